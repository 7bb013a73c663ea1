export type Post = {
  title: string;
  content: string;
};

export type StoredFormat = "json" | "legacy";

export type SkipReason = "blank" | "malformed";

export type ParsedRecord =
  | { kind: "parsed"; post: Post; format: StoredFormat }
  | { kind: "skipped"; reason: SkipReason };
