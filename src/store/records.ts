import type { ParsedRecord, Post } from "../domain";
import { encodeJsonLine, safeJsonParse } from "./jsonl";

export const LEGACY_DELIMITER = "|||";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function encodeRecord(post: Post): string {
  return encodeJsonLine({ title: post.title, content: post.content });
}

function parseJsonRecord(line: string): Post | null {
  const parsed = safeJsonParse(line);
  if (!parsed.ok || !isRecord(parsed.value)) return null;

  const { title, content } = parsed.value;
  if (typeof title !== "string" || typeof content !== "string") return null;
  return { title, content };
}

function parseLegacyRecord(line: string): Post | null {
  const delimiterIndex = line.indexOf(LEGACY_DELIMITER);
  if (delimiterIndex < 0) return null;
  return {
    title: line.slice(0, delimiterIndex),
    content: line.slice(delimiterIndex + LEGACY_DELIMITER.length),
  };
}

// JSON first, then the legacy `title|||content` form. Never throws.
export function parseRecordLine(line: string): ParsedRecord {
  const trimmed = line.trim();
  if (trimmed.length === 0) return { kind: "skipped", reason: "blank" };

  const fromJson = parseJsonRecord(trimmed);
  if (fromJson) return { kind: "parsed", post: fromJson, format: "json" };

  const fromLegacy = parseLegacyRecord(trimmed);
  if (fromLegacy) return { kind: "parsed", post: fromLegacy, format: "legacy" };

  return { kind: "skipped", reason: "malformed" };
}

export function decodeRecords(lines: readonly string[]): Post[] {
  const posts: Post[] = [];
  for (const line of lines) {
    const record = parseRecordLine(line);
    if (record.kind === "parsed") posts.push(record.post);
  }
  return posts;
}
