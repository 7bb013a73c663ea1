import type { Post } from "../domain";
import { splitLines } from "./jsonl";
import { decodeRecords, encodeRecord } from "./records";
import type { PostStore } from "./types";

// Holds the same line-oriented text the file store would write.
export class MemoryPostStore implements PostStore {
  private buffer: string;

  constructor(lines: readonly string[] = []) {
    this.buffer = lines.map((line) => `${line}\n`).join("");
  }

  static fromText(text: string): MemoryPostStore {
    const store = new MemoryPostStore();
    store.buffer = text;
    return store;
  }

  text(): string {
    return this.buffer;
  }

  load(): Post[] {
    return decodeRecords(splitLines(this.buffer));
  }

  appendOne(post: Post): void {
    if (this.buffer.length > 0 && !this.buffer.endsWith("\n")) this.buffer += "\n";
    this.buffer += encodeRecord(post);
  }

  rewriteAll(posts: readonly Post[]): void {
    this.buffer = posts.map(encodeRecord).join("");
  }
}
