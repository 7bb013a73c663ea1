import fs from "node:fs";
import { ensureParentDir } from "../config";
import type { Post } from "../domain";
import { StorageError, isErrnoException } from "../errors";
import { splitLines } from "./jsonl";
import { decodeRecords, encodeRecord } from "./records";
import type { PostStore } from "./types";

export class FilePostStore implements PostStore {
  constructor(readonly filePath: string) {}

  load(): Post[] {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return [];
      throw new StorageError("read", this.filePath, err);
    }
    return decodeRecords(splitLines(text));
  }

  // True when the file has content whose last byte is not a newline.
  private endsMidLine(): boolean {
    let fd: number;
    try {
      fd = fs.openSync(this.filePath, "r");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw err;
    }

    try {
      const { size } = fs.fstatSync(fd);
      if (size === 0) return false;
      const last = Buffer.alloc(1);
      fs.readSync(fd, last, 0, 1, size - 1);
      return last[0] !== 0x0a;
    } finally {
      fs.closeSync(fd);
    }
  }

  appendOne(post: Post): void {
    try {
      ensureParentDir(this.filePath);
      const separator = this.endsMidLine() ? "\n" : "";
      fs.appendFileSync(this.filePath, separator + encodeRecord(post), "utf8");
    } catch (err) {
      throw new StorageError("append", this.filePath, err);
    }
  }

  rewriteAll(posts: readonly Post[]): void {
    try {
      ensureParentDir(this.filePath);
      fs.writeFileSync(this.filePath, posts.map(encodeRecord).join(""), "utf8");
    } catch (err) {
      throw new StorageError("rewrite", this.filePath, err);
    }
  }
}
