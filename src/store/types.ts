import type { Post } from "../domain";

export interface PostStore {
  load(): Post[];
  appendOne(post: Post): void;
  rewriteAll(posts: readonly Post[]): void;
}
