import type { Post } from "../domain";
import { PostNotFoundError } from "../errors";
import type { PostStore } from "../store/types";

function inBounds(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

export class BoardService {
  constructor(private readonly store: PostStore) {}

  list(): Post[] {
    return this.store.load();
  }

  create(title: string, content: string): void {
    this.store.appendOne({ title: title.trim(), content });
  }

  get(index: number): Post {
    const posts = this.store.load();
    const post = inBounds(index, posts.length) ? posts[index] : undefined;
    if (!post) throw new PostNotFoundError(index);
    return post;
  }

  update(index: number, title: string, content: string): void {
    const posts = this.store.load();
    if (!inBounds(index, posts.length)) throw new PostNotFoundError(index);
    posts[index] = { title, content };
    this.store.rewriteAll(posts);
  }

  // A stale delete (post already gone) is not an error.
  delete(index: number): void {
    const posts = this.store.load();
    if (!inBounds(index, posts.length)) return;
    posts.splice(index, 1);
    this.store.rewriteAll(posts);
  }
}
