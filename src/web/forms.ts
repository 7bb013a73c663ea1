export const MAX_FORM_BYTES = 256 * 1024;

export class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Body exceeds ${limit} bytes`);
    this.name = "BodyTooLargeError";
  }
}

export async function readBody(
  req: AsyncIterable<Buffer | string>,
  maxBytes: number = MAX_FORM_BYTES,
): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) throw new BodyTooLargeError(maxBytes);
    chunks.push(buf);
  }

  return Buffer.concat(chunks).toString("utf8");
}

export type PostForm = { title: string; content: string };

export function parsePostForm(body: string): { ok: true; form: PostForm } | { ok: false; message: string } {
  const params = new URLSearchParams(body);
  const title = params.get("title");
  const content = params.get("content");
  if (title === null) return { ok: false, message: "title is required" };
  if (content === null) return { ok: false, message: "content is required" };
  return { ok: true, form: { title, content } };
}
