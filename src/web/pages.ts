import type { Post } from "../domain";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function layout(title: string, body: string[]): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    ...body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

export function renderBoardPage(posts: readonly Post[]): string {
  const items = posts.map(
    (post, index) => `<li><a href="/detail/${index}">${escapeHtml(post.title)}</a></li>`,
  );
  return layout("Board", [
    "<h2>Board</h2>",
    '<a href="/create">New post</a>',
    items.length > 0 ? `<ul>\n${items.join("\n")}\n</ul>` : "<p>No posts yet.</p>",
  ]);
}

export function renderCreatePage(): string {
  return layout("New post", [
    "<h2>New post</h2>",
    '<form method="post" action="/create">',
    '<label>Title <input type="text" name="title"></label><br><br>',
    '<label>Content<br><textarea name="content" rows="4" cols="50"></textarea></label><br>',
    '<button type="submit">Save</button>',
    "</form>",
    '<a href="/board">Back to list</a>',
  ]);
}

export function renderDetailPage(index: number, post: Post): string {
  return layout(post.title, [
    `<h2>${escapeHtml(post.title)}</h2>`,
    `<pre style="white-space:pre-wrap; font-family:inherit;">${escapeHtml(post.content)}</pre>`,
    '<div style="display:flex; gap:10px;">',
    `<a href="/edit/${index}"><button type="button">Edit</button></a>`,
    `<form method="post" action="/delete/${index}" onsubmit="return confirm('Delete this post?');">`,
    '<button type="submit">Delete</button>',
    "</form>",
    "</div>",
    '<p><a href="/board">Back to list</a></p>',
  ]);
}

// An <input> drops line breaks from its value, so multi-line titles get a textarea.
function renderTitleField(title: string): string {
  if (/[\r\n]/.test(title)) {
    return `<textarea name="title" rows="2" cols="60" required>\n${escapeHtml(title)}</textarea>`;
  }
  return `<input type="text" name="title" value="${escapeHtml(title)}" required>`;
}

export function renderEditPage(index: number, post: Post): string {
  return layout("Edit post", [
    "<h2>Edit post</h2>",
    `<form method="post" action="/edit/${index}">`,
    `<label>Title ${renderTitleField(post.title)}</label><br><br>`,
    `<label>Content<br><textarea name="content" rows="6" cols="60" required>\n${escapeHtml(post.content)}</textarea></label><br>`,
    '<button type="submit">Save changes</button>',
    "</form>",
    `<p><a href="/detail/${index}">Back</a></p>`,
  ]);
}
