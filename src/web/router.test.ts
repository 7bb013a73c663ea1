import { describe, expect, it } from "vitest";
import { BoardService } from "../board/service";
import { StorageError } from "../errors";
import { MemoryPostStore } from "../store/memory";
import type { PostStore } from "../store/types";
import { createRouter, type WebRequest } from "./router";

function setup(lines: string[] = []) {
  const store = new MemoryPostStore(lines);
  const service = new BoardService(store);
  return { store, service, route: createRouter(service) };
}

function get(pathname: string): WebRequest {
  return { method: "GET", pathname, body: "" };
}

function post(pathname: string, body = ""): WebRequest {
  return { method: "POST", pathname, body };
}

describe("createRouter", () => {
  it("redirects the root to the board", () => {
    const res = setup().route(get("/"));
    expect(res.status).toBe(302);
    expect(res.headers.location).toBe("/board");
  });

  it("answers the health check", () => {
    const res = setup().route(get("/health"));
    expect(res.status).toBe(200);
    expect(res.body).toBe('{"ok":true}');
  });

  describe("GET /board", () => {
    it("links every title to its positional index", () => {
      const { route } = setup(["Hello|||World", '{"title":"<b>A&B</b>","content":""}']);
      const res = route(get("/board"));
      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("text/html; charset=utf-8");
      expect(res.body).toContain('<li><a href="/detail/0">Hello</a></li>');
      expect(res.body).toContain('<li><a href="/detail/1">&lt;b&gt;A&amp;B&lt;/b&gt;</a></li>');
    });

    it("shows a placeholder for an empty board", () => {
      expect(setup().route(get("/board")).body).toContain("<p>No posts yet.</p>");
    });
  });

  describe("/create", () => {
    it("renders the form", () => {
      const res = setup().route(get("/create"));
      expect(res.status).toBe(200);
      expect(res.body).toContain('<form method="post" action="/create">');
    });

    it("creates a post from the submitted form", () => {
      const { route, service } = setup();
      const res = route(post("/create", "title=+Hi+&content=line1%0Aline2"));
      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/board");
      expect(service.list()).toEqual([{ title: "Hi", content: "line1\nline2" }]);
    });

    it("rejects a form without content", () => {
      const { route, service } = setup();
      const res = route(post("/create", "title=Hi"));
      expect(res.status).toBe(400);
      expect(res.body).toBe("content is required");
      expect(service.list()).toEqual([]);
    });
  });

  describe("GET /detail/:index", () => {
    it("renders the post", () => {
      const { route } = setup(["Hello|||World"]);
      const res = route(get("/detail/0"));
      expect(res.status).toBe(200);
      expect(res.body).toContain("<h2>Hello</h2>");
      expect(res.body).toContain('<pre style="white-space:pre-wrap; font-family:inherit;">World</pre>');
      expect(res.body).toContain('<form method="post" action="/delete/0"');
    });

    it("answers 404 for a missing index", () => {
      const res = setup(["Hello|||World"]).route(get("/detail/1"));
      expect(res.status).toBe(404);
      expect(res.body).toBe("Post not found");
    });

    it("does not match a negative index", () => {
      const res = setup(["Hello|||World"]).route(get("/detail/-1"));
      expect(res.status).toBe(404);
      expect(res.body).toBe("Not found");
    });
  });

  describe("/edit/:index", () => {
    it("prefills the form with the escaped post", () => {
      const { route } = setup(['{"title":"Say \\"hi\\"","content":"\\nfirst"}']);
      const res = route(get("/edit/0"));
      expect(res.status).toBe(200);
      expect(res.body).toContain('value="Say &quot;hi&quot;"');
      expect(res.body).toContain('required>\n\nfirst</textarea>');
    });

    it("uses a textarea for a multi-line title", () => {
      const { route } = setup(['{"title":"line one\\nline two","content":"body"}']);
      const res = route(get("/edit/0"));
      expect(res.body).toContain('<textarea name="title" rows="2" cols="60" required>\nline one\nline two</textarea>');
      expect(res.body).not.toContain('<input type="text" name="title"');
    });

    it("updates the post and redirects to its detail page", () => {
      const { route, service } = setup(["Hello|||World", "Second|||Post"]);
      const res = route(post("/edit/1", "title=T2&content=C2"));
      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/detail/1");
      expect(service.get(1)).toEqual({ title: "T2", content: "C2" });
    });

    it("answers 404 when the post is gone", () => {
      const { route, store } = setup(["Hello|||World"]);
      expect(route(get("/edit/3")).status).toBe(404);
      expect(route(post("/edit/3", "title=T&content=C")).status).toBe(404);
      expect(store.text()).toBe("Hello|||World\n");
    });
  });

  describe("POST /delete/:index", () => {
    it("removes the post and redirects to the board", () => {
      const { route, service } = setup(["A|||1", "B|||2"]);
      const res = route(post("/delete/0"));
      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/board");
      expect(service.list()).toEqual([{ title: "B", content: "2" }]);
    });

    it("redirects even when the post is already gone", () => {
      const { route, store } = setup(["A|||1"]);
      const res = route(post("/delete/5"));
      expect(res.status).toBe(302);
      expect(res.headers.location).toBe("/board");
      expect(store.text()).toBe("A|||1\n");
    });
  });

  it("answers 405 with the allowed methods", () => {
    const { route } = setup(["A|||1"]);
    const deleteByGet = route(get("/delete/0"));
    expect(deleteByGet.status).toBe(405);
    expect(deleteByGet.headers.allow).toBe("POST");

    const putBoard = route({ method: "PUT", pathname: "/board", body: "" });
    expect(putBoard.status).toBe(405);
    expect(putBoard.headers.allow).toBe("GET, HEAD");
  });

  it("answers HEAD on routes that answer GET", () => {
    const { route } = setup(["A|||1"]);
    expect(route({ method: "HEAD", pathname: "/board", body: "" }).status).toBe(200);
    expect(route({ method: "HEAD", pathname: "/detail/0", body: "" }).status).toBe(200);
    expect(route({ method: "HEAD", pathname: "/detail/4", body: "" }).status).toBe(404);

    const headDelete = route({ method: "HEAD", pathname: "/delete/0", body: "" });
    expect(headDelete.status).toBe(405);
    expect(headDelete.headers.allow).toBe("POST");
  });

  it("answers 404 for unknown paths", () => {
    const res = setup().route(get("/nowhere"));
    expect(res.status).toBe(404);
    expect(res.body).toBe("Not found");
  });

  it("lets storage errors through", () => {
    const failing: PostStore = {
      load: () => {
        throw new StorageError("read", "posts.txt", new Error("EACCES"));
      },
      appendOne: () => {},
      rewriteAll: () => {},
    };
    const route = createRouter(new BoardService(failing));
    expect(() => route(get("/board"))).toThrow(StorageError);
  });
});
