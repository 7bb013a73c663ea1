import type { BoardService } from "../board/service";
import { PostNotFoundError } from "../errors";
import { parsePostForm } from "./forms";
import { renderBoardPage, renderCreatePage, renderDetailPage, renderEditPage } from "./pages";

export type WebRequest = {
  method: string;
  pathname: string;
  body: string;
};

export type WebResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

type Route = {
  pattern: RegExp;
  methods: Record<string, (params: RouteParams) => WebResponse>;
};

type RouteParams = { index: number; body: string };

function html(body: string): WebResponse {
  return { status: 200, headers: { "content-type": "text/html; charset=utf-8" }, body };
}

function text(status: number, body: string, headers: Record<string, string> = {}): WebResponse {
  return { status, headers: { "content-type": "text/plain; charset=utf-8", ...headers }, body };
}

function json(status: number, body: unknown): WebResponse {
  return {
    status,
    headers: { "content-type": "application/json; charset=utf-8", "cache-control": "no-store" },
    body: JSON.stringify(body),
  };
}

function redirect(location: string): WebResponse {
  return { status: 302, headers: { location }, body: "" };
}

function notFound(): WebResponse {
  return text(404, "Post not found");
}

function allowedMethods(route: Route): string[] {
  const methods = Object.keys(route.methods);
  return route.methods.GET ? [...methods, "HEAD"] : methods;
}

export function createRouter(service: BoardService): (req: WebRequest) => WebResponse {
  const routes: Route[] = [
    { pattern: /^\/$/, methods: { GET: () => redirect("/board") } },
    { pattern: /^\/health$/, methods: { GET: () => json(200, { ok: true }) } },
    { pattern: /^\/board$/, methods: { GET: () => html(renderBoardPage(service.list())) } },
    {
      pattern: /^\/create$/,
      methods: {
        GET: () => html(renderCreatePage()),
        POST: ({ body }) => {
          const parsed = parsePostForm(body);
          if (!parsed.ok) return text(400, parsed.message);
          service.create(parsed.form.title, parsed.form.content);
          return redirect("/board");
        },
      },
    },
    {
      pattern: /^\/detail\/(\d+)$/,
      methods: { GET: ({ index }) => html(renderDetailPage(index, service.get(index))) },
    },
    {
      pattern: /^\/edit\/(\d+)$/,
      methods: {
        GET: ({ index }) => html(renderEditPage(index, service.get(index))),
        POST: ({ index, body }) => {
          const parsed = parsePostForm(body);
          if (!parsed.ok) return text(400, parsed.message);
          service.update(index, parsed.form.title, parsed.form.content);
          return redirect(`/detail/${index}`);
        },
      },
    },
    {
      pattern: /^\/delete\/(\d+)$/,
      methods: {
        POST: ({ index }) => {
          service.delete(index);
          return redirect("/board");
        },
      },
    },
  ];

  return (req) => {
    for (const route of routes) {
      const match = route.pattern.exec(req.pathname);
      if (!match) continue;

      const handler = route.methods[req.method] ?? (req.method === "HEAD" ? route.methods.GET : undefined);
      if (!handler) return text(405, "Method not allowed", { allow: allowedMethods(route).join(", ") });

      const index = match[1] === undefined ? -1 : Number(match[1]);
      try {
        return handler({ index, body: req.body });
      } catch (error) {
        if (error instanceof PostNotFoundError) return notFound();
        throw error;
      }
    }

    return text(404, "Not found");
  };
}
