import { BodyTooLargeError, readBody } from "./forms";
import type { WebRequest, WebResponse } from "./router";

// Structural subsets of http.IncomingMessage and http.ServerResponse.
export type IncomingRequest = AsyncIterable<Buffer | string> & { url?: string; method?: string };

export type OutgoingResponse = {
  statusCode: number;
  setHeader(name: string, value: string): unknown;
  end(body: string): unknown;
};

function send(res: OutgoingResponse, response: WebResponse): void {
  res.statusCode = response.status;
  for (const [name, value] of Object.entries(response.headers)) res.setHeader(name, value);
  res.end(response.body);
}

function sendText(res: OutgoingResponse, status: number, body: string): void {
  send(res, { status, headers: { "content-type": "text/plain; charset=utf-8" }, body });
}

export function createRequestListener(
  route: (req: WebRequest) => WebResponse,
): (req: IncomingRequest, res: OutgoingResponse) => Promise<void> {
  return async (req, res) => {
    try {
      const url = new URL(req.url ?? "/", "http://localhost");
      const method = req.method ?? "GET";
      const body = method === "POST" ? await readBody(req) : "";
      send(res, route({ method, pathname: url.pathname, body }));
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        sendText(res, 413, "Body too large");
        return;
      }

      console.error("[http] request failed:", error);
      sendText(res, 500, "Internal error");
    }
  };
}
