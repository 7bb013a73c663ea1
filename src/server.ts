import http from "node:http";
import { BoardService } from "./board/service";
import { loadConfig } from "./config";
import { FilePostStore } from "./store/file";
import { createRequestListener } from "./web/http";
import { createRouter } from "./web/router";

function main(): void {
  const { postsPath, port, host } = loadConfig();

  const service = new BoardService(new FilePostStore(postsPath));
  const server = http.createServer(createRequestListener(createRouter(service)));

  server.on("error", (err) => {
    console.error("[server] server error:", err);
    process.exitCode = 1;
  });

  server.listen(port, host, () => {
    console.log(`[server] http://${host}:${port}`);
    console.log(`[server] posts: ${postsPath}`);
  });

  const shutdown = () => {
    server.close(() => {
      console.log("[server] stopped");
    });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main();
