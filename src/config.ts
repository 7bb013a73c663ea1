import fs from "node:fs";
import path from "node:path";

export const DEFAULT_POSTS_PATH = "posts.txt";
export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = "127.0.0.1";

export type BoardConfig = {
  postsPath: string;
  port: number;
  host: string;
};

export function resolvePath(value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
}

export function ensureParentDir(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BoardConfig {
  const portRaw = Number(env.BOARD_PORT ?? DEFAULT_PORT);
  const port = Number.isInteger(portRaw) && portRaw >= 0 && portRaw <= 65535 ? portRaw : DEFAULT_PORT;
  const host = env.BOARD_HOST?.trim() || DEFAULT_HOST;
  const postsPath = resolvePath(env.BOARD_POSTS_PATH?.trim() || DEFAULT_POSTS_PATH);
  return { postsPath, port, host };
}
