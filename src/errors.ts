export type BoardErrorCode = "NOT_FOUND" | "STORAGE";

export class BoardError extends Error {
  readonly code: BoardErrorCode;

  constructor(code: BoardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class PostNotFoundError extends BoardError {
  readonly index: number;

  constructor(index: number) {
    super("NOT_FOUND", `Post ${index} does not exist`);
    this.index = index;
  }
}

export type StorageOperation = "read" | "append" | "rewrite";

export class StorageError extends BoardError {
  readonly operation: StorageOperation;
  readonly filePath: string;

  constructor(operation: StorageOperation, filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STORAGE", `Failed to ${operation} ${filePath}: ${reason}`, { cause });
    this.operation = operation;
    this.filePath = filePath;
  }
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && "code" in value;
}
