import process from "node:process";

/**
 * Runtime types derived from the Node.js process globals, kept in one place so
 * the supervisor and the gateway agree on the shapes they pass around.
 */
export type ProcessEnv = typeof process.env;

/**
 * Errno-flavoured error raised by sockets and `child_process`. Only the
 * properties inspected by the runtime are listed.
 */
export interface ErrnoException extends Error {
  code?: string;
  errno?: number;
  path?: string;
  syscall?: string;
}

/** Narrows an unknown failure to an {@link ErrnoException} when it carries a code. */
export function isErrnoException(value: unknown): value is ErrnoException {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
