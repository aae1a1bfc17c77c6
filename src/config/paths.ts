/**
 * @file src/config/paths.ts
 * @description Filesystem locations used by the library. Only logging writes to disk;
 *   conversations live in memory for the lifetime of the process.
 */
import { join, resolve } from "path";

export interface LogDirectories {
  /** Root directory for combined log files. */
  combined: string;
  /** Sub-directory for error-level logs. */
  error: string;
}

/**
 * Resolve the log directories below `root` (relative paths resolve against the working directory).
 */
export function resolveLogDirectories(root: string): LogDirectories {
  const combined = resolve(process.cwd(), root);
  return { combined, error: join(combined, "error") };
}
