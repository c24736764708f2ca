import { readFileSync, realpathSync } from "node:fs";
import { logger } from "../logger";

/**
 * Read-only access to the process environment and filesystem
 * Every method returns undefined instead of throwing.
 */
export interface HostAccess {
  env(name: string): string | undefined;
  readTextFile(path: string): string | undefined;
  /** Absolute path with every symbolic link resolved */
  realPath(path: string): string | undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * HostAccess backed by process.env and node:fs
 */
export const nodeHost: HostAccess = {
  env(name) {
    return process.env[name];
  },

  readTextFile(path) {
    try {
      return readFileSync(path, "utf-8");
    } catch (error) {
      logger.debug("Unreadable file", { path, error: describeError(error) });
      return undefined;
    }
  },

  realPath(path) {
    try {
      return realpathSync(path);
    } catch (error) {
      logger.debug("Unresolvable path", { path, error: describeError(error) });
      return undefined;
    }
  },
};
