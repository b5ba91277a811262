/**
 * File system seam shared by the resume ledger, the worker pool and the
 * orchestrator.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";

/**
 * File system interface for dependency injection.
 */
export interface FileSystem {
  writeFile(path: string, data: Uint8Array | string): Promise<void>;
  readFile(path: string): Promise<Uint8Array>;
  readTextFile(path: string): Promise<string>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
  exists(path: string): Promise<boolean>;
  stat(path: string): Promise<{ size: number }>;
}

/**
 * Default file system using node:fs.
 */
export const defaultFileSystem: FileSystem = {
  writeFile: (path, data) => writeFile(path, data),
  readFile: (path) => readFile(path),
  readTextFile: (path) => readFile(path, "utf8"),
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
  mkdir: async (path, options) => {
    await mkdir(path, options);
  },
  exists: async (path) => {
    try {
      await stat(path);
      return true;
    } catch {
      return false;
    }
  },
  stat: async (path) => {
    const info = await stat(path);
    return { size: info.size };
  },
};
