/**
 * Small filesystem probes shared by the analyzers
 *
 * Permission, missing-path and path-length failures are absorbed here so a
 * single unreadable folder only skips that folder. Anything else is re-thrown
 * and reported by the aggregator against the running analyzer.
 */

import * as fs from "fs";
import * as path from "path";

const SKIPPABLE_CODES = new Set([
  "EACCES",
  "EPERM",
  "ENOENT",
  "ENOTDIR",
  "ENAMETOOLONG",
  "ELOOP",
  "EBUSY",
]);

export interface FileEntry {
  path: string;
  name: string;
  size: number;
  accessedAt: Date;
}

/**
 * Errors from Node's fs may come from another realm (as under Jest), so
 * they are recognised by shape rather than with instanceof.
 */
export function isSkippableFsError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    SKIPPABLE_CODES.has(error.code)
  );
}

export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(dirPath)).isDirectory();
  } catch (error) {
    if (isSkippableFsError(error)) {
      return false;
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(filePath)).isFile();
  } catch (error) {
    if (isSkippableFsError(error)) {
      return false;
    }
    throw error;
  }
}

async function readEntries(dirPath: string): Promise<fs.Dirent[]> {
  try {
    return await fs.promises.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isSkippableFsError(error)) {
      return [];
    }
    throw error;
  }
}

/**
 * Full paths of the immediate subdirectories (symlinks are not followed)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  const entries = await readEntries(dirPath);
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(dirPath, entry.name));
}

/**
 * Regular files directly inside a directory, with length and last access
 */
export async function listFiles(dirPath: string): Promise<FileEntry[]> {
  const entries = await readEntries(dirPath);
  const files: FileEntry[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const fullPath = path.join(dirPath, entry.name);
    try {
      const stats = await fs.promises.stat(fullPath);
      files.push({
        path: fullPath,
        name: entry.name,
        size: stats.size,
        accessedAt: stats.atime,
      });
    } catch (error) {
      if (!isSkippableFsError(error)) {
        throw error;
      }
    }
  }

  return files;
}

/**
 * Hidden or system-reserved folder names ("." and "$" prefixes)
 */
export function isHiddenName(name: string): boolean {
  return name.startsWith(".") || name.startsWith("$");
}
