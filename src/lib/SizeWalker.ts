/**
 * Recursive directory size walker
 */

import * as fs from "fs";
import * as path from "path";
import { FolderInfo, ISizeWalker } from "../interfaces/ISizeWalker";
import { FileSystemError, throwIfCancelled } from "../types";

interface Totals {
  size: number;
  files: number;
  folders: number;
}

export class SizeWalker implements ISizeWalker {
  /**
   * Total size and counts for a directory tree
   */
  async getFolderInfo(
    dirPath: string,
    signal?: AbortSignal
  ): Promise<FolderInfo> {
    await this.assertDirectory(dirPath);
    const totals = await this.walk(dirPath, signal);

    return {
      path: dirPath,
      name: path.basename(dirPath),
      sizeInBytes: totals.size,
      fileCount: totals.files,
      folderCount: totals.folders,
    };
  }

  /**
   * Immediate subdirectories with their totals, largest first.
   * Subdirectories that cannot be read are kept with zero totals.
   */
  async getSubdirectories(
    dirPath: string,
    signal?: AbortSignal
  ): Promise<FolderInfo[]> {
    await this.assertDirectory(dirPath);

    const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    const result: FolderInfo[] = [];

    for (const entry of entries) {
      if (!entry.isDirectory()) {
        continue;
      }
      throwIfCancelled(signal);

      const fullPath = path.join(dirPath, entry.name);
      if (!(await this.isReadable(fullPath))) {
        result.push({
          path: fullPath,
          name: `${entry.name} (Access Denied)`,
          sizeInBytes: 0,
          fileCount: 0,
          folderCount: 0,
        });
        continue;
      }

      const totals = await this.walk(fullPath, signal);
      result.push({
        path: fullPath,
        name: entry.name,
        sizeInBytes: totals.size,
        fileCount: totals.files,
        folderCount: totals.folders,
      });
    }

    return result.sort((a, b) => b.sizeInBytes - a.sizeInBytes);
  }

  /**
   * Sum of file lengths below a directory
   */
  async calculateDirectorySize(
    dirPath: string,
    signal?: AbortSignal
  ): Promise<number> {
    const totals = await this.walk(dirPath, signal);
    return totals.size;
  }

  private async assertDirectory(dirPath: string): Promise<void> {
    let stats: fs.Stats;
    try {
      stats = await fs.promises.stat(dirPath);
    } catch (error) {
      throw new FileSystemError(`Directory not found: ${dirPath}`);
    }

    if (!stats.isDirectory()) {
      throw new FileSystemError(`Path is not a directory: ${dirPath}`);
    }
  }

  private async isReadable(dirPath: string): Promise<boolean> {
    try {
      await fs.promises.access(dirPath, fs.constants.R_OK | fs.constants.X_OK);
      return true;
    } catch (error) {
      return false;
    }
  }

  /**
   * Recursively accumulate sizes. Symlinks count with their own length and
   * are never followed.
   */
  private async walk(dirPath: string, signal?: AbortSignal): Promise<Totals> {
    const totals: Totals = { size: 0, files: 0, folders: 0 };

    throwIfCancelled(signal);

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      // Unreadable directories contribute nothing
      return totals;
    }

    for (const entry of entries) {
      throwIfCancelled(signal);
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        const sub = await this.walk(fullPath, signal);
        totals.size += sub.size;
        totals.files += sub.files;
        totals.folders += sub.folders + 1;
        continue;
      }

      if (entry.isFile() || entry.isSymbolicLink()) {
        try {
          const stats = await fs.promises.lstat(fullPath);
          totals.size += stats.size;
          totals.files++;
        } catch (error) {
          // Vanished or unreadable entries count as 0
          continue;
        }
      }
    }

    return totals;
  }
}
