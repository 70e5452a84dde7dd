/**
 * Size walker interface
 */

export interface FolderInfo {
  path: string;
  name: string;
  sizeInBytes: number;
  fileCount: number;
  folderCount: number;
}

export interface ISizeWalker {
  /**
   * Total size and counts for a directory tree
   * @throws FileSystemError if the path is not a directory
   */
  getFolderInfo(dirPath: string, signal?: AbortSignal): Promise<FolderInfo>;

  /**
   * Immediate subdirectories with their totals, largest first
   */
  getSubdirectories(dirPath: string, signal?: AbortSignal): Promise<FolderInfo[]>;

  /**
   * Sum of all file lengths below a directory. Unreadable entries count as 0.
   */
  calculateDirectorySize(dirPath: string, signal?: AbortSignal): Promise<number>;
}
