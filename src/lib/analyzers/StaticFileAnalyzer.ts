/**
 * Cold and oversized user files: old downloads, installers, large media
 * and disk images
 */

import * as path from "path";
import {
  IInsightAnalyzer,
  Insight,
  InsightType,
  RecommendedAction,
} from "../../interfaces/IInsightAnalyzer";
import { SystemPaths } from "../../interfaces/ISystemPaths";
import { throwIfCancelled } from "../../types";
import { createInsight } from "../InsightModel";
import { formatBytes, MB } from "../SizeFormatter";
import {
  directoryExists,
  FileEntry,
  isHiddenName,
  listDirectories,
  listFiles,
} from "./FsQueries";

const DAY_MS = 24 * 60 * 60 * 1000;

export const INSTALLER_EXTENSIONS = [
  ".exe",
  ".msi",
  ".msix",
  ".dmg",
  ".pkg",
  ".deb",
  ".rpm",
  ".appimage",
];

export const ARCHIVABLE_MEDIA_EXTENSIONS = [
  ".mp4",
  ".mkv",
  ".avi",
  ".mov",
  ".wmv",
  ".zip",
  ".rar",
  ".7z",
];

export const DISK_IMAGE_EXTENSIONS = [".iso", ".img", ".vhd", ".vmdk"];

/** Folders never entered by the home-wide disk image search */
const DISK_IMAGE_PRUNED = new Set(["AppData", "Library", "node_modules"]);

const OLD_DOWNLOADS_THRESHOLD = 100 * MB;
const LARGE_INSTALLER_THRESHOLD = 50 * MB;

export interface StaticFileAnalyzerOptions {
  daysUntilOld?: number;
  largeFileSizeMB?: number;
  /** Disk images at or below this size are ignored */
  diskImageMinMB?: number;
  /** Clock used for the age cutoff */
  now?: () => number;
}

function extensionOf(name: string): string {
  return path.extname(name).toLowerCase();
}

export class StaticFileAnalyzer implements IInsightAnalyzer {
  readonly name = "Static Files";

  private readonly daysUntilOld: number;
  private readonly largeFileThreshold: number;
  private readonly diskImageThreshold: number;
  private readonly now: () => number;

  constructor(
    private readonly paths: SystemPaths,
    options: StaticFileAnalyzerOptions = {}
  ) {
    this.daysUntilOld = options.daysUntilOld ?? 180;
    this.largeFileThreshold = (options.largeFileSizeMB ?? 500) * MB;
    this.diskImageThreshold = (options.diskImageMinMB ?? 10) * MB;
    this.now = options.now ?? Date.now;
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const insights: Insight[] = [];
    const { home } = this.paths;

    const downloads = path.join(home, "Downloads");
    if (await directoryExists(downloads)) {
      insights.push(...(await this.analyzeDownloads(downloads, signal)));
    }

    for (const folder of ["Videos", "Documents", "Desktop"]) {
      const location = path.join(home, folder);
      if (await directoryExists(location)) {
        await this.findLargeFiles(location, 0, 3, insights, signal);
      }
    }

    const diskImages: Insight[] = [];
    await this.findDiskImages(home, 0, 4, diskImages, signal);

    // A disk image also found as a large file keeps only its Archive finding
    const imagePaths = new Set(diskImages.map((insight) => insight.path));
    return [
      ...insights.filter((insight) => !imagePaths.has(insight.path)),
      ...diskImages,
    ];
  }

  private async analyzeDownloads(
    downloads: string,
    signal?: AbortSignal
  ): Promise<Insight[]> {
    const insights: Insight[] = [];
    const cutoff = this.now() - this.daysUntilOld * DAY_MS;
    const oldFiles: FileEntry[] = [];
    const installers: FileEntry[] = [];

    for (const file of await listFiles(downloads)) {
      throwIfCancelled(signal);

      if (file.accessedAt.getTime() < cutoff) {
        oldFiles.push(file);
      }
      if (
        INSTALLER_EXTENSIONS.includes(extensionOf(file.name)) &&
        file.size > LARGE_INSTALLER_THRESHOLD
      ) {
        installers.push(file);
      }
    }

    const oldSize = oldFiles.reduce((sum, file) => sum + file.size, 0);
    if (oldSize > OLD_DOWNLOADS_THRESHOLD) {
      insights.push(
        createInsight({
          type: InsightType.OldFiles,
          description: `Downloads: ${oldFiles.length} old files (${formatBytes(oldSize)})`,
          path: downloads,
          sizeInBytes: oldSize,
          action: RecommendedAction.Archive,
        })
      );
    }

    if (installers.length > 0) {
      const installerSize = installers.reduce((sum, file) => sum + file.size, 0);
      insights.push(
        createInsight({
          type: InsightType.LargeFiles,
          description: `Downloads: ${installers.length} large installers (${formatBytes(installerSize)})`,
          path: downloads,
          sizeInBytes: installerSize,
          action: RecommendedAction.Review,
        })
      );
    }

    return insights;
  }

  private async findLargeFiles(
    dirPath: string,
    currentDepth: number,
    maxDepth: number,
    insights: Insight[],
    signal?: AbortSignal
  ): Promise<void> {
    if (currentDepth > maxDepth) {
      return;
    }

    for (const file of await listFiles(dirPath)) {
      throwIfCancelled(signal);
      if (file.size <= this.largeFileThreshold) {
        continue;
      }

      const isMedia = ARCHIVABLE_MEDIA_EXTENSIONS.includes(extensionOf(file.name));
      insights.push(
        createInsight({
          type: InsightType.LargeFiles,
          description: `Large file: ${file.name} (${formatBytes(file.size)})`,
          path: file.path,
          sizeInBytes: file.size,
          action: isMedia ? RecommendedAction.Archive : RecommendedAction.Review,
        })
      );
    }

    for (const dir of await listDirectories(dirPath)) {
      throwIfCancelled(signal);
      if (isHiddenName(path.basename(dir))) {
        continue;
      }
      await this.findLargeFiles(dir, currentDepth + 1, maxDepth, insights, signal);
    }
  }

  private async findDiskImages(
    dirPath: string,
    currentDepth: number,
    maxDepth: number,
    insights: Insight[],
    signal?: AbortSignal
  ): Promise<void> {
    if (currentDepth > maxDepth) {
      return;
    }

    for (const file of await listFiles(dirPath)) {
      throwIfCancelled(signal);
      if (
        !DISK_IMAGE_EXTENSIONS.includes(extensionOf(file.name)) ||
        file.size <= this.diskImageThreshold
      ) {
        continue;
      }

      insights.push(
        createInsight({
          type: InsightType.LargeFiles,
          description: `Disk image: ${file.name} (${formatBytes(file.size)})`,
          path: file.path,
          sizeInBytes: file.size,
          action: RecommendedAction.Archive,
        })
      );
    }

    for (const dir of await listDirectories(dirPath)) {
      throwIfCancelled(signal);
      const name = path.basename(dir);
      if (isHiddenName(name) || DISK_IMAGE_PRUNED.has(name)) {
        continue;
      }
      await this.findDiskImages(
        dir,
        currentDepth + 1,
        maxDepth,
        insights,
        signal
      );
    }
  }
}
