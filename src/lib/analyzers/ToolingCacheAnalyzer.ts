/**
 * IDE and editor caches: Visual Studio, JetBrains products and VS Code
 */

import * as path from "path";
import { minimatch } from "minimatch";
import {
  IInsightAnalyzer,
  Insight,
  InsightType,
  RecommendedAction,
} from "../../interfaces/IInsightAnalyzer";
import { ISizeWalker } from "../../interfaces/ISizeWalker";
import { SystemPaths } from "../../interfaces/ISystemPaths";
import { throwIfCancelled } from "../../types";
import { createInsight } from "../InsightModel";
import { formatBytes, MB } from "../SizeFormatter";
import { directoryExists, listDirectories } from "./FsQueries";

interface CacheFolder {
  label: string;
  path: string;
  thresholdBytes: number;
  action: RecommendedAction;
}

/** Visual Studio 2022, 2019 and 2017 */
const VISUAL_STUDIO_VERSIONS = ["17.0", "16.0", "15.0"];

/** Per-product subfolders of JetBrains installs */
const JETBRAINS_FOLDERS = [
  { folder: "caches", label: "caches", thresholdBytes: 100 * MB, action: RecommendedAction.Clean },
  // Indexes rebuild on their own but take a while
  { folder: "index", label: "index", thresholdBytes: 100 * MB, action: RecommendedAction.Review },
  { folder: "log", label: "logs", thresholdBytes: 50 * MB, action: RecommendedAction.Clean },
];

export class ToolingCacheAnalyzer implements IInsightAnalyzer {
  readonly name = "IDE Caches";

  constructor(
    private readonly paths: SystemPaths,
    private readonly sizeWalker: ISizeWalker
  ) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const folders = [
      ...(await this.visualStudioFolders(signal)),
      ...(await this.jetBrainsFolders(signal)),
      ...this.vsCodeFolders(),
    ];

    const insights: Insight[] = [];
    for (const folder of folders) {
      throwIfCancelled(signal);
      if (!(await directoryExists(folder.path))) {
        continue;
      }

      const size = await this.sizeWalker.calculateDirectorySize(
        folder.path,
        signal
      );
      if (size > folder.thresholdBytes) {
        insights.push(
          createInsight({
            type: InsightType.ToolingCache,
            description: `${folder.label}: ${formatBytes(size)}`,
            path: folder.path,
            sizeInBytes: size,
            action: folder.action,
          })
        );
      }
    }

    return insights;
  }

  private async visualStudioFolders(signal?: AbortSignal): Promise<CacheFolder[]> {
    const { localAppData } = this.paths;
    const folders: CacheFolder[] = [];
    const installs = await listDirectories(
      path.join(localAppData, "Microsoft", "VisualStudio")
    );

    for (const version of VISUAL_STUDIO_VERSIONS) {
      throwIfCancelled(signal);
      const major = version.split(".")[0];
      const matching = installs.filter((dir) =>
        minimatch(path.basename(dir), `${version}_*`)
      );

      for (const dir of matching) {
        folders.push(
          {
            label: `VS ${major} Component Cache`,
            path: path.join(dir, "ComponentModelCache"),
            thresholdBytes: 50 * MB,
            action: RecommendedAction.Clean,
          },
          {
            label: `VS ${major} Designer Cache`,
            path: path.join(dir, "Designer", "ShadowCache"),
            thresholdBytes: 20 * MB,
            action: RecommendedAction.Clean,
          }
        );
      }
    }

    folders.push(
      {
        label: "VS Code Analysis Cache",
        path: path.join(localAppData, "Microsoft", "CodeAnalysis"),
        thresholdBytes: 100 * MB,
        action: RecommendedAction.Clean,
      },
      {
        label: "Visual Studio Temp",
        path: path.join(localAppData, "Temp", "VisualStudio"),
        thresholdBytes: 50 * MB,
        action: RecommendedAction.Clean,
      }
    );

    return folders;
  }

  private async jetBrainsFolders(signal?: AbortSignal): Promise<CacheFolder[]> {
    const bases = [
      path.join(this.paths.localAppData, "JetBrains"),
      path.join(this.paths.appData, "JetBrains"),
    ];
    const folders: CacheFolder[] = [];

    for (const base of new Set(bases)) {
      for (const productDir of await listDirectories(base)) {
        throwIfCancelled(signal);
        const product = path.basename(productDir);

        for (const entry of JETBRAINS_FOLDERS) {
          folders.push({
            label: `${product} ${entry.label}`,
            path: path.join(productDir, entry.folder),
            thresholdBytes: entry.thresholdBytes,
            action: entry.action,
          });
        }
      }
    }

    return folders;
  }

  private vsCodeFolders(): CacheFolder[] {
    const code = path.join(this.paths.appData, "Code");

    return [
      {
        label: "VS Code Cache",
        path: path.join(code, "Cache"),
        thresholdBytes: 100 * MB,
        action: RecommendedAction.Clean,
      },
      {
        label: "VS Code Cached Data",
        path: path.join(code, "CachedData"),
        thresholdBytes: 50 * MB,
        action: RecommendedAction.Clean,
      },
      {
        label: "VS Code Cached Extensions",
        path: path.join(code, "CachedExtensions"),
        thresholdBytes: 50 * MB,
        action: RecommendedAction.Clean,
      },
      {
        // Removing these loses installed extensions, so only flag huge ones
        label: "VS Code Extensions",
        path: path.join(this.paths.home, ".vscode", "extensions"),
        thresholdBytes: 500 * MB,
        action: RecommendedAction.Review,
      },
    ];
  }
}
