/**
 * Package manager caches at their well-known locations
 */

import * as path from "path";
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
import { directoryExists } from "./FsQueries";

export interface DependencyCache {
  label: string;
  path: string;
  /** Reported only when strictly larger than this */
  thresholdBytes: number;
  action: RecommendedAction;
  cleanupCommand?: string;
}

/**
 * One entry per ecosystem cache; presence is decided by the folder alone
 */
export function knownDependencyCaches(paths: SystemPaths): DependencyCache[] {
  const { home, localAppData, goPath } = paths;

  return [
    {
      label: "NuGet package cache",
      path: path.join(home, ".nuget", "packages"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Review,
      cleanupCommand: "dotnet nuget locals all --clear",
    },
    {
      label: "npm cache",
      path: path.join(localAppData, "npm-cache"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Clean,
      cleanupCommand: "npm cache clean --force",
    },
    {
      label: "npm cache (~/.npm)",
      path: path.join(home, ".npm"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Clean,
      cleanupCommand: "npm cache clean --force",
    },
    {
      label: "Yarn cache",
      path: path.join(localAppData, "Yarn", "Cache"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Clean,
      cleanupCommand: "yarn cache clean",
    },
    {
      label: "pnpm store",
      path: path.join(localAppData, "pnpm-store"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Review,
      cleanupCommand: "pnpm store prune",
    },
    {
      label: "pip cache",
      path: path.join(localAppData, "pip", "cache"),
      thresholdBytes: 50 * MB,
      action: RecommendedAction.Clean,
      cleanupCommand: "pip cache purge",
    },
    {
      label: "Cargo registry cache",
      path: path.join(home, ".cargo", "registry"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Review,
      cleanupCommand: "cargo cache --autoclean",
    },
    {
      label: "Go modules cache",
      path: path.join(goPath, "pkg", "mod", "cache"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Clean,
      cleanupCommand: "go clean -modcache",
    },
    {
      label: "Maven repository cache",
      path: path.join(home, ".m2", "repository"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Review,
    },
    {
      label: "Gradle caches",
      path: path.join(home, ".gradle", "caches"),
      thresholdBytes: 100 * MB,
      action: RecommendedAction.Review,
    },
  ];
}

export class DependencyCacheAnalyzer implements IInsightAnalyzer {
  readonly name = "Package Caches";

  private readonly caches: DependencyCache[];

  constructor(
    paths: SystemPaths,
    private readonly sizeWalker: ISizeWalker,
    caches?: DependencyCache[]
  ) {
    this.caches = caches ?? knownDependencyCaches(paths);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const insights: Insight[] = [];
    const visited = new Set<string>();

    for (const cache of this.caches) {
      throwIfCancelled(signal);

      // Two entries may resolve to the same folder
      const resolved = path.resolve(cache.path);
      if (visited.has(resolved) || !(await directoryExists(resolved))) {
        continue;
      }
      visited.add(resolved);

      const size = await this.sizeWalker.calculateDirectorySize(resolved, signal);
      if (size > cache.thresholdBytes) {
        insights.push(
          createInsight({
            type: InsightType.DependencyCache,
            description: `${cache.label}: ${formatBytes(size)}`,
            path: resolved,
            sizeInBytes: size,
            action: cache.action,
            cleanupCommand: cache.cleanupCommand,
          })
        );
      }
    }

    return insights;
  }
}
