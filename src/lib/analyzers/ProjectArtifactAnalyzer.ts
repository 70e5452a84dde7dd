/**
 * Dependency folders inside developer workspaces (node_modules and friends)
 */

import * as fs from "fs";
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
import { directoryExists, fileExists, listDirectories } from "./FsQueries";

export interface ArtifactRule {
  /** Manifest file that marks a project folder */
  marker: string;
  /** Regenerable folder next to the manifest */
  folder: string;
}

export interface ProjectArtifactAnalyzerOptions {
  /** Workspace roots; defaults to common folders under home */
  searchPaths?: string[];
  maxDepth?: number;
  thresholdBytes?: number;
  rules?: ArtifactRule[];
}

export const DEFAULT_ARTIFACT_RULES: ArtifactRule[] = [
  { marker: "package.json", folder: "node_modules" },
];

export function defaultWorkspaceRoots(home: string): string[] {
  return [
    path.join(home, "source"),
    path.join(home, "repos"),
    path.join(home, "projects"),
    path.join(home, "dev"),
    path.join(home, "code"),
    path.join(home, "workspace"),
    path.join(home, "Workspace"),
    path.join(home, "Documents", "GitHub"),
  ];
}

export class ProjectArtifactAnalyzer implements IInsightAnalyzer {
  readonly name = "Node Modules";

  private readonly searchPaths: string[];
  private readonly maxDepth: number;
  private readonly thresholdBytes: number;
  private readonly rules: ArtifactRule[];
  private readonly skippedNames: Set<string>;

  constructor(
    private readonly paths: SystemPaths,
    private readonly sizeWalker: ISizeWalker,
    options: ProjectArtifactAnalyzerOptions = {}
  ) {
    this.searchPaths = options.searchPaths ?? defaultWorkspaceRoots(paths.home);
    this.maxDepth = options.maxDepth ?? 5;
    this.thresholdBytes = options.thresholdBytes ?? 10 * MB;
    this.rules = options.rules ?? DEFAULT_ARTIFACT_RULES;
    this.skippedNames = new Set(this.rules.map((rule) => rule.folder));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const insights: Insight[] = [];
    const roots: string[] = [];

    // Case-insensitive filesystems report "workspace" and "Workspace" twice
    const seen = new Set<string>();
    for (const root of this.searchPaths) {
      if (await directoryExists(root)) {
        const key = await this.identity(root);
        if (!seen.has(key)) {
          seen.add(key);
          roots.push(root);
        }
      }
    }

    for (const root of roots) {
      throwIfCancelled(signal);
      await this.findArtifacts(root, 0, insights, signal);
    }

    return insights;
  }

  /**
   * Depth-first search. A matched project is reported and not descended
   * into; its siblings still are.
   */
  private async findArtifacts(
    dirPath: string,
    currentDepth: number,
    insights: Insight[],
    signal?: AbortSignal
  ): Promise<void> {
    if (currentDepth > this.maxDepth) {
      return;
    }

    for (const dir of await listDirectories(dirPath)) {
      throwIfCancelled(signal);

      const dirName = path.basename(dir);
      if (dirName.startsWith(".") || this.skippedNames.has(dirName)) {
        continue;
      }

      const matched = await this.matchProject(dir);
      if (matched.length === 0) {
        await this.findArtifacts(dir, currentDepth + 1, insights, signal);
        continue;
      }

      for (const artifactPath of matched) {
        const size = await this.sizeWalker.calculateDirectorySize(
          artifactPath,
          signal
        );
        if (size > this.thresholdBytes) {
          insights.push(
            createInsight({
              type: InsightType.ProjectArtifacts,
              description: `${path.basename(artifactPath)} in ${dirName}: ${formatBytes(size)}`,
              path: artifactPath,
              sizeInBytes: size,
              action: RecommendedAction.Clean,
              cleanupCommand: this.deleteCommand(artifactPath),
            })
          );
        }
      }
    }
  }

  private async matchProject(dir: string): Promise<string[]> {
    const matched: string[] = [];
    for (const rule of this.rules) {
      const artifactPath = path.join(dir, rule.folder);
      if (
        (await directoryExists(artifactPath)) &&
        (await fileExists(path.join(dir, rule.marker)))
      ) {
        matched.push(artifactPath);
      }
    }
    return matched;
  }

  private deleteCommand(target: string): string {
    return this.paths.platform === "win32"
      ? `rmdir /s /q "${target}"`
      : `rm -rf "${target}"`;
  }

  /**
   * Device and inode of a folder, so aliases of one folder compare equal
   */
  private async identity(dirPath: string): Promise<string> {
    const stats = await fs.promises.stat(dirPath);
    return `${stats.dev}:${stats.ino}`;
  }
}
