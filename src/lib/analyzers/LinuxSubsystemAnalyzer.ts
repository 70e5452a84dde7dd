/**
 * WSL2 distribution disks (Windows only)
 */

import * as path from "path";
import { minimatch } from "minimatch";
import {
  IInsightAnalyzer,
  Insight,
  InsightType,
  RecommendedAction,
} from "../../interfaces/IInsightAnalyzer";
import { SystemPaths } from "../../interfaces/ISystemPaths";
import { throwIfCancelled } from "../../types";
import { createInsight } from "../InsightModel";
import { formatBytes } from "../SizeFormatter";
import { directoryExists, FileEntry, listDirectories, listFiles } from "./FsQueries";

/** Package folder name patterns of installed distributions */
export const DISTRIBUTION_PATTERNS = [
  "CanonicalGroupLimited.Ubuntu*",
  "TheDebianProject.DebianGNULinux*",
  "*WSL*",
  "*Linux*",
];

const CONTAINER_RUNTIME_PATTERN = "Docker*";

function isVirtualDisk(file: FileEntry): boolean {
  return path.extname(file.name).toLowerCase() === ".vhdx";
}

/**
 * Short distribution name for descriptions and the unregister command
 */
export function distributionName(packageFolder: string): string {
  if (packageFolder.includes("Ubuntu")) {
    return "Ubuntu";
  }
  if (packageFolder.includes("Debian")) {
    return "Debian";
  }
  return packageFolder;
}

export class LinuxSubsystemAnalyzer implements IInsightAnalyzer {
  readonly name = "WSL2";

  constructor(private readonly paths: SystemPaths) {}

  async isAvailable(): Promise<boolean> {
    return this.paths.platform === "win32";
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const insights: Insight[] = [];

    if (!(await this.isAvailable())) {
      return insights;
    }

    const packagesPath = path.join(this.paths.localAppData, "Packages");
    if (!(await directoryExists(packagesPath))) {
      return insights;
    }

    // One physical disk can sit under folders matched by several patterns
    const seen = new Set<string>();
    const packageDirs = await listDirectories(packagesPath);

    for (const pattern of DISTRIBUTION_PATTERNS) {
      const matching = packageDirs.filter((dir) =>
        minimatch(path.basename(dir), pattern, { nocase: true, dot: true })
      );

      for (const dir of matching) {
        throwIfCancelled(signal);
        const disks = (await listFiles(path.join(dir, "LocalState"))).filter(
          isVirtualDisk
        );

        for (const disk of disks) {
          throwIfCancelled(signal);
          const resolved = path.resolve(disk.path);
          if (seen.has(resolved)) {
            continue;
          }
          seen.add(resolved);

          const name = distributionName(path.basename(dir));
          insights.push(
            createInsight({
              type: InsightType.LinuxSubsystemDistribution,
              description: `WSL2 ${name}: ${formatBytes(disk.size)}`,
              path: resolved,
              sizeInBytes: disk.size,
              // Unregistering deletes the distribution's data
              action: RecommendedAction.Review,
              cleanupCommand: `wsl --unregister ${name}`,
            })
          );
        }
      }
    }

    const runtimeDirs = packageDirs.filter((dir) =>
      minimatch(path.basename(dir), CONTAINER_RUNTIME_PATTERN, { nocase: true })
    );
    for (const dir of runtimeDirs) {
      const disks = await this.findVirtualDisks(
        path.join(dir, "LocalState"),
        signal
      );

      for (const disk of disks) {
        const resolved = path.resolve(disk.path);
        if (seen.has(resolved)) {
          continue;
        }
        seen.add(resolved);

        insights.push(
          createInsight({
            type: InsightType.LinuxSubsystemDistribution,
            description: `Docker Desktop WSL2 data: ${formatBytes(disk.size)}`,
            path: resolved,
            sizeInBytes: disk.size,
            action: RecommendedAction.Review,
          })
        );
      }
    }

    return insights;
  }

  private async findVirtualDisks(
    dirPath: string,
    signal?: AbortSignal
  ): Promise<FileEntry[]> {
    throwIfCancelled(signal);
    const found = (await listFiles(dirPath)).filter(isVirtualDisk);

    for (const sub of await listDirectories(dirPath)) {
      found.push(...(await this.findVirtualDisks(sub, signal)));
    }

    return found;
  }
}
