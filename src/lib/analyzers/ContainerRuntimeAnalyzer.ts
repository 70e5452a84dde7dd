/**
 * Container runtime disk usage, read through the container CLI
 */

import { ICommandRunner } from "../../interfaces/ICommandRunner";
import {
  IInsightAnalyzer,
  Insight,
  InsightType,
  RecommendedAction,
} from "../../interfaces/IInsightAnalyzer";
import { throwIfCancelled } from "../../types";
import { createInsight } from "../InsightModel";
import { countListedIds, parseSystemDf } from "./SystemDfParser";

export interface ContainerRuntimeAnalyzerOptions {
  /** CLI binary, "docker" by default */
  cli?: string;
  /** Analyzer name and description prefix, "Docker" by default */
  displayName?: string;
  /** Upper bound for the version command */
  probeTimeoutMs?: number;
}

export class ContainerRuntimeAnalyzer implements IInsightAnalyzer {
  readonly name: string;

  private readonly cli: string;
  private readonly probeTimeoutMs: number;

  constructor(
    private readonly runner: ICommandRunner,
    options: ContainerRuntimeAnalyzerOptions = {}
  ) {
    this.cli = options.cli ?? "docker";
    this.name = options.displayName ?? "Docker";
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
  }

  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner.run(this.cli, ["version"], {
        timeoutMs: this.probeTimeoutMs,
      });
      return result.exitCode === 0;
    } catch (error) {
      return false;
    }
  }

  async analyze(signal?: AbortSignal): Promise<Insight[]> {
    const insights: Insight[] = [];

    // Availability is checked by the aggregator; a missing CLI fails `system df`
    const dfOutput = await this.runCli(["system", "df"], signal);
    if (!dfOutput) {
      return insights;
    }

    insights.push(...this.toInsights(dfOutput));

    const danglingOutput = await this.runCli(
      ["images", "-f", "dangling=true", "-q"],
      signal
    );
    const danglingCount = countListedIds(danglingOutput);
    if (danglingCount > 0) {
      insights.push(
        createInsight({
          type: InsightType.ContainerImages,
          description: `${danglingCount} dangling image(s) can be removed`,
          path: `${this.cli} images`,
          // Only a count is available for dangling images
          sizeInBytes: 0,
          action: RecommendedAction.Clean,
          cleanupCommand: `${this.cli} image prune -f`,
        })
      );
    }

    return insights;
  }

  /**
   * Map parsed `system df` sections to insights
   */
  toInsights(dfOutput: string): Insight[] {
    const summary = parseSystemDf(dfOutput);
    const insights: Insight[] = [];

    const images = summary.images;
    if (images && images.reclaimableBytes > 0 && (images.percent ?? 0) > 0) {
      insights.push(
        createInsight({
          type: InsightType.ContainerImages,
          description: `${this.name} images: ${images.reclaimableText} reclaimable (${images.percent}%)`,
          path: `${this.cli} images`,
          sizeInBytes: images.reclaimableBytes,
          action: RecommendedAction.Review,
          cleanupCommand: `${this.cli} image prune -a`,
        })
      );
    }

    const containers = summary.containers;
    if (containers && containers.reclaimableBytes > 0) {
      insights.push(
        createInsight({
          type: InsightType.ContainerContainers,
          description: `Stopped containers: ${containers.reclaimableText} reclaimable`,
          path: `${this.cli} ps -a`,
          sizeInBytes: containers.reclaimableBytes,
          action: RecommendedAction.Clean,
          cleanupCommand: `${this.cli} container prune -f`,
        })
      );
    }

    const volumes = summary.volumes;
    if (volumes && volumes.reclaimableBytes > 0) {
      insights.push(
        createInsight({
          type: InsightType.ContainerVolumes,
          description: `Unused volumes: ${volumes.reclaimableText} reclaimable`,
          path: `${this.cli} volume ls`,
          sizeInBytes: volumes.reclaimableBytes,
          action: RecommendedAction.Review,
          cleanupCommand: `${this.cli} volume prune -f`,
        })
      );
    }

    return insights;
  }

  /**
   * Stdout of a successful CLI call, or "" when it failed
   */
  private async runCli(args: string[], signal?: AbortSignal): Promise<string> {
    throwIfCancelled(signal);
    const result = await this.runner.run(this.cli, args, { signal });
    throwIfCancelled(signal);
    return result.exitCode === 0 ? result.stdout : "";
  }
}
