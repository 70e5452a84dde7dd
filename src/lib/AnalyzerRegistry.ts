/**
 * Wiring of the built-in analyzers from configuration
 */

import { ICommandRunner } from "../interfaces/ICommandRunner";
import { IInsightAnalyzer } from "../interfaces/IInsightAnalyzer";
import { ISizeWalker } from "../interfaces/ISizeWalker";
import { SystemPaths } from "../interfaces/ISystemPaths";
import { ContainerRuntimeAnalyzer } from "./analyzers/ContainerRuntimeAnalyzer";
import { DependencyCacheAnalyzer } from "./analyzers/DependencyCacheAnalyzer";
import { LinuxSubsystemAnalyzer } from "./analyzers/LinuxSubsystemAnalyzer";
import { ProjectArtifactAnalyzer } from "./analyzers/ProjectArtifactAnalyzer";
import { StaticFileAnalyzer } from "./analyzers/StaticFileAnalyzer";
import { ToolingCacheAnalyzer } from "./analyzers/ToolingCacheAnalyzer";
import { CommandRunner } from "./CommandRunner";
import { InsightsConfig } from "./ConfigLoader";
import { InsightAggregator } from "./InsightAggregator";
import { SizeWalker } from "./SizeWalker";
import { resolveSystemPaths } from "./SystemPaths";

export interface AnalyzerDependencies {
  runner?: ICommandRunner;
  sizeWalker?: ISizeWalker;
  paths?: SystemPaths;
}

/**
 * The six built-in analyzers in execution order, minus disabled ones
 */
export function createAnalyzers(
  config: InsightsConfig,
  deps: AnalyzerDependencies = {}
): IInsightAnalyzer[] {
  const runner = deps.runner ?? new CommandRunner();
  const sizeWalker = deps.sizeWalker ?? new SizeWalker();
  const paths =
    deps.paths ??
    resolveSystemPaths(
      config.homeDirectory ? { home: config.homeDirectory } : {}
    );

  const analyzers: IInsightAnalyzer[] = [
    new ContainerRuntimeAnalyzer(runner, {
      cli: config.containerCli,
      displayName: config.containerCli === "docker" ? "Docker" : config.containerCli,
      probeTimeoutMs: config.containerProbeTimeoutMs,
    }),
    new LinuxSubsystemAnalyzer(paths),
    new ProjectArtifactAnalyzer(paths, sizeWalker, {
      searchPaths: config.projectArtifacts.searchPaths,
      maxDepth: config.projectArtifacts.maxDepth,
    }),
    new DependencyCacheAnalyzer(paths, sizeWalker),
    new ToolingCacheAnalyzer(paths, sizeWalker),
    new StaticFileAnalyzer(paths, {
      daysUntilOld: config.staticFiles.daysUntilOld,
      largeFileSizeMB: config.staticFiles.largeFileSizeMB,
    }),
  ];

  const disabled = new Set(config.disabledAnalyzers);
  return analyzers.filter((analyzer) => !disabled.has(analyzer.name));
}

export function createInsightAggregator(
  config: InsightsConfig,
  deps: AnalyzerDependencies = {}
): InsightAggregator {
  return new InsightAggregator(createAnalyzers(config, deps));
}
