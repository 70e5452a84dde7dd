/**
 * Core library exports for the Disk Insights server
 */

export * from "./SizeFormatter";
export * from "./SizeWalker";
export * from "./CommandRunner";
export * from "./SystemPaths";
export * from "./InsightModel";
export * from "./InsightAggregator";
export * from "./LocationGrouping";
export * from "./AnalyzerRegistry";
export * from "./analyzers/ContainerRuntimeAnalyzer";
export * from "./analyzers/SystemDfParser";
export * from "./analyzers/LinuxSubsystemAnalyzer";
export * from "./analyzers/DependencyCacheAnalyzer";
export * from "./analyzers/ProjectArtifactAnalyzer";
export * from "./analyzers/ToolingCacheAnalyzer";
export * from "./analyzers/StaticFileAnalyzer";
export * from "./MCPServer";
export * from "./MCPTools";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
