/**
 * Core interfaces for the Disk Insights server
 */

export * from "./IInsightAnalyzer";
export * from "./IInsightAggregator";
export * from "./ISizeWalker";
export * from "./ICommandRunner";
export * from "./ISystemPaths";
