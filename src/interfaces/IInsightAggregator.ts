/**
 * Insight aggregator interface
 */

import { IInsightAnalyzer, Insight, RecommendedAction } from "./IInsightAnalyzer";

/**
 * Progress emitted before each analyzer starts and once when the scan completes
 */
export interface AnalysisProgress {
  readonly currentAnalyzer: string;
  readonly completedCount: number;
  readonly totalCount: number;
  /** completedCount * 100 / totalCount, rounded down; 0 when totalCount is 0 */
  readonly percentComplete: number;
}

/**
 * Receives progress values on whatever context the aggregator runs on
 */
export type ProgressSink = (progress: AnalysisProgress) => void;

export interface AnalysisResult {
  /** Every insight, in analyzer execution order then discovery order */
  readonly allInsights: readonly Insight[];
  /** Findings keyed by analyzer name */
  readonly byAnalyzer: ReadonlyMap<string, readonly Insight[]>;
  /** One "<analyzer>: <message>" entry per failed analyzer */
  readonly errors: readonly string[];
  readonly totalReclaimableBytes: number;
  readonly totalInsightCount: number;
}

export interface ActionSummary {
  totalBytes: number;
  counts: Record<RecommendedAction, number>;
  bytes: Record<RecommendedAction, number>;
}

export interface AnalyzeOptions {
  onProgress?: ProgressSink;
  signal?: AbortSignal;
  /** Restrict the run to these analyzer names */
  only?: string[];
}

export interface IInsightAggregator {
  /**
   * Registered analyzers, in execution order
   */
  readonly analyzers: readonly IInsightAnalyzer[];

  /**
   * Run every available analyzer and merge their findings
   * @returns Merged result; rejects with CancellationError when aborted
   */
  analyzeAll(options?: AnalyzeOptions): Promise<AnalysisResult>;
}
