/**
 * Constructors for insights, progress values and analysis results
 */

import { Insight, RecommendedAction } from "../interfaces/IInsightAnalyzer";
import {
  ActionSummary,
  AnalysisProgress,
  AnalysisResult,
} from "../interfaces/IInsightAggregator";

/**
 * Create a frozen insight
 */
export function createInsight(insight: Insight): Insight {
  return Object.freeze({ ...insight });
}

export function createAnalysisProgress(
  currentAnalyzer: string,
  completedCount: number,
  totalCount: number
): AnalysisProgress {
  return Object.freeze({
    currentAnalyzer,
    completedCount,
    totalCount,
    percentComplete:
      totalCount > 0 ? Math.floor((completedCount * 100) / totalCount) : 0,
  });
}

export function createAnalysisResult(
  allInsights: readonly Insight[],
  byAnalyzer: ReadonlyMap<string, readonly Insight[]>,
  errors: readonly string[]
): AnalysisResult {
  return {
    allInsights,
    byAnalyzer,
    errors,
    totalReclaimableBytes: allInsights.reduce(
      (sum, insight) => sum + insight.sizeInBytes,
      0
    ),
    totalInsightCount: allInsights.length,
  };
}

/**
 * Counts and bytes per recommended action, as shown in a summary line
 */
export function summarizeByAction(result: AnalysisResult): ActionSummary {
  const summary: ActionSummary = {
    totalBytes: result.totalReclaimableBytes,
    counts: {
      [RecommendedAction.Clean]: 0,
      [RecommendedAction.Archive]: 0,
      [RecommendedAction.Review]: 0,
    },
    bytes: {
      [RecommendedAction.Clean]: 0,
      [RecommendedAction.Archive]: 0,
      [RecommendedAction.Review]: 0,
    },
  };

  for (const insight of result.allInsights) {
    summary.counts[insight.action]++;
    summary.bytes[insight.action] += insight.sizeInBytes;
  }

  return summary;
}
