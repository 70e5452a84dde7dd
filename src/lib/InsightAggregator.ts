/**
 * Runs every available analyzer and merges their findings
 */

import {
  AnalysisResult,
  AnalyzeOptions,
  IInsightAggregator,
} from "../interfaces/IInsightAggregator";
import { IInsightAnalyzer, Insight } from "../interfaces/IInsightAnalyzer";
import {
  CancellationError,
  errorMessage,
  throwIfCancelled,
  ValidationError,
} from "../types";
import { createAnalysisProgress, createAnalysisResult } from "./InsightModel";

export class InsightAggregator implements IInsightAggregator {
  private readonly registered: IInsightAnalyzer[];

  constructor(analyzers: IInsightAnalyzer[]) {
    const names = new Set<string>();
    for (const analyzer of analyzers) {
      if (names.has(analyzer.name)) {
        throw new ValidationError(`Duplicate analyzer name: ${analyzer.name}`);
      }
      names.add(analyzer.name);
    }
    this.registered = [...analyzers];
  }

  get analyzers(): readonly IInsightAnalyzer[] {
    return this.registered;
  }

  /**
   * Run analyzers one at a time under a shared signal.
   *
   * A failing analyzer is recorded as "<name>: <message>" and the run goes
   * on; cancellation aborts the whole run and discards partial findings.
   */
  async analyzeAll(options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const { onProgress, signal, only } = options;
    throwIfCancelled(signal);

    const selected = this.select(only);
    const available: IInsightAnalyzer[] = [];
    for (const analyzer of selected) {
      if (await this.probe(analyzer)) {
        available.push(analyzer);
      }
      throwIfCancelled(signal);
    }

    const allInsights: Insight[] = [];
    const byAnalyzer = new Map<string, readonly Insight[]>();
    const errors: string[] = [];
    const total = available.length;
    let completed = 0;

    for (const analyzer of available) {
      throwIfCancelled(signal);
      onProgress?.(createAnalysisProgress(analyzer.name, completed, total));

      try {
        const insights = await analyzer.analyze(signal);
        byAnalyzer.set(analyzer.name, insights);
        allInsights.push(...insights);
      } catch (error) {
        if (error instanceof CancellationError || signal?.aborted) {
          throw error instanceof CancellationError
            ? error
            : new CancellationError();
        }
        errors.push(`${analyzer.name}: ${errorMessage(error)}`);
      }

      completed++;
    }

    onProgress?.(createAnalysisProgress("Complete", total, total));

    return createAnalysisResult(allInsights, byAnalyzer, errors);
  }

  private select(only?: string[]): IInsightAnalyzer[] {
    if (!only) {
      return this.registered;
    }

    const known = new Set(this.registered.map((analyzer) => analyzer.name));
    const unknown = only.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new ValidationError(`Unknown analyzer: ${unknown.join(", ")}`);
    }

    return this.registered.filter((analyzer) => only.includes(analyzer.name));
  }

  /**
   * Availability check; a probe that rejects counts as unavailable
   */
  private async probe(analyzer: IInsightAnalyzer): Promise<boolean> {
    try {
      return await analyzer.isAvailable();
    } catch (error) {
      console.error(
        `[Disk Insights] Availability check failed for ${analyzer.name}:`,
        errorMessage(error)
      );
      return false;
    }
  }
}
