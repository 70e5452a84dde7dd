/**
 * Unit tests for the insight model constructors
 */

import {
  createAnalysisProgress,
  createAnalysisResult,
  createInsight,
  summarizeByAction,
} from "./InsightModel";
import { InsightType, RecommendedAction } from "../interfaces/IInsightAnalyzer";

describe("InsightModel", () => {
  describe("createInsight", () => {
    it("should return a frozen copy", () => {
      const insight = createInsight({
        type: InsightType.TempFiles,
        description: "Temp: 1.00 KB",
        path: "/tmp/x",
        sizeInBytes: 1024,
        action: RecommendedAction.Clean,
      });

      expect(Object.isFrozen(insight)).toBe(true);
      expect(insight.cleanupCommand).toBeUndefined();
    });
  });

  describe("createAnalysisProgress", () => {
    it("should compute percent complete with integer division", () => {
      expect(createAnalysisProgress("Docker", 1, 3).percentComplete).toBe(33);
      expect(createAnalysisProgress("Docker", 2, 3).percentComplete).toBe(66);
      expect(createAnalysisProgress("Complete", 3, 3).percentComplete).toBe(
        100
      );
    });

    it("should report 0 when there is nothing to run", () => {
      expect(createAnalysisProgress("Complete", 0, 0).percentComplete).toBe(0);
    });
  });

  describe("createAnalysisResult and summarizeByAction", () => {
    const insights = [
      createInsight({
        type: InsightType.DependencyCache,
        description: "npm cache",
        path: "/home/u/.npm",
        sizeInBytes: 300,
        action: RecommendedAction.Clean,
      }),
      createInsight({
        type: InsightType.LargeFiles,
        description: "Large file",
        path: "/home/u/Videos/a.mp4",
        sizeInBytes: 200,
        action: RecommendedAction.Archive,
      }),
      createInsight({
        type: InsightType.DependencyCache,
        description: "Maven",
        path: "/home/u/.m2/repository",
        sizeInBytes: 100,
        action: RecommendedAction.Clean,
      }),
    ];

    it("should derive totals", () => {
      const result = createAnalysisResult(insights, new Map(), []);

      expect(result.totalReclaimableBytes).toBe(600);
      expect(result.totalInsightCount).toBe(3);
    });

    it("should summarize counts and bytes per action", () => {
      const summary = summarizeByAction(
        createAnalysisResult(insights, new Map(), [])
      );

      expect(summary).toEqual({
        totalBytes: 600,
        counts: { Clean: 2, Archive: 1, Review: 0 },
        bytes: { Clean: 400, Archive: 200, Review: 0 },
      });
    });
  });
});
