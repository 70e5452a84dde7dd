/**
 * MCP tool definitions for disk insights
 *
 * Provides 6 MCP tools:
 * 1. insights_list_analyzers - List registered analyzers and their availability
 * 2. insights_analyze - Run the analyzers and store the result as a scan
 * 3. insights_get_scan - Read a stored scan, optionally filtered by action
 * 4. insights_group_by_location - Group a stored scan by drive and top folder
 * 5. fs_folder_info - Size and counts of one directory tree
 * 6. fs_list_subdirectories - Immediate subdirectories, largest first
 */

import * as path from "path";
import { z } from "zod";
import { v4 as uuidv4 } from "uuid";
import {
  ActionSummary,
  AnalysisResult,
  IInsightAggregator,
  ProgressSink,
} from "../interfaces/IInsightAggregator";
import { Insight, RecommendedAction } from "../interfaces/IInsightAnalyzer";
import { FolderInfo, ISizeWalker } from "../interfaces/ISizeWalker";
import { ValidationError } from "../types";
import { summarizeByAction } from "./InsightModel";
import { getLocationKey, groupByLocation } from "./LocationGrouping";
import { formatBytes } from "./SizeFormatter";

export interface MCPToolsOptions {
  /** Scans kept for follow-up calls; oldest are dropped first */
  maxStoredScans?: number;
  onProgress?: ProgressSink;
}

interface StoredScan {
  scanId: string;
  createdAt: string;
  result: AnalysisResult;
}

type FolderReport = FolderInfo & { formattedSize: string };

const DEFAULT_MAX_STORED_SCANS = 10;

/**
 * MCP Tools class
 * Provides all tool implementations for the Disk Insights server
 */
export class MCPTools {
  private aggregator: IInsightAggregator;
  private sizeWalker: ISizeWalker;
  private maxStoredScans: number;
  private onProgress?: ProgressSink;
  private scans = new Map<string, StoredScan>();

  constructor(
    aggregator: IInsightAggregator,
    sizeWalker: ISizeWalker,
    options: MCPToolsOptions = {}
  ) {
    this.aggregator = aggregator;
    this.sizeWalker = sizeWalker;
    this.maxStoredScans = options.maxStoredScans ?? DEFAULT_MAX_STORED_SCANS;
    this.onProgress = options.onProgress;
  }

  /**
   * Tool 1: insights_list_analyzers
   */
  async insightsListAnalyzers(args: unknown): Promise<{
    status: string;
    analyzers: Array<{ name: string; available: boolean }>;
  }> {
    parseArgs(MCPTools.getInsightsListAnalyzersSchema(), args);

    const analyzers: Array<{ name: string; available: boolean }> = [];
    for (const analyzer of this.aggregator.analyzers) {
      const available = await analyzer.isAvailable().catch(() => false);
      analyzers.push({ name: analyzer.name, available });
    }

    return { status: "success", analyzers };
  }

  static getInsightsListAnalyzersSchema() {
    return {
      name: "insights_list_analyzers",
      description:
        "List the registered disk analyzers and whether each can run on this system",
      inputSchema: z.object({}),
    };
  }

  /**
   * Tool 2: insights_analyze
   * Runs the analyzers and keeps the result under a new scanId
   */
  async insightsAnalyze(
    args: unknown,
    signal?: AbortSignal
  ): Promise<{
    status: string;
    scanId: string;
    summary: {
      totalInsightCount: number;
      totalReclaimableBytes: number;
      totalReclaimable: string;
      byAction: ActionSummary;
    };
    byAnalyzer: Record<string, readonly Insight[]>;
    errors: readonly string[];
    insights: readonly Insight[];
  }> {
    const { analyzers } = parseArgs(
      MCPTools.getInsightsAnalyzeSchema(),
      args
    );

    const result = await this.aggregator.analyzeAll({
      only: analyzers,
      signal,
      onProgress: this.onProgress,
    });

    const scanId = uuidv4();
    this.store({ scanId, createdAt: new Date().toISOString(), result });

    return {
      status: "success",
      scanId,
      summary: {
        totalInsightCount: result.totalInsightCount,
        totalReclaimableBytes: result.totalReclaimableBytes,
        totalReclaimable: formatBytes(result.totalReclaimableBytes),
        byAction: summarizeByAction(result),
      },
      byAnalyzer: Object.fromEntries(result.byAnalyzer),
      errors: result.errors,
      insights: result.allInsights,
    };
  }

  static getInsightsAnalyzeSchema() {
    return {
      name: "insights_analyze",
      description:
        "Scan the system for reclaimable disk space. Nothing is deleted; findings carry suggested cleanup commands",
      inputSchema: z.object({
        analyzers: z
          .array(z.string())
          .optional()
          .describe("Analyzer names to run (default: all available)"),
      }),
    };
  }

  /**
   * Tool 3: insights_get_scan
   */
  async insightsGetScan(args: unknown): Promise<{
    status: string;
    scanId: string;
    createdAt: string;
    totalBytes: number;
    totalFormatted: string;
    insights: Insight[];
    errors: readonly string[];
  }> {
    const { scanId, action } = parseArgs(
      MCPTools.getInsightsGetScanSchema(),
      args
    );
    const scan = this.getScan(scanId);

    const insights = scan.result.allInsights.filter(
      (insight) => action === undefined || insight.action === action
    );
    const totalBytes = insights.reduce(
      (sum, insight) => sum + insight.sizeInBytes,
      0
    );

    return {
      status: "success",
      scanId: scan.scanId,
      createdAt: scan.createdAt,
      totalBytes,
      totalFormatted: formatBytes(totalBytes),
      insights,
      errors: scan.result.errors,
    };
  }

  static getInsightsGetScanSchema() {
    return {
      name: "insights_get_scan",
      description: "Get the insights of a stored scan",
      inputSchema: z.object({
        scanId: z.string().min(1).describe("Id returned by insights_analyze"),
        action: z
          .nativeEnum(RecommendedAction)
          .optional()
          .describe("Only return insights with this action (Clean, Archive, Review)"),
      }),
    };
  }

  /**
   * Tool 4: insights_group_by_location
   */
  async insightsGroupByLocation(args: unknown): Promise<{
    status: string;
    scanId: string;
    groups: Array<{
      location: string;
      totalBytes: number;
      totalFormatted: string;
      insights: Insight[];
    }>;
  }> {
    const { scanId } = parseArgs(
      MCPTools.getInsightsGroupByLocationSchema(),
      args
    );
    const scan = this.getScan(scanId);

    const groups = Array.from(
      groupByLocation(scan.result.allInsights),
      ([location, insights]) => {
        const totalBytes = insights.reduce(
          (sum, insight) => sum + insight.sizeInBytes,
          0
        );
        return {
          location,
          totalBytes,
          totalFormatted: formatBytes(totalBytes),
          insights,
        };
      }
    );

    return { status: "success", scanId: scan.scanId, groups };
  }

  static getInsightsGroupByLocationSchema() {
    return {
      name: "insights_group_by_location",
      description:
        "Group a stored scan by drive and top-level folder, largest findings first",
      inputSchema: z.object({
        scanId: z.string().min(1).describe("Id returned by insights_analyze"),
      }),
    };
  }

  /**
   * Tool 5: fs_folder_info
   */
  async fsFolderInfo(
    args: unknown,
    signal?: AbortSignal
  ): Promise<{ status: string; folder: FolderReport; location: string }> {
    const { path: dirPath } = parseArgs(
      MCPTools.getFsFolderInfoSchema(),
      args
    );
    const resolved = path.resolve(dirPath);

    const info = await this.sizeWalker.getFolderInfo(resolved, signal);

    return {
      status: "success",
      folder: withFormattedSize(info),
      location: getLocationKey(resolved),
    };
  }

  static getFsFolderInfoSchema() {
    return {
      name: "fs_folder_info",
      description: "Total size, file count and folder count of a directory tree",
      inputSchema: z.object({
        path: z.string().min(1).describe("Directory path"),
      }),
    };
  }

  /**
   * Tool 6: fs_list_subdirectories
   */
  async fsListSubdirectories(
    args: unknown,
    signal?: AbortSignal
  ): Promise<{ status: string; path: string; subdirectories: FolderReport[] }> {
    const { path: dirPath, limit } = parseArgs(
      MCPTools.getFsListSubdirectoriesSchema(),
      args
    );
    const resolved = path.resolve(dirPath);

    const subdirectories = await this.sizeWalker.getSubdirectories(
      resolved,
      signal
    );

    return {
      status: "success",
      path: resolved,
      subdirectories: subdirectories
        .slice(0, limit ?? subdirectories.length)
        .map(withFormattedSize),
    };
  }

  static getFsListSubdirectoriesSchema() {
    return {
      name: "fs_list_subdirectories",
      description: "Immediate subdirectories of a directory with their sizes, largest first",
      inputSchema: z.object({
        path: z.string().min(1).describe("Directory path"),
        limit: z
          .number()
          .int()
          .positive()
          .optional()
          .describe("Maximum number of subdirectories to return (default: all)"),
      }),
    };
  }

  /**
   * Get all tool schemas
   */
  static getAllSchemas() {
    return [
      MCPTools.getInsightsListAnalyzersSchema(),
      MCPTools.getInsightsAnalyzeSchema(),
      MCPTools.getInsightsGetScanSchema(),
      MCPTools.getInsightsGroupByLocationSchema(),
      MCPTools.getFsFolderInfoSchema(),
      MCPTools.getFsListSubdirectoriesSchema(),
    ];
  }

  private store(scan: StoredScan): void {
    this.scans.set(scan.scanId, scan);
    // Map iteration order is insertion order, so the first key is the oldest
    while (this.scans.size > this.maxStoredScans) {
      const oldest = this.scans.keys().next();
      if (oldest.done) {
        break;
      }
      this.scans.delete(oldest.value);
    }
  }

  private getScan(scanId: string): StoredScan {
    const scan = this.scans.get(scanId);
    if (!scan) {
      throw new ValidationError(`Scan not found: ${scanId}`);
    }
    return scan;
  }
}

function parseArgs<T extends z.ZodTypeAny>(
  tool: { name: string; inputSchema: T },
  args: unknown
): z.infer<T> {
  const result = tool.inputSchema.safeParse(args ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid arguments for ${tool.name}: ${issues}`);
  }
  return result.data;
}

function withFormattedSize(info: FolderInfo): FolderReport {
  return { ...info, formattedSize: formatBytes(info.sizeInBytes) };
}
