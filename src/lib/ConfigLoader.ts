/**
 * Configuration loader for the Disk Insights server
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ValidationError } from "../types";

export const InsightsConfigSchema = z.object({
  /** Home directory to scan instead of the current user's */
  homeDirectory: z.string().min(1).optional(),
  containerCli: z.string().min(1).default("docker"),
  containerProbeTimeoutMs: z.number().int().positive().default(5000),
  /** Analyzer names to leave out of every scan */
  disabledAnalyzers: z.array(z.string()).default([]),
  staticFiles: z
    .object({
      daysUntilOld: z.number().int().positive().default(180),
      largeFileSizeMB: z.number().positive().default(500),
    })
    .default({}),
  projectArtifacts: z
    .object({
      searchPaths: z.array(z.string().min(1)).optional(),
      maxDepth: z.number().int().min(0).default(5),
    })
    .default({}),
  /** Scan results kept in memory for follow-up tool calls */
  maxStoredScans: z.number().int().positive().default(10),
});

export type InsightsConfig = z.infer<typeof InsightsConfigSchema>;

export class ConfigLoader {
  /**
   * Load configuration from file or environment
   */
  static async loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): Promise<InsightsConfig> {
    const configPath =
      env["DISK_INSIGHTS_CONFIG"] ||
      path.join(cwd, "disk-insights-config.json");

    if (fs.existsSync(configPath)) {
      const configData = await fs.promises.readFile(configPath, "utf-8");
      let raw: unknown;
      try {
        raw = JSON.parse(configData);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(
          `Invalid configuration file ${configPath}: ${reason}`
        );
      }
      return ConfigLoader.parse(raw);
    }

    // Default configuration
    return ConfigLoader.parse({
      homeDirectory: env["DISK_INSIGHTS_HOME"] || undefined,
      containerCli: env["DISK_INSIGHTS_CONTAINER_CLI"] || undefined,
    });
  }

  /**
   * Validate raw configuration and fill in defaults
   */
  static parse(raw: unknown): InsightsConfig {
    const result = InsightsConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration: ${issues}`);
    }
    return result.data;
  }
}
