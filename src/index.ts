/**
 * Disk Insights Server
 *
 * Read-only analysis of reclaimable disk space: container runtimes, Linux
 * subsystem disks, project artifacts, dependency and tooling caches, and
 * old or large user files. Exposed as a library and as an MCP server.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

// Main entry point for running the server
import { MCPServer } from "./lib/MCPServer";
import { ConfigLoader } from "./lib/ConfigLoader";

/**
 * Create and start the Disk Insights MCP server
 */
export async function startDiskInsightsServer(): Promise<MCPServer> {
  const config = await ConfigLoader.loadConfig();
  const server = new MCPServer(config);
  await server.start();
  return server;
}
