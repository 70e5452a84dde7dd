#!/usr/bin/env node

/**
 * CLI entry point for the Disk Insights server
 */

import { startDiskInsightsServer } from "./index";

// Handle unhandled promise rejections
process.on("unhandledRejection", (reason) => {
  console.error("[Disk Insights Server] Unhandled promise rejection:", reason);
});

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  console.error("[Disk Insights Server] Uncaught exception:", error);
});

async function main(): Promise<void> {
  try {
    await startDiskInsightsServer();
  } catch (error) {
    console.error("Failed to start Disk Insights server:", error);
    process.exit(1);
  }
}

void main();
