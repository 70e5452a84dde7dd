/**
 * Unit tests for DependencyCacheAnalyzer
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import {
  DependencyCacheAnalyzer,
  knownDependencyCaches,
} from "./DependencyCacheAnalyzer";
import { resolveSystemPaths } from "../SystemPaths";
import { SizeWalker } from "../SizeWalker";
import { MB } from "../SizeFormatter";
import { SystemPaths } from "../../interfaces/ISystemPaths";
import { InsightType, RecommendedAction } from "../../interfaces/IInsightAnalyzer";
import { CancellationError } from "../../types";

function writeSparse(filePath: string, size: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, "");
  fs.truncateSync(filePath, size);
}

describe("DependencyCacheAnalyzer", () => {
  let home: string;
  let paths: SystemPaths;
  let analyzer: DependencyCacheAnalyzer;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "dependency-cache-test-"));
    paths = resolveSystemPaths({ platform: "linux", home }, {});
    analyzer = new DependencyCacheAnalyzer(paths, new SizeWalker());
  });

  afterEach(() => {
    if (fs.existsSync(home)) {
      fs.rmSync(home, { recursive: true, force: true });
    }
  });

  it("should list ten well-known caches", () => {
    const caches = knownDependencyCaches(paths);

    expect(caches).toHaveLength(10);
    expect(caches.find((c) => c.label === "pip cache")?.thresholdBytes).toBe(
      50 * MB
    );
  });

  it("should report nothing for an empty home", async () => {
    expect(await analyzer.analyze()).toEqual([]);
  });

  it("should not report a cache exactly at its threshold", async () => {
    writeSparse(path.join(home, ".m2", "repository", "lib.jar"), 100 * MB);

    expect(await analyzer.analyze()).toEqual([]);
  });

  it("should report a cache one byte over its threshold", async () => {
    const cacheDir = path.join(home, ".m2", "repository");
    writeSparse(path.join(cacheDir, "lib.jar"), 100 * MB + 1);

    expect(await analyzer.analyze()).toEqual([
      {
        type: InsightType.DependencyCache,
        description: "Maven repository cache: 100.00 MB",
        path: cacheDir,
        sizeInBytes: 100 * MB + 1,
        action: RecommendedAction.Review,
      },
    ]);
  });

  it("should find a 150MB npm cache in a synthetic home", async () => {
    const cacheDir = path.join(home, ".npm");
    writeSparse(path.join(cacheDir, "_cacache", "content-v2", "blob"), 150 * MB);

    const insights = await analyzer.analyze();

    expect(insights).toHaveLength(1);
    expect(insights[0].type).toBe(InsightType.DependencyCache);
    expect(insights[0].action).toBe(RecommendedAction.Clean);
    expect(insights[0].cleanupCommand).toBe("npm cache clean --force");
    expect(insights[0].sizeInBytes).toBeGreaterThanOrEqual(150 * MB);
    expect(insights[0].sizeInBytes).toBeLessThan(151 * MB);
  });

  it("should apply the lower pip threshold", async () => {
    const cacheDir = path.join(paths.localAppData, "pip", "cache");
    writeSparse(path.join(cacheDir, "wheels", "pkg.whl"), 60 * MB);

    const insights = await analyzer.analyze();

    expect(insights.map((i) => i.description)).toEqual([
      "pip cache: 60.00 MB",
    ]);
    expect(insights[0].cleanupCommand).toBe("pip cache purge");
  });

  it("should stop when cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(analyzer.analyze(controller.signal)).rejects.toBeInstanceOf(
      CancellationError
    );
  });
});
