/**
 * Unit tests for ToolingCacheAnalyzer
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { ToolingCacheAnalyzer } from "./ToolingCacheAnalyzer";
import { resolveSystemPaths } from "../SystemPaths";
import { SizeWalker } from "../SizeWalker";
import { MB } from "../SizeFormatter";
import { SystemPaths } from "../../interfaces/ISystemPaths";
import { InsightType, RecommendedAction } from "../../interfaces/IInsightAnalyzer";

function writeSparse(filePath: string, size: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, "");
  fs.truncateSync(filePath, size);
}

describe("ToolingCacheAnalyzer", () => {
  let home: string;
  let paths: SystemPaths;
  let analyzer: ToolingCacheAnalyzer;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "tooling-cache-test-"));
    paths = resolveSystemPaths({ platform: "win32", home }, {});
    analyzer = new ToolingCacheAnalyzer(paths, new SizeWalker());
  });

  afterEach(() => {
    if (fs.existsSync(home)) {
      fs.rmSync(home, { recursive: true, force: true });
    }
  });

  it("should report nothing when no IDE folders exist", async () => {
    expect(await analyzer.analyze()).toEqual([]);
  });

  it("should report Visual Studio caches per matching version folder", async () => {
    const install = path.join(paths.localAppData, "Microsoft", "VisualStudio", "17.0_4f2a1b");
    const componentCache = path.join(install, "ComponentModelCache");
    writeSparse(path.join(componentCache, "cache.bin"), 60 * MB);
    writeSparse(path.join(install, "Designer", "ShadowCache", "x.dll"), 10 * MB);
    writeSparse(
      path.join(paths.localAppData, "Microsoft", "VisualStudio", "14.0_old", "ComponentModelCache", "c.bin"),
      60 * MB
    );

    expect(await analyzer.analyze()).toEqual([
      {
        type: InsightType.ToolingCache,
        description: "VS 17 Component Cache: 60.00 MB",
        path: componentCache,
        sizeInBytes: 60 * MB,
        action: RecommendedAction.Clean,
      },
    ]);
  });

  it("should mark JetBrains indexes for review and caches for cleaning", async () => {
    const product = path.join(paths.localAppData, "JetBrains", "Rider2024.1");
    writeSparse(path.join(product, "caches", "a.bin"), 120 * MB);
    writeSparse(path.join(product, "index", "b.bin"), 150 * MB);
    writeSparse(path.join(product, "log", "idea.log"), 50 * MB);

    const insights = await analyzer.analyze();

    expect(insights.map((i) => [i.description, i.action])).toEqual([
      ["Rider2024.1 caches: 120.00 MB", RecommendedAction.Clean],
      ["Rider2024.1 index: 150.00 MB", RecommendedAction.Review],
    ]);
  });

  it("should only flag VS Code extensions above 500MB", async () => {
    const extensions = path.join(home, ".vscode", "extensions");
    writeSparse(path.join(extensions, "ms-python", "bundle.js"), 400 * MB);

    expect(await analyzer.analyze()).toEqual([]);

    writeSparse(path.join(extensions, "ms-dotnet", "bundle.js"), 200 * MB);

    expect(await analyzer.analyze()).toEqual([
      {
        type: InsightType.ToolingCache,
        description: "VS Code Extensions: 600.00 MB",
        path: extensions,
        sizeInBytes: 600 * MB,
        action: RecommendedAction.Review,
      },
    ]);
  });

  it("should report VS Code cached data above 50MB", async () => {
    const cachedData = path.join(paths.appData, "Code", "CachedData");
    writeSparse(path.join(cachedData, "blob"), 51 * MB);

    const insights = await analyzer.analyze();

    expect(insights.map((i) => i.description)).toEqual([
      "VS Code Cached Data: 51.00 MB",
    ]);
  });
});
