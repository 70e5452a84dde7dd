/**
 * Unit tests for StaticFileAnalyzer
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { StaticFileAnalyzer, StaticFileAnalyzerOptions } from "./StaticFileAnalyzer";
import { resolveSystemPaths } from "../SystemPaths";
import { MB } from "../SizeFormatter";
import { InsightType, RecommendedAction } from "../../interfaces/IInsightAnalyzer";
import { CancellationError } from "../../types";

const YEAR_MS = 365 * 24 * 60 * 60 * 1000;

function writeSparse(filePath: string, size: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, "");
  fs.truncateSync(filePath, size);
}

describe("StaticFileAnalyzer", () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "static-file-test-"));
  });

  afterEach(() => {
    if (fs.existsSync(home)) {
      fs.rmSync(home, { recursive: true, force: true });
    }
  });

  function createAnalyzer(options: StaticFileAnalyzerOptions = {}): StaticFileAnalyzer {
    return new StaticFileAnalyzer(
      resolveSystemPaths({ platform: "linux", home }, {}),
      options
    );
  }

  describe("downloads", () => {
    it("should aggregate old downloads into one archive insight", async () => {
      const downloads = path.join(home, "Downloads");
      writeSparse(path.join(downloads, "a.bin"), 60 * MB);
      writeSparse(path.join(downloads, "b.bin"), 60 * MB);

      const insights = await createAnalyzer({
        now: () => Date.now() + YEAR_MS,
      }).analyze();

      expect(insights).toEqual([
        {
          type: InsightType.OldFiles,
          description: "Downloads: 2 old files (120.00 MB)",
          path: downloads,
          sizeInBytes: 120 * MB,
          action: RecommendedAction.Archive,
        },
      ]);
    });

    it("should ignore recently accessed downloads", async () => {
      writeSparse(path.join(home, "Downloads", "a.bin"), 150 * MB);

      expect(await createAnalyzer().analyze()).toEqual([]);
    });

    it("should flag large installers for review", async () => {
      const downloads = path.join(home, "Downloads");
      writeSparse(path.join(downloads, "setup.exe"), 60 * MB);
      writeSparse(path.join(downloads, "tool.msi"), 10 * MB);

      expect(await createAnalyzer().analyze()).toEqual([
        {
          type: InsightType.LargeFiles,
          description: "Downloads: 1 large installers (60.00 MB)",
          path: downloads,
          sizeInBytes: 60 * MB,
          action: RecommendedAction.Review,
        },
      ]);
    });
  });

  describe("large files", () => {
    it("should archive media and review everything else", async () => {
      const movie = path.join(home, "Videos", "movie.mp4");
      const report = path.join(home, "Documents", "report.pdf");
      writeSparse(movie, 2 * MB);
      writeSparse(report, 2 * MB);
      writeSparse(path.join(home, "Documents", ".hidden", "secret.mp4"), 2 * MB);
      writeSparse(path.join(home, "Desktop", "note.txt"), 1024);

      const insights = await createAnalyzer({ largeFileSizeMB: 1 }).analyze();

      expect(insights).toEqual([
        {
          type: InsightType.LargeFiles,
          description: "Large file: movie.mp4 (2.00 MB)",
          path: movie,
          sizeInBytes: 2 * MB,
          action: RecommendedAction.Archive,
        },
        {
          type: InsightType.LargeFiles,
          description: "Large file: report.pdf (2.00 MB)",
          path: report,
          sizeInBytes: 2 * MB,
          action: RecommendedAction.Review,
        },
      ]);
    });

    it("should stop three levels below each media folder", async () => {
      const videos = path.join(home, "Videos");
      writeSparse(path.join(videos, "1", "2", "3", "ok.mp4"), 2 * MB);
      writeSparse(path.join(videos, "1", "2", "3", "4", "deep.mp4"), 2 * MB);

      const insights = await createAnalyzer({ largeFileSizeMB: 1 }).analyze();

      expect(insights.map((i) => path.basename(i.path))).toEqual(["ok.mp4"]);
    });
  });

  describe("disk images", () => {
    it("should archive disk images found under home", async () => {
      const iso = path.join(home, "isos", "ubuntu.iso");
      writeSparse(iso, 20 * MB);
      writeSparse(path.join(home, "AppData", "vm.vmdk"), 20 * MB);
      writeSparse(path.join(home, ".vagrant", "box.vmdk"), 20 * MB);
      writeSparse(path.join(home, "small.img"), 1 * MB);

      expect(await createAnalyzer().analyze()).toEqual([
        {
          type: InsightType.LargeFiles,
          description: "Disk image: ubuntu.iso (20.00 MB)",
          path: iso,
          sizeInBytes: 20 * MB,
          action: RecommendedAction.Archive,
        },
      ]);
    });

    it("should keep only the archive finding for a large disk image", async () => {
      const iso = path.join(home, "Documents", "backup.iso");
      writeSparse(iso, 600 * MB);

      const insights = await createAnalyzer().analyze();

      expect(insights).toEqual([
        {
          type: InsightType.LargeFiles,
          description: "Disk image: backup.iso (600.00 MB)",
          path: iso,
          sizeInBytes: 600 * MB,
          action: RecommendedAction.Archive,
        },
      ]);
    });
  });

  it("should stop when cancelled", async () => {
    writeSparse(path.join(home, "Videos", "movie.mp4"), 2 * MB);
    const controller = new AbortController();
    controller.abort();

    await expect(
      createAnalyzer({ largeFileSizeMB: 1 }).analyze(controller.signal)
    ).rejects.toBeInstanceOf(CancellationError);
  });
});
