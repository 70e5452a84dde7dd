/**
 * Unit tests for LinuxSubsystemAnalyzer
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { distributionName, LinuxSubsystemAnalyzer } from "./LinuxSubsystemAnalyzer";
import { resolveSystemPaths } from "../SystemPaths";
import { InsightType, RecommendedAction } from "../../interfaces/IInsightAnalyzer";

function writeSparse(filePath: string, size: number): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, "");
  fs.truncateSync(filePath, size);
}

describe("LinuxSubsystemAnalyzer", () => {
  let testDir: string;
  let packagesDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), "wsl-analyzer-test-"));
    packagesDir = path.join(testDir, "Local", "Packages");
    fs.mkdirSync(packagesDir, { recursive: true });
  });

  afterEach(() => {
    if (fs.existsSync(testDir)) {
      fs.rmSync(testDir, { recursive: true, force: true });
    }
  });

  function createAnalyzer(platform: NodeJS.Platform): LinuxSubsystemAnalyzer {
    return new LinuxSubsystemAnalyzer(
      resolveSystemPaths(
        {
          platform,
          home: testDir,
          localAppData: path.join(testDir, "Local"),
        },
        {}
      )
    );
  }

  it("should only be available on Windows", async () => {
    expect(await createAnalyzer("linux").isAvailable()).toBe(false);
    expect(await createAnalyzer("win32").isAvailable()).toBe(true);
  });

  it("should emit nothing off Windows even when disks exist", async () => {
    writeSparse(
      path.join(packagesDir, "CanonicalGroupLimited.Ubuntu_x", "LocalState", "ext4.vhdx"),
      1024
    );

    expect(await createAnalyzer("linux").analyze()).toEqual([]);
  });

  it("should report each virtual disk once even when several patterns match", async () => {
    const ubuntuDisk = path.join(
      packagesDir,
      "CanonicalGroupLimited.Ubuntu22.04LTS_79rhkp1fndgsc",
      "LocalState",
      "ext4.vhdx"
    );
    const debianDisk = path.join(
      packagesDir,
      "TheDebianProject.DebianGNULinux_76v4gfsz19hv4",
      "LocalState",
      "ext4.vhdx"
    );
    writeSparse(ubuntuDisk, 2048);
    writeSparse(debianDisk, 1024);

    const insights = await createAnalyzer("win32").analyze();

    expect(insights).toEqual([
      {
        type: InsightType.LinuxSubsystemDistribution,
        description: "WSL2 Ubuntu: 2.00 KB",
        path: ubuntuDisk,
        sizeInBytes: 2048,
        action: RecommendedAction.Review,
        cleanupCommand: "wsl --unregister Ubuntu",
      },
      {
        type: InsightType.LinuxSubsystemDistribution,
        description: "WSL2 Debian: 1.00 KB",
        path: debianDisk,
        sizeInBytes: 1024,
        action: RecommendedAction.Review,
        cleanupCommand: "wsl --unregister Debian",
      },
    ]);
  });

  it("should ignore files that are not virtual disks", async () => {
    const stateDir = path.join(packagesDir, "CanonicalGroupLimited.Ubuntu_x", "LocalState");
    writeSparse(path.join(stateDir, "rootfs.tar"), 4096);

    expect(await createAnalyzer("win32").analyze()).toEqual([]);
  });

  it("should find container runtime disks in nested folders", async () => {
    const dockerDisk = path.join(
      packagesDir,
      "Docker.DockerDesktop_abc",
      "LocalState",
      "data",
      "docker_data.vhdx"
    );
    writeSparse(dockerDisk, 1024 * 1024);

    const insights = await createAnalyzer("win32").analyze();

    expect(insights).toEqual([
      {
        type: InsightType.LinuxSubsystemDistribution,
        description: "Docker Desktop WSL2 data: 1.00 MB",
        path: dockerDisk,
        sizeInBytes: 1024 * 1024,
        action: RecommendedAction.Review,
      },
    ]);
  });

  it("should return nothing when the packages folder is missing", async () => {
    fs.rmSync(packagesDir, { recursive: true });

    expect(await createAnalyzer("win32").analyze()).toEqual([]);
  });
});

describe("distributionName", () => {
  it("should shorten known distributions", () => {
    expect(distributionName("CanonicalGroupLimited.UbuntuOnWindows_x")).toBe("Ubuntu");
    expect(distributionName("TheDebianProject.DebianGNULinux_x")).toBe("Debian");
    expect(distributionName("KaliLinux.54290C8133FEE_ey8k8hqnwqnmg")).toBe(
      "KaliLinux.54290C8133FEE_ey8k8hqnwqnmg"
    );
  });
});
