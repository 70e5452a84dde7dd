/**
 * Resolution of the per-user folders probed by the analyzers
 */

import * as os from "os";
import * as path from "path";
import { SystemPaths } from "../interfaces/ISystemPaths";

/**
 * Resolve well-known folders for a platform.
 *
 * On Windows the usual environment variables win; macOS uses the Library
 * folders; everything else follows the XDG base directories.
 */
export function resolveSystemPaths(
  overrides: Partial<SystemPaths> = {},
  env: NodeJS.ProcessEnv = process.env
): SystemPaths {
  const platform = overrides.platform ?? process.platform;
  const home = overrides.home ?? os.homedir();

  let localAppData: string;
  let appData: string;

  switch (platform) {
    case "win32":
      localAppData = env["LOCALAPPDATA"] || path.join(home, "AppData", "Local");
      appData = env["APPDATA"] || path.join(home, "AppData", "Roaming");
      break;
    case "darwin":
      localAppData = path.join(home, "Library", "Caches");
      appData = path.join(home, "Library", "Application Support");
      break;
    default:
      localAppData = env["XDG_CACHE_HOME"] || path.join(home, ".cache");
      appData = env["XDG_CONFIG_HOME"] || path.join(home, ".config");
      break;
  }

  return {
    platform,
    home,
    localAppData: overrides.localAppData ?? localAppData,
    appData: overrides.appData ?? appData,
    goPath: overrides.goPath ?? (env["GOPATH"] || path.join(home, "go")),
  };
}
