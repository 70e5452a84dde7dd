/**
 * Grouping of insights by the location they live in
 */

import { Insight } from "../interfaces/IInsightAnalyzer";

const WINDOWS_DRIVE = /^[A-Za-z]:/;

/**
 * Drive (or POSIX root) plus the first folder below it; for UNC paths,
 * the server and share.
 *
 * Paths that are not rooted, such as the "docker images" marker, are
 * their own key.
 *
 * @example
 * getLocationKey("C:\\Users\\a\\file"); // "C:\\Users"
 * getLocationKey("/home/a/file");       // "/home"
 * getLocationKey("\\\\nas\\media\\a.mkv");  // "\\\\nas\\media"
 * getLocationKey("docker images");      // "docker images"
 */
export function getLocationKey(location: string): string {
  if (!location) {
    return "Unknown";
  }

  if (WINDOWS_DRIVE.test(location)) {
    const drive = location.substring(0, 2);
    const parts = location.split(/[\\/]/).filter((part) => part.length > 0);
    return parts.length >= 2 ? `${drive}\\${parts[1]}` : drive;
  }

  if (location.startsWith("\\\\")) {
    const [server, share] = location
      .substring(2)
      .split(/[\\/]/)
      .filter((part) => part.length > 0);
    if (!server) {
      return "\\\\";
    }
    return share ? `\\\\${server}\\${share}` : `\\\\${server}`;
  }

  if (location.startsWith("/")) {
    const first = location.split("/").find((part) => part.length > 0);
    return first ? `/${first}` : "/";
  }

  return location;
}

/**
 * Group insights by location key, each group sorted by size descending.
 * Keys keep the order in which they were first seen.
 */
export function groupByLocation(
  insights: readonly Insight[]
): Map<string, Insight[]> {
  const grouped = new Map<string, Insight[]>();

  for (const insight of insights) {
    const key = getLocationKey(insight.path);
    const group = grouped.get(key);
    if (group) {
      group.push(insight);
    } else {
      grouped.set(key, [insight]);
    }
  }

  for (const group of grouped.values()) {
    group.sort((a, b) => b.sizeInBytes - a.sizeInBytes);
  }

  return grouped;
}
