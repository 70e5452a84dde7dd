/**
 * Well-known per-user folders the analyzers probe
 */

export interface SystemPaths {
  platform: NodeJS.Platform;
  /** The user's home directory */
  home: string;
  /** Machine-local application data (caches) */
  localAppData: string;
  /** Roaming application data (settings, editor state) */
  appData: string;
  /** Go workspace root */
  goPath: string;
}
