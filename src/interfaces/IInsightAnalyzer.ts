/**
 * Insight analyzer interface
 */

/**
 * Category of an insight
 */
export enum InsightType {
  ContainerImages = "ContainerImages",
  ContainerContainers = "ContainerContainers",
  ContainerVolumes = "ContainerVolumes",
  LinuxSubsystemDistribution = "LinuxSubsystemDistribution",
  ProjectArtifacts = "ProjectArtifacts",
  DependencyCache = "DependencyCache",
  ToolingCache = "ToolingCache",
  TempFiles = "TempFiles",
  OldFiles = "OldFiles",
  LargeFiles = "LargeFiles",
}

/**
 * Recommended action for an insight
 */
export enum RecommendedAction {
  /** Safe to delete, can be regenerated */
  Clean = "Clean",
  /** Move to external storage */
  Archive = "Archive",
  /** User should review before acting */
  Review = "Review",
}

/**
 * One actionable finding about reclaimable or archivable disk space
 */
export interface Insight {
  readonly type: InsightType;
  /** Human-readable summary, already carrying the formatted size */
  readonly description: string;
  /** Filesystem path, or a marker such as "docker images" */
  readonly path: string;
  /** Estimated bytes; 0 when only a count is known */
  readonly sizeInBytes: number;
  readonly action: RecommendedAction;
  /** Suggested shell command. Never executed by the analyzers. */
  readonly cleanupCommand?: string;
}

export interface IInsightAnalyzer {
  /**
   * Display name, unique across the registered analyzers
   */
  readonly name: string;

  /**
   * Whether this analyzer can run on the current system.
   * Must resolve quickly and never reject.
   */
  isAvailable(): Promise<boolean>;

  /**
   * Probe the system and return insights in discovery order
   * @param signal - Aborts the analysis with a CancellationError
   */
  analyze(signal?: AbortSignal): Promise<Insight[]>;
}
