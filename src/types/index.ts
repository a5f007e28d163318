/**
 * Core type definitions for docgov
 */

// ============================================================================
// POLICY PACK
// ============================================================================

export interface SlaThresholds {
  minQualityScore: number;
  maxStalePct: number;
  maxHighPriorityGaps: number;
  maxQualityScoreDrop: number;
}

export interface CommunityFeed {
  url: string;
  name: string;
}

/** Collector tuning; optional in the pack file, defaults applied by the loader */
export interface GapSettings {
  staleDays: number;
  communityMinRepetitions: number;
  searchMinOccurrences: number;
  docsDir: string;
  communityFeeds: CommunityFeed[];
}

export interface PolicyPack {
  name: string;
  /** Path the pack was loaded from */
  source: string;
  interfacePatterns: string[];
  docPatterns: string[];
  openapiPatterns: string[];
  sdkPatterns: string[];
  referenceDocPatterns: string[];
  slaThresholds: SlaThresholds;
  gapSettings: GapSettings;
}

// ============================================================================
// CHANGE SETS
// ============================================================================

export type ChangeType = 'added' | 'modified' | 'deleted' | 'renamed';

export interface ChangedFile {
  path: string;
  changeType: ChangeType;
  /** Previous path, for renames */
  oldPath?: string;
}

export type PatternGroup = 'interface' | 'doc' | 'openapi' | 'sdk' | 'referenceDoc';

export interface ClassifiedChange {
  file: ChangedFile;
  labels: PatternGroup[];
}

// ============================================================================
// GATES
// ============================================================================

export interface ContractViolation {
  interfaceFilesChanged: string[];
  docFilesChanged: string[];
  satisfied: boolean;
  explanation: string;
}

export type DriftStatus = 'OK' | 'DRIFT';

export interface DriftReport {
  status: DriftStatus;
  summary: string;
  openapiChanges: string[];
  sdkChanges: string[];
  referenceDocChanges: string[];
}

// ============================================================================
// GAPS
// ============================================================================

export type GapSource = 'CodeChange' | 'Community' | 'Staleness' | 'SearchAnalytics';

export type GapPriority = 'low' | 'medium' | 'high';

export type DocType = 'tutorial' | 'how-to' | 'concept' | 'reference' | 'troubleshooting';

export interface ScoreContribution {
  source: GapSource;
  baseWeight: number;
  recencyBonus: number;
  volumeBonus: number;
}

export interface Gap {
  id: string;
  source: GapSource;
  /** Every source that reported this gap, highest-weighted first */
  sources: GapSource[];
  title: string;
  description: string;
  suggestedDocType: DocType;
  category: string;
  priority: GapPriority;
  score: number;
  /** ISO timestamp */
  detectedAt: string;
  /** Source-specific magnitude: questions in a cluster, searches, months overdue */
  volume: number;
  /** Files, sample questions or queries backing the gap */
  evidence: string[];
  contributions: ScoreContribution[];
}

export interface CollectionFailure {
  source: GapSource;
  message: string;
}

export interface GapSummary {
  totalGaps: number;
  byPriority: Record<GapPriority, number>;
  bySource: Partial<Record<GapSource, number>>;
  byDocType: Partial<Record<DocType, number>>;
}

export interface GapReport {
  generatedAt: string;
  sinceDays: number;
  sourcesAnalyzed: GapSource[];
  collectionFailures: CollectionFailure[];
  summary: GapSummary;
  gaps: Gap[];
}

// ============================================================================
// KPI / SLA
// ============================================================================

export interface KPISnapshot {
  qualityScore: number;
  totalDocs: number;
  docsWithFrontmatter: number;
  staleDocs: number;
  openGaps: number;
  highPriorityGaps: number;
  generatedAt: string;
  metadataCompletenessPct?: number;
  notes: string[];
}

export type SlaStatus = 'OK' | 'BREACH';

export interface SLAVerdict {
  status: SlaStatus;
  summary: string;
  breaches: string[];
  trendNotes: string[];
  metrics: {
    qualityScore: number;
    stalePct: number;
    highPriorityGaps: number;
    /** current minus previous; null without a previous snapshot */
    qualityScoreDelta: number | null;
  };
}

// ============================================================================
// DOCUMENT INVENTORY
// ============================================================================

export interface DocumentRecord {
  /** Path relative to the docs directory, forward slashes */
  path: string;
  hasFrontmatter: boolean;
  frontmatter: Record<string, unknown>;
}

// ============================================================================
// CLI OPTIONS
// ============================================================================

export interface GlobalOptions {
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
}

export interface ChangeSetOptions extends GlobalOptions {
  base: string;
  head: string;
  policyPack: string;
  repo: string;
}

export interface ContractCheckOptions extends ChangeSetOptions {
  jsonOutput?: string;
}

export interface DriftCheckOptions extends ChangeSetOptions {
  jsonOutput: string;
  mdOutput: string;
}

export interface KpiSlaOptions extends GlobalOptions {
  current: string;
  previous?: string;
  policyPack: string;
  jsonOutput: string;
  mdOutput: string;
}

export interface GapsAnalyzeOptions extends GlobalOptions {
  since: number;
  repo: string;
  outputDir: string;
  policyPack?: string;
  algoliaJson?: string;
  algoliaCsv?: string;
  communityJson?: string;
  xlsx: boolean;
}

export interface KpiSnapshotOptions extends GlobalOptions {
  policyPack?: string;
  docsDir?: string;
  staleDays?: number;
  gapReport: string;
  jsonOutput: string;
  mdOutput: string;
  note: string[];
}

export interface InitOptions extends GlobalOptions {
  output: string;
  force: boolean;
}
