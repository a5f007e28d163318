/**
 * docgov library entry point
 *
 * The governance engine without the CLI: load a policy pack, classify a
 * change set, run the gates, collect and rank gaps, and evaluate KPIs.
 */

export type * from './types/index.js';

export {
  DEFAULT_POLICY_PACK_PATH,
  DEFAULT_POLICY_PACK_YAML,
  defaultPolicyPack,
  loadPolicyPack,
  parsePolicyPack,
  resolvePolicyPack,
} from './core/policy/policy-pack.js';

export { GitVersionControl, parseNameStatus } from './core/changes/git-diff.js';
export type { VersionControl } from './core/changes/git-diff.js';
export { ChangeSetClassifier, classifyChanges, matchesAny } from './core/changes/change-classifier.js';

export { evaluateContract } from './core/gates/contract-gate.js';
export { evaluateDrift } from './core/drift/drift-detector.js';

export { runCollectors } from './core/gaps/collector.js';
export type { CollectorRun, GapCollector } from './core/gaps/collector.js';
export { CodeChangeCollector, scanSurfaces } from './core/gaps/code-change-collector.js';
export { CommunityCollector, parseFeed } from './core/gaps/community-collector.js';
export { StalenessCollector } from './core/gaps/staleness-collector.js';
export { SearchAnalyticsCollector } from './core/gaps/search-collector.js';
export { BASE_WEIGHTS, PRIORITY_CUTOFFS, createGap, priorityFor } from './core/gaps/gap-scoring.js';
export type { GapDraft } from './core/gaps/gap-scoring.js';
export { aggregate, buildGapReport } from './core/gaps/gap-aggregator.js';

export { loadDocuments } from './core/docs/doc-inventory.js';
export { buildKpiSnapshot, loadKpiSnapshot, parseKpiSnapshot } from './core/kpi/kpi-snapshot.js';
export { evaluateSla } from './core/kpi/sla-evaluator.js';

export { render, renderGapCsv } from './core/report/report-emitter.js';
export type { ReportDocument, ReportFormat } from './core/report/report-emitter.js';
export { renderGapWorkbook } from './core/report/xlsx-writer.js';

export {
  CollectionFailureError,
  ConfigError,
  DiffError,
  GovernanceError,
} from './utils/errors.js';
