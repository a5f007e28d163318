/**
 * Change-set classifier
 *
 * Labels each changed file with the policy pattern groups it matches. A file
 * may carry several labels (an OpenAPI document is usually both `interface`
 * and `openapi`).
 */

import { minimatch } from 'minimatch';
import type { ChangedFile, ClassifiedChange, PatternGroup, PolicyPack } from '../../types/index.js';
import { GLOB_OPTIONS } from '../policy/policy-pack.js';
import type { VersionControl } from './git-diff.js';

const GROUPS: ReadonlyArray<[PatternGroup, (pack: PolicyPack) => readonly string[]]> = [
  ['interface', (pack) => pack.interfacePatterns],
  ['doc', (pack) => pack.docPatterns],
  ['openapi', (pack) => pack.openapiPatterns],
  ['sdk', (pack) => pack.sdkPatterns],
  ['referenceDoc', (pack) => pack.referenceDocPatterns],
];

/**
 * Case-insensitive glob match of a repository path against any pattern
 */
export function matchesAny(path: string, patterns: readonly string[]): boolean {
  const normalized = path.replace(/\\/g, '/').replace(/^\.\//, '');
  return patterns.some((pattern) => minimatch(normalized, pattern, GLOB_OPTIONS));
}

/**
 * Classify a file list against a policy pack. Pure; order is preserved.
 */
export function classifyChanges(files: readonly ChangedFile[], pack: PolicyPack): ClassifiedChange[] {
  return files.map((file) => ({
    file,
    labels: GROUPS.filter(([, patterns]) => matchesAny(file.path, patterns(pack))).map(([group]) => group),
  }));
}

/**
 * Paths carrying a label, in classification order
 */
export function pathsWithLabel(classified: readonly ClassifiedChange[], label: PatternGroup): string[] {
  return classified.filter((change) => change.labels.includes(label)).map((change) => change.file.path);
}

export class ChangeSetClassifier {
  constructor(
    private readonly vcs: VersionControl,
    private readonly pack: PolicyPack
  ) {}

  /**
   * Diff two refs and classify the result. Throws DiffError for bad refs.
   */
  async classify(base: string, head: string): Promise<ClassifiedChange[]> {
    const files = await this.vcs.diff(base, head);
    return classifyChanges(files, this.pack);
  }
}
