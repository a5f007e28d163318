/**
 * Git diff integration
 *
 * The version-control collaborator behind change-set classification. Shells
 * out to git for the file-level diff between two revisions, per-file patches
 * and date-based revision lookup.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { ChangedFile, ChangeType } from '../../types/index.js';
import { errors } from '../../utils/errors.js';

const execFileAsync = promisify(execFile);

/** Git's well-known empty tree SHA, used when history starts inside the window */
export const GIT_EMPTY_TREE_SHA = '4b825dc642cb6eb9a060e54bf899d15f71049056';

// ============================================================================
// TYPES
// ============================================================================

export interface VersionControl {
  /** Resolve a ref to a commit id; throws DiffError when it cannot */
  resolveRef(ref: string): Promise<string>;
  /** Files changed between two refs, in the collaborator's output order */
  diff(base: string, head: string): Promise<ChangedFile[]>;
  /** Last commit on HEAD older than the given number of days */
  revisionBefore(daysAgo: number): Promise<string>;
  /** Unified patch of one file between two refs; empty when unchanged */
  fileDiff(base: string, head: string, path: string): Promise<string>;
}

// ============================================================================
// PARSING
// ============================================================================

/**
 * Parse a git status letter into a change type
 */
function parseGitStatus(statusChar: string): ChangeType {
  switch (statusChar) {
    case 'A': return 'added';
    case 'D': return 'deleted';
    case 'M': return 'modified';
    case 'R': return 'renamed';
    case 'C': return 'added'; // copied = effectively added
    default: return 'modified';
  }
}

/**
 * Parse git diff --name-status output into changed files.
 * Renames ("R100\told\tnew") keep the previous path.
 */
export function parseNameStatus(output: string): ChangedFile[] {
  const files: ChangedFile[] = [];
  const seen = new Set<string>();
  const lines = output.split('\n').map((line) => line.trimEnd()).filter(Boolean);

  for (const line of lines) {
    const parts = line.split('\t');
    if (parts.length < 2) continue;

    const statusRaw = parts[0].charAt(0); // R100 → R
    const file: ChangedFile = statusRaw === 'R' && parts.length >= 3
      ? { path: parts[2], changeType: 'renamed', oldPath: parts[1] }
      : { path: parts[parts.length - 1], changeType: parseGitStatus(statusRaw) };

    if (seen.has(file.path)) continue;
    seen.add(file.path);
    files.push(file);
  }

  return files;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
    return stderr || error.message;
  }
  return String(error);
}

// ============================================================================
// GIT IMPLEMENTATION
// ============================================================================

export class GitVersionControl implements VersionControl {
  constructor(private readonly rootPath: string = process.cwd()) {}

  private async git(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync('git', args, {
      cwd: this.rootPath,
      maxBuffer: 64 * 1024 * 1024,
    });
    return stdout;
  }

  async resolveRef(ref: string): Promise<string> {
    if (ref === GIT_EMPTY_TREE_SHA) return ref;
    if (ref.trim() === '' || ref.startsWith('-')) {
      throw errors.unresolvableRef(ref, 'not a revision');
    }
    try {
      const stdout = await this.git(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);
      return stdout.trim();
    } catch (error) {
      throw errors.unresolvableRef(ref, describe(error));
    }
  }

  async diff(base: string, head: string): Promise<ChangedFile[]> {
    const baseId = await this.resolveRef(base);
    const headId = await this.resolveRef(head);

    // Three-dot diff compares against the merge base; two-dot covers refs with
    // no shared ancestor, the plain form covers an empty-tree base
    let lastError: unknown;
    for (const range of [[`${baseId}...${headId}`], [`${baseId}..${headId}`], [baseId, headId]]) {
      try {
        return parseNameStatus(await this.git(['diff', '--name-status', '-M', ...range]));
      } catch (error) {
        lastError = error;
      }
    }
    throw errors.diffFailed(base, head, describe(lastError));
  }

  async revisionBefore(daysAgo: number): Promise<string> {
    try {
      const stdout = await this.git(['rev-list', '-1', `--before=${daysAgo} days ago`, 'HEAD']);
      return stdout.trim() || GIT_EMPTY_TREE_SHA;
    } catch (error) {
      throw errors.unresolvableRef(`HEAD@{${daysAgo} days ago}`, describe(error));
    }
  }

  async fileDiff(base: string, head: string, path: string): Promise<string> {
    let lastError: unknown;
    // Empty-tree bases have no merge base, hence the plain two-argument form last
    for (const range of [[`${base}...${head}`], [`${base}..${head}`], [base, head]]) {
      try {
        return await this.git(['diff', ...range, '--', path]);
      } catch (error) {
        lastError = error;
      }
    }
    throw errors.diffFailed(base, head, describe(lastError));
  }
}
