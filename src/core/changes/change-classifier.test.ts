/**
 * Tests for the change-set classifier
 */

import { describe, it, expect } from 'vitest';
import type { ChangedFile } from '../../types/index.js';
import { ChangeSetClassifier, classifyChanges, matchesAny, pathsWithLabel } from './change-classifier.js';
import type { VersionControl } from './git-diff.js';
import { DEFAULT_POLICY_PACK_YAML, parsePolicyPack } from '../policy/policy-pack.js';
import { DiffError, errors } from '../../utils/errors.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const pack = parsePolicyPack(DEFAULT_POLICY_PACK_YAML, 'policy.yml');

function makeChangedFile(overrides: Partial<ChangedFile>): ChangedFile {
  return {
    path: 'src/file.ts',
    changeType: 'modified',
    ...overrides,
  };
}

function fakeVcs(files: ChangedFile[], knownRefs: string[] = ['main', 'HEAD']): VersionControl {
  return {
    resolveRef: async (ref) => {
      if (!knownRefs.includes(ref)) throw errors.unresolvableRef(ref);
      return ref;
    },
    diff: async (base, head) => {
      for (const ref of [base, head]) {
        if (!knownRefs.includes(ref)) throw errors.unresolvableRef(ref);
      }
      return files;
    },
    revisionBefore: async () => 'main',
    fileDiff: async () => '',
  };
}

// ============================================================================
// TESTS
// ============================================================================

describe('matchesAny', () => {
  it('should match case-insensitively', () => {
    expect(matchesAny('API/OpenAPI.YAML', ['api/**'])).toBe(true);
  });

  it('should match dotfiles', () => {
    expect(matchesAny('docs/.pages', ['docs/**'])).toBe(true);
  });

  it('should normalize leading ./ and backslashes', () => {
    expect(matchesAny('./docs/index.md', ['docs/**'])).toBe(true);
    expect(matchesAny('docs\\reference\\orders.md', ['docs/reference/**'])).toBe(true);
  });

  it('should not match unrelated paths', () => {
    expect(matchesAny('src/app.ts', ['docs/**', 'api/**'])).toBe(false);
  });
});

describe('classifyChanges', () => {
  it('should give an OpenAPI document both interface and openapi labels', () => {
    const [change] = classifyChanges([makeChangedFile({ path: 'api/openapi.yaml' })], pack);

    expect(change.labels).toEqual(['interface', 'openapi']);
  });

  it('should give a reference doc both doc and referenceDoc labels', () => {
    const [change] = classifyChanges([makeChangedFile({ path: 'docs/reference/orders.md' })], pack);

    expect(change.labels).toEqual(['doc', 'referenceDoc']);
  });

  it('should label SDK code as interface and sdk', () => {
    const [change] = classifyChanges([makeChangedFile({ path: 'sdk/python/client.py' })], pack);

    expect(change.labels).toEqual(['interface', 'sdk']);
  });

  it('should leave unmatched files unlabelled', () => {
    const [change] = classifyChanges([makeChangedFile({ path: 'src/internal/cache.ts' })], pack);

    expect(change.labels).toEqual([]);
  });

  it('should match nested route directories', () => {
    const [change] = classifyChanges([makeChangedFile({ path: 'src/billing/routes/invoices.ts' })], pack);

    expect(change.labels).toEqual(['interface']);
  });

  it('should preserve input order and be deterministic', () => {
    const files = [
      makeChangedFile({ path: 'docs/index.md' }),
      makeChangedFile({ path: 'api/openapi.yaml' }),
      makeChangedFile({ path: 'README.md' }),
    ];

    const first = classifyChanges(files, pack);
    const second = classifyChanges(files, pack);

    expect(first.map((c) => c.file.path)).toEqual(['docs/index.md', 'api/openapi.yaml', 'README.md']);
    expect(second).toEqual(first);
  });
});

describe('pathsWithLabel', () => {
  it('should select paths carrying a label', () => {
    const classified = classifyChanges(
      [
        makeChangedFile({ path: 'api/openapi.yaml' }),
        makeChangedFile({ path: 'docs/guide.md' }),
        makeChangedFile({ path: 'clients/go/client.go' }),
      ],
      pack
    );

    expect(pathsWithLabel(classified, 'interface')).toEqual(['api/openapi.yaml', 'clients/go/client.go']);
    expect(pathsWithLabel(classified, 'doc')).toEqual(['docs/guide.md']);
  });
});

describe('ChangeSetClassifier', () => {
  it('should diff through the version-control collaborator', async () => {
    const classifier = new ChangeSetClassifier(
      fakeVcs([makeChangedFile({ path: 'api/openapi.yaml', changeType: 'added' })]),
      pack
    );

    const classified = await classifier.classify('main', 'HEAD');

    expect(classified).toEqual([
      { file: { path: 'api/openapi.yaml', changeType: 'added' }, labels: ['interface', 'openapi'] },
    ]);
  });

  it('should propagate DiffError for unknown refs', async () => {
    const classifier = new ChangeSetClassifier(fakeVcs([]), pack);

    await expect(classifier.classify('origin/missing', 'HEAD')).rejects.toBeInstanceOf(DiffError);
  });
});
