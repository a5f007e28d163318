/**
 * Tests for the topic lexicon
 */

import { describe, it, expect } from 'vitest';
import { categorize, extractKeywords, loadLexicon, parseLexicon, questionDocType } from './lexicon.js';

const lexicon = loadLexicon();

describe('loadLexicon', () => {
  it('should load stop words and both category lists', () => {
    expect(lexicon.stopWords.has('the')).toBe(true);
    expect(lexicon.communityCategories[0].category).toBe('webhook');
    expect(lexicon.searchCategories.map(({ category }) => category)).toContain('deployment');
  });

  it('should reject malformed lexicons', () => {
    expect(() => parseLexicon({ stopWords: 'a' })).toThrow('stopWords must be a list of strings');
    expect(() =>
      parseLexicon({ stopWords: [], communityCategories: [{ keywords: [] }], searchCategories: [] })
    ).toThrow('communityCategories[0] needs a category');
  });
});

describe('categorize', () => {
  it('should return the first category with a matching keyword', () => {
    expect(categorize('Webhook not firing', lexicon.communityCategories)).toBe('webhook');
    expect(categorize('Connect error with Postgres', lexicon.communityCategories)).toBe('error');
  });

  it('should fall back to general', () => {
    expect(categorize('How to set up SAML', lexicon.communityCategories)).toBe('general');
  });
});

describe('questionDocType', () => {
  it('should recognise question shapes in order', () => {
    expect(questionDocType('Workflow stuck after update')).toBe('troubleshooting');
    expect(questionDocType('Why does my cron job skip runs?')).toBe('concept');
    expect(questionDocType('List of supported nodes')).toBe('reference');
  });

  it('should default to how-to', () => {
    expect(questionDocType('Custom nodes')).toBe('how-to');
  });
});

describe('extractKeywords', () => {
  it('should drop stop words and short words', () => {
    expect(extractKeywords('How do I connect Postgres to my workflow?', lexicon.stopWords)).toEqual([
      'connect',
      'postgres',
      'workflow',
    ]);
  });

  it('should keep at most ten keywords', () => {
    const title = 'alpha bravo charlie delta echo foxtrot golf hotel india juliet kilo lima';

    expect(extractKeywords(title, lexicon.stopWords)).toHaveLength(10);
  });
});
