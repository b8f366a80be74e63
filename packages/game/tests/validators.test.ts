import { SessionError } from '@inkling/shared';
import { createChallengeDraft } from '@inkling/testing';
import { describe, expect, it } from 'vitest';
import {
  findForbiddenWordsInPrompt,
  normalizeWord,
  validateChallengeDraft,
  validatePrompt,
} from '../src/index.js';

function ruleOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SessionError) {
      expect(error.kind).toBe('invalid');
      return error.rule;
    }
    throw error;
  }
  return undefined;
}

describe('normalizeWord', () => {
  it('should strip accents, case and non-letters', () => {
    expect(normalizeWord('  Élève-2 ')).toBe('eleve');
    expect(normalizeWord('Garçon')).toBe('garcon');
  });
});

describe('validatePrompt', () => {
  const challenge = createChallengeDraft();

  it('should return the trimmed prompt', () => {
    expect(validatePrompt('  a small feline on furniture  ', challenge)).toBe(
      'a small feline on furniture'
    );
  });

  it('should reject an empty prompt', () => {
    expect(ruleOf(() => validatePrompt('   ', challenge))).toBe('prompt_empty');
  });

  it('should reject target words regardless of case', () => {
    expect(ruleOf(() => validatePrompt('A CHAT sleeping', challenge))).toBe('prompt_forbidden_word');
  });

  it('should name every offending word', () => {
    expect(() => validatePrompt('chat on a wooden table, bois', challenge)).toThrow(
      'Prompt contains forbidden words: chat, table, bois'
    );
  });

  it('should match forbidden words inside longer words', () => {
    expect(findForbiddenWordsInPrompt('animalistic vibes', challenge)).toEqual(['animal']);
  });
});

describe('validateChallengeDraft', () => {
  it('should normalize words and canonicalize the template', () => {
    const draft = createChallengeDraft({
      article1: 'un',
      input1: ' Chât ',
      preposition: 'DANS',
      article2: 'une',
      input2: 'Boîte',
      forbiddenWords: ['Animal', 'carton', 'miaou'],
    });

    expect(validateChallengeDraft(draft)).toEqual({
      article1: 'Un',
      input1: 'chat',
      preposition: 'Dans',
      article2: 'Une',
      input2: 'boite',
      forbiddenWords: ['animal', 'carton', 'miaou'],
    });
  });

  it('should reject unknown articles', () => {
    expect(ruleOf(() => validateChallengeDraft(createChallengeDraft({ article1: 'Le' })))).toBe(
      'invalid_article'
    );
  });

  it('should reject unknown prepositions', () => {
    expect(
      ruleOf(() => validateChallengeDraft(createChallengeDraft({ preposition: 'Sous' })))
    ).toBe('invalid_preposition');
  });

  it('should require exactly three forbidden words', () => {
    const draft = createChallengeDraft({ forbiddenWords: ['animal', '  ', 'bois'] });

    expect(ruleOf(() => validateChallengeDraft(draft))).toBe('forbidden_word_count');
  });

  it('should reject one-letter words', () => {
    expect(ruleOf(() => validateChallengeDraft(createChallengeDraft({ input2: 'x' })))).toBe(
      'word_too_short'
    );
  });

  it('should reject duplicates after normalization', () => {
    const draft = createChallengeDraft({ forbiddenWords: ['animal', 'CHAT', 'bois'] });

    expect(ruleOf(() => validateChallengeDraft(draft))).toBe('duplicate_words');
  });
});
