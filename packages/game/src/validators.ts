/**
 * @fileoverview Local validation of player input.
 *
 * Everything here runs before any remote call. Violations raise
 * `SessionError('invalid')` carrying the rule that failed.
 */

import {
  ARTICLES,
  type ChallengeDraft,
  FORBIDDEN_WORDS_PER_CHALLENGE,
  getAllForbiddenWords,
  PREPOSITIONS,
  SessionError,
} from '@inkling/shared';

export const MIN_WORD_LENGTH = 2;

/**
 * Lower-case, strip accents, then drop everything that is not a-z.
 */
export function normalizeWord(word: string): string {
  return word
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-z]/g, '');
}

// ============ Prompts ============

/**
 * Target and forbidden words that appear in the prompt (case-insensitive).
 */
export function findForbiddenWordsInPrompt(prompt: string, challenge: ChallengeDraft): string[] {
  const text = prompt.toLowerCase();
  return getAllForbiddenWords(challenge).filter((word) => {
    const needle = word.trim().toLowerCase();
    return needle.length > 0 && text.includes(needle);
  });
}

/**
 * Check a drawer's prompt and return it trimmed.
 */
export function validatePrompt(prompt: string, challenge: ChallengeDraft): string {
  const trimmed = prompt.trim();
  if (trimmed.length === 0) {
    throw SessionError.invalid('prompt_empty', 'Prompt must not be empty');
  }
  const offending = findForbiddenWordsInPrompt(trimmed, challenge);
  if (offending.length > 0) {
    throw SessionError.invalid(
      'prompt_forbidden_word',
      `Prompt contains forbidden words: ${offending.join(', ')}`
    );
  }
  return trimmed;
}

// ============ Challenges ============

function canonicalChoice<T extends string>(
  value: string,
  allowed: readonly T[],
  rule: string
): T {
  const match = allowed.find((option) => option.toLowerCase() === value.trim().toLowerCase());
  if (!match) {
    throw SessionError.invalid(rule, `"${value}" must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

/**
 * Check a challenge definition and return it with normalized words and
 * canonical articles/preposition.
 */
export function validateChallengeDraft(draft: ChallengeDraft): ChallengeDraft {
  const article1 = canonicalChoice(draft.article1, ARTICLES, 'invalid_article');
  const preposition = canonicalChoice(draft.preposition, PREPOSITIONS, 'invalid_preposition');
  const article2 = canonicalChoice(draft.article2, ARTICLES, 'invalid_article');

  const forbiddenWords = draft.forbiddenWords
    .filter((word) => word.trim().length > 0)
    .map(normalizeWord);
  if (forbiddenWords.length !== FORBIDDEN_WORDS_PER_CHALLENGE) {
    throw SessionError.invalid(
      'forbidden_word_count',
      `Exactly ${FORBIDDEN_WORDS_PER_CHALLENGE} forbidden words are required`
    );
  }

  const input1 = normalizeWord(draft.input1);
  const input2 = normalizeWord(draft.input2);
  const words = [input1, input2, ...forbiddenWords];

  const tooShort = words.filter((word) => word.length < MIN_WORD_LENGTH);
  if (tooShort.length > 0) {
    throw SessionError.invalid(
      'word_too_short',
      `Words must have at least ${MIN_WORD_LENGTH} letters`
    );
  }

  if (new Set(words).size !== words.length) {
    throw SessionError.invalid('duplicate_words', 'All words must be different');
  }

  return { article1, input1, preposition, article2, input2, forbiddenWords };
}
