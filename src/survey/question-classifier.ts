/**
 * Keyword classifier that maps a question's text to an answer strategy.
 *
 * Matching is case-insensitive substring membership, tested in a fixed
 * precedence order: yes/no, numeric, favorite (only when the question
 * offers options), opinion, and finally freeform. Substrings are not
 * word-bounded: "agree" also matches "disagree" and "age" matches "page".
 */

import { QUESTION_KEYWORDS } from '../shared/constants.js';
import type { AnswerStrategy } from '../types/index.js';

export interface ClassifyOptions {
  /** Whether the question offers a fixed set of options to pick from. */
  hasOptions: boolean;
}

export type TopicHint = 'location';

function mentionsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

export function classify(questionText: string, options: ClassifyOptions): AnswerStrategy {
  const text = questionText.toLowerCase();

  if (mentionsAny(text, QUESTION_KEYWORDS.YES_NO)) {
    return 'yes-no';
  }
  if (mentionsAny(text, QUESTION_KEYWORDS.NUMERIC)) {
    return 'numeric';
  }
  if (options.hasOptions && mentionsAny(text, QUESTION_KEYWORDS.FAVORITE)) {
    return 'favorite';
  }
  if (mentionsAny(text, QUESTION_KEYWORDS.OPINION)) {
    return 'opinion';
  }
  return 'freeform';
}

/**
 * Topics a question touches that do not change its strategy but are worth
 * logging. Only location is tracked today.
 */
export function detectTopicHints(questionText: string): TopicHint[] {
  const text = questionText.toLowerCase();
  return mentionsAny(text, QUESTION_KEYWORDS.LOCATION) ? ['location'] : [];
}
