import { ANSWER_DEFAULTS } from '../shared/constants.js';
import { EmptyAnswerPoolError } from '../shared/errors.js';
import { randomInt, type RandomSource } from '../shared/timing.js';
import { pickRandom } from '../shared/utils.js';
import type { AnswerStrategy, ResponseProfile } from '../types/index.js';
import { classify } from './question-classifier.js';

export interface AnswerSynthesizerOptions {
  /** Probability of "Yes" for yes/no questions. */
  yesBias?: number;
  /** Probability of drawing an opinion answer from the long pool. */
  longOpinionProbability?: number;
  random?: RandomSource;
}

export interface SynthesizedAnswer {
  strategy: AnswerStrategy;
  value: string;
}

/**
 * Produces a concrete answer for a classified question.
 *
 * Options are the visible labels of the question's choices (empty for
 * free-text fields). All randomness flows through the injected source.
 */
export class AnswerSynthesizer {
  private readonly yesBias: number;
  private readonly longOpinionProbability: number;
  private readonly random: RandomSource;

  constructor(options: AnswerSynthesizerOptions = {}) {
    this.yesBias = options.yesBias ?? ANSWER_DEFAULTS.YES_BIAS;
    this.longOpinionProbability = options.longOpinionProbability ?? ANSWER_DEFAULTS.LONG_OPINION_PROBABILITY;
    this.random = options.random ?? Math.random;
  }

  /**
   * @throws EmptyAnswerPoolError when both the chosen profile pool and the
   *   options are empty
   */
  synthesize(strategy: AnswerStrategy, options: readonly string[], profile: ResponseProfile): string {
    switch (strategy) {
      case 'yes-no':
        return this.random() < this.yesBias ? 'Yes' : 'No';

      case 'numeric':
        return String(randomInt(ANSWER_DEFAULTS.NUMERIC_MIN, ANSWER_DEFAULTS.NUMERIC_MAX, this.random));

      case 'favorite':
        if (options.length > 0) {
          return pickRandom(options, this.random);
        }
        return this.freeform(options, profile);

      case 'opinion': {
        const useLong = this.random() < this.longOpinionProbability;
        const pool = useLong ? profile.longAnswers : profile.shortAnswers;
        return this.pickFrom(pool, options, useLong ? 'longAnswers' : 'shortAnswers', profile);
      }

      case 'freeform':
        return this.freeform(options, profile);
    }
  }

  /** Classifies the question and synthesizes in one step. */
  answerFor(questionText: string, options: readonly string[], profile: ResponseProfile): SynthesizedAnswer {
    const strategy = classify(questionText, { hasOptions: options.length > 0 });
    return { strategy, value: this.synthesize(strategy, options, profile) };
  }

  private freeform(options: readonly string[], profile: ResponseProfile): string {
    if (options.length > 0) {
      return pickRandom(options, this.random);
    }
    return this.pickFrom(profile.shortAnswers, options, 'shortAnswers', profile);
  }

  private pickFrom(
    pool: readonly string[],
    options: readonly string[],
    poolName: string,
    profile: ResponseProfile,
  ): string {
    if (pool.length > 0) {
      return pickRandom(pool, this.random);
    }
    if (options.length > 0) {
      return pickRandom(options, this.random);
    }
    throw new EmptyAnswerPoolError(
      `No ${poolName} in profile "${profile.name}" and no options to choose from`,
      poolName,
      profile.name,
    );
  }
}
