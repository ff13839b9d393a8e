/**
 * Sentiment scoring service.
 * Turns a review's text into per-dimension 1–5 scores through the completion
 * provider. Completion and parse failures yield the default mapping.
 */

import { z } from 'zod';
import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisConfig } from '../config.js';
import type { SentimentScores } from '../types/models.js';
import { OVERALL_SENTIMENT } from '../types/models.js';
import type { PromptSynthesizer } from './PromptSynthesizer.js';
import { ParseError, describeError } from '../errors.js';
import { parseJsonObject, snippet, stripReasoningTags } from '../text/completion-text.js';

const MIN_SCORE = 1;
const MAX_SCORE = 5;

/** A finite number, or a string that holds one. */
const ScoreValueSchema = z.union([
  z.number().finite(),
  z.string().trim().min(1).pipe(z.coerce.number().finite()),
]);

export class SentimentScorer {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly prompts: PromptSynthesizer,
    private readonly completionProvider: ICompletionProvider,
    private readonly config: Pick<AnalysisConfig, 'clampSentimentScores' | 'defaultDimensionScore'>,
    private readonly logProvider: ILogProvider
  ) {}

  /** Falls back to default scores on failure, unless `signal` was aborted. */
  async score(reviewText: string, signal?: AbortSignal): Promise<SentimentScores> {
    let response: string;
    try {
      response = await this.completionProvider.complete(
        this.prompts.sentimentAnalysisPrompt(reviewText),
        { signal }
      );
    } catch (err) {
      signal?.throwIfAborted();
      this.logProvider.warn('Sentiment scoring failed, using default scores', {
        error: describeError(err),
      });
      return this.defaultScores();
    }

    try {
      return this.parseScores(response);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      this.logProvider.warn('Sentiment response unusable, using default scores', {
        error: err.message,
        response: snippet(response, 200),
      });
      return this.defaultScores();
    }
  }

  /** The configured default for every current dimension plus overall_sentiment. */
  defaultScores(): SentimentScores {
    const scores: SentimentScores = {};
    for (const id of this.graph.getDimensionIds()) {
      scores[id] = this.config.defaultDimensionScore;
    }
    scores[OVERALL_SENTIMENT] = this.config.defaultDimensionScore;
    return scores;
  }

  /**
   * Keep only current dimension ids and overall_sentiment with numeric values,
   * clamped to 1–5 when configured. Throws ParseError if nothing usable remains.
   */
  parseScores(response: string): SentimentScores {
    const parsed = parseJsonObject(stripReasoningTags(response));
    if (!parsed) {
      throw new ParseError('Sentiment response contained no JSON object');
    }

    const allowed = new Set([...this.graph.getDimensionIds(), OVERALL_SENTIMENT]);
    const scores: SentimentScores = {};

    for (const [key, raw] of Object.entries(parsed)) {
      if (!allowed.has(key)) continue;
      const value = ScoreValueSchema.safeParse(raw);
      if (!value.success) continue;
      scores[key] = this.config.clampSentimentScores
        ? Math.min(MAX_SCORE, Math.max(MIN_SCORE, value.data))
        : value.data;
    }

    if (Object.keys(scores).length === 0) {
      throw new ParseError('Sentiment response held no usable scores', {
        keys: Object.keys(parsed),
      });
    }
    return scores;
  }
}
