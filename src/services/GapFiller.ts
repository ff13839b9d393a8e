/**
 * Coverage gap filler.
 * For every domain that is relevant to the project but has no accepted human
 * review, asks the model for a review from that domain's perspective.
 * A failure for one domain is recorded and the next domain is still processed.
 */

import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisConfig } from '../config.js';
import type { Domain, Review } from '../types/models.js';
import type { PromptSynthesizer } from './PromptSynthesizer.js';
import type { SentimentScorer } from './SentimentScorer.js';
import { NotFoundError, ParseError, describeError } from '../errors.js';
import { stripReasoningTags } from '../text/completion-text.js';

export const ARTIFICIAL_EXPERTISE_LEVEL = 'expert';
export const DEFAULT_ARTIFICIAL_CONFIDENCE = 90;

export interface GapFillOptions {
  /** Domains to leave alone even if uncovered (e.g. already holding a generated review). */
  skipDomains?: Iterable<string>;
  /** Stops generation; an abort propagates instead of being recorded per domain. */
  signal?: AbortSignal;
}

export interface GapFillResult {
  reviews: Review[];
  /** One message per domain whose generation failed. */
  errors: string[];
}

export interface ParsedArtificialReview {
  text: string;
  confidenceScore: number;
}

export class GapFiller {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly prompts: PromptSynthesizer,
    private readonly completionProvider: ICompletionProvider,
    private readonly sentimentScorer: SentimentScorer,
    private readonly config: Pick<AnalysisConfig, 'gapFillRelevanceThreshold'>,
    private readonly logProvider: ILogProvider
  ) {}

  /** Domains covered by accepted, human reviews. */
  coveredDomains(reviews: Review[]): Set<string> {
    const covered = new Set<string>();
    for (const review of reviews) {
      if (review.isAccepted === true && !review.isArtificial && review.domain) {
        covered.add(review.domain);
      }
    }
    return covered;
  }

  /** Uncovered domains whose relevance reaches the threshold, in id order. */
  findGaps(reviews: Review[], projectText: string, options: GapFillOptions = {}): string[] {
    const covered = this.coveredDomains(reviews);
    const skip = new Set(options.skipDomains ?? []);

    return this.graph.getDomainIds().filter((id) => {
      if (covered.has(id) || skip.has(id)) return false;
      return (
        this.graph.calculateDomainRelevance(projectText, id) >=
        this.config.gapFillRelevanceThreshold
      );
    });
  }

  async fillGaps(
    reviews: Review[],
    projectText: string,
    options: GapFillOptions = {}
  ): Promise<GapFillResult> {
    const generated: Review[] = [];
    const errors: string[] = [];

    const { signal } = options;
    for (const domainId of this.findGaps(reviews, projectText, options)) {
      signal?.throwIfAborted();
      try {
        generated.push(await this.generateReview(projectText, domainId, signal));
      } catch (err) {
        signal?.throwIfAborted();
        const message = `Gap filling for domain "${domainId}" failed: ${describeError(err)}`;
        errors.push(message);
        this.logProvider.error('Gap filling failed for domain', {
          domain: domainId,
          error: describeError(err),
        });
      }
    }

    return { reviews: generated, errors };
  }

  async generateReview(
    projectText: string,
    domainId: string,
    signal?: AbortSignal
  ): Promise<Review> {
    const domain = this.graph.getDomainById(domainId);
    if (!domain) throw new NotFoundError(`Domain "${domainId}" not found`);

    const response = await this.completionProvider.complete(
      this.prompts.artificialReviewPrompt(projectText, domainId),
      { signal }
    );
    const parsed = parseArtificialReview(response);
    const sentimentScores = await this.sentimentScorer.score(parsed.text, signal);

    this.logProvider.info('Generated review for uncovered domain', {
      domain: domainId,
      confidence: parsed.confidenceScore,
    });

    return {
      reviewerName: artificialReviewerName(domain),
      text: parsed.text,
      confidenceScore: parsed.confidenceScore,
      links: {},
      isArtificial: true,
      domain: domainId,
      expertiseLevel: ARTIFICIAL_EXPERTISE_LEVEL,
      relevanceScore: this.graph.calculateDomainRelevance(projectText, domainId),
      sentimentScores,
      isAccepted: true,
    };
  }
}

export function artificialReviewerName(domain: Pick<Domain, 'name'>): string {
  return `AI ${domain.name} Expert`;
}

/**
 * Split a `REVIEW: … CONFIDENCE: NN` answer. A missing confidence defaults
 * to 90; values are clamped to 0–100. Throws ParseError when no text remains.
 */
export function parseArtificialReview(response: string): ParsedArtificialReview {
  const cleaned = stripReasoningTags(response);

  const match = /CONFIDENCE:\s*(\d+)/i.exec(cleaned);
  const confidenceScore = match
    ? Math.min(100, Math.max(0, Number.parseInt(match[1], 10)))
    : DEFAULT_ARTIFICIAL_CONFIDENCE;

  const text = cleaned
    .replace(/CONFIDENCE:[^\n]*/gi, '')
    .replace(/^\s*REVIEW:\s*/i, '')
    .trim();

  if (!text) {
    throw new ParseError('Generated review contained no review text');
  }
  return { text, confidenceScore };
}
