/**
 * Acceptance filter.
 * Decides whether a review counts toward scoring. Writes only the review's
 * relevanceScore and isAccepted fields.
 */

import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { AnalysisConfig } from '../config.js';
import type { Review } from '../types/models.js';

export type AcceptanceReason = 'artificial' | 'low_confidence' | 'low_relevance' | 'accepted';

export interface AcceptanceDecision {
  accepted: boolean;
  reason: AcceptanceReason;
  /** Null when the decision was made before relevance was needed. */
  relevance: number | null;
}

type AcceptanceThresholds = Pick<
  AnalysisConfig,
  'minConfidenceThreshold' | 'expertConfidenceThreshold' | 'minDomainRelevance'
>;

export class AcceptanceFilter {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly thresholds: AcceptanceThresholds
  ) {}

  shouldAccept(review: Review, projectText: string): boolean {
    return this.evaluate(review, projectText).accepted;
  }

  evaluate(review: Review, projectText: string): AcceptanceDecision {
    if (review.isArtificial) {
      return this.decide(review, true, 'artificial', null);
    }

    if (review.confidenceScore < this.thresholds.minConfidenceThreshold) {
      return this.decide(review, false, 'low_confidence', null);
    }

    // Unclassified reviews have nothing to measure relevance against.
    if (!review.domain) {
      return this.decide(review, true, 'accepted', null);
    }

    const relevance = this.graph.calculateDomainRelevance(projectText, review.domain);
    review.relevanceScore = relevance;

    if (
      review.confidenceScore < this.thresholds.expertConfidenceThreshold &&
      relevance < this.thresholds.minDomainRelevance
    ) {
      return this.decide(review, false, 'low_relevance', relevance);
    }

    return this.decide(review, true, 'accepted', relevance);
  }

  // ── Private ──

  private decide(
    review: Review,
    accepted: boolean,
    reason: AcceptanceReason,
    relevance: number | null
  ): AcceptanceDecision {
    review.isAccepted = accepted;
    return { accepted, reason, relevance };
  }
}
