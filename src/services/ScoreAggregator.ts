/**
 * Score aggregation service.
 * Weighted mean per impact dimension across accepted reviews.
 *
 * weight = expertise weight
 *        × artificialPenalty              (generated reviews)
 *        × relevantDimensionBoost         (dimension relevant to the reviewer's domain)
 */

import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import { DEFAULT_EXPERTISE_LEVEL } from '../ontology/KnowledgeGraph.js';
import type { AnalysisConfig } from '../config.js';
import type { Review } from '../types/models.js';
import { round1 } from '../text/completion-text.js';

export class ScoreAggregator {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly config: Pick<AnalysisConfig, 'weights' | 'defaultDimensionScore'>
  ) {}

  /**
   * One entry per dimension currently in the graph, rounded to one decimal.
   * Dimensions no review scored get the default score.
   */
  aggregate(acceptedReviews: Review[]): Record<string, number> {
    const relevantByDomain = new Map<string, Set<string>>();
    const relevantFor = (domainId: string | null): Set<string> => {
      if (!domainId) return new Set();
      let relevant = relevantByDomain.get(domainId);
      if (!relevant) {
        relevant = new Set(this.graph.getRelevantDimensionsForDomain(domainId));
        relevantByDomain.set(domainId, relevant);
      }
      return relevant;
    };

    const result: Record<string, number> = {};
    for (const dimensionId of this.graph.getDimensionIds()) {
      let weightedSum = 0;
      let totalWeight = 0;

      for (const review of acceptedReviews) {
        const score = review.sentimentScores?.[dimensionId];
        if (score === undefined || !Number.isFinite(score)) continue;
        const weight = this.weightFor(review, relevantFor(review.domain).has(dimensionId));
        weightedSum += score * weight;
        totalWeight += weight;
      }

      result[dimensionId] =
        totalWeight > 0 ? round1(weightedSum / totalWeight) : this.config.defaultDimensionScore;
    }

    return result;
  }

  weightFor(review: Review, dimensionIsRelevant: boolean): number {
    const { expertise, artificialPenalty, relevantDimensionBoost } = this.config.weights;
    let weight = expertise[review.expertiseLevel ?? DEFAULT_EXPERTISE_LEVEL] ?? 1.0;
    if (review.isArtificial) weight *= artificialPenalty;
    if (dimensionIsRelevant) weight *= relevantDimensionBoost;
    return weight;
  }

  /** Mean of the dimension scores, rounded to one decimal. */
  overallScore(dimensionScores: Record<string, number>): number {
    const values = Object.values(dimensionScores);
    if (values.length === 0) return this.config.defaultDimensionScore;
    return round1(values.reduce((sum, v) => sum + v, 0) / values.length);
  }
}
