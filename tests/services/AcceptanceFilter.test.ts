import { describe, it, expect, beforeEach } from 'vitest';
import { AcceptanceFilter } from '../../src/services/AcceptanceFilter.js';
import { KnowledgeGraph } from '../../src/ontology/KnowledgeGraph.js';
import { PROJECT_TEXT, humanReview, testOntology } from '../fixtures/ontology.js';

/** Only one business subdomain keyword: relevance 0.5 / 6. */
const BUDGET_TEXT = 'We stayed within budget.';

describe('AcceptanceFilter', () => {
  let graph: KnowledgeGraph;
  let filter: AcceptanceFilter;

  beforeEach(() => {
    graph = KnowledgeGraph.fromDocument(testOntology());
    filter = new AcceptanceFilter(graph, {
      minConfidenceThreshold: 40,
      expertConfidenceThreshold: 80,
      minDomainRelevance: 0.3,
    });
  });

  // --- evaluate() ---

  it('should always accept artificial reviews', () => {
    const review = humanReview({ isArtificial: true, confidenceScore: 10, domain: 'business' });

    expect(filter.evaluate(review, BUDGET_TEXT)).toEqual({
      accepted: true,
      reason: 'artificial',
      relevance: null,
    });
    expect(review.isAccepted).toBe(true);
  });

  it('should reject low confidence regardless of relevance', () => {
    const review = humanReview({ confidenceScore: 35, domain: 'technical' });

    expect(filter.evaluate(review, PROJECT_TEXT)).toEqual({
      accepted: false,
      reason: 'low_confidence',
      relevance: null,
    });
    expect(review.isAccepted).toBe(false);
    expect(review.relevanceScore).toBeNull();
  });

  it('should let expert confidence bypass the relevance check', () => {
    const review = humanReview({ confidenceScore: 85, domain: 'business' });
    const decision = filter.evaluate(review, BUDGET_TEXT);

    expect(decision.accepted).toBe(true);
    expect(decision.reason).toBe('accepted');
    expect(review.relevanceScore).toBeCloseTo(0.5 / 6, 10);
  });

  it('should reject mid confidence with low relevance', () => {
    const review = humanReview({ confidenceScore: 60, domain: 'business' });

    expect(filter.evaluate(review, BUDGET_TEXT)).toMatchObject({
      accepted: false,
      reason: 'low_relevance',
    });
    expect(review.isAccepted).toBe(false);
    expect(review.relevanceScore).toBeCloseTo(0.5 / 6, 10);
  });

  it('should accept mid confidence with enough relevance', () => {
    const review = humanReview({ confidenceScore: 60, domain: 'technical' });

    expect(filter.evaluate(review, PROJECT_TEXT)).toMatchObject({ accepted: true, reason: 'accepted' });
    expect(review.relevanceScore).toBeCloseTo(2 / 3.3, 10);
  });

  it('should accept exactly at the thresholds', () => {
    const atMin = humanReview({ confidenceScore: 40, domain: 'technical' });
    const atExpert = humanReview({ confidenceScore: 80, domain: 'business' });

    expect(filter.evaluate(atMin, PROJECT_TEXT).accepted).toBe(true);
    expect(filter.evaluate(atExpert, BUDGET_TEXT).accepted).toBe(true);
  });

  it('should accept an unclassified review without a relevance check', () => {
    const review = humanReview({ confidenceScore: 60, domain: null });

    expect(filter.evaluate(review, BUDGET_TEXT)).toEqual({
      accepted: true,
      reason: 'accepted',
      relevance: null,
    });
  });

  // --- shouldAccept() ---

  it('should return the decision as a boolean', () => {
    expect(filter.shouldAccept(humanReview({ confidenceScore: 35 }), PROJECT_TEXT)).toBe(false);
    expect(filter.shouldAccept(humanReview({ confidenceScore: 90 }), PROJECT_TEXT)).toBe(true);
  });

  it('should never flip from accepted to rejected as confidence rises', () => {
    for (const text of [PROJECT_TEXT, BUDGET_TEXT, '']) {
      for (const domain of ['business', 'technical']) {
        let seenAccepted = false;
        for (let confidence = 0; confidence <= 100; confidence += 5) {
          const accepted = filter.shouldAccept(
            humanReview({ confidenceScore: confidence, domain }),
            text
          );
          if (seenAccepted) expect(accepted).toBe(true);
          seenAccepted ||= accepted;
        }
        expect(seenAccepted).toBe(true);
      }
    }
  });
});
