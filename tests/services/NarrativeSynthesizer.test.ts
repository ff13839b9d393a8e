import { describe, it, expect, beforeEach } from 'vitest';
import {
  GENERIC_RECOMMENDATION,
  NarrativeSynthesizer,
} from '../../src/services/NarrativeSynthesizer.js';
import { PromptSynthesizer } from '../../src/services/PromptSynthesizer.js';
import { KnowledgeGraph } from '../../src/ontology/KnowledgeGraph.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { CompletionError } from '../../src/errors.js';
import { MockCompletionProvider, PROMPT_MARKERS } from '../mocks/MockCompletionProvider.js';
import { PROJECT_INFO, humanReview, testOntology } from '../fixtures/ontology.js';

const SCORES = { feasibility: 4.3, roi: 2 };

const TEMPLATE =
  'Overall score: 3.2/5.0 across 2 dimension(s).\n' +
  'Strengths: Feasibility (4.3/5.0).\n' +
  'Needs improvement: Return on Investment (2/5.0).';

describe('NarrativeSynthesizer', () => {
  let graph: KnowledgeGraph;
  let completion: MockCompletionProvider;
  let logProvider: ConsoleLogProvider;
  let synthesizer: NarrativeSynthesizer;

  const reviews = () => [
    humanReview({
      domain: 'technical',
      expertiseLevel: 'seasoned',
      isAccepted: true,
      sentimentScores: { feasibility: 4.5, overall_sentiment: 4.5 },
    }),
    humanReview({
      reviewerName: 'AI Business Expert',
      isArtificial: true,
      domain: 'business',
      expertiseLevel: 'expert',
      isAccepted: true,
      sentimentScores: { roi: 2, feasibility: 4, overall_sentiment: 3 },
    }),
  ];

  beforeEach(() => {
    graph = KnowledgeGraph.fromDocument(testOntology());
    completion = new MockCompletionProvider();
    logProvider = new ConsoleLogProvider();
    synthesizer = new NarrativeSynthesizer(
      graph,
      new PromptSynthesizer(graph),
      completion,
      { maxRecommendations: 5 },
      logProvider
    );
  });

  // --- synthesize() ---

  it('should use the model review when one comes back', async () => {
    completion.when(PROMPT_MARKERS.finalReview, '<think>draft</think>\nA balanced final review.');

    const result = await synthesizer.synthesize(PROJECT_INFO, reviews(), SCORES);

    expect(result.finalReview).toBe('A balanced final review.');
    expect(result.finalReviewSource).toBe('model');
    expect(result.recommendations).toEqual([
      'Improve Return on Investment: Value delivered relative to cost',
      'Address Business concerns: Return on Investment',
    ]);
    expect(Object.keys(result.domainInsights)).toEqual(['business', 'technical']);
  });

  it('should fall back to the templated summary when the model fails', async () => {
    completion.otherwise(new CompletionError('Completion failed after 3 attempt(s): down'));

    const result = await synthesizer.synthesize(PROJECT_INFO, reviews(), SCORES);

    expect(result.finalReview).toBe(TEMPLATE);
    expect(result.finalReviewSource).toBe('template');
    expect(logProvider.eventsAt('warn')).toMatchObject([
      {
        message: 'Final review synthesis failed, using templated summary',
        fields: { projectId: 'project-1' },
      },
    ]);
  });

  it('should fall back when the model returns nothing but reasoning', async () => {
    completion.otherwise('<think>I am not sure</think>');

    const result = await synthesizer.synthesize(PROJECT_INFO, reviews(), SCORES);

    expect(result.finalReview).toBe(TEMPLATE);
    expect(result.finalReviewSource).toBe('template');
  });

  // --- buildDomainInsights() ---

  it('should summarize each domain', () => {
    expect(synthesizer.buildDomainInsights(reviews())).toEqual({
      business: {
        name: 'Business',
        summary: 'Perspective from 1 Business reviewer(s)',
        keyPoints: ['Feasibility'],
        concerns: ['Return on Investment'],
        reviewCount: 1,
        artificialCount: 1,
        averageScores: { feasibility: 4, roi: 2 },
      },
      technical: {
        name: 'Technical',
        summary: 'Perspective from 1 Technical reviewer(s)',
        keyPoints: ['Feasibility'],
        concerns: [],
        reviewCount: 1,
        artificialCount: 0,
        averageScores: { feasibility: 4.5 },
      },
    });
  });

  it('should average scores across a domain and keep points distinct', () => {
    const insights = synthesizer.buildDomainInsights([
      humanReview({ domain: 'technical', sentimentScores: { feasibility: 4, roi: 1 } }),
      humanReview({ domain: 'technical', sentimentScores: { feasibility: 5, roi: 2.5 } }),
    ]);

    expect(insights.technical).toMatchObject({
      keyPoints: ['Feasibility'],
      concerns: ['Return on Investment'],
      reviewCount: 2,
      averageScores: { feasibility: 4.5, roi: 1.8 },
    });
  });

  it('should cap key points at three', () => {
    const insights = synthesizer.buildDomainInsights([
      humanReview({ domain: 'technical', sentimentScores: { alpha: 5, beta: 5, delta: 5, gamma: 5 } }),
    ]);

    expect(insights.technical.keyPoints).toEqual(['Alpha', 'Beta', 'Delta']);
  });

  it('should group unclassified reviews under unknown', () => {
    const insights = synthesizer.buildDomainInsights([humanReview({ sentimentScores: {} })]);

    expect(insights.unknown).toMatchObject({ name: 'Unknown', reviewCount: 1 });
  });

  // --- buildRecommendations() ---

  it('should use bespoke phrasing for well-known dimensions and cap the list', () => {
    const recommendations = synthesizer.buildRecommendations(
      {
        technical_feasibility: 2,
        implementation_complexity: 2.9,
        scalability: 1,
        return_on_investment: 2.5,
        innovation: 4.5,
        impact: 4.2,
      },
      {}
    );

    expect(recommendations).toEqual([
      'Address technical challenges to improve Technical Feasibility',
      'Simplify the implementation approach for easier adoption',
      'Develop a clear scaling strategy',
      'Clarify the value proposition and ROI metrics',
      'Consider simplifying innovative features for better feasibility',
    ]);
  });

  it('should suggest leveraging high impact', () => {
    expect(synthesizer.buildRecommendations({ impact: 4.5, roi: 3.5 }, {})).toEqual([
      'Leverage the high impact potential with a clear implementation roadmap',
    ]);
  });

  it('should fall back to the dimension name when it has no description', () => {
    expect(synthesizer.buildRecommendations({ mystery: 1 }, {})).toEqual(['Improve Mystery']);
  });

  it('should emit the generic recommendation when nothing applies', () => {
    expect(synthesizer.buildRecommendations({ feasibility: 3.5, roi: 3.5 }, {})).toEqual([
      GENERIC_RECOMMENDATION,
    ]);
  });

  it('should always return between one and five recommendations', () => {
    const inputs: Record<string, number>[] = [
      {},
      { feasibility: 1, roi: 1 },
      { feasibility: 5, roi: 5 },
      { a: 1, b: 1, c: 1, d: 1, e: 1, f: 1, g: 1 },
    ];
    for (const scores of inputs) {
      const count = synthesizer.buildRecommendations(scores, {}).length;
      expect(count).toBeGreaterThanOrEqual(1);
      expect(count).toBeLessThanOrEqual(5);
    }
  });

  // --- templatedSummary() ---

  it('should group dimensions into strengths, adequate and weak', () => {
    expect(synthesizer.templatedSummary(SCORES)).toBe(TEMPLATE);
    expect(synthesizer.templatedSummary({ feasibility: 3.5 })).toBe(
      'Overall score: 3.5/5.0 across 1 dimension(s).\nAdequate: Feasibility (3.5/5.0).'
    );
  });

  it('should say so when nothing was scored', () => {
    expect(synthesizer.templatedSummary({})).toBe(
      'No evaluation dimensions were scored for this project.'
    );
  });
});
