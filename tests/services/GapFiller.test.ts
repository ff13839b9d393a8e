import { describe, it, expect, beforeEach } from 'vitest';
import {
  GapFiller,
  artificialReviewerName,
  parseArtificialReview,
} from '../../src/services/GapFiller.js';
import { PromptSynthesizer } from '../../src/services/PromptSynthesizer.js';
import { SentimentScorer } from '../../src/services/SentimentScorer.js';
import { KnowledgeGraph } from '../../src/ontology/KnowledgeGraph.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { CompletionError, ParseError } from '../../src/errors.js';
import { MockCompletionProvider, PROMPT_MARKERS } from '../mocks/MockCompletionProvider.js';
import { PROJECT_TEXT, humanReview, testOntology } from '../fixtures/ontology.js';

describe('GapFiller', () => {
  let graph: KnowledgeGraph;
  let completion: MockCompletionProvider;
  let logProvider: ConsoleLogProvider;

  function createGapFiller(gapFillRelevanceThreshold = 0.2): GapFiller {
    const prompts = new PromptSynthesizer(graph);
    const scorer = new SentimentScorer(
      graph,
      prompts,
      completion,
      { clampSentimentScores: true, defaultDimensionScore: 3.0 },
      logProvider
    );
    return new GapFiller(
      graph,
      prompts,
      completion,
      scorer,
      { gapFillRelevanceThreshold },
      logProvider
    );
  }

  const technicalReview = () =>
    humanReview({ domain: 'technical', expertiseLevel: 'seasoned', isAccepted: true });

  beforeEach(() => {
    graph = KnowledgeGraph.fromDocument(testOntology());
    completion = new MockCompletionProvider()
      .when(PROMPT_MARKERS.artificialReview, 'REVIEW: Pricing needs work.\nCONFIDENCE: 88')
      .when(PROMPT_MARKERS.sentiment, '{"roi": 2, "feasibility": 4, "overall_sentiment": 3}');
    logProvider = new ConsoleLogProvider();
  });

  // --- findGaps() ---

  it('should find relevant domains without an accepted human review', () => {
    // business relevance is exactly 0.25
    expect(createGapFiller().findGaps([technicalReview()], PROJECT_TEXT)).toEqual(['business']);
  });

  it('should respect the relevance threshold', () => {
    expect(createGapFiller(0.3).findGaps([technicalReview()], PROJECT_TEXT)).toEqual([]);
  });

  it('should not count rejected or artificial reviews as coverage', () => {
    const reviews = [
      technicalReview(),
      humanReview({ domain: 'business', isAccepted: false }),
      humanReview({ domain: 'business', isAccepted: true, isArtificial: true }),
    ];

    expect(createGapFiller().findGaps(reviews, PROJECT_TEXT)).toEqual(['business']);
  });

  it('should leave skipped domains alone', () => {
    expect(
      createGapFiller().findGaps([technicalReview()], PROJECT_TEXT, { skipDomains: ['business'] })
    ).toEqual([]);
  });

  it('should return gaps in domain id order', () => {
    graph.addDomain({ id: 'clinical', name: 'Clinical', keywords: ['clinics', 'patients'] });

    expect(createGapFiller().findGaps([], PROJECT_TEXT)).toEqual([
      'business',
      'clinical',
      'technical',
    ]);
  });

  // --- fillGaps() ---

  it('should generate one scored artificial review per gap', async () => {
    const result = await createGapFiller().fillGaps([technicalReview()], PROJECT_TEXT);

    expect(result.errors).toEqual([]);
    expect(result.reviews).toEqual([
      {
        reviewerName: 'AI Business Expert',
        text: 'Pricing needs work.',
        confidenceScore: 88,
        links: {},
        isArtificial: true,
        domain: 'business',
        expertiseLevel: 'expert',
        relevanceScore: 0.25,
        sentimentScores: { roi: 2, feasibility: 4, overall_sentiment: 3 },
        isAccepted: true,
      },
    ]);
    expect(completion.promptsContaining(PROMPT_MARKERS.sentiment)[0]).toContain(
      'Review:\nPricing needs work.'
    );
  });

  it('should not touch the input reviews', async () => {
    const reviews = [technicalReview()];
    await createGapFiller().fillGaps(reviews, PROJECT_TEXT);

    expect(reviews).toHaveLength(1);
  });

  it('should keep going when one domain fails', async () => {
    graph.addDomain({ id: 'clinical', name: 'Clinical', keywords: ['clinics', 'patients'] });
    const failing = new MockCompletionProvider()
      .when('deep expertise in Business', new CompletionError('model offline'))
      .when(PROMPT_MARKERS.artificialReview, 'REVIEW: Useful for triage nurses.\nCONFIDENCE: 91')
      .when(PROMPT_MARKERS.sentiment, '{"feasibility": 4}');
    completion = failing;

    const result = await createGapFiller().fillGaps([technicalReview()], PROJECT_TEXT);

    expect(result.reviews.map((r) => r.reviewerName)).toEqual(['AI Clinical Expert']);
    expect(result.errors).toEqual(['Gap filling for domain "business" failed: model offline']);
    expect(logProvider.eventsAt('error')).toMatchObject([
      { message: 'Gap filling failed for domain', fields: { domain: 'business', error: 'model offline' } },
    ]);
  });

  it('should stop at an abort instead of recording it per domain', async () => {
    graph.addDomain({ id: 'clinical', name: 'Clinical', keywords: ['clinics', 'patients'] });
    const controller = new AbortController();
    const reason = new Error('run expired');
    completion = new MockCompletionProvider().when(PROMPT_MARKERS.artificialReview, () => {
      controller.abort(reason);
      throw new CompletionError('request aborted');
    });

    await expect(
      createGapFiller().fillGaps([technicalReview()], PROJECT_TEXT, { signal: controller.signal })
    ).rejects.toBe(reason);
    expect(completion.promptsContaining(PROMPT_MARKERS.artificialReview)).toHaveLength(1);
    expect(logProvider.eventsAt('error')).toEqual([]);
  });

  it('should record a review with no text as a failure for that domain', async () => {
    completion = new MockCompletionProvider().when(PROMPT_MARKERS.artificialReview, 'CONFIDENCE: 90');

    const result = await createGapFiller().fillGaps([technicalReview()], PROJECT_TEXT);

    expect(result.reviews).toEqual([]);
    expect(result.errors).toEqual([
      'Gap filling for domain "business" failed: Generated review contained no review text',
    ]);
  });

  it('should use default scores when sentiment scoring fails', async () => {
    completion = new MockCompletionProvider()
      .when(PROMPT_MARKERS.artificialReview, 'REVIEW: Fine.\nCONFIDENCE: 90')
      .when(PROMPT_MARKERS.sentiment, 'no idea');

    const result = await createGapFiller().fillGaps([technicalReview()], PROJECT_TEXT);

    expect(result.reviews[0].sentimentScores).toEqual({
      feasibility: 3.0,
      roi: 3.0,
      overall_sentiment: 3.0,
    });
  });
});

describe('parseArtificialReview', () => {
  it('should split review text and confidence', () => {
    expect(parseArtificialReview('REVIEW: Strong clinical value.\nCONFIDENCE: 92')).toEqual({
      text: 'Strong clinical value.',
      confidenceScore: 92,
    });
  });

  it('should default the confidence to 90', () => {
    expect(parseArtificialReview('Good work overall.')).toEqual({
      text: 'Good work overall.',
      confidenceScore: 90,
    });
  });

  it('should handle a single-line answer and clamp the confidence', () => {
    expect(parseArtificialReview('REVIEW: Fine CONFIDENCE: 150')).toEqual({
      text: 'Fine',
      confidenceScore: 100,
    });
  });

  it('should strip reasoning blocks first', () => {
    expect(
      parseArtificialReview('<think>CONFIDENCE: 10</think>REVIEW: Solid.\nCONFIDENCE: 85')
    ).toEqual({ text: 'Solid.', confidenceScore: 85 });
  });

  it('should reject an answer without review text', () => {
    expect(() => parseArtificialReview('CONFIDENCE: 80')).toThrow(ParseError);
  });
});

describe('artificialReviewerName', () => {
  it('should name the reviewer after the domain', () => {
    expect(artificialReviewerName({ name: 'User Experience' })).toBe('AI User Experience Expert');
  });
});
