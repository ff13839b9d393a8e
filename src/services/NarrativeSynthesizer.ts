/**
 * Narrative synthesis service.
 * Produces the final review text, per-domain insights and recommendations.
 * The final review falls back to a template built from the scores whenever
 * the model cannot provide one, so a result is never empty.
 */

import { compareIds, type KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisConfig } from '../config.js';
import type {
  DomainInsight,
  FinalReviewSource,
  ProjectInfo,
  Review,
} from '../types/models.js';
import { OVERALL_SENTIMENT } from '../types/models.js';
import { groupReviewsByDomain, type PromptSynthesizer } from './PromptSynthesizer.js';
import { ParseError, describeError } from '../errors.js';
import { round1, stripReasoningTags, titleCase } from '../text/completion-text.js';

const KEY_POINT_THRESHOLD = 4.0;
const CONCERN_THRESHOLD = 2.5;
const LOW_SCORE_THRESHOLD = 3.0;
const HIGH_SCORE_THRESHOLD = 4.0;
const MAX_INSIGHT_ITEMS = 3;
const MAX_CONCERNS_PER_RECOMMENDATION = 2;

export const GENERIC_RECOMMENDATION =
  "Build on the project's current strengths and keep iterating with reviewer and user feedback";

/** Bespoke phrasing for well-known dimensions that score low. */
const LOW_SCORE_RECOMMENDATIONS: Record<string, (name: string) => string> = {
  technical_feasibility: (name) => `Address technical challenges to improve ${name}`,
  implementation_complexity: () => 'Simplify the implementation approach for easier adoption',
  scalability: () => 'Develop a clear scaling strategy',
  return_on_investment: () => 'Clarify the value proposition and ROI metrics',
};

export interface NarrativeResult {
  finalReview: string;
  finalReviewSource: FinalReviewSource;
  domainInsights: Record<string, DomainInsight>;
  recommendations: string[];
}

export class NarrativeSynthesizer {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly prompts: PromptSynthesizer,
    private readonly completionProvider: ICompletionProvider,
    private readonly config: Pick<AnalysisConfig, 'maxRecommendations'>,
    private readonly logProvider: ILogProvider
  ) {}

  async synthesize(
    projectInfo: ProjectInfo,
    acceptedReviews: Review[],
    dimensionScores: Record<string, number>,
    signal?: AbortSignal
  ): Promise<NarrativeResult> {
    const domainInsights = this.buildDomainInsights(acceptedReviews);
    const recommendations = this.buildRecommendations(dimensionScores, domainInsights);

    let finalReview: string;
    let finalReviewSource: FinalReviewSource = 'model';
    try {
      const response = await this.completionProvider.complete(
        this.prompts.finalReviewSynthesisPrompt(
          projectInfo,
          groupReviewsByDomain(acceptedReviews),
          dimensionScores
        ),
        { signal }
      );
      finalReview = stripReasoningTags(response);
      if (!finalReview) throw new ParseError('Model returned an empty final review');
    } catch (err) {
      signal?.throwIfAborted();
      this.logProvider.warn('Final review synthesis failed, using templated summary', {
        projectId: projectInfo.id,
        error: describeError(err),
      });
      finalReview = this.templatedSummary(dimensionScores);
      finalReviewSource = 'template';
    }

    return { finalReview, finalReviewSource, domainInsights, recommendations };
  }

  /** Keyed by domain id, in id order. */
  buildDomainInsights(reviews: Review[]): Record<string, DomainInsight> {
    const insights: Record<string, DomainInsight> = {};

    for (const [domainId, domainReviews] of groupReviewsByDomain(reviews)) {
      const name = this.graph.getDomainById(domainId)?.name ?? titleCase(domainId);
      const keyPoints: string[] = [];
      const concerns: string[] = [];
      const sums = new Map<string, { total: number; count: number }>();

      for (const review of domainReviews) {
        const scores = review.sentimentScores ?? {};
        for (const dimensionId of Object.keys(scores).sort(compareIds)) {
          const score = scores[dimensionId];
          if (dimensionId === OVERALL_SENTIMENT || !Number.isFinite(score)) continue;

          const entry = sums.get(dimensionId) ?? { total: 0, count: 0 };
          entry.total += score;
          entry.count += 1;
          sums.set(dimensionId, entry);

          const label = this.dimensionName(dimensionId);
          if (score >= KEY_POINT_THRESHOLD) pushDistinct(keyPoints, label);
          else if (score <= CONCERN_THRESHOLD) pushDistinct(concerns, label);
        }
      }

      const averageScores: Record<string, number> = {};
      for (const [dimensionId, { total, count }] of [...sums].sort(([a], [b]) => compareIds(a, b))) {
        averageScores[dimensionId] = round1(total / count);
      }

      insights[domainId] = {
        name,
        summary: `Perspective from ${domainReviews.length} ${name} reviewer(s)`,
        keyPoints: keyPoints.slice(0, MAX_INSIGHT_ITEMS),
        concerns: concerns.slice(0, MAX_INSIGHT_ITEMS),
        reviewCount: domainReviews.length,
        artificialCount: domainReviews.filter((r) => r.isArtificial).length,
        averageScores,
      };
    }

    return insights;
  }

  /** Between 1 and maxRecommendations entries, duplicates removed. */
  buildRecommendations(
    dimensionScores: Record<string, number>,
    domainInsights: Record<string, DomainInsight>
  ): string[] {
    const recommendations: string[] = [];

    for (const [dimensionId, score] of Object.entries(dimensionScores)) {
      if (dimensionId === OVERALL_SENTIMENT || score >= LOW_SCORE_THRESHOLD) continue;
      pushDistinct(recommendations, this.lowScoreRecommendation(dimensionId));
    }

    for (const insight of Object.values(domainInsights)) {
      if (insight.concerns.length === 0) continue;
      pushDistinct(
        recommendations,
        `Address ${insight.name} concerns: ${insight.concerns
          .slice(0, MAX_CONCERNS_PER_RECOMMENDATION)
          .join(', ')}`
      );
    }

    const innovation = dimensionScores.innovation ?? 0;
    const feasibility = dimensionScores.technical_feasibility ?? 0;
    if (innovation > HIGH_SCORE_THRESHOLD && feasibility < LOW_SCORE_THRESHOLD) {
      pushDistinct(recommendations, 'Consider simplifying innovative features for better feasibility');
    }
    if ((dimensionScores.impact ?? 0) > HIGH_SCORE_THRESHOLD) {
      pushDistinct(recommendations, 'Leverage the high impact potential with a clear implementation roadmap');
    }

    if (recommendations.length === 0) return [GENERIC_RECOMMENDATION];
    return recommendations.slice(0, this.config.maxRecommendations);
  }

  /** Deterministic summary built only from the scores. */
  templatedSummary(dimensionScores: Record<string, number>): string {
    const entries = Object.entries(dimensionScores).filter(([id]) => id !== OVERALL_SENTIMENT);
    if (entries.length === 0) {
      return 'No evaluation dimensions were scored for this project.';
    }

    const describe = (items: [string, number][]) =>
      items.map(([id, score]) => `${this.dimensionName(id)} (${score}/5.0)`).join(', ');

    const strengths = entries.filter(([, s]) => s >= HIGH_SCORE_THRESHOLD);
    const adequate = entries.filter(([, s]) => s >= LOW_SCORE_THRESHOLD && s < HIGH_SCORE_THRESHOLD);
    const weaknesses = entries.filter(([, s]) => s < LOW_SCORE_THRESHOLD);
    const overall = round1(entries.reduce((sum, [, s]) => sum + s, 0) / entries.length);

    const lines = [`Overall score: ${overall}/5.0 across ${entries.length} dimension(s).`];
    if (strengths.length > 0) lines.push(`Strengths: ${describe(strengths)}.`);
    if (adequate.length > 0) lines.push(`Adequate: ${describe(adequate)}.`);
    if (weaknesses.length > 0) lines.push(`Needs improvement: ${describe(weaknesses)}.`);
    return lines.join('\n');
  }

  // ── Private ──

  private dimensionName(dimensionId: string): string {
    return this.graph.getDimensionById(dimensionId)?.name ?? titleCase(dimensionId);
  }

  private lowScoreRecommendation(dimensionId: string): string {
    const name = this.dimensionName(dimensionId);
    if (Object.hasOwn(LOW_SCORE_RECOMMENDATIONS, dimensionId)) {
      return LOW_SCORE_RECOMMENDATIONS[dimensionId](name);
    }

    const description = this.graph.getDimensionById(dimensionId)?.description;
    return description ? `Improve ${name}: ${description}` : `Improve ${name}`;
  }
}

function pushDistinct(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
