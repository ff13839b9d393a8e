/**
 * Analysis pipeline.
 *
 *   created → classifying → filtering → scoring_human → filling_gaps
 *           → aggregating → synthesizing → completed
 *
 * Any unrecoverable error (or the caller's deadline) moves the run to `failed`.
 * Stages run strictly in sequence; the caller's project is never mutated.
 * On expiry the run's signal is aborted, so a stage still in flight makes no
 * further completion calls; the ontology read lease is held until it settles.
 */

import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { AnalysisConfig } from '../config.js';
import type {
  AnalysisMetadata,
  AnalysisResult,
  ProjectInfo,
  Review,
  SubmittedReview,
} from '../types/models.js';
import type { ReviewerClassifier } from './ReviewerClassifier.js';
import type { AcceptanceFilter, AcceptanceReason } from './AcceptanceFilter.js';
import type { SentimentScorer } from './SentimentScorer.js';
import type { GapFiller } from './GapFiller.js';
import type { ScoreAggregator } from './ScoreAggregator.js';
import type { NarrativeSynthesizer } from './NarrativeSynthesizer.js';
import { compareIds } from '../ontology/KnowledgeGraph.js';
import { DeadlineExceededError, ValidationError, describeError } from '../errors.js';
import { formatProjectText } from '../text/project-text.js';

export type PipelineStage =
  | 'created'
  | 'classifying'
  | 'filtering'
  | 'scoring_human'
  | 'filling_gaps'
  | 'aggregating'
  | 'synthesizing'
  | 'completed'
  | 'failed';

/** The stages that do work, in execution order. */
export const WORK_STAGES = [
  'classifying',
  'filtering',
  'scoring_human',
  'filling_gaps',
  'aggregating',
  'synthesizing',
] as const satisfies readonly PipelineStage[];

export type WorkStage = (typeof WORK_STAGES)[number];

export interface StageProgress {
  completedStages: number;
  totalStages: number;
}

export interface AnalyzeOptions {
  /** Reclassify, rescore and regenerate even where results already exist. */
  forceReprocess?: boolean;
  /** Wall-clock budget for the whole analysis. */
  timeoutMs?: number;
  onStageChange?: (stage: PipelineStage, progress: StageProgress) => void;
}

export interface AnalysisInput extends ProjectInfo {
  reviews: readonly SubmittedReview[];
}

export interface PipelineCompleted {
  status: 'completed';
  stage: 'completed';
  result: AnalysisResult;
  stagesCompleted: WorkStage[];
}

export interface PipelineFailed {
  status: 'failed';
  stage: 'failed';
  /** The stage that was running when the failure happened. */
  failedStage: PipelineStage;
  /** Recovered warnings first, then the fatal error. */
  errors: string[];
  /** Reviews as far as the run got. */
  reviews: Review[];
  stagesCompleted: WorkStage[];
}

export type PipelineOutcome = PipelineCompleted | PipelineFailed;

interface RunControl {
  controller: AbortController;
  /** Settles once a stage abandoned at the deadline has finished. */
  abandoned: Promise<void> | null;
}

export interface PipelineComponents {
  createClassifier: () => ReviewerClassifier;
  acceptanceFilter: AcceptanceFilter;
  sentimentScorer: SentimentScorer;
  gapFiller: GapFiller;
  scoreAggregator: ScoreAggregator;
  narrativeSynthesizer: NarrativeSynthesizer;
}

export class PipelineOrchestrator {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly components: PipelineComponents,
    private readonly config: Pick<AnalysisConfig, 'generateArtificialReviews'>,
    private readonly logProvider: ILogProvider
  ) {}

  async analyze(project: AnalysisInput, options: AnalyzeOptions = {}): Promise<PipelineOutcome> {
    const startedAt = Date.now();
    const forceReprocess = options.forceReprocess ?? false;
    const deadline = options.timeoutMs !== undefined ? startedAt + options.timeoutMs : null;

    let stage: PipelineStage = 'created';
    const stagesCompleted: WorkStage[] = [];
    const warnings: string[] = [];
    let reviews: Review[] = [];

    const enter = (next: PipelineStage) => {
      if (isWorkStage(stage)) stagesCompleted.push(stage);
      stage = next;
      this.logProvider.debug('Pipeline stage changed', { projectId: project.id, stage: next });
      this.notify(options, next, stagesCompleted.length);
    };

    const run: RunControl = { controller: new AbortController(), abandoned: null };
    const { signal } = run.controller;

    const runStage = async <T>(next: WorkStage, work: () => Promise<T>): Promise<T> => {
      enter(next);
      return this.withDeadline(work, deadline, options.timeoutMs ?? 0, next, project.id, run);
    };

    const release = this.graph.acquireReadLease();
    try {
      this.graph.validate();
      validateInput(project);
      reviews = prepareReviews(project.reviews, forceReprocess);

      const projectText = formatProjectText(project);
      const classifier = this.components.createClassifier();

      await runStage('classifying', () =>
        this.classifyReviews(reviews, classifier, forceReprocess, signal)
      );
      const rejected = await runStage('filtering', async () => this.filterReviews(reviews, projectText, project.id));
      await runStage('scoring_human', () => this.scoreReviews(reviews, signal));

      await runStage('filling_gaps', async () => {
        if (!this.config.generateArtificialReviews) return;
        const skipDomains = reviews.flatMap((r) => (r.isArtificial && r.domain ? [r.domain] : []));
        const filled = await this.components.gapFiller.fillGaps(reviews, projectText, {
          skipDomains,
          signal,
        });
        signal.throwIfAborted();
        reviews.push(...filled.reviews);
        warnings.push(...filled.errors);
      });

      const accepted = reviews.filter((r) => r.isAccepted === true);
      const feedbackScores = await runStage('aggregating', async () =>
        this.components.scoreAggregator.aggregate(accepted)
      );
      const overallScore = this.components.scoreAggregator.overallScore(feedbackScores);

      const narrative = await runStage('synthesizing', () =>
        this.components.narrativeSynthesizer.synthesize(project, accepted, feedbackScores, signal)
      );
      if (narrative.finalReviewSource === 'template') {
        warnings.push('Final review synthesis failed; a templated summary was used');
      }

      const metadata: AnalysisMetadata = {
        totalReviews: reviews.length,
        acceptedReviews: accepted.length,
        rejectedReviews: rejected,
        humanReviews: accepted.filter((r) => !r.isArtificial).length,
        artificialReviews: accepted.filter((r) => r.isArtificial).length,
        dimensionsEvaluated: Object.keys(feedbackScores).length,
        domainsUsed: distinctDomains(accepted),
        domainsAvailable: this.graph.getDomainIds().length,
        projectType: this.graph.classifyProjectType(projectText),
        durationMs: Date.now() - startedAt,
        warnings,
      };

      enter('completed');
      this.logProvider.info('Analysis completed', {
        projectId: project.id,
        acceptedReviews: metadata.acceptedReviews,
        artificialReviews: metadata.artificialReviews,
        overallScore,
        durationMs: metadata.durationMs,
      });

      return {
        status: 'completed',
        stage: 'completed',
        stagesCompleted: [...stagesCompleted],
        result: {
          projectId: project.id,
          feedbackScores,
          overallScore,
          finalReview: narrative.finalReview,
          finalReviewSource: narrative.finalReviewSource,
          domainInsights: narrative.domainInsights,
          recommendations: narrative.recommendations,
          reviews,
          metadata,
        },
      };
    } catch (err) {
      const failedStage = stage;
      const errors = [...warnings, `Stage "${failedStage}" failed: ${describeError(err)}`];
      this.logProvider.error('Analysis failed', {
        projectId: project.id,
        stage: failedStage,
        errors,
      });

      stage = 'failed';
      this.notify(options, 'failed', stagesCompleted.length);

      return {
        status: 'failed',
        stage: 'failed',
        failedStage,
        errors,
        reviews: structuredClone(reviews),
        stagesCompleted: [...stagesCompleted],
      };
    } finally {
      if (run.abandoned) {
        this.logProvider.debug('Read lease held until the abandoned stage settles', {
          projectId: project.id,
        });
        void run.abandoned.then(release);
      } else {
        release();
      }
    }
  }

  // ── Stages ──

  private async classifyReviews(
    reviews: Review[],
    classifier: ReviewerClassifier,
    forceReprocess: boolean,
    signal: AbortSignal
  ): Promise<void> {
    for (const review of reviews) {
      if (review.domain && !forceReprocess) {
        review.expertiseLevel ??= this.graph.getExpertiseLevelByConfidence(review.confidenceScore);
        continue;
      }
      signal.throwIfAborted();
      const classification = await classifier.classify(
        review.reviewerName,
        review.text,
        review.confidenceScore,
        review.links,
        signal
      );
      signal.throwIfAborted();
      review.domain = classification.domain;
      review.expertiseLevel = classification.expertiseLevel;
    }
  }

  /** Returns the number of rejected reviews. */
  private filterReviews(reviews: Review[], projectText: string, projectId: string): number {
    const reasons: Partial<Record<AcceptanceReason, number>> = {};
    for (const review of reviews) {
      const { reason } = this.components.acceptanceFilter.evaluate(review, projectText);
      reasons[reason] = (reasons[reason] ?? 0) + 1;
    }
    this.logProvider.debug('Reviews filtered', { projectId, ...reasons });
    return (reasons.low_confidence ?? 0) + (reasons.low_relevance ?? 0);
  }

  private async scoreReviews(reviews: Review[], signal: AbortSignal): Promise<void> {
    for (const review of reviews) {
      if (review.isAccepted !== true || review.sentimentScores) continue;
      signal.throwIfAborted();
      const scores = await this.components.sentimentScorer.score(review.text, signal);
      signal.throwIfAborted();
      review.sentimentScores = scores;
    }
  }

  // ── Private ──

  /**
   * Race a stage against the remaining budget. On expiry the run's signal is
   * aborted with the deadline error and the stage's promise is recorded as
   * abandoned; an error other than that abort is logged when it settles.
   */
  private async withDeadline<T>(
    work: () => Promise<T>,
    deadline: number | null,
    timeoutMs: number,
    stage: WorkStage,
    projectId: string,
    run: RunControl
  ): Promise<T> {
    if (deadline === null) return work();

    const remaining = deadline - Date.now();
    if (remaining <= 0) throw new DeadlineExceededError(stage, timeoutMs);

    const running = work();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const expired = new DeadlineExceededError(stage, timeoutMs);
        run.controller.abort(expired);
        run.abandoned = running.then(
          () => undefined,
          (err: unknown) => {
            if (err === expired) return;
            this.logProvider.debug('Abandoned stage settled with an error', {
              projectId,
              stage,
              error: describeError(err),
            });
          }
        );
        reject(expired);
      }, remaining);
    });
    try {
      return await Promise.race([running, expiry]);
    } finally {
      clearTimeout(timer);
    }
  }

  private notify(options: AnalyzeOptions, stage: PipelineStage, completedStages: number): void {
    if (!options.onStageChange) return;
    try {
      options.onStageChange(stage, { completedStages, totalStages: WORK_STAGES.length });
    } catch (err) {
      this.logProvider.warn('Stage change listener threw', { stage, error: describeError(err) });
    }
  }
}

function isWorkStage(stage: PipelineStage): stage is WorkStage {
  return WORK_STAGES.some((s) => s === stage);
}

function validateInput(project: AnalysisInput): void {
  const problems: string[] = [];
  if (!project.id) problems.push('project id is required');
  project.reviews.forEach((review, index) => {
    const score = review.confidenceScore;
    if (!Number.isFinite(score) || score < 0 || score > 100) {
      problems.push(`review ${index} (${review.reviewerName}): confidenceScore must be between 0 and 100`);
    }
  });
  if (problems.length > 0) {
    throw new ValidationError(`Invalid project: ${problems.join('; ')}`, { problems });
  }
}

/**
 * Copy the submitted reviews. With forceReprocess, computed fields are cleared
 * and previously generated reviews are dropped so they can be regenerated.
 */
function prepareReviews(submitted: readonly SubmittedReview[], forceReprocess: boolean): Review[] {
  const copies: Review[] = [];
  for (const review of submitted) {
    if (forceReprocess && review.isArtificial) continue;
    copies.push({
      id: review.id,
      reviewerName: review.reviewerName,
      text: review.text,
      confidenceScore: review.confidenceScore,
      links: { ...review.links },
      isArtificial: review.isArtificial,
      domain: forceReprocess ? null : review.domain ?? null,
      expertiseLevel: forceReprocess ? null : review.expertiseLevel ?? null,
      relevanceScore: forceReprocess ? null : review.relevanceScore ?? null,
      sentimentScores:
        forceReprocess || !review.sentimentScores ? null : { ...review.sentimentScores },
      isAccepted: forceReprocess ? null : review.isAccepted ?? null,
    });
  }
  return copies;
}

function distinctDomains(reviews: Review[]): string[] {
  const domains = new Set<string>();
  for (const review of reviews) {
    if (review.domain) domains.add(review.domain);
  }
  return [...domains].sort(compareIds);
}
