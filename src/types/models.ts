/**
 * Domain models: ontology entities, projects, reviews and analysis output
 * as the engine understands them.
 * Decoupled from both the persisted document shape and database row shapes.
 */

// ── Ontology Entities ──

export interface Subdomain {
  id: string;
  name: string;
  keywords: string[];
}

export interface Domain {
  /** Unique slug, e.g. "technical". */
  id: string;
  name: string;
  description: string;
  /** Primary keywords, in declaration order. */
  keywords: string[];
  subdomains: Subdomain[];
  /** Ids of the impact dimensions this domain's reviewers speak to most. */
  relevantDimensions: string[];
}

export type ScaleValue = 1 | 2 | 3 | 4 | 5;

export const SCALE_VALUES: readonly ScaleValue[] = [1, 2, 3, 4, 5];

/** Human description for each point of a 1–5 scale. Points may be missing. */
export type DimensionScale = Partial<Record<ScaleValue, string>>;

export interface ImpactDimension {
  id: string;
  name: string;
  description: string;
  scale: DimensionScale;
}

export interface ExpertiseLevel {
  id: string;
  name: string;
  description: string;
  /** Inclusive [min, max] band of self-reported confidence (0–100). */
  confidenceRange: [number, number];
}

export interface ProjectType {
  id: string;
  name: string;
  description: string;
  keywords: string[];
}

/** Complete ontology snapshot, as loaded from and saved to a repository. */
export interface OntologyDocument {
  domains: Domain[];
  impactDimensions: ImpactDimension[];
  expertiseLevels: ExpertiseLevel[];
  projectTypes: ProjectType[];
}

// ── Projects & Reviews ──

/** External profile links keyed by source, e.g. { github: "https://…" }. */
export type ExternalLinks = Record<string, string>;

export const OVERALL_SENTIMENT = 'overall_sentiment';

/** Dimension id → score (1.0–5.0), plus `overall_sentiment`. */
export type SentimentScores = Record<string, number>;

export interface Review {
  id?: string;
  readonly reviewerName: string;
  readonly text: string;
  /** Self-reported confidence, 0–100. */
  readonly confidenceScore: number;
  readonly links: ExternalLinks;
  readonly isArtificial: boolean;

  // Computed by the engine, set once per analysis pass.
  domain: string | null;
  expertiseLevel: string | null;
  relevanceScore: number | null;
  sentimentScores: SentimentScores | null;
  isAccepted: boolean | null;
}

/** The fields a caller supplies when submitting a review. */
export type SubmittedReview = Pick<
  Review,
  'id' | 'reviewerName' | 'text' | 'confidenceScore' | 'links' | 'isArtificial'
> &
  Partial<
    Pick<Review, 'domain' | 'expertiseLevel' | 'relevanceScore' | 'sentimentScores' | 'isAccepted'>
  >;

export interface Project {
  id: string;
  name: string;
  description: string;
  workDone: string;
  reviews: Review[];
}

export type ProjectInfo = Pick<Project, 'id' | 'name' | 'description' | 'workDone'>;

// ── Analysis Output ──

export interface DomainInsight {
  name: string;
  summary: string;
  /** Distinct dimension names scored ≥ 4.0 by this domain's reviews (max 3). */
  keyPoints: string[];
  /** Distinct dimension names scored ≤ 2.5 by this domain's reviews (max 3). */
  concerns: string[];
  reviewCount: number;
  artificialCount: number;
  /** Plain mean per dimension id across this domain's reviews. */
  averageScores: Record<string, number>;
}

export interface AnalysisMetadata {
  totalReviews: number;
  acceptedReviews: number;
  rejectedReviews: number;
  humanReviews: number;
  artificialReviews: number;
  dimensionsEvaluated: number;
  domainsUsed: string[];
  domainsAvailable: number;
  projectType: string;
  durationMs: number;
  warnings: string[];
}

export type FinalReviewSource = 'model' | 'template';

export interface AnalysisResult {
  projectId: string;
  feedbackScores: Record<string, number>;
  overallScore: number;
  finalReview: string;
  finalReviewSource: FinalReviewSource;
  domainInsights: Record<string, DomainInsight>;
  recommendations: string[];
  reviews: Review[];
  metadata: AnalysisMetadata;
}
