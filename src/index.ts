export * from './types/models.js';
export * from './errors.js';
export * from './config.js';
export * from './providers/index.js';

export {
  KnowledgeGraph,
  compareIds,
  DEFAULT_EXPERTISE_LEVEL,
  DEFAULT_PROJECT_TYPE,
  type AddDomainInput,
  type AddImpactDimensionInput,
  type AddProjectTypeInput,
  type AddSubdomainInput,
  type KnowledgeGraphOptions,
  type ReleaseLease,
} from './ontology/KnowledgeGraph.js';
export { parseOntologyDocument, serializeOntologyDocument } from './ontology/schema.js';

export type { IOntologyRepository } from './repositories/IOntologyRepository.js';
export { JsonFileOntologyRepository } from './repositories/JsonFileOntologyRepository.js';
export { SupabaseOntologyRepository } from './repositories/SupabaseOntologyRepository.js';

export { PromptSynthesizer, UNKNOWN_DOMAIN, groupReviewsByDomain } from './services/PromptSynthesizer.js';
export { SentimentScorer } from './services/SentimentScorer.js';
export {
  ReviewerClassifier,
  resolveDomain,
  type DomainSource,
  type ReviewerClassification,
} from './services/ReviewerClassifier.js';
export {
  AcceptanceFilter,
  type AcceptanceDecision,
  type AcceptanceReason,
} from './services/AcceptanceFilter.js';
export {
  GapFiller,
  artificialReviewerName,
  parseArtificialReview,
  type GapFillOptions,
  type GapFillResult,
} from './services/GapFiller.js';
export { ScoreAggregator } from './services/ScoreAggregator.js';
export {
  NarrativeSynthesizer,
  GENERIC_RECOMMENDATION,
  type NarrativeResult,
} from './services/NarrativeSynthesizer.js';
export {
  PipelineOrchestrator,
  WORK_STAGES,
  type AnalysisInput,
  type AnalyzeOptions,
  type PipelineOutcome,
  type PipelineCompleted,
  type PipelineFailed,
  type PipelineStage,
  type StageProgress,
  type WorkStage,
} from './services/PipelineOrchestrator.js';
export {
  OntologyUpdateService,
  parseOntologySuggestions,
  type OntologyUpdateSummary,
  type SkippedSuggestion,
} from './services/OntologyUpdateService.js';

export { formatProjectText } from './text/project-text.js';
export { createContainer, type Container } from './container.js';
export { getProductionContainer, DEFAULT_ONTOLOGY_PATH } from './container.production.js';
