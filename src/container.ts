/**
 * Dependency wiring.
 * Constructs all services around one knowledge graph and one completion provider.
 * The production container supplies real stores and a hosted model;
 * tests pass in-memory doubles.
 */

import type { KnowledgeGraph } from './ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from './providers/ICompletionProvider.js';
import type { IProfileProvider } from './providers/IProfileProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import {
  resolveAnalysisConfig,
  type AnalysisConfig,
  type AnalysisConfigOverrides,
} from './config.js';
import { RetryingCompletionProvider, type Sleep } from './providers/RetryingCompletionProvider.js';
import { SimulatedProfileProvider } from './providers/SimulatedProfileProvider.js';
import { PromptSynthesizer } from './services/PromptSynthesizer.js';
import { SentimentScorer } from './services/SentimentScorer.js';
import { ReviewerClassifier } from './services/ReviewerClassifier.js';
import { AcceptanceFilter } from './services/AcceptanceFilter.js';
import { GapFiller } from './services/GapFiller.js';
import { ScoreAggregator } from './services/ScoreAggregator.js';
import { NarrativeSynthesizer } from './services/NarrativeSynthesizer.js';
import { PipelineOrchestrator } from './services/PipelineOrchestrator.js';
import { OntologyUpdateService } from './services/OntologyUpdateService.js';

export interface Container {
  config: AnalysisConfig;
  graph: KnowledgeGraph;
  logProvider: ILogProvider;
  /** The caller's provider wrapped in the configured retry policy. */
  completionProvider: ICompletionProvider;
  prompts: PromptSynthesizer;
  sentimentScorer: SentimentScorer;
  /** A fresh classifier (and classification cache) per analysis. */
  createReviewerClassifier: () => ReviewerClassifier;
  acceptanceFilter: AcceptanceFilter;
  gapFiller: GapFiller;
  scoreAggregator: ScoreAggregator;
  narrativeSynthesizer: NarrativeSynthesizer;
  pipeline: PipelineOrchestrator;
  ontologyUpdateService: OntologyUpdateService;
}

export function createContainer(deps: {
  graph: KnowledgeGraph;
  completionProvider: ICompletionProvider;
  logProvider: ILogProvider;
  config?: AnalysisConfigOverrides;
  /** Used only when `enableProfileSignals` is set; defaults to the simulated provider. */
  profileProvider?: IProfileProvider;
  sleep?: Sleep;
}): Container {
  const config = resolveAnalysisConfig(deps.config);
  const { graph, logProvider } = deps;

  const completionProvider = new RetryingCompletionProvider(
    deps.completionProvider,
    config.retry,
    logProvider,
    deps.sleep
  );
  const profileProvider = config.enableProfileSignals
    ? deps.profileProvider ?? new SimulatedProfileProvider()
    : null;

  const prompts = new PromptSynthesizer(graph, config.snippetLength);
  const sentimentScorer = new SentimentScorer(
    graph,
    prompts,
    completionProvider,
    config,
    logProvider
  );
  const createReviewerClassifier = () =>
    new ReviewerClassifier(graph, prompts, completionProvider, logProvider, profileProvider);
  const acceptanceFilter = new AcceptanceFilter(graph, config);
  const gapFiller = new GapFiller(
    graph,
    prompts,
    completionProvider,
    sentimentScorer,
    config,
    logProvider
  );
  const scoreAggregator = new ScoreAggregator(graph, config);
  const narrativeSynthesizer = new NarrativeSynthesizer(
    graph,
    prompts,
    completionProvider,
    config,
    logProvider
  );

  const pipeline = new PipelineOrchestrator(
    graph,
    {
      createClassifier: createReviewerClassifier,
      acceptanceFilter,
      sentimentScorer,
      gapFiller,
      scoreAggregator,
      narrativeSynthesizer,
    },
    config,
    logProvider
  );
  const ontologyUpdateService = new OntologyUpdateService(
    graph,
    prompts,
    completionProvider,
    logProvider
  );

  return {
    config,
    graph,
    logProvider,
    completionProvider,
    prompts,
    sentimentScorer,
    createReviewerClassifier,
    acceptanceFilter,
    gapFiller,
    scoreAggregator,
    narrativeSynthesizer,
    pipeline,
    ontologyUpdateService,
  };
}
