/**
 * Analysis configuration.
 * A single explicit struct threaded into the container at construction;
 * no component reads thresholds from process-wide state.
 */

import { ValidationError } from './errors.js';

export type BackoffStrategy = 'fixed' | 'exponential';

export interface RetryPolicy {
  /** Total attempts per completion call (1 = no retry). */
  maxRetries: number;
  /** Delay before the second attempt. */
  retryDelayMs: number;
  backoff: BackoffStrategy;
  /** Upper bound for any single delay. */
  maxDelayMs: number;
}

export interface WeightConfig {
  /** Base weight per expertise level id. Levels not listed weigh 1.0. */
  expertise: Record<string, number>;
  /** Multiplier applied to generated reviews. */
  artificialPenalty: number;
  /** Multiplier when a dimension is relevant to the reviewer's domain. */
  relevantDimensionBoost: number;
}

export interface AnalysisConfig {
  minConfidenceThreshold: number;
  expertConfidenceThreshold: number;
  minDomainRelevance: number;
  gapFillRelevanceThreshold: number;
  generateArtificialReviews: boolean;
  clampSentimentScores: boolean;
  enableProfileSignals: boolean;
  defaultDimensionScore: number;
  maxRecommendations: number;
  snippetLength: number;
  weights: WeightConfig;
  retry: RetryPolicy;
}

export type AnalysisConfigOverrides = Partial<
  Omit<AnalysisConfig, 'weights' | 'retry'>
> & {
  weights?: Partial<WeightConfig>;
  retry?: Partial<RetryPolicy>;
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  minConfidenceThreshold: 40,
  expertConfidenceThreshold: 80,
  minDomainRelevance: 0.3,
  gapFillRelevanceThreshold: 0.2,
  generateArtificialReviews: true,
  clampSentimentScores: true,
  enableProfileSignals: false,
  defaultDimensionScore: 3.0,
  maxRecommendations: 5,
  snippetLength: 150,
  weights: {
    expertise: {
      expert: 3.0,
      seasoned: 2.5,
      talented: 2.0,
      skilled: 1.5,
      beginner: 1.0,
    },
    artificialPenalty: 0.7,
    relevantDimensionBoost: 1.5,
  },
  retry: {
    maxRetries: 3,
    retryDelayMs: 2000,
    backoff: 'fixed',
    maxDelayMs: 60_000,
  },
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws ValidationError listing every out-of-range setting.
 */
export function resolveAnalysisConfig(
  overrides: AnalysisConfigOverrides = {}
): AnalysisConfig {
  const config: AnalysisConfig = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...overrides,
    weights: {
      ...DEFAULT_ANALYSIS_CONFIG.weights,
      ...overrides.weights,
      expertise: {
        ...DEFAULT_ANALYSIS_CONFIG.weights.expertise,
        ...overrides.weights?.expertise,
      },
    },
    retry: {
      ...DEFAULT_ANALYSIS_CONFIG.retry,
      ...overrides.retry,
    },
  };

  const problems = validateConfig(config);
  if (problems.length > 0) {
    throw new ValidationError(`Invalid analysis config: ${problems.join('; ')}`, {
      problems,
    });
  }

  return config;
}

function validateConfig(config: AnalysisConfig): string[] {
  const problems: string[] = [];

  const inRange = (name: string, value: number, min: number, max: number) => {
    if (!Number.isFinite(value) || value < min || value > max) {
      problems.push(`${name} must be between ${min} and ${max}`);
    }
  };

  inRange('minConfidenceThreshold', config.minConfidenceThreshold, 0, 100);
  inRange('expertConfidenceThreshold', config.expertConfidenceThreshold, 0, 100);
  inRange('minDomainRelevance', config.minDomainRelevance, 0, 1);
  inRange('gapFillRelevanceThreshold', config.gapFillRelevanceThreshold, 0, 1);
  inRange('defaultDimensionScore', config.defaultDimensionScore, 1, 5);

  if (!Number.isInteger(config.maxRecommendations) || config.maxRecommendations < 1) {
    problems.push('maxRecommendations must be a positive integer');
  }
  if (!Number.isInteger(config.snippetLength) || config.snippetLength < 1) {
    problems.push('snippetLength must be a positive integer');
  }
  if (!Number.isInteger(config.retry.maxRetries) || config.retry.maxRetries < 1) {
    problems.push('retry.maxRetries must be a positive integer');
  }
  if (config.retry.retryDelayMs < 0) {
    problems.push('retry.retryDelayMs must not be negative');
  }
  if (config.retry.maxDelayMs < config.retry.retryDelayMs) {
    problems.push('retry.maxDelayMs must be at least retry.retryDelayMs');
  }
  if (config.weights.artificialPenalty <= 0) {
    problems.push('weights.artificialPenalty must be positive');
  }
  if (config.weights.relevantDimensionBoost <= 0) {
    problems.push('weights.relevantDimensionBoost must be positive');
  }
  for (const [level, weight] of Object.entries(config.weights.expertise)) {
    if (!(weight > 0)) {
      problems.push(`weights.expertise.${level} must be positive`);
    }
  }

  return problems;
}

/**
 * Read overrides from environment variables. Used by the production
 * container only; unset or blank variables fall back to the defaults.
 */
export function loadAnalysisConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): AnalysisConfig {
  const overrides: AnalysisConfigOverrides = {};
  const retry: Partial<RetryPolicy> = {};

  const minConfidence = readNumber(env, 'REVIEW_MIN_CONFIDENCE');
  if (minConfidence !== undefined) overrides.minConfidenceThreshold = minConfidence;

  const expertConfidence = readNumber(env, 'REVIEW_EXPERT_CONFIDENCE');
  if (expertConfidence !== undefined) overrides.expertConfidenceThreshold = expertConfidence;

  const minRelevance = readNumber(env, 'REVIEW_MIN_RELEVANCE');
  if (minRelevance !== undefined) overrides.minDomainRelevance = minRelevance;

  const gapFill = readNumber(env, 'REVIEW_GAP_FILL_RELEVANCE');
  if (gapFill !== undefined) overrides.gapFillRelevanceThreshold = gapFill;

  const artificial = readBoolean(env, 'REVIEW_ARTIFICIAL_REVIEWS');
  if (artificial !== undefined) overrides.generateArtificialReviews = artificial;

  const maxRetries = readNumber(env, 'LLM_MAX_RETRIES');
  if (maxRetries !== undefined) retry.maxRetries = maxRetries;

  const retryDelay = readNumber(env, 'LLM_RETRY_DELAY_MS');
  if (retryDelay !== undefined) retry.retryDelayMs = retryDelay;

  const backoff = env.LLM_BACKOFF?.trim();
  if (backoff) {
    if (backoff !== 'fixed' && backoff !== 'exponential') {
      throw new ValidationError(`LLM_BACKOFF must be "fixed" or "exponential", got "${backoff}"`);
    }
    retry.backoff = backoff;
  }

  return resolveAnalysisConfig({ ...overrides, retry });
}

function readNumber(
  env: Record<string, string | undefined>,
  name: string
): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(
  env: Record<string, string | undefined>,
  name: string
): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ValidationError(`${name} must be true or false, got "${raw}"`);
}
