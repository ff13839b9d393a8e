/**
 * Production container: environment-driven wiring.
 * Ontology comes from Supabase when configured, otherwise from a JSON file.
 * Completions go to any OpenAI-compatible endpoint.
 */

import { fileURLToPath } from 'node:url';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { loadAnalysisConfigFromEnv } from './config.js';
import { ValidationError } from './errors.js';
import { KnowledgeGraph } from './ontology/KnowledgeGraph.js';
import type { IOntologyRepository } from './repositories/IOntologyRepository.js';
import { JsonFileOntologyRepository } from './repositories/JsonFileOntologyRepository.js';
import { SupabaseOntologyRepository } from './repositories/SupabaseOntologyRepository.js';
import { OpenAICompletionProvider } from './providers/OpenAICompletionProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './providers/ILogProvider.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_ONTOLOGY_PATH = fileURLToPath(new URL('../data/ontology.json', import.meta.url));

// Local servers such as Ollama accept any key.
const LOCAL_API_KEY = 'not-needed';

// Events the production logger keeps in memory.
const LOG_BUFFER_SIZE = 1000;

let cached: Promise<Container> | null = null;

export function getProductionContainer(env: Env = process.env): Promise<Container> {
  if (!cached) {
    cached = buildContainer(env).catch((err: unknown) => {
      cached = null;
      throw err;
    });
  }
  return cached;
}

async function buildContainer(env: Env): Promise<Container> {
  const apiKey = env.LLM_API_KEY?.trim();
  const baseURL = env.LLM_BASE_URL?.trim();
  if (!apiKey && !baseURL) {
    throw new ValidationError(
      'Missing required environment variables: LLM_API_KEY (or LLM_BASE_URL for a local server)'
    );
  }

  const config = loadAnalysisConfigFromEnv(env);
  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: readLogLevel(env),
    maxBufferedEvents: LOG_BUFFER_SIZE,
  });

  const graph = await KnowledgeGraph.open(selectRepository(env), logProvider);

  const completionProvider = new OpenAICompletionProvider({
    apiKey: apiKey || LOCAL_API_KEY,
    baseURL: baseURL || undefined,
    model: env.LLM_MODEL?.trim() || undefined,
    maxTokens: readOptionalNumber(env, 'LLM_MAX_TOKENS'),
    temperature: readOptionalNumber(env, 'LLM_TEMPERATURE'),
  });

  return createContainer({ graph, completionProvider, logProvider, config });
}

function selectRepository(env: Env): IOntologyRepository {
  if (env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY) {
    return new SupabaseOntologyRepository(getSupabaseClient(env));
  }
  return new JsonFileOntologyRepository(env.ONTOLOGY_PATH?.trim() || DEFAULT_ONTOLOGY_PATH);
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) return 'info';
  if (!isLogLevel(raw)) {
    throw new ValidationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`
    );
  }
  return raw;
}

function readOptionalNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}
