/**
 * Configuration Module
 *
 * Reads and validates environment configuration, then wires concrete
 * collaborators. Channels without credentials get their Null implementation.
 */

import { z } from 'zod';
import { createDeliveryAdapters } from '../adapters/index.js';
import { loadProfilesFromJson, MemoryProfileStore } from '../enrichment/index.js';
import { ConfigError } from '../errors/index.js';
import { AnthropicTextGenerator } from '../generator/index.js';
import { GuardrailGate, HttpGuardrailBackend } from '../guardrail/index.js';
import { createLogger } from '../logger/index.js';
import { NullSearchProvider, TavilySearchProvider } from '../research/index.js';
import { createStorageAdapter } from '../storage/index.js';
import type { Logger, Observability, WebSearchProvider } from '../types/index.js';
import {
  alwaysResearch,
  researchWhenInsufficient,
  type OutreachDependencies,
  type ResearchPolicy,
} from '../workflow/index.js';

const defaultLogger: Logger = createLogger('config');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  ANTHROPIC_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  TAVILY_API_KEY: optionalString,
  TAVILY_API_URL: z.string().url().optional(),
  GUARDRAIL_API_URL: z.string().url().optional(),
  GUARDRAIL_API_KEY: optionalString,
  GUARDRAIL_PROJECT_ID: optionalString,
  GUARDRAIL_STAGE_ID: optionalString,
  GUARDRAIL_STRICT_MODE: booleanString,
  GMAIL_ACCESS_TOKEN: optionalString,
  STORAGE_TYPE: z.enum(['file', 's3', 'memory']).default('file'),
  OUTPUT_DIR: z.string().default('.'),
  S3_BUCKET: optionalString,
  AWS_REGION: z.string().default('us-east-1'),
  PROFILE_DATA_PATH: optionalString,
  RESEARCH_POLICY: z.enum(['always', 'when_insufficient']).default('always'),
  SENDER_OFFERING: optionalString,
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Validate environment variables into an AppConfig
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const config = parsed.data;
  if (config.STORAGE_TYPE === 's3' && !config.S3_BUCKET) {
    throw new ConfigError('Invalid configuration', ['S3_BUCKET: required when STORAGE_TYPE is s3']);
  }
  return config;
}

export function researchPolicyFromConfig(config: Pick<AppConfig, 'RESEARCH_POLICY'>): ResearchPolicy {
  return config.RESEARCH_POLICY === 'when_insufficient' ? researchWhenInsufficient : alwaysResearch;
}

/**
 * Build workflow dependencies from configuration. The guardrail gate is
 * initialized here, once.
 *
 * @throws ConfigError when no text generator can be created
 */
export async function createDependenciesFromConfig(
  config: AppConfig,
  observability: Observability = {}
): Promise<OutreachDependencies> {
  const logger = observability.logger ?? defaultLogger;

  if (!config.ANTHROPIC_API_KEY) {
    throw new ConfigError('Invalid configuration', ['ANTHROPIC_API_KEY: required']);
  }

  const generator = new AnthropicTextGenerator(
    {
      apiKey: config.ANTHROPIC_API_KEY,
      model: config.ANTHROPIC_MODEL,
      maxTokens: config.ANTHROPIC_MAX_TOKENS,
    },
    observability
  );

  let searchProvider: WebSearchProvider;
  if (config.TAVILY_API_KEY) {
    searchProvider = new TavilySearchProvider({ apiKey: config.TAVILY_API_KEY, apiUrl: config.TAVILY_API_URL });
  } else {
    logger.warn('TAVILY_API_KEY not set, web research returns no results');
    searchProvider = new NullSearchProvider();
  }

  const backend =
    config.GUARDRAIL_API_URL && config.GUARDRAIL_API_KEY
      ? new HttpGuardrailBackend({ apiUrl: config.GUARDRAIL_API_URL, apiKey: config.GUARDRAIL_API_KEY })
      : null;
  const guardrail = new GuardrailGate(
    {
      project_id: config.GUARDRAIL_PROJECT_ID ?? '',
      stage_id: config.GUARDRAIL_STAGE_ID ?? '',
      strict_mode: config.GUARDRAIL_STRICT_MODE,
    },
    backend,
    observability
  );
  await guardrail.initialize();

  const profiles = config.PROFILE_DATA_PATH ? await loadProfilesFromJson(config.PROFILE_DATA_PATH) : [];
  const profileStore = new MemoryProfileStore(profiles);
  logger.info('Profile store loaded', { profiles: profileStore.size });

  const storage =
    config.STORAGE_TYPE === 's3'
      ? createStorageAdapter({ type: 's3', bucket: config.S3_BUCKET ?? '', region: config.AWS_REGION })
      : config.STORAGE_TYPE === 'memory'
        ? createStorageAdapter({ type: 'memory' })
        : createStorageAdapter({ type: 'file', rootDir: config.OUTPUT_DIR });

  const adapters = createDeliveryAdapters(
    { gmailAccessToken: config.GMAIL_ACCESS_TOKEN, queueSocialMessages: true },
    observability.logger ?? createLogger('adapters')
  );

  return {
    profileStore,
    searchProvider,
    generator,
    guardrail,
    emailDrafts: adapters.email,
    socialQueue: adapters.social,
    storage,
    offering: config.SENDER_OFFERING,
    observability,
  };
}
