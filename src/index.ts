/**
 * SDR Outreach Engine - Main Entry Point
 *
 * Drafts an email, a social message and a call script for one lead, each
 * screened by a guardrail gate before it is accepted.
 *
 * Architecture:
 * - A LangGraph state graph threads one state record through every stage
 * - Collaborators (profile store, search, generator, guardrail, delivery,
 *   storage) are injected through typed interfaces
 * - Stages record failures on state instead of throwing
 */

// Core Types
export type * from './types/index.js';
export { HOOK_KINDS, ARTIFACT_KINDS, ARTIFACT_STATUS_PREFIX } from './types/index.js';

// Errors and logging
export {
  OutreachError,
  InvalidInputFormatError,
  CollaboratorUnavailableError,
  GuardrailTimeoutError,
  ConfigError,
  toErrorMessage,
  type ErrorCode,
  type CollaboratorName,
} from './errors/index.js';
export { createLogger, silentLogger, noopMetrics, type LogLevel } from './logger/index.js';

// Normalizer Module - Input classification
export {
  normalize,
  normalizeLead,
  isContactAddress,
  validateLeadIdentity,
  getDisplayIdentifier,
  deriveIdentityKey,
  organizationFromAddress,
  ACCEPTED_FORMATS_MESSAGE,
} from './normalizer/index.js';

// Enrichment Module - Profile lookup and sufficiency
export {
  lookupEnrichment,
  isEnrichmentSufficient,
  normalizeProfileMatches,
  MemoryProfileStore,
  loadProfilesFromJson,
  parseLeadProfiles,
  mapApolloRow,
  REQUIRED_METADATA_FIELDS,
  MIN_CONTENT_LENGTH,
  type LeadProfile,
  type EnrichmentLookup,
  type EnrichmentStatus,
} from './enrichment/index.js';

// Research and hooks
export {
  runResearch,
  buildResearchQueries,
  resolveOrganization,
  TavilySearchProvider,
  NullSearchProvider,
  type TavilyConfig,
  type ResearchOutcome,
} from './research/index.js';
export { extractHooks, presentHooks, DEFAULT_HOOK_KEYWORDS, type HookKeywords } from './hooks/index.js';

// Guardrail and generation
export {
  GuardrailGate,
  HttpGuardrailBackend,
  buildRules,
  withTimeout,
  summarizeVerdict,
  type GuardrailConfig,
  type HttpGuardrailConfig,
  type PrioritizedRule,
} from './guardrail/index.js';
export { AnthropicTextGenerator, type GeneratorConfig, type MessageClient } from './generator/index.js';

// Drafting and workflow
export {
  runDraftNode,
  buildDraftContext,
  buildHookBlock,
  buildDraftPrompt,
  persistCallScript,
  type DraftDependencies,
} from './drafts/index.js';
export {
  runOutreachWorkflow,
  buildOutreachGraph,
  alwaysResearch,
  researchWhenInsufficient,
  shouldDoResearch,
  NODES,
  DEFAULT_RECURSION_LIMIT,
  OutreachStateAnnotation,
  createInitialState,
  appendStatus,
  mergeSlots,
  assertIdentityExclusive,
  type OutreachDependencies,
  type OutreachOptions,
  type ResearchPolicy,
} from './workflow/index.js';

// Delivery, storage and run records
export {
  GmailDraftAdapter,
  NullEmailDraftAdapter,
  NullSocialMessageAdapter,
  QueuedSocialMessageAdapter,
  createDeliveryAdapters,
  calculateDeliveryMetrics,
} from './adapters/index.js';
export {
  S3StorageAdapter,
  FileStorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  type S3Config,
  type StorageSettings,
} from './storage/index.js';
export {
  generateLeadId,
  buildRunRecord,
  saveRunRecord,
  loadRunRecord,
  checkExistingRun,
  type RunRecord,
} from './run-manager/index.js';

// Evaluation and rendering
export {
  evaluateWorkflowOutput,
  personalizationScore,
  researchDepthScore,
  draftQualityScore,
  type WorkflowMetrics,
} from './metrics/index.js';
export { renderCallScriptDocument, renderOutreachSummary } from './renderers/index.js';

// Configuration
export { loadConfig, createDependenciesFromConfig, researchPolicyFromConfig, type AppConfig } from './config/index.js';
