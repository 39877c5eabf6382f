/**
 * Core type definitions for the SDR outreach engine
 *
 * This module exports the shared state record threaded through the workflow
 * graph, the collaborator contracts the core consumes, and the observability
 * interfaces every module accepts.
 */

/**
 * Stable identifier for a lead's workflow run
 * Format: lead_<16 hex chars> or any caller-supplied non-empty string
 */
export type LeadId = string;

// ============================================================================
// Enumerations
// ============================================================================

/**
 * How the lead was identified by the caller
 */
export type InputMode = 'BY_CONTACT' | 'BY_NAME_ORG';

/**
 * Personalization hook categories
 */
export type HookKind = 'RECENT_EVENT' | 'PAIN_POINT' | 'GROWTH_SIGNAL';

export const HOOK_KINDS: readonly HookKind[] = ['RECENT_EVENT', 'PAIN_POINT', 'GROWTH_SIGNAL'];

/**
 * Outreach artifacts produced per lead
 */
export type ArtifactKind = 'EMAIL' | 'SOCIAL_MESSAGE' | 'CALL_SCRIPT';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = ['EMAIL', 'SOCIAL_MESSAGE', 'CALL_SCRIPT'];

/**
 * Status-token prefix for each artifact (e.g. `social_message_error`)
 */
export const ARTIFACT_STATUS_PREFIX: Record<ArtifactKind, string> = {
  EMAIL: 'email',
  SOCIAL_MESSAGE: 'social_message',
  CALL_SCRIPT: 'call_script',
};

// ============================================================================
// Lead identity (Input Normalizer output)
// ============================================================================

export interface ContactIdentity {
  input_mode: 'BY_CONTACT';
  contact_address: string;
  person_name: null;
  organization: null;
}

export interface NameOrgIdentity {
  input_mode: 'BY_NAME_ORG';
  contact_address: null;
  person_name: string;
  organization: string;
}

/**
 * Exactly one identification shape is populated, matching input_mode
 */
export type LeadIdentity = ContactIdentity | NameOrgIdentity;

// ============================================================================
// Enrichment and research records
// ============================================================================

export interface EnrichmentRecord {
  content: string;
  metadata: Record<string, string>;
}

export type ResearchCategory = 'recent_events' | 'pain_signals';

export interface SourceRef {
  title: string;
  url: string;
  category: ResearchCategory;
}

export interface ResearchRecord {
  recent_events: string[];
  pain_signals: string[];
  sources: SourceRef[];
  summary: string;
}

export type HookSet = Record<HookKind, string | null>;

export type DraftSet = Record<ArtifactKind, string | null>;

// ============================================================================
// Guardrail types
// ============================================================================

export interface Violation {
  metric: string;
  value: number | null;
  threshold: number | null;
}

/**
 * Terminal state of one guardrail call
 */
export type GuardrailOutcome = 'SAFE' | 'BLOCKED' | 'PASS_OPEN' | 'PASS_OPEN_WITH_WARNING';

export interface GuardrailVerdict {
  outcome: GuardrailOutcome;
  safe: boolean;
  filtered_text: string;
  violations: Violation[];
  original_text: string;
  /** Recorded when the verdict is a fail-open caused by an infrastructure failure */
  error?: string;
}

/**
 * Compact verdict kept on the workflow state for observability
 */
export interface GuardrailSummary {
  safe: boolean;
  violations: string[];
  error: string | null;
}

export interface InputSafetyResult {
  safe: boolean;
  violations: Violation[];
  error?: string;
}

// ============================================================================
// Delivery outcome
// ============================================================================

export type DeliveryStatusValue = 'not_attempted' | 'success' | 'failed' | 'skipped';

export interface DeliveryOutcome {
  status: DeliveryStatusValue;
  reference: string | null;
  error: string | null;
}

// ============================================================================
// Workflow state
// ============================================================================

/**
 * The single record threaded through the workflow graph.
 *
 * Each field has one owning stage; `status_log` is the only field written by
 * concurrent branches and is merged by concatenation.
 */
export interface WorkflowState {
  lead_id: LeadId;
  input_mode: InputMode;
  contact_address: string | null;
  person_name: string | null;
  organization: string | null;

  input_safety: InputSafetyResult | null;

  enrichment: EnrichmentRecord | null;
  enrichment_sufficient: boolean;

  research: ResearchRecord | null;
  hooks: HookSet;

  drafts: DraftSet;
  guardrail: Record<ArtifactKind, GuardrailSummary | null>;
  deliveries: Record<ArtifactKind, DeliveryOutcome | null>;

  status_log: string[];
  error: string | null;
}

/**
 * Partial update returned by a workflow node. Slot maps may be partial.
 */
export type WorkflowStateUpdate = {
  input_safety?: InputSafetyResult | null;
  enrichment?: EnrichmentRecord | null;
  enrichment_sufficient?: boolean;
  research?: ResearchRecord | null;
  hooks?: HookSet;
  drafts?: Partial<DraftSet>;
  guardrail?: Partial<Record<ArtifactKind, GuardrailSummary | null>>;
  deliveries?: Partial<Record<ArtifactKind, DeliveryOutcome | null>>;
  status_log?: string[];
  error?: string | null;
};

// ============================================================================
// Collaborator contracts
// ============================================================================

export interface ProfileMatch {
  content: string;
  metadata: Record<string, string>;
}

/**
 * Profile store (vector store or equivalent), keyed by contact address
 */
export interface ProfileStore {
  search(query: string, k: number, filter?: Record<string, string>): Promise<ProfileMatch[]>;
}

export interface SearchResult {
  title: string;
  url: string;
  content: string;
}

export interface WebSearchProvider {
  readonly name: string;
  search(query: string, maxResults: number, recencyDays?: number): Promise<SearchResult[]>;
}

export interface TextGenerator {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export type GuardrailOperator = 'contains' | 'gt';

export interface GuardrailRule {
  metric: string;
  operator: GuardrailOperator;
  target_value: string | number | string[];
}

export interface GuardrailRuleset {
  rules: GuardrailRule[];
  action: {
    type: 'OVERRIDE';
    choices: string[];
  };
}

export interface GuardrailEvaluation {
  overridden: boolean;
  output: string;
  triggered_rules: Violation[];
}

export interface GuardrailBackend {
  /** One-time setup (project/stage resolution). Optional for stateless backends. */
  initialize?(config: { project_id: string; stage_id: string }): Promise<void>;
  evaluate(
    input: string,
    output: string,
    rulesets: GuardrailRuleset[],
    options: { stage_id: string; timeout_ms: number; signal?: AbortSignal }
  ): Promise<GuardrailEvaluation>;
}

export interface DeliveryResult {
  success: boolean;
  id?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

export interface EmailDraftAdapter {
  createDraft(recipient: string, subject: string, body: string): Promise<DeliveryResult>;
}

export interface SocialMessageAdapter {
  queueMessage(recipient: string, message: string): Promise<DeliveryResult>;
}

/**
 * Minimal JSON POST client; an axios instance satisfies it
 */
export interface JsonPoster {
  post(url: string, body: unknown, config?: { signal?: AbortSignal; timeout?: number }): Promise<{ data: unknown }>;
}

// ============================================================================
// Artifact storage
// ============================================================================

export interface ArtifactMetadata {
  key: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for artifact persistence
 */
export interface StorageAdapter {
  save(key: string, content: string | Buffer, metadata?: { contentType?: string }): Promise<ArtifactMetadata>;
  load(key: string): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(key: string): Promise<boolean>;
  list(prefix: string): Promise<ArtifactMetadata[]>;
  delete(key: string): Promise<void>;
}

// ============================================================================
// Observability
// ============================================================================

export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export interface Observability {
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Module result wrapper for boundary functions that report rather than throw
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    leadId: LeadId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
