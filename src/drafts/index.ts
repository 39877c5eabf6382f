/**
 * Drafts Module
 *
 * One node per outreach artifact. Each node builds its prompt from the
 * lead context and extracted hooks, generates a draft, screens it through the
 * guardrail gate and records the outcome on state.
 *
 * A node never throws: generation failures become `<kind>_error` with the
 * draft slot cleared, and a blocked draft is stored as the gate's notice.
 * Delivery side effects only run for accepted drafts and never fail the node.
 */

import { toDeliveryOutcome } from '../adapters/index.js';
import { toErrorMessage } from '../errors/index.js';
import { summarizeVerdict, type GuardrailGate } from '../guardrail/index.js';
import { presentHooks } from '../hooks/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import { renderCallScriptDocument } from '../renderers/index.js';
import { resolveOrganization } from '../research/index.js';
import {
  ARTIFACT_STATUS_PREFIX,
  type ArtifactKind,
  type ArtifactMetadata,
  type DeliveryOutcome,
  type DeliveryResult,
  type EmailDraftAdapter,
  type EnrichmentRecord,
  type HookSet,
  type Logger,
  type ModuleResult,
  type Observability,
  type ResearchRecord,
  type SocialMessageAdapter,
  type StorageAdapter,
  type TextGenerator,
  type WorkflowState,
  type WorkflowStateUpdate,
} from '../types/index.js';

export const RESEARCH_BLOCK_LIMIT = 200;
export const MAX_PROMPT_HOOKS = 3;

export const DEFAULT_OFFERING =
  'We help revenue teams research accounts and personalize outreach with AI.';

const defaultLogger: Logger = createLogger('drafts');

export interface DraftDependencies {
  generator: TextGenerator;
  guardrail: GuardrailGate;
  emailDrafts?: EmailDraftAdapter;
  socialQueue?: SocialMessageAdapter;
  storage?: StorageAdapter;
  /** One-line description of what the sender offers */
  offering?: string;
  observability?: Observability;
}

export interface DraftPrompt {
  system: string;
  user: string;
}

// ============================================================================
// Context
// ============================================================================

function researchBlock(entries: string[]): string {
  return entries.join(' ').slice(0, RESEARCH_BLOCK_LIMIT);
}

/**
 * Lead context for generation. Research is rendered per category, each
 * block capped; the combined summary is never included.
 */
export function buildDraftContext(enrichment: EnrichmentRecord | null, research: ResearchRecord | null): string {
  const parts: string[] = [];

  if (enrichment) {
    const metadata = enrichment.metadata;
    parts.push(`Company: ${metadata['organization'] || 'N/A'}`);
    parts.push(`Title: ${metadata['role_title'] || 'N/A'}`);
    parts.push(`Industry: ${metadata['sector'] || 'N/A'}`);
    parts.push(`Location: ${metadata['location'] || 'N/A'}`);
    parts.push(`\nEnrichment: ${enrichment.content}`);
  }

  if (research) {
    const events = researchBlock(research.recent_events);
    const pains = researchBlock(research.pain_signals);
    if (events) {
      parts.push(`\nRecent Events: ${events}`);
    }
    if (pains) {
      parts.push(`\nPain Signals: ${pains}`);
    }
  }

  return parts.join('\n');
}

/**
 * Hook instructions embedded in every prompt; empty when nothing was extracted
 */
export function buildHookBlock(hooks: HookSet): string {
  const present = presentHooks(hooks).slice(0, MAX_PROMPT_HOOKS);
  if (present.length === 0) {
    return '';
  }
  const lines = ['Personalization hooks:'];
  present.forEach((hook, index) => {
    lines.push(`${index + 1}. ${hook.text}`);
  });
  lines.push('The opening must reference at least one of these hooks.');
  return lines.join('\n');
}

function leadHeader(state: Pick<WorkflowState, 'person_name' | 'organization' | 'contact_address' | 'enrichment'>): string {
  const organization = resolveOrganization(state);
  if (state.person_name) {
    return `Lead: ${state.person_name}${organization ? ` at ${organization}` : ''}`;
  }
  return `Lead: ${state.contact_address ?? 'unknown'}${organization ? ` (${organization})` : ''}`;
}

/**
 * System and user prompts for one artifact
 */
export function buildDraftPrompt(kind: ArtifactKind, state: WorkflowState, offering: string = DEFAULT_OFFERING): DraftPrompt {
  const context = buildDraftContext(state.enrichment, state.research);
  const hookBlock = buildHookBlock(state.hooks);
  const leadContext = [leadHeader(state), context].filter(Boolean).join('\n');
  const hookSection = hookBlock ? `\n\n${hookBlock}` : '';

  switch (kind) {
    case 'EMAIL':
      return {
        system: [
          'You are an expert SDR drafting personalized outreach emails.',
          '',
          'Key guidelines:',
          '- Keep emails concise (100-150 words)',
          '- Lead with value, not product pitch',
          '- Reference specific, relevant context about the lead',
          '- End with clear, low-friction CTA',
          '- Professional but conversational tone',
        ].join('\n'),
        user: `Draft an email to reach out to this lead:\n\nLead Context:\n${leadContext}${hookSection}\n\nOur offering: ${offering}\n\nDraft the email body only (no subject line).`,
      };
    case 'SOCIAL_MESSAGE':
      return {
        system: [
          'You are an expert SDR drafting professional network connection messages.',
          '',
          'Key guidelines:',
          '- Keep under 300 characters',
          '- Mention a shared interest or relevant context',
          '- Professional and friendly',
          '- No sales pitch in a connection request',
        ].join('\n'),
        user: `Draft a connection request message:\n\nLead Context:\n${leadContext}${hookSection}\n\nDraft the connection message only.`,
      };
    case 'CALL_SCRIPT':
      return {
        system: [
          'You are an expert SDR drafting call scripts.',
          '',
          'Key guidelines:',
          '- Opening: Brief intro + permission to proceed',
          '- Discovery: 3-4 key questions about their challenges',
          '- Positioning: Connect their needs to our value',
          '- Close: Calendar booking or next step',
          '- Include objection handling tips',
          '- Format as structured markdown',
        ].join('\n'),
        user: `Draft a call script for this lead:\n\nLead Context:\n${leadContext}${hookSection}\n\nOur offering: ${offering}\n\nFormat with sections: Opening, Discovery Questions, Positioning, Close, Objection Handling.`,
      };
  }
}

// ============================================================================
// Side effects
// ============================================================================

export function callScriptKey(leadId: string): string {
  return `outputs/call_script_${leadId}.md`;
}

/**
 * Save the call script document for a lead
 */
export async function persistCallScript(
  storage: StorageAdapter,
  state: WorkflowState,
  script: string
): Promise<ModuleResult<ArtifactMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  try {
    const document = renderCallScriptDocument(state, script, timestamp);
    const metadata = await storage.save(callScriptKey(state.lead_id), document, { contentType: 'text/markdown' });
    return {
      success: true,
      data: metadata,
      metadata: { leadId: state.lead_id, module: 'drafts', timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return {
      success: false,
      error: { code: 'CALL_SCRIPT_PERSIST_ERROR', message: toErrorMessage(error) },
      metadata: { leadId: state.lead_id, module: 'drafts', timestamp, duration: Date.now() - startTime },
    };
  }
}

interface DeliveryStep {
  outcome: DeliveryOutcome;
  statuses: string[];
}

const SKIPPED: DeliveryOutcome = { status: 'skipped', reference: null, error: null };

function slot<T>(kind: ArtifactKind, value: T): Partial<Record<ArtifactKind, T>> {
  const update: Partial<Record<ArtifactKind, T>> = {};
  update[kind] = value;
  return update;
}

async function deliver(
  kind: ArtifactKind,
  text: string,
  state: WorkflowState,
  deps: DraftDependencies,
  logger: Logger
): Promise<DeliveryStep> {
  const prefix = ARTIFACT_STATUS_PREFIX[kind];

  if (kind === 'CALL_SCRIPT') {
    if (!deps.storage) {
      return { outcome: SKIPPED, statuses: [] };
    }
    const result = await persistCallScript(deps.storage, state, text);
    if (result.success && result.data) {
      return {
        outcome: { status: 'success', reference: result.data.key, error: null },
        statuses: ['call_script_persisted'],
      };
    }
    const message = result.error?.message ?? 'Call script persistence failed';
    logger.error('Failed to persist call script', { leadId: state.lead_id, error: message });
    return {
      outcome: { status: 'failed', reference: null, error: message },
      statuses: ['call_script_persist_error'],
    };
  }

  const recipient = state.contact_address;
  if (!recipient) {
    return { outcome: SKIPPED, statuses: [] };
  }

  try {
    let result: DeliveryResult;
    if (kind === 'EMAIL') {
      if (!deps.emailDrafts) {
        return { outcome: SKIPPED, statuses: [] };
      }
      const subject = `Quick idea for ${resolveOrganization(state) || 'your team'}`;
      result = await deps.emailDrafts.createDraft(recipient, subject, text);
    } else {
      if (!deps.socialQueue) {
        return { outcome: SKIPPED, statuses: [] };
      }
      result = await deps.socialQueue.queueMessage(recipient, text);
    }
    const outcome = toDeliveryOutcome(result);
    return { outcome, statuses: outcome.status === 'failed' ? [`${prefix}_delivery_failed`] : [] };
  } catch (error) {
    const message = toErrorMessage(error);
    logger.error('Delivery failed', { leadId: state.lead_id, kind, error: message });
    return {
      outcome: { status: 'failed', reference: null, error: message },
      statuses: [`${prefix}_delivery_failed`],
    };
  }
}

// ============================================================================
// Draft node
// ============================================================================

/**
 * Generate, screen and record one artifact
 */
export async function runDraftNode(
  kind: ArtifactKind,
  state: WorkflowState,
  deps: DraftDependencies
): Promise<WorkflowStateUpdate> {
  const logger = deps.observability?.logger ?? defaultLogger;
  const metrics = deps.observability?.metrics ?? noopMetrics;
  const prefix = ARTIFACT_STATUS_PREFIX[kind];
  const leadId = state.lead_id;
  const startTime = Date.now();

  let prompt: DraftPrompt;
  let draft: string;
  try {
    prompt = buildDraftPrompt(kind, state, deps.offering);
    draft = await deps.generator.generate(prompt.system, prompt.user);
  } catch (error) {
    const message = toErrorMessage(error);
    logger.error('Draft generation failed', { leadId, kind, error: message });
    metrics.increment('drafts.error', { kind });
    return {
      drafts: slot<string | null>(kind, null),
      status_log: [`${prefix}_error`],
      error: message,
    };
  }

  const verdict = await deps.guardrail.validate(draft, kind, prompt.user);
  const guardrail = slot(kind, summarizeVerdict(verdict));

  if (!verdict.safe) {
    logger.warn('Draft replaced by guardrail notice', { leadId, kind });
    metrics.increment('drafts.blocked', { kind });
    return {
      drafts: slot<string | null>(kind, verdict.filtered_text),
      guardrail,
      deliveries: slot(kind, SKIPPED),
      status_log: [`${prefix}_blocked`],
    };
  }

  const accepted = verdict.filtered_text;
  const delivery = await deliver(kind, accepted, state, deps, logger);

  logger.info('Draft accepted', { leadId, kind, length: accepted.length, delivery: delivery.outcome.status });
  metrics.increment('drafts.drafted', { kind });
  metrics.timing('drafts.duration_ms', Date.now() - startTime, { kind });

  return {
    drafts: slot<string | null>(kind, accepted),
    guardrail,
    deliveries: slot(kind, delivery.outcome),
    status_log: [`${prefix}_drafted`, ...delivery.statuses],
  };
}
