/**
 * Outreach Workflow
 *
 * NORMALIZE -> ENRICH -> (research policy) -> RESEARCH | DRAFT_EMAIL
 * RESEARCH -> DRAFT_EMAIL -> { DRAFT_SOCIAL, DRAFT_CALL }
 *
 * The social message and call script are drafted concurrently once the
 * email is done. Only invalid input escapes runOutreachWorkflow; every
 * collaborator failure is recorded on the returned state.
 *
 * Usage:
 * const state = await runOutreachWorkflow('jane.doe@acme.com', deps);
 */

import { END, START, StateGraph } from '@langchain/langgraph';
import { runDraftNode, type DraftDependencies } from '../drafts/index.js';
import { lookupEnrichment } from '../enrichment/index.js';
import { toErrorMessage } from '../errors/index.js';
import type { GuardrailGate } from '../guardrail/index.js';
import { DEFAULT_HOOK_KEYWORDS, extractHooks, type HookKeywords } from '../hooks/index.js';
import { createLogger } from '../logger/index.js';
import { normalize } from '../normalizer/index.js';
import { runResearch } from '../research/index.js';
import { generateLeadId, saveRunRecord } from '../run-manager/index.js';
import type {
  EmailDraftAdapter,
  LeadId,
  Logger,
  Observability,
  ProfileStore,
  SocialMessageAdapter,
  StorageAdapter,
  TextGenerator,
  WebSearchProvider,
  WorkflowState,
  WorkflowStateUpdate,
} from '../types/index.js';
import { OutreachStateAnnotation, assertIdentityExclusive, createInitialState } from './state.js';

export {
  OutreachStateAnnotation,
  appendStatus,
  assertIdentityExclusive,
  createInitialState,
  mergeSlots,
} from './state.js';

export const NODES = {
  NORMALIZE: 'normalize',
  ENRICH: 'enrich',
  RESEARCH: 'web_research',
  DRAFT_EMAIL: 'draft_email',
  DRAFT_SOCIAL: 'draft_social',
  DRAFT_CALL: 'draft_call',
} as const;

/**
 * Superstep limit for one run
 */
export const DEFAULT_RECURSION_LIMIT = 25;

const defaultLogger: Logger = createLogger('workflow');

// ============================================================================
// Research policy
// ============================================================================

/**
 * Decides, after enrichment, whether web research runs
 */
export type ResearchPolicy = (state: WorkflowState) => boolean;

export const alwaysResearch: ResearchPolicy = () => true;

export const researchWhenInsufficient: ResearchPolicy = (state) => !state.enrichment_sufficient;

export function shouldDoResearch(policy: ResearchPolicy): (state: WorkflowState) => 'research' | 'draft' {
  return (state) => (policy(state) ? 'research' : 'draft');
}

// ============================================================================
// Dependencies
// ============================================================================

export interface OutreachDependencies {
  profileStore: ProfileStore;
  searchProvider: WebSearchProvider;
  generator: TextGenerator;
  /** Initialized by the owner before the first run */
  guardrail: GuardrailGate;
  emailDrafts?: EmailDraftAdapter;
  socialQueue?: SocialMessageAdapter;
  storage?: StorageAdapter;
  offering?: string;
  hookKeywords?: HookKeywords;
  observability?: Observability;
}

export interface OutreachOptions {
  leadId?: LeadId;
  researchPolicy?: ResearchPolicy;
  /** Screen the lead fields for sensitive data before enrichment */
  checkInputSafety?: boolean;
  /** Write runs/<lead_id>/run_record.json when storage is configured */
  saveRunRecord?: boolean;
  recursionLimit?: number;
}

// ============================================================================
// Nodes
// ============================================================================

export function createNormalizeNode(
  deps: OutreachDependencies,
  checkInputSafety: boolean
): (state: WorkflowState) => Promise<WorkflowStateUpdate> {
  return async (state) => {
    assertIdentityExclusive(state);
    if (!checkInputSafety) {
      return { status_log: ['normalized'] };
    }
    const inputSafety = await deps.guardrail.checkInputSafety({
      contact_address: state.contact_address,
      person_name: state.person_name,
      organization: state.organization,
    });
    return {
      input_safety: inputSafety,
      status_log: ['normalized', inputSafety.safe ? 'input_safety_checked' : 'input_safety_flagged'],
    };
  };
}

export function createEnrichNode(
  deps: OutreachDependencies
): (state: WorkflowState) => Promise<WorkflowStateUpdate> {
  return async (state) => {
    const lookup = await lookupEnrichment(state, deps.profileStore, deps.observability);
    const update: WorkflowStateUpdate = {
      enrichment: lookup.enrichment,
      enrichment_sufficient: lookup.sufficient,
      status_log: [lookup.status],
    };
    if (lookup.error !== null) {
      update.error = lookup.error;
    }
    return update;
  };
}

export function createResearchNode(
  deps: OutreachDependencies
): (state: WorkflowState) => Promise<WorkflowStateUpdate> {
  const logger = deps.observability?.logger ?? defaultLogger;
  return async (state) => {
    try {
      const { research, errors } = await runResearch(state, deps.searchProvider, deps.observability);
      const hooks = extractHooks(research, deps.hookKeywords ?? DEFAULT_HOOK_KEYWORDS);
      const update: WorkflowStateUpdate = {
        research,
        hooks,
        status_log: ['research_completed', 'hooks_extracted'],
      };
      if (errors.length > 0) {
        update.error = errors.join('; ');
      }
      return update;
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error('Research stage failed', { leadId: state.lead_id, error: message });
      return { research: null, status_log: ['research_error'], error: message };
    }
  };
}

// ============================================================================
// Graph
// ============================================================================

export function buildOutreachGraph(deps: OutreachDependencies, options: OutreachOptions = {}) {
  const draftDeps: DraftDependencies = {
    generator: deps.generator,
    guardrail: deps.guardrail,
    emailDrafts: deps.emailDrafts,
    socialQueue: deps.socialQueue,
    storage: deps.storage,
    offering: deps.offering,
    observability: deps.observability,
  };

  const graph = new StateGraph(OutreachStateAnnotation)
    .addNode(NODES.NORMALIZE, createNormalizeNode(deps, options.checkInputSafety ?? false))
    .addNode(NODES.ENRICH, createEnrichNode(deps))
    .addNode(NODES.RESEARCH, createResearchNode(deps))
    .addNode(NODES.DRAFT_EMAIL, (state: WorkflowState) => runDraftNode('EMAIL', state, draftDeps))
    .addNode(NODES.DRAFT_SOCIAL, (state: WorkflowState) => runDraftNode('SOCIAL_MESSAGE', state, draftDeps))
    .addNode(NODES.DRAFT_CALL, (state: WorkflowState) => runDraftNode('CALL_SCRIPT', state, draftDeps))
    .addEdge(START, NODES.NORMALIZE)
    .addEdge(NODES.NORMALIZE, NODES.ENRICH)
    .addConditionalEdges(NODES.ENRICH, shouldDoResearch(options.researchPolicy ?? alwaysResearch), {
      research: NODES.RESEARCH,
      draft: NODES.DRAFT_EMAIL,
    })
    .addEdge(NODES.RESEARCH, NODES.DRAFT_EMAIL)
    // Social message and call script fan out from the email and run in one step
    .addEdge(NODES.DRAFT_EMAIL, NODES.DRAFT_SOCIAL)
    .addEdge(NODES.DRAFT_EMAIL, NODES.DRAFT_CALL)
    .addEdge(NODES.DRAFT_SOCIAL, END)
    .addEdge(NODES.DRAFT_CALL, END);

  return graph.compile();
}

/**
 * Normalize raw input and run the full workflow for one lead
 *
 * @throws InvalidInputFormatError before any node runs when the input is invalid
 */
export async function runOutreachWorkflow(
  raw: string,
  deps: OutreachDependencies,
  options: OutreachOptions = {}
): Promise<WorkflowState> {
  const logger = deps.observability?.logger ?? defaultLogger;
  const identity = normalize(raw);
  const leadId = options.leadId || generateLeadId(identity);
  const startedAt = new Date().toISOString();

  logger.info('Starting outreach workflow', { leadId, inputMode: identity.input_mode });

  const workflow = buildOutreachGraph(deps, options);
  const finalState: WorkflowState = await workflow.invoke(createInitialState(identity, leadId), {
    recursionLimit: options.recursionLimit ?? DEFAULT_RECURSION_LIMIT,
  });

  if (options.saveRunRecord && deps.storage) {
    const saved = await saveRunRecord(deps.storage, finalState, startedAt);
    if (!saved.success) {
      logger.error('Failed to save run record', { leadId, error: saved.error?.message });
    }
  }

  logger.info('Outreach workflow completed', {
    leadId,
    statusLog: finalState.status_log,
    error: finalState.error,
  });

  return finalState;
}
