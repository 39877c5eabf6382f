/**
 * Workflow state annotation and construction
 *
 * Single-owner fields are plain LastValue channels: two nodes writing one of
 * them in the same step is rejected by the graph runtime. Fields the fan-out
 * branches share carry reducers:
 * - status_log entries are appended
 * - drafts, guardrail and deliveries merge per artifact slot
 * - error: the last update that sets it wins
 */

import { Annotation } from '@langchain/langgraph';
import { InvalidInputFormatError } from '../errors/index.js';
import { emptyHooks } from '../hooks/index.js';
import { validateLeadIdentity } from '../normalizer/index.js';
import {
  ARTIFACT_KINDS,
  type ArtifactKind,
  type DeliveryOutcome,
  type GuardrailSummary,
  type LeadId,
  type LeadIdentity,
  type WorkflowState,
} from '../types/index.js';

export function appendStatus(current: string[], update: string[]): string[] {
  return [...current, ...update];
}

/**
 * Overlay the slots an update sets; untouched slots keep their value
 */
export function mergeSlots<T>(
  current: Record<ArtifactKind, T>,
  update: Partial<Record<ArtifactKind, T>>
): Record<ArtifactKind, T> {
  const next = { ...current };
  for (const kind of ARTIFACT_KINDS) {
    const value = update[kind];
    if (value !== undefined) {
      next[kind] = value;
    }
  }
  return next;
}

function emptySlots<T>(): Record<ArtifactKind, T | null> {
  return { EMAIL: null, SOCIAL_MESSAGE: null, CALL_SCRIPT: null };
}

export const OutreachStateAnnotation = Annotation.Root({
  // Identity
  lead_id: Annotation<WorkflowState['lead_id']>,
  input_mode: Annotation<WorkflowState['input_mode']>,
  contact_address: Annotation<WorkflowState['contact_address']>,
  person_name: Annotation<WorkflowState['person_name']>,
  organization: Annotation<WorkflowState['organization']>,

  // Stage outputs, one writer each
  input_safety: Annotation<WorkflowState['input_safety']>,
  enrichment: Annotation<WorkflowState['enrichment']>,
  enrichment_sufficient: Annotation<WorkflowState['enrichment_sufficient']>,
  research: Annotation<WorkflowState['research']>,
  hooks: Annotation<WorkflowState['hooks']>,

  // Written concurrently by the draft branches
  drafts: Annotation<WorkflowState['drafts'], Partial<WorkflowState['drafts']>>({
    reducer: (current, update) => mergeSlots(current, update),
    default: () => emptySlots<string>(),
  }),
  guardrail: Annotation<WorkflowState['guardrail'], Partial<WorkflowState['guardrail']>>({
    reducer: (current, update) => mergeSlots(current, update),
    default: () => emptySlots<GuardrailSummary>(),
  }),
  deliveries: Annotation<WorkflowState['deliveries'], Partial<WorkflowState['deliveries']>>({
    reducer: (current, update) => mergeSlots(current, update),
    default: () => emptySlots<DeliveryOutcome>(),
  }),
  status_log: Annotation<string[]>({
    reducer: appendStatus,
    default: () => [],
  }),
  error: Annotation<string | null>({
    reducer: (_current, update) => update,
    default: () => null,
  }),
});

export function createInitialState(identity: LeadIdentity, leadId: LeadId): WorkflowState {
  if (!leadId) {
    throw new InvalidInputFormatError('lead_id cannot be empty');
  }
  return {
    lead_id: leadId,
    input_mode: identity.input_mode,
    contact_address: identity.contact_address,
    person_name: identity.person_name,
    organization: identity.organization,
    input_safety: null,
    enrichment: null,
    enrichment_sufficient: false,
    research: null,
    hooks: emptyHooks(),
    drafts: emptySlots<string>(),
    guardrail: emptySlots<GuardrailSummary>(),
    deliveries: emptySlots<DeliveryOutcome>(),
    status_log: [],
    error: null,
  };
}

/**
 * Throws when both or neither identification shapes are populated
 */
export function assertIdentityExclusive(
  state: Pick<WorkflowState, 'input_mode' | 'contact_address' | 'person_name' | 'organization'>
): void {
  const result = validateLeadIdentity(state);
  if (!result.valid) {
    throw new InvalidInputFormatError(result.errors.join('; '));
  }
}
