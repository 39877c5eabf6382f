/**
 * Renderers Module
 *
 * Markdown views derived from a finished workflow state:
 * - Call script document persisted next to each lead's run
 * - Outreach summary covering all three artifacts, hooks and status log
 *
 * Renderers are pure apart from their structured log line.
 */

import { createLogger } from '../logger/index.js';
import { presentHooks } from '../hooks/index.js';
import { resolveOrganization } from '../research/index.js';
import type { ArtifactKind, HookKind, Logger, WorkflowState } from '../types/index.js';

const defaultLogger: Logger = createLogger('renderers');

const HOOK_LABELS: Record<HookKind, string> = {
  RECENT_EVENT: 'Recent event',
  PAIN_POINT: 'Pain point',
  GROWTH_SIGNAL: 'Growth signal',
};

const ARTIFACT_TITLES: Record<ArtifactKind, string> = {
  EMAIL: 'Email',
  SOCIAL_MESSAGE: 'Social Message',
  CALL_SCRIPT: 'Call Script',
};

type RenderableState = Pick<
  WorkflowState,
  'lead_id' | 'input_mode' | 'contact_address' | 'person_name' | 'organization' | 'enrichment' | 'hooks'
>;

/**
 * Human-readable lead label: "Name (Organization)" or the contact address
 */
export function leadLabel(state: Pick<WorkflowState, 'contact_address' | 'person_name' | 'organization'>): string {
  if (state.person_name) {
    return state.organization ? `${state.person_name} (${state.organization})` : state.person_name;
  }
  return state.contact_address ?? 'Unknown lead';
}

function pushHooks(lines: string[], state: Pick<WorkflowState, 'hooks'>): void {
  const hooks = presentHooks(state.hooks);
  if (hooks.length === 0) {
    lines.push('_No hooks extracted._');
  } else {
    for (const hook of hooks) {
      lines.push(`- **${HOOK_LABELS[hook.kind]}:** ${hook.text}`);
    }
  }
  lines.push('');
}

/**
 * Markdown document saved for a call script
 */
export function renderCallScriptDocument(
  state: RenderableState,
  script: string,
  generatedAt: string = new Date().toISOString(),
  logger: Logger = defaultLogger
): string {
  const lines: string[] = [];

  lines.push(`# Call Script: ${leadLabel(state)}`);
  lines.push('');
  lines.push(`**Lead ID:** \`${state.lead_id}\``);
  lines.push(`**Generated:** ${generatedAt}`);
  lines.push(`**Organization:** ${resolveOrganization(state) || 'Unknown'}`);
  const roleTitle = state.enrichment?.metadata['role_title'];
  if (roleTitle) {
    lines.push(`**Title:** ${roleTitle}`);
  }
  lines.push('');

  lines.push('## Personalization Hooks');
  lines.push('');
  pushHooks(lines, state);

  lines.push('## Script');
  lines.push('');
  lines.push(script.trim());
  lines.push('');

  const markdown = lines.join('\n');
  logger.debug('Rendered call script document', { leadId: state.lead_id, outputSize: markdown.length });
  return markdown;
}

/**
 * Markdown summary of a completed run
 */
export function renderOutreachSummary(state: WorkflowState, logger: Logger = defaultLogger): string {
  const lines: string[] = [];

  lines.push(`# Outreach Summary: ${leadLabel(state)}`);
  lines.push('');
  lines.push(`**Lead ID:** \`${state.lead_id}\``);
  lines.push(`**Input Mode:** ${state.input_mode}`);
  const enrichmentLabel = state.enrichment ? (state.enrichment_sufficient ? 'sufficient' : 'partial') : 'none';
  lines.push(`**Enrichment:** ${enrichmentLabel}`);
  lines.push('');

  lines.push('## Research');
  lines.push('');
  if (state.research) {
    lines.push(`- Recent events: ${state.research.recent_events.length}`);
    lines.push(`- Pain signals: ${state.research.pain_signals.length}`);
    lines.push('');
    if (state.research.sources.length > 0) {
      lines.push('### Sources');
      lines.push('');
      for (const source of state.research.sources) {
        lines.push(`- [${source.title || source.url}](${source.url}) (${source.category})`);
      }
      lines.push('');
    }
  } else {
    lines.push('_No research performed._');
    lines.push('');
  }

  lines.push('## Hooks');
  lines.push('');
  pushHooks(lines, state);

  for (const kind of ['EMAIL', 'SOCIAL_MESSAGE', 'CALL_SCRIPT'] as const) {
    lines.push(`## ${ARTIFACT_TITLES[kind]}`);
    lines.push('');
    const verdict = state.guardrail[kind];
    if (verdict && !verdict.safe) {
      lines.push(`**Guardrail:** blocked (${verdict.violations.join(', ') || 'override'})`);
      lines.push('');
    } else if (verdict?.error) {
      lines.push(`**Guardrail:** unchecked (${verdict.error})`);
      lines.push('');
    }
    lines.push(state.drafts[kind] ?? '_Not generated._');
    lines.push('');
  }

  lines.push('## Status Log');
  lines.push('');
  for (const status of state.status_log) {
    lines.push(`- ${status}`);
  }
  lines.push('');

  if (state.error) {
    lines.push('## Last Error');
    lines.push('');
    lines.push(state.error);
    lines.push('');
  }

  const markdown = lines.join('\n');
  logger.debug('Rendered outreach summary', { leadId: state.lead_id, outputSize: markdown.length });
  return markdown;
}
