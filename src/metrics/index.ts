/**
 * Metrics Module
 *
 * Offline quality scores for a finished workflow state. Every score is in
 * [0, 1] and rounded to two decimals. Guardrail notices are not drafts and
 * score 0.
 */

import { presentHooks } from '../hooks/index.js';
import type { ArtifactKind, EnrichmentRecord, HookSet, ResearchRecord, WorkflowState } from '../types/index.js';

export const BLOCKED_NOTICE_PREFIX = '[BLOCKED BY GUARDRAIL';

/**
 * Character ranges considered a good fit for each artifact
 */
export const EXPECTED_LENGTH: Record<ArtifactKind, [number, number]> = {
  EMAIL: [400, 1000],
  SOCIAL_MESSAGE: [50, 300],
  CALL_SCRIPT: [300, 3000],
};

const CTA_KEYWORDS = ['call', 'meeting', 'chat', 'connect', 'discuss', 'schedule', 'book'];
const PROFESSIONAL_INDICATORS = ['thank', 'appreciate', 'would love', 'happy to', 'let me know'];

export interface ArtifactScores {
  quality: number;
  personalization: number;
}

export interface WorkflowMetrics {
  artifacts: Partial<Record<ArtifactKind, ArtifactScores>>;
  research_depth: number;
  /** Share of the three artifacts that were generated and accepted */
  completion_rate: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function words(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter(Boolean));
}

export function isBlockedNotice(text: string | null): boolean {
  return text !== null && text.startsWith(BLOCKED_NOTICE_PREFIX);
}

/**
 * How much of the lead's known context a draft references
 *
 * organization 0.3, sector or role 0.2, detail overlap up to 0.3, length 0.2
 */
export function personalizationScore(
  draft: string | null,
  enrichment: EnrichmentRecord | null,
  hooks: HookSet | null = null
): number {
  const hookTexts = hooks ? presentHooks(hooks).map((h) => h.text) : [];
  if (!draft || isBlockedNotice(draft) || (!enrichment && hookTexts.length === 0)) {
    return 0;
  }

  const draftLower = draft.toLowerCase();
  let score = 0;

  const organization = enrichment?.metadata['organization'] ?? '';
  if (organization && draftLower.includes(organization.toLowerCase())) {
    score += 0.3;
  }

  const sector = enrichment?.metadata['sector'] ?? '';
  const roleTitle = enrichment?.metadata['role_title'] ?? '';
  if (
    (sector && draftLower.includes(sector.toLowerCase())) ||
    (roleTitle && draftLower.includes(roleTitle.toLowerCase()))
  ) {
    score += 0.2;
  }

  const detailText = [enrichment?.content ?? '', ...hookTexts].join(' ');
  if (detailText.trim()) {
    const draftWords = words(draft);
    let overlap = 0;
    for (const word of words(detailText)) {
      if (draftWords.has(word)) {
        overlap++;
      }
    }
    score += Math.min(overlap / 20, 0.3);
  }

  if (draft.length > 100) {
    score += 0.2;
  }

  return round2(Math.min(score, 1));
}

/**
 * Summary present 0.5, sources up to 0.5
 */
export function researchDepthScore(research: ResearchRecord | null): number {
  if (!research) {
    return 0;
  }
  let score = 0;
  if (research.summary) {
    score += 0.5;
  }
  score += Math.min(research.sources.length / 3, 0.5);
  return round2(score);
}

/**
 * Length fit 0.4, call to action 0.3, professional phrasing up to 0.3
 */
export function draftQualityScore(draft: string | null, kind: ArtifactKind): number {
  if (!draft || isBlockedNotice(draft)) {
    return 0;
  }

  const [minLength, maxLength] = EXPECTED_LENGTH[kind];
  const length = draft.length;
  const lower = draft.toLowerCase();
  let score = 0;

  if (length >= minLength && length <= maxLength) {
    score += 0.4;
  } else if (length < minLength) {
    score += 0.2 * (length / minLength);
  } else {
    score += 0.2 * (maxLength / length);
  }

  if (CTA_KEYWORDS.some((keyword) => lower.includes(keyword))) {
    score += 0.3;
  }

  const matches = PROFESSIONAL_INDICATORS.filter((indicator) => lower.includes(indicator)).length;
  score += Math.min(matches / PROFESSIONAL_INDICATORS.length, 0.3);

  return round2(Math.min(score, 1));
}

export function evaluateWorkflowOutput(
  state: Pick<WorkflowState, 'drafts' | 'enrichment' | 'research' | 'hooks'>
): WorkflowMetrics {
  const artifacts: Partial<Record<ArtifactKind, ArtifactScores>> = {};
  let accepted = 0;

  for (const kind of ['EMAIL', 'SOCIAL_MESSAGE', 'CALL_SCRIPT'] as const) {
    const draft = state.drafts[kind];
    if (!draft) {
      continue;
    }
    artifacts[kind] = {
      quality: draftQualityScore(draft, kind),
      personalization: personalizationScore(draft, state.enrichment, state.hooks),
    };
    if (!isBlockedNotice(draft)) {
      accepted++;
    }
  }

  return {
    artifacts,
    research_depth: researchDepthScore(state.research),
    completion_rate: round2(accepted / 3),
  };
}
