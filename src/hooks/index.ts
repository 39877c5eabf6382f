/**
 * Hook Extraction Module
 *
 * Derives short, evidence-backed personalization hooks from categorized
 * research. Pure and deterministic: no network, no clock.
 *
 * Priority rules:
 * - RECENT_EVENT / PAIN_POINT: first entry, then first keyword, then first
 *   sentence. Entry order beats keyword-list order.
 * - GROWTH_SIGNAL: first keyword found anywhere in the summary, rendered as
 *   "Currently <keyword>".
 * - Fallback: when nothing matched, a technology sentence from the first
 *   three summary sentences seeds PAIN_POINT.
 *
 * Keyword lists are English-only and loaded from keywords.json.
 */

import { z } from 'zod';
import keywordData from './keywords.json';
import type { HookKind, HookSet, ResearchRecord } from '../types/index.js';

/**
 * Maximum length of an extracted hook
 */
export const MAX_HOOK_LENGTH = 150;

/**
 * Length of the sentence prefix used by the technology fallback
 */
export const FALLBACK_PREFIX_LENGTH = 100;

const FALLBACK_SENTENCE_COUNT = 3;

const HookKeywordsSchema = z.object({
  recent_event: z.array(z.string().min(1)).min(1),
  pain_point: z.array(z.string().min(1)).min(1),
  growth_signal: z.array(z.string().min(1)).min(1),
  technology: z.array(z.string().min(1)).min(1),
});

export type HookKeywords = z.infer<typeof HookKeywordsSchema>;

export const DEFAULT_HOOK_KEYWORDS: HookKeywords = HookKeywordsSchema.parse(keywordData);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive substring test. `wholeWord` anchors both ends at word
 * boundaries; the technology list needs it for short acronyms such as "ai".
 */
export function containsKeyword(text: string, keyword: string, wholeWord = false): boolean {
  if (!wholeWord) {
    return text.toLowerCase().includes(keyword.toLowerCase());
  }
  return new RegExp(`\\b${escapeRegExp(keyword)}\\b`, 'i').test(text);
}

export function splitSentences(text: string): string[] {
  return text.split('.');
}

function capHook(text: string): string {
  return text.trim().slice(0, MAX_HOOK_LENGTH);
}

/**
 * Scan entries in order; return the first sentence containing the first
 * matching keyword of the first entry that matches any keyword.
 */
export function findSentenceHook(entries: readonly string[], keywords: readonly string[]): string | null {
  for (const entry of entries) {
    for (const keyword of keywords) {
      if (!containsKeyword(entry, keyword)) {
        continue;
      }
      const sentence = splitSentences(entry).find((s) => containsKeyword(s, keyword));
      if (sentence !== undefined && sentence.trim().length > 0) {
        return capHook(sentence);
      }
    }
  }
  return null;
}

export function findGrowthSignal(summary: string, keywords: readonly string[]): string | null {
  const keyword = keywords.find((k) => containsKeyword(summary, k));
  return keyword ? `Currently ${keyword}` : null;
}

export function findTechnologyFocus(summary: string, keywords: readonly string[]): string | null {
  const sentences = splitSentences(summary)
    .map((s) => s.trim())
    .filter((s) => s.length > 0)
    .slice(0, FALLBACK_SENTENCE_COUNT);

  for (const sentence of sentences) {
    if (keywords.some((k) => containsKeyword(sentence, k, true))) {
      return `Focus on ${sentence.slice(0, FALLBACK_PREFIX_LENGTH)}...`;
    }
  }
  return null;
}

export function emptyHooks(): HookSet {
  return { RECENT_EVENT: null, PAIN_POINT: null, GROWTH_SIGNAL: null };
}

/**
 * Extract personalization hooks from a research record
 */
export function extractHooks(
  research: ResearchRecord | null,
  keywords: HookKeywords = DEFAULT_HOOK_KEYWORDS
): HookSet {
  const hooks = emptyHooks();
  if (!research) {
    return hooks;
  }

  hooks.RECENT_EVENT = findSentenceHook(research.recent_events, keywords.recent_event);
  hooks.PAIN_POINT = findSentenceHook(research.pain_signals, keywords.pain_point);
  hooks.GROWTH_SIGNAL = findGrowthSignal(research.summary, keywords.growth_signal);

  const noneFound = hooks.RECENT_EVENT === null && hooks.PAIN_POINT === null && hooks.GROWTH_SIGNAL === null;
  if (noneFound && research.summary.trim().length > 0) {
    hooks.PAIN_POINT = findTechnologyFocus(research.summary, keywords.technology);
  }

  return hooks;
}

/**
 * Hooks that are present, in RECENT_EVENT, PAIN_POINT, GROWTH_SIGNAL order
 */
export function presentHooks(hooks: HookSet): Array<{ kind: HookKind; text: string }> {
  const ordered: HookKind[] = ['RECENT_EVENT', 'PAIN_POINT', 'GROWTH_SIGNAL'];
  const present: Array<{ kind: HookKind; text: string }> = [];
  for (const kind of ordered) {
    const text = hooks[kind];
    if (text) {
      present.push({ kind, text });
    }
  }
  return present;
}
