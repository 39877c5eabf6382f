/**
 * Unit tests for workflow state construction and channel reducers
 */

import { describe, it, expect } from '@jest/globals';
import { END, START, StateGraph } from '@langchain/langgraph';
import {
  OutreachStateAnnotation,
  appendStatus,
  assertIdentityExclusive,
  createInitialState,
  mergeSlots,
} from '../../../src/workflow/state.js';
import { InvalidInputFormatError } from '../../../src/errors/index.js';
import { normalize } from '../../../src/normalizer/index.js';
import { createState } from '../../helpers/fakes.js';

describe('createInitialState', () => {
  it('copies the identity and starts every slot empty', () => {
    const state = createInitialState(normalize('Jane Doe - Acme'), 'lead_1');

    expect(state).toEqual({
      lead_id: 'lead_1',
      input_mode: 'BY_NAME_ORG',
      contact_address: null,
      person_name: 'Jane Doe',
      organization: 'Acme',
      input_safety: null,
      enrichment: null,
      enrichment_sufficient: false,
      research: null,
      hooks: { RECENT_EVENT: null, PAIN_POINT: null, GROWTH_SIGNAL: null },
      drafts: { EMAIL: null, SOCIAL_MESSAGE: null, CALL_SCRIPT: null },
      guardrail: { EMAIL: null, SOCIAL_MESSAGE: null, CALL_SCRIPT: null },
      deliveries: { EMAIL: null, SOCIAL_MESSAGE: null, CALL_SCRIPT: null },
      status_log: [],
      error: null,
    });
  });

  it('rejects an empty lead id', () => {
    expect(() => createInitialState(normalize('jane@acme.com'), '')).toThrow(InvalidInputFormatError);
  });
});

describe('assertIdentityExclusive', () => {
  it('accepts a normalized state', () => {
    expect(() => assertIdentityExclusive(createState())).not.toThrow();
  });

  it('rejects a state carrying both shapes', () => {
    const state = { ...createState(), person_name: 'Jane Doe' };

    expect(() => assertIdentityExclusive(state)).toThrow(
      'person_name and organization must be empty when input_mode is BY_CONTACT'
    );
  });
});

// =============================================================================
// Reducers
// =============================================================================

describe('appendStatus', () => {
  it('appends entries in update order', () => {
    expect(appendStatus(['normalized'], ['social_message_drafted', 'call_script_drafted'])).toEqual([
      'normalized',
      'social_message_drafted',
      'call_script_drafted',
    ]);
  });
});

describe('mergeSlots', () => {
  it('overlays only the slots an update sets', () => {
    const current = { EMAIL: 'Hello', SOCIAL_MESSAGE: null, CALL_SCRIPT: null };

    expect(mergeSlots(current, { CALL_SCRIPT: 'Opening' })).toEqual({
      EMAIL: 'Hello',
      SOCIAL_MESSAGE: null,
      CALL_SCRIPT: 'Opening',
    });
  });

  it('writes an explicit null', () => {
    expect(mergeSlots({ EMAIL: 'Hello', SOCIAL_MESSAGE: null, CALL_SCRIPT: null }, { EMAIL: null }).EMAIL).toBeNull();
  });

  it('does not mutate the current value', () => {
    const current = { EMAIL: null, SOCIAL_MESSAGE: null, CALL_SCRIPT: null };

    mergeSlots(current, { EMAIL: 'Hello' });

    expect(current.EMAIL).toBeNull();
  });
});

// =============================================================================
// Concurrent writes through the state graph
// =============================================================================

describe('OutreachStateAnnotation', () => {
  const research = { recent_events: [], pain_signals: [], sources: [], summary: '' };

  it('merges different artifact slots written in one step', async () => {
    const graph = new StateGraph(OutreachStateAnnotation)
      .addNode('social', () => ({
        drafts: { SOCIAL_MESSAGE: 'Hi' },
        guardrail: { SOCIAL_MESSAGE: { safe: true, violations: [], error: null } },
        status_log: ['social_message_drafted'],
      }))
      .addNode('call', () => ({ drafts: { CALL_SCRIPT: 'Opening' }, status_log: ['call_script_drafted'] }))
      .addEdge(START, 'social')
      .addEdge(START, 'call')
      .addEdge('social', END)
      .addEdge('call', END)
      .compile();

    const state = await graph.invoke(createState('jane@acme.com', { status_log: ['normalized'] }));

    expect(state.drafts).toEqual({ EMAIL: null, SOCIAL_MESSAGE: 'Hi', CALL_SCRIPT: 'Opening' });
    expect(state.guardrail.SOCIAL_MESSAGE).toEqual({ safe: true, violations: [], error: null });
    expect(state.status_log[0]).toBe('normalized');
    expect([...state.status_log].sort()).toEqual(['call_script_drafted', 'normalized', 'social_message_drafted']);
  });

  it('rejects two writes to a single-owner field in one step', async () => {
    const graph = new StateGraph(OutreachStateAnnotation)
      .addNode('first', () => ({ research }))
      .addNode('second', () => ({ research: null }))
      .addEdge(START, 'first')
      .addEdge(START, 'second')
      .addEdge('first', END)
      .addEdge('second', END)
      .compile();

    await expect(graph.invoke(createState())).rejects.toThrow(/one value per step/);
  });

  it('keeps an earlier error when no update sets one', async () => {
    const graph = new StateGraph(OutreachStateAnnotation)
      .addNode('draft', () => ({ status_log: ['email_drafted'] }))
      .addEdge(START, 'draft')
      .addEdge('draft', END)
      .compile();

    const state = await graph.invoke(createState('jane@acme.com', { error: 'enrichment failed' }));

    expect(state.error).toBe('enrichment failed');
    expect(state.status_log).toEqual(['email_drafted']);
  });

  it('replaces the error with the latest one', async () => {
    const graph = new StateGraph(OutreachStateAnnotation)
      .addNode('draft', () => ({ error: 'generation failed' }))
      .addEdge(START, 'draft')
      .addEdge('draft', END)
      .compile();

    const state = await graph.invoke(createState('jane@acme.com', { error: 'enrichment failed' }));

    expect(state.error).toBe('generation failed');
  });
});
