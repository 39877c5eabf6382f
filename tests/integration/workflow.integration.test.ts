/**
 * Integration Tests for the outreach workflow
 *
 * Runs the wired workflow against fixture profiles with filesystem storage,
 * then reads back what a run leaves behind.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { QueuedSocialMessageAdapter } from '../../src/adapters/index.js';
import { loadProfilesFromJson, MemoryProfileStore, type LeadProfile } from '../../src/enrichment/index.js';
import { GuardrailGate } from '../../src/guardrail/index.js';
import { evaluateWorkflowOutput } from '../../src/metrics/index.js';
import { normalize } from '../../src/normalizer/index.js';
import { renderOutreachSummary } from '../../src/renderers/index.js';
import { checkExistingRun, loadRunRecord } from '../../src/run-manager/index.js';
import { FileStorageAdapter } from '../../src/storage/index.js';
import { runOutreachWorkflow, researchWhenInsufficient, type OutreachDependencies } from '../../src/workflow/index.js';
import { silentLogger } from '../../src/logger/index.js';
import {
  FakeGuardrailBackend,
  FakeSearchProvider,
  FakeTextGenerator,
  createMockLogger,
  isEventsQuery,
} from '../helpers/fakes.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const EMAIL_BODY =
  'Hi Priya, congrats on the expansion news at Northwind. Teams in logistics software often tell us dispatch ' +
  'data is scattered. Would you be open to a short call next week to discuss? Thank you, and let me know.';

let profiles: LeadProfile[] = [];

beforeAll(async () => {
  profiles = await loadProfilesFromJson(join(__dirname, '..', 'fixtures', 'leads.json'));
});

describe('Outreach workflow integration', () => {
  let root: string;
  let storage: FileStorageAdapter;
  let socialQueue: QueuedSocialMessageAdapter;
  let search: FakeSearchProvider;

  const createDeps = async (): Promise<OutreachDependencies> => {
    const observability = { logger: createMockLogger() };
    const guardrail = new GuardrailGate(
      { project_id: 'proj-1', stage_id: 'stage-1', strict_mode: false },
      new FakeGuardrailBackend(),
      observability
    );
    await guardrail.initialize();
    return {
      profileStore: new MemoryProfileStore(profiles),
      searchProvider: search,
      generator: new FakeTextGenerator({ email: EMAIL_BODY, social: 'Hi Priya, would love to connect.' }),
      guardrail,
      socialQueue,
      storage,
      observability,
    };
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'outreach-integration-'));
    storage = new FileStorageAdapter(root);
    socialQueue = new QueuedSocialMessageAdapter(300, silentLogger);
    search = new FakeSearchProvider((query) =>
      isEventsQuery(query)
        ? [{ title: 'Expansion', url: 'https://news.example.com/nw', content: 'Northwind announced an expansion into Texas.' }]
        : []
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('runs a sufficient lead end to end and stores its artifacts', async () => {
    const deps = await createDeps();

    const state = await runOutreachWorkflow('priya.raman@northwind.io', deps, { saveRunRecord: true });

    expect(state.enrichment_sufficient).toBe(true);
    expect(state.hooks.RECENT_EVENT).toBe('Northwind announced an expansion into Texas');
    expect(state.deliveries.SOCIAL_MESSAGE?.status).toBe('success');
    expect(state.deliveries.CALL_SCRIPT?.reference).toBe(`outputs/call_script_${state.lead_id}.md`);
    expect(socialQueue.pending().map((m) => m.recipient)).toEqual(['priya.raman@northwind.io']);

    const record = await loadRunRecord(storage, state.lead_id);
    expect(record.success).toBe(true);
    expect(record.data?.status).toBe('completed');

    const existing = await checkExistingRun(storage, normalize('Priya.Raman@Northwind.io'));
    expect(existing.data).toEqual({ exists: true, leadId: state.lead_id });

    const stored = await storage.list('');
    expect(stored.map((m) => m.key)).toEqual([
      `outputs/call_script_${state.lead_id}.md`,
      `runs/${state.lead_id}/run_record.json`,
    ]);
  });

  it('skips research for a sufficient lead under the insufficient-only policy', async () => {
    const deps = await createDeps();

    const state = await runOutreachWorkflow('priya.raman@northwind.io', deps, {
      researchPolicy: researchWhenInsufficient,
    });

    expect(state.research).toBeNull();
    expect(search.calls).toEqual([]);
  });

  it('researches a lead whose profile is incomplete', async () => {
    const deps = await createDeps();

    const state = await runOutreachWorkflow('tom.baker@bluefin.dev', deps, {
      researchPolicy: researchWhenInsufficient,
    });

    expect(state.status_log[1]).toBe('enrichment_retrieved');
    expect(state.enrichment_sufficient).toBe(false);
    expect(search.calls.map((c) => c.query)).toEqual([
      'Bluefin funding OR launch OR hiring OR acquisition',
      'Bluefin challenges OR problems',
    ]);
  });

  it('reports not found for an unknown contact and drafts anyway', async () => {
    const deps = await createDeps();

    const state = await runOutreachWorkflow('someone@zzyzx.org', deps);

    expect(state.status_log[1]).toBe('enrichment_not_found');
    expect(search.calls[0]?.query).toBe('Zzyzx funding OR launch OR hiring OR acquisition');
    expect(state.drafts.EMAIL).toBe(EMAIL_BODY);
  });

  it('scores and summarizes a finished run', async () => {
    const deps = await createDeps();

    const state = await runOutreachWorkflow('priya.raman@northwind.io', deps);
    const metrics = evaluateWorkflowOutput(state);
    const summary = renderOutreachSummary(state, silentLogger).split('\n');

    expect(metrics.completion_rate).toBe(1);
    expect(metrics.research_depth).toBe(0.83);
    expect(metrics.artifacts.EMAIL?.personalization).toBeGreaterThan(0.5);
    expect(summary[0]).toBe('# Outreach Summary: priya.raman@northwind.io');
    expect(summary).toContain('**Enrichment:** sufficient');
    expect(summary).toContain('- **Recent event:** Northwind announced an expansion into Texas');
  });
});
