/**
 * In-process collaborators shared by the unit and integration tests
 */

import { jest } from '@jest/globals';
import type {
  GuardrailBackend,
  GuardrailEvaluation,
  GuardrailRuleset,
  JsonPoster,
  Logger,
  Metrics,
  SearchResult,
  TextGenerator,
  WebSearchProvider,
  WorkflowState,
} from '../../src/types/index.js';
import type { LeadProfile } from '../../src/enrichment/index.js';
import { normalize } from '../../src/normalizer/index.js';
import { createInitialState } from '../../src/workflow/state.js';

// =============================================================================
// Observability
// =============================================================================

export const createMockLogger = () => ({
  info: jest.fn<Logger['info']>(),
  warn: jest.fn<Logger['warn']>(),
  error: jest.fn<Logger['error']>(),
  debug: jest.fn<Logger['debug']>(),
});

export const createMockMetrics = () => ({
  increment: jest.fn<Metrics['increment']>(),
  gauge: jest.fn<Metrics['gauge']>(),
  timing: jest.fn<Metrics['timing']>(),
});

// =============================================================================
// Profiles
// =============================================================================

export const createProfile = (overrides?: Partial<LeadProfile>): LeadProfile => ({
  lead_id: 'crm_001',
  email: 'jane.doe@acme.com',
  organization: 'Acme',
  sector: 'Retail Software',
  role_title: 'VP Operations',
  revenue: '$10M-$50M',
  location: 'Austin, TX',
  notes: 'Acme sells inventory planning tools to regional grocery chains.',
  ...overrides,
});

// =============================================================================
// Search
// =============================================================================

export interface SearchCall {
  query: string;
  maxResults: number;
  recencyDays?: number;
}

/**
 * Search provider answering by query prefix; a queued Error is thrown
 */
export class FakeSearchProvider implements WebSearchProvider {
  readonly name = 'fake';
  readonly calls: SearchCall[] = [];

  constructor(private readonly answer: (query: string) => SearchResult[] | Error = () => []) {}

  async search(query: string, maxResults: number, recencyDays?: number): Promise<SearchResult[]> {
    this.calls.push({ query, maxResults, recencyDays });
    const result = this.answer(query);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export const isEventsQuery = (query: string): boolean => query.includes('funding OR launch');

// =============================================================================
// Text generation
// =============================================================================

export interface GenerateCall {
  system: string;
  user: string;
}

/**
 * Generator that picks its reply from the system prompt's artifact wording
 */
export class FakeTextGenerator implements TextGenerator {
  readonly calls: GenerateCall[] = [];

  constructor(
    private readonly replies: {
      email?: string | Error;
      social?: string | Error;
      call?: string | Error;
    } = {}
  ) {}

  async generate(system: string, user: string): Promise<string> {
    this.calls.push({ system, user });
    const reply = system.includes('outreach emails')
      ? this.replies.email
      : system.includes('connection messages')
        ? this.replies.social
        : this.replies.call;
    if (reply instanceof Error) {
      throw reply;
    }
    return reply ?? 'Generated text';
  }
}

// =============================================================================
// Guardrail
// =============================================================================

export interface EvaluateCall {
  input: string;
  output: string;
  rulesets: GuardrailRuleset[];
  options: { stage_id: string; timeout_ms: number; signal?: AbortSignal };
}

/**
 * Guardrail backend driven by a callback on the evaluated output
 */
export class FakeGuardrailBackend implements GuardrailBackend {
  readonly calls: EvaluateCall[] = [];
  initialized = false;

  constructor(
    private readonly decide: (output: string, rulesets: GuardrailRuleset[]) => Promise<GuardrailEvaluation> | GuardrailEvaluation = (
      output
    ) => ({ overridden: false, output, triggered_rules: [] })
  ) {}

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async evaluate(
    input: string,
    output: string,
    rulesets: GuardrailRuleset[],
    options: { stage_id: string; timeout_ms: number; signal?: AbortSignal }
  ): Promise<GuardrailEvaluation> {
    this.calls.push({ input, output, rulesets, options });
    return this.decide(output, rulesets);
  }
}

// =============================================================================
// HTTP
// =============================================================================

export interface PostCall {
  url: string;
  body: unknown;
  config?: { signal?: AbortSignal; timeout?: number };
}

export class FakeJsonPoster implements JsonPoster {
  readonly calls: PostCall[] = [];

  constructor(private readonly respond: (url: string, body: unknown) => unknown) {}

  async post(url: string, body: unknown, config?: { signal?: AbortSignal; timeout?: number }): Promise<{ data: unknown }> {
    this.calls.push({ url, body, config });
    const data = this.respond(url, body);
    if (data instanceof Error) {
      throw data;
    }
    return { data };
  }
}

// =============================================================================
// State
// =============================================================================

/**
 * Initial workflow state for a raw lead, with fields overridden
 */
export const createState = (raw = 'jane.doe@acme.com', overrides?: Partial<WorkflowState>): WorkflowState => ({
  ...createInitialState(normalize(raw), 'lead_test'),
  ...overrides,
});
