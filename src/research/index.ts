/**
 * Research Module
 *
 * Runs two targeted web searches for a lead's organization and buckets the
 * results into recent events and pain signals.
 *
 * Failure isolation:
 * - The two queries are independent; one failing never stops the other
 * - A failed query yields an empty bucket and a recorded error
 * - The stage itself never throws
 */

import axios from 'axios';
import { z } from 'zod';
import { CollaboratorUnavailableError, toErrorMessage } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import { organizationFromAddress } from '../normalizer/index.js';
import type {
  JsonPoster,
  Logger,
  Metrics,
  Observability,
  ResearchCategory,
  ResearchRecord,
  SearchResult,
  SourceRef,
  WebSearchProvider,
  WorkflowState,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const RESULTS_PER_QUERY = 2;
export const RECENT_EVENTS_WINDOW_DAYS = 90;
export const MAX_SUMMARY_LENGTH = 800;

const EVENT_KEYWORDS = ['funding', 'launch', 'hiring', 'acquisition'];
const CHALLENGE_KEYWORDS = ['challenges', 'problems'];

const defaultLogger: Logger = createLogger('research');

// ============================================================================
// Types
// ============================================================================

export interface ResearchQuery {
  category: ResearchCategory;
  query: string;
  maxResults: number;
  recencyDays?: number;
}

export interface ResearchOutcome {
  research: ResearchRecord;
  errors: string[];
}

// ============================================================================
// Query construction
// ============================================================================

/**
 * Organization to research: explicit name, enrichment metadata, then the
 * contact address domain
 */
export function resolveOrganization(
  state: Pick<WorkflowState, 'organization' | 'enrichment' | 'contact_address'>
): string {
  if (state.organization) {
    return state.organization;
  }
  const fromEnrichment = state.enrichment?.metadata['organization'];
  if (fromEnrichment && fromEnrichment.trim()) {
    return fromEnrichment.trim();
  }
  if (state.contact_address) {
    return organizationFromAddress(state.contact_address) ?? state.contact_address;
  }
  return '';
}

export function resolveSector(state: Pick<WorkflowState, 'enrichment'>): string {
  return state.enrichment?.metadata['sector']?.trim() ?? '';
}

export function buildResearchQueries(organization: string, sector: string): [ResearchQuery, ResearchQuery] {
  const eventsQuery: ResearchQuery = {
    category: 'recent_events',
    query: `${organization} ${EVENT_KEYWORDS.join(' OR ')}`,
    maxResults: RESULTS_PER_QUERY,
    recencyDays: RECENT_EVENTS_WINDOW_DAYS,
  };

  const painSubject = sector ? `${organization} ${sector}` : organization;
  const painQuery: ResearchQuery = {
    category: 'pain_signals',
    query: `${painSubject} ${CHALLENGE_KEYWORDS.join(' OR ')}`,
    maxResults: RESULTS_PER_QUERY,
  };

  return [eventsQuery, painQuery];
}

export function buildSummary(recentEvents: string[], painSignals: string[]): string {
  return [...recentEvents, ...painSignals]
    .filter((text) => text.length > 0)
    .join(' ')
    .slice(0, MAX_SUMMARY_LENGTH);
}

export function emptyResearch(): ResearchRecord {
  return { recent_events: [], pain_signals: [], sources: [], summary: '' };
}

// ============================================================================
// Research stage
// ============================================================================

/**
 * Run both research queries and assemble the research record
 */
export async function runResearch(
  state: Pick<WorkflowState, 'lead_id' | 'organization' | 'enrichment' | 'contact_address'>,
  provider: WebSearchProvider,
  observability: Observability = {}
): Promise<ResearchOutcome> {
  const logger = observability.logger ?? defaultLogger;
  const metrics = observability.metrics ?? noopMetrics;
  const leadId = state.lead_id;
  const startTime = Date.now();

  const organization = resolveOrganization(state);
  const sector = resolveSector(state);
  const queries = buildResearchQueries(organization, sector);

  logger.info('Starting research', { leadId, organization, sector, provider: provider.name });

  const settled = await Promise.allSettled(
    queries.map(async (q) => provider.search(q.query, q.maxResults, q.recencyDays))
  );

  const research = emptyResearch();
  const errors: string[] = [];

  settled.forEach((outcome, index) => {
    const query = queries[index];
    if (!query) {
      return;
    }
    if (outcome.status === 'rejected') {
      const message = `${query.category} query failed: ${toErrorMessage(outcome.reason)}`;
      logger.warn('Research query failed', { leadId, category: query.category, error: message });
      metrics.increment('research.query_error', { category: query.category });
      errors.push(message);
      return;
    }

    const results = outcome.value.slice(0, query.maxResults);
    const bucket = query.category === 'recent_events' ? research.recent_events : research.pain_signals;
    for (const result of results) {
      bucket.push(result.content);
      const source: SourceRef = { title: result.title, url: result.url, category: query.category };
      research.sources.push(source);
    }
    metrics.gauge('research.results', results.length, { category: query.category });
  });

  research.summary = buildSummary(research.recent_events, research.pain_signals);

  logger.info('Research completed', {
    leadId,
    recentEvents: research.recent_events.length,
    painSignals: research.pain_signals.length,
    failedQueries: errors.length,
  });
  metrics.timing('research.duration_ms', Date.now() - startTime);

  return { research, errors };
}

// ============================================================================
// Search providers
// ============================================================================

/**
 * Provider used when no search API is configured; always returns nothing
 */
export class NullSearchProvider implements WebSearchProvider {
  readonly name = 'null';

  async search(_query: string, _maxResults: number, _recencyDays?: number): Promise<SearchResult[]> {
    return [];
  }
}

export interface TavilyConfig {
  apiKey: string;
  apiUrl?: string;
  timeout?: number;
  searchDepth?: 'basic' | 'advanced';
}

const TavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        content: z.string().nullish(),
      })
    )
    .default([]),
});

/**
 * Normalize a Tavily search response into SearchResult rows
 */
export function normalizeTavilyResponse(raw: unknown): SearchResult[] {
  const parsed = TavilyResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed search response: ${parsed.error.errors.map((e) => e.message).join('; ')}`);
  }
  return parsed.data.results.map((r) => ({
    title: r.title ?? '',
    url: r.url ?? '',
    content: r.content ?? '',
  }));
}

/**
 * Tavily search API client
 */
export class TavilySearchProvider implements WebSearchProvider {
  readonly name = 'tavily';
  private readonly client: JsonPoster;
  private readonly searchDepth: 'basic' | 'advanced';

  constructor(config: TavilyConfig, client?: JsonPoster) {
    if (!config.apiKey) {
      throw new CollaboratorUnavailableError('search_provider', 'Tavily API key is required');
    }
    this.searchDepth = config.searchDepth ?? 'basic';
    this.client =
      client ??
      axios.create({
        baseURL: config.apiUrl ?? 'https://api.tavily.com',
        timeout: config.timeout ?? 15000,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
      });
  }

  async search(query: string, maxResults: number, recencyDays?: number): Promise<SearchResult[]> {
    const payload: Record<string, unknown> = {
      query,
      max_results: maxResults,
      search_depth: this.searchDepth,
      topic: recencyDays !== undefined ? 'news' : 'general',
    };
    if (recencyDays !== undefined) {
      payload['days'] = recencyDays;
    }

    const response = await this.client.post('/search', payload);
    return normalizeTavilyResponse(response.data);
  }
}
