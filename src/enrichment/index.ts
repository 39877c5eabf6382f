/**
 * Enrichment Module
 *
 * Looks up existing profile context for a lead and decides whether it is
 * sufficient on its own.
 *
 * Key behaviors:
 * - Lookup is keyed by contact address only; BY_NAME_ORG leads skip it
 * - Enrichment is OPTIONAL and NON-BLOCKING: store failures become state
 * - Store responses are normalized once, right after the call
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { toErrorMessage } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import type {
  EnrichmentRecord,
  Logger,
  Metrics,
  Observability,
  ProfileMatch,
  ProfileStore,
  WorkflowState,
} from '../types/index.js';

// =============================================================================
// Types and Constants
// =============================================================================

export type EnrichmentStatus =
  | 'enrichment_retrieved'
  | 'enrichment_not_found'
  | 'enrichment_skipped'
  | 'enrichment_error';

export interface EnrichmentLookup {
  enrichment: EnrichmentRecord | null;
  sufficient: boolean;
  status: EnrichmentStatus;
  error: string | null;
}

/**
 * Metadata fields that must all be non-empty for enrichment to be sufficient
 */
export const REQUIRED_METADATA_FIELDS = ['organization', 'sector', 'role_title'] as const;

/**
 * Content must be strictly longer than this many characters
 */
export const MIN_CONTENT_LENGTH = 100;

/**
 * Lead profile row as held by a profile store
 */
export interface LeadProfile {
  lead_id: string;
  email: string;
  organization: string;
  sector: string;
  role_title: string;
  revenue?: string;
  location?: string;
  notes?: string;
}

const defaultLogger: Logger = createLogger('enrichment');

// =============================================================================
// Response normalization
// =============================================================================

const MetadataValueSchema = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .transform((value) => (value === null ? '' : String(value)));

/**
 * Single normalization step for profile store responses
 */
export const ProfileMatchSchema = z.object({
  content: z.string().default(''),
  metadata: z.record(MetadataValueSchema).default({}),
});

const ProfileMatchListSchema = z.array(ProfileMatchSchema);

export function normalizeProfileMatches(raw: unknown): ProfileMatch[] {
  const parsed = ProfileMatchListSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Malformed profile store response: ${issues.join('; ')}`);
  }
  return parsed.data;
}

// =============================================================================
// Core Functions
// =============================================================================

/**
 * Hard-coded quality bar: all required metadata present and substantial content
 */
export function isEnrichmentSufficient(record: EnrichmentRecord | null): boolean {
  if (!record) {
    return false;
  }
  const hasRequired = REQUIRED_METADATA_FIELDS.every((field) => {
    const value = record.metadata[field];
    return typeof value === 'string' && value.trim().length > 0;
  });
  return hasRequired && record.content.length > MIN_CONTENT_LENGTH;
}

/**
 * Look up enrichment for a lead
 *
 * Never throws: store failures are reported through `status` and `error`.
 */
export async function lookupEnrichment(
  state: Pick<WorkflowState, 'lead_id' | 'input_mode' | 'contact_address'>,
  store: ProfileStore,
  observability: Observability = {}
): Promise<EnrichmentLookup> {
  const logger = observability.logger ?? defaultLogger;
  const metrics = observability.metrics ?? noopMetrics;
  const leadId = state.lead_id;
  const startTime = Date.now();

  if (state.input_mode === 'BY_NAME_ORG' || !state.contact_address) {
    logger.info('Lead identified by name and organization, skipping enrichment lookup', { leadId });
    metrics.increment('enrichment.skipped');
    return { enrichment: null, sufficient: false, status: 'enrichment_skipped', error: null };
  }

  const address = state.contact_address;

  try {
    const raw = await store.search(address, 1, { email: address });
    const matches = normalizeProfileMatches(raw);
    metrics.timing('enrichment.lookup_ms', Date.now() - startTime);

    const top = matches[0];
    if (!top) {
      logger.info('No enrichment found for lead', { leadId });
      metrics.increment('enrichment.not_found');
      return { enrichment: null, sufficient: false, status: 'enrichment_not_found', error: null };
    }

    const enrichment: EnrichmentRecord = { content: top.content, metadata: top.metadata };
    const sufficient = isEnrichmentSufficient(enrichment);

    logger.info('Enrichment retrieved', { leadId, sufficient, contentLength: top.content.length });
    metrics.increment('enrichment.retrieved', { sufficient: String(sufficient) });
    return { enrichment, sufficient, status: 'enrichment_retrieved', error: null };
  } catch (error) {
    const message = toErrorMessage(error);
    logger.error('Profile store lookup failed', { leadId, error: message });
    metrics.increment('enrichment.error');
    return { enrichment: null, sufficient: false, status: 'enrichment_error', error: message };
  }
}

// =============================================================================
// In-memory profile store
// =============================================================================

/**
 * Render a profile row into the searchable text block stored as content
 */
export function profileToContent(profile: LeadProfile): string {
  const lines = [
    `Company: ${profile.organization || 'N/A'}`,
    `Industry: ${profile.sector || 'N/A'}`,
    `Revenue: ${profile.revenue || 'N/A'}`,
    `Title: ${profile.role_title || 'N/A'}`,
    `Location: ${profile.location || 'N/A'}`,
  ];
  if (profile.notes) {
    lines.push(profile.notes);
  }
  return lines.join('\n');
}

export function profileToMatch(profile: LeadProfile): ProfileMatch {
  return {
    content: profileToContent(profile),
    metadata: {
      lead_id: profile.lead_id,
      email: profile.email,
      organization: profile.organization,
      sector: profile.sector,
      role_title: profile.role_title,
      revenue: profile.revenue ?? '',
      location: profile.location ?? '',
    },
  };
}

function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((token) => token.length > 1)
  );
}

/**
 * Profile store backed by an in-process list.
 *
 * Exact metadata filter first; when the filter matches nothing, falls back
 * to ranking every profile by token overlap with the query.
 */
export class MemoryProfileStore implements ProfileStore {
  private readonly matches: ProfileMatch[];

  constructor(profiles: LeadProfile[] = []) {
    this.matches = profiles.map(profileToMatch);
  }

  get size(): number {
    return this.matches.length;
  }

  add(profile: LeadProfile): void {
    this.matches.push(profileToMatch(profile));
  }

  async search(query: string, k: number, filter?: Record<string, string>): Promise<ProfileMatch[]> {
    if (filter && Object.keys(filter).length > 0) {
      const filtered = this.matches.filter((match) =>
        Object.entries(filter).every(
          ([key, value]) => (match.metadata[key] ?? '').toLowerCase() === value.toLowerCase()
        )
      );
      if (filtered.length > 0) {
        return filtered.slice(0, k);
      }
    }

    const queryTokens = tokenize(query);
    return this.matches
      .map((match) => {
        const tokens = tokenize(`${match.content} ${Object.values(match.metadata).join(' ')}`);
        let overlap = 0;
        for (const token of queryTokens) {
          if (tokens.has(token)) {
            overlap++;
          }
        }
        return { match, overlap };
      })
      .filter((entry) => entry.overlap > 0)
      .sort((a, b) => b.overlap - a.overlap)
      .slice(0, k)
      .map((entry) => entry.match);
  }
}

// =============================================================================
// Loaders
// =============================================================================

const LeadProfileSchema = z.object({
  lead_id: z.string().min(1),
  email: z.string(),
  organization: z.string().default(''),
  sector: z.string().default(''),
  role_title: z.string().default(''),
  revenue: z.string().optional(),
  location: z.string().optional(),
  notes: z.string().optional(),
});

/**
 * Parse a list of lead profiles, rejecting malformed rows
 */
export function parseLeadProfiles(raw: unknown): LeadProfile[] {
  const parsed = z.array(LeadProfileSchema).safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid lead profile data: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Load lead profiles from a JSON file (array of LeadProfile objects)
 */
export async function loadProfilesFromJson(filePath: string): Promise<LeadProfile[]> {
  const content = await readFile(filePath, 'utf-8');
  return parseLeadProfiles(JSON.parse(content));
}

/**
 * Map one row of an Apollo-style CRM export to a LeadProfile
 */
export function mapApolloRow(row: Record<string, string | undefined>): LeadProfile {
  const email = row['Email'] ?? '';
  const location = [row['City'], row['State']].filter((part) => part && part.trim()).join(', ');
  const notes: string[] = [];
  if (row['Company Size']) {
    notes.push(`Company Size: ${row['Company Size']}.`);
  }
  if (row['Technologies']) {
    notes.push(`Technologies: ${row['Technologies']}.`);
  }

  return {
    lead_id: row['Contact ID'] || email,
    email,
    organization: row['Company'] ?? '',
    sector: row['Industry'] ?? '',
    role_title: row['Title'] ?? '',
    revenue: row['Revenue Range'] ?? '',
    location,
    notes: notes.join(' '),
  };
}
