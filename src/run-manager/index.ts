/**
 * Run Manager Module
 *
 * Responsibilities:
 * - Generate deterministic lead IDs using SHA-256
 * - Persist and reload the run record of a finished workflow
 * - Report whether a lead has already been processed
 *
 * Lead ID algorithm:
 * 1. Derive the identity key (lowercase address, or name|organization)
 * 2. Hash using SHA-256
 * 3. Prefix the first 16 hex characters with "lead_"
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { toErrorMessage } from '../errors/index.js';
import { evaluateWorkflowOutput, type WorkflowMetrics } from '../metrics/index.js';
import { deriveIdentityKey } from '../normalizer/index.js';
import type {
  ArtifactMetadata,
  LeadId,
  LeadIdentity,
  ModuleResult,
  StorageAdapter,
  WorkflowState,
} from '../types/index.js';

export type RunStatus = 'completed' | 'completed_with_errors';

/**
 * Run record stored once per lead run
 */
export interface RunRecord {
  lead_id: LeadId;
  status: RunStatus;
  started_at: string | null;
  completed_at: string;
  state: WorkflowState;
  metrics: WorkflowMetrics;
}

const MODULE = 'run-manager';

/**
 * Generate a deterministic lead ID
 */
export function generateLeadId(identity: LeadIdentity): LeadId {
  const hash = createHash('sha256').update(deriveIdentityKey(identity)).digest('hex');
  return `lead_${hash.substring(0, 16)}`;
}

export function runRecordKey(leadId: LeadId): string {
  return `runs/${leadId}/run_record.json`;
}

export function buildRunRecord(
  state: WorkflowState,
  startedAt: string | null = null,
  completedAt: string = new Date().toISOString()
): RunRecord {
  return {
    lead_id: state.lead_id,
    status: state.error ? 'completed_with_errors' : 'completed',
    started_at: startedAt,
    completed_at: completedAt,
    state,
    metrics: evaluateWorkflowOutput(state),
  };
}

/**
 * Save the run record for a finished state
 */
export async function saveRunRecord(
  storage: StorageAdapter,
  state: WorkflowState,
  startedAt: string | null = null
): Promise<ModuleResult<ArtifactMetadata>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const record = buildRunRecord(state, startedAt);
    const metadata = await storage.save(runRecordKey(state.lead_id), JSON.stringify(record, null, 2), {
      contentType: 'application/json',
    });

    return {
      success: true,
      data: metadata,
      metadata: { leadId: state.lead_id, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'RUN_RECORD_SAVE_ERROR',
        message: `Failed to save run record: ${toErrorMessage(error)}`,
        details: { error },
      },
      metadata: { leadId: state.lead_id, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  }
}

const StoredRunRecordSchema = z
  .object({
    lead_id: z.string().min(1),
    status: z.enum(['completed', 'completed_with_errors']),
    started_at: z.string().nullable(),
    completed_at: z.string(),
  })
  .passthrough();

export type StoredRunRecord = z.infer<typeof StoredRunRecordSchema>;

/**
 * Load a stored run record; the header fields are validated, the state
 * snapshot is returned as stored
 */
export async function loadRunRecord(
  storage: StorageAdapter,
  leadId: LeadId
): Promise<ModuleResult<StoredRunRecord>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  try {
    const { content } = await storage.load(runRecordKey(leadId));
    const parsed = StoredRunRecordSchema.safeParse(JSON.parse(content.toString()));
    if (!parsed.success) {
      return {
        success: false,
        error: {
          code: 'RUN_RECORD_INVALID',
          message: 'Stored run record is malformed',
          details: parsed.error.errors,
        },
        metadata: { leadId, module: MODULE, timestamp, duration: Date.now() - startTime },
      };
    }
    return {
      success: true,
      data: parsed.data,
      metadata: { leadId, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'RUN_RECORD_LOAD_ERROR',
        message: `Failed to load run record: ${toErrorMessage(error)}`,
      },
      metadata: { leadId, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  }
}

/**
 * Check whether this lead already has a stored run record
 */
export async function checkExistingRun(
  storage: StorageAdapter,
  identity: LeadIdentity
): Promise<ModuleResult<{ exists: boolean; leadId: LeadId }>> {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();
  const leadId = generateLeadId(identity);

  try {
    const exists = await storage.exists(runRecordKey(leadId));
    return {
      success: true,
      data: { exists, leadId },
      metadata: { leadId, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  } catch (error) {
    return {
      success: false,
      error: {
        code: 'RUN_LOOKUP_ERROR',
        message: `Failed to check existing run: ${toErrorMessage(error)}`,
      },
      metadata: { leadId, module: MODULE, timestamp, duration: Date.now() - startTime },
    };
  }
}
