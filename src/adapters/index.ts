/**
 * Delivery Adapters Module
 *
 * Side effects run after a draft is accepted by the guardrail. Nothing is
 * ever sent: emails become drafts in the sender's mailbox and social
 * messages are queued for manual sending.
 *
 * Responsibilities:
 * - Gmail draft creation over the REST API
 * - Null adapters used when a channel is not configured
 * - In-memory social message queue
 * - Map adapter results to per-artifact delivery outcomes
 */

import { toErrorMessage } from '../errors/index.js';
import { createLogger } from '../logger/index.js';
import type {
  ArtifactKind,
  DeliveryOutcome,
  DeliveryResult,
  EmailDraftAdapter,
  Logger,
  SocialMessageAdapter,
} from '../types/index.js';

const defaultLogger: Logger = createLogger('adapters');

export const GMAIL_API_URL = 'https://gmail.googleapis.com/gmail/v1';

// ============================================================================
// GMAIL DRAFT ADAPTER
// ============================================================================

export interface GmailConfig {
  /** OAuth access token with the gmail.compose scope */
  accessToken: string;
  apiUrl?: string;
  timeout?: number;
  /** Defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

function encodeHeader(value: string): string {
  // RFC 2047 encoded-word for non-ASCII subjects
  return /^[\x20-\x7e]*$/.test(value) ? value : `=?UTF-8?B?${Buffer.from(value, 'utf-8').toString('base64')}?=`;
}

/**
 * Build the base64url RFC 2822 message Gmail expects in `message.raw`
 */
export function buildRawMessage(recipient: string, subject: string, body: string): string {
  const message = [
    `To: ${recipient}`,
    `Subject: ${encodeHeader(subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    '',
    body,
  ].join('\r\n');
  return Buffer.from(message, 'utf-8').toString('base64url');
}

/**
 * GmailDraftAdapter
 *
 * Creates a draft in the authenticated user's mailbox.
 */
export class GmailDraftAdapter implements EmailDraftAdapter {
  private accessToken: string;
  private apiUrl: string;
  private timeout: number;
  private fetchImpl: typeof fetch;
  private logger: Logger;

  constructor(config: GmailConfig, logger: Logger = defaultLogger) {
    if (!config.accessToken) {
      throw new Error('Gmail access token is required');
    }
    this.accessToken = config.accessToken;
    this.apiUrl = config.apiUrl ?? GMAIL_API_URL;
    this.timeout = config.timeout ?? 30000;
    this.fetchImpl = config.fetchImpl ?? fetch;
    this.logger = logger;
  }

  async createDraft(recipient: string, subject: string, body: string): Promise<DeliveryResult> {
    try {
      const response = await this.fetchImpl(`${this.apiUrl}/users/me/drafts`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ message: { raw: buildRawMessage(recipient, subject, body) } }),
        signal: AbortSignal.timeout(this.timeout),
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`Gmail API error: ${response.status} - ${errorBody}`);
      }

      const payload: unknown = await response.json();
      const draftId =
        typeof payload === 'object' && payload !== null && 'id' in payload && typeof payload.id === 'string'
          ? payload.id
          : undefined;

      this.logger.info('Email draft created', { draftId, to: recipient });

      return {
        success: true,
        ...(draftId !== undefined ? { id: draftId } : {}),
        metadata: { provider: 'gmail', createdAt: new Date().toISOString() },
      };
    } catch (error) {
      const errorMessage = toErrorMessage(error);
      this.logger.error('Failed to create Gmail draft', { to: recipient, error: errorMessage });

      return {
        success: false,
        error: errorMessage,
        metadata: { provider: 'gmail', failedAt: new Date().toISOString() },
      };
    }
  }
}

// ============================================================================
// NULL ADAPTERS
// ============================================================================

/**
 * NullEmailDraftAdapter
 *
 * Returns success but performs no action. Used when no mailbox is configured.
 */
export class NullEmailDraftAdapter implements EmailDraftAdapter {
  constructor(private logger: Logger = defaultLogger) {}

  async createDraft(recipient: string, _subject: string, _body: string): Promise<DeliveryResult> {
    this.logger.warn('Email drafts not configured - skipping createDraft', { to: recipient });
    return {
      success: true,
      metadata: { skipped: true, reason: 'Email drafts not configured' },
    };
  }
}

export class NullSocialMessageAdapter implements SocialMessageAdapter {
  constructor(private logger: Logger = defaultLogger) {}

  async queueMessage(recipient: string, _message: string): Promise<DeliveryResult> {
    this.logger.warn('Social messaging not configured - skipping queueMessage', { to: recipient });
    return {
      success: true,
      metadata: { skipped: true, reason: 'Social messaging not configured' },
    };
  }
}

// ============================================================================
// SOCIAL MESSAGE QUEUE
// ============================================================================

export interface QueuedSocialMessage {
  id: string;
  recipient: string;
  message: string;
  queuedAt: string;
}

/**
 * QueuedSocialMessageAdapter
 *
 * Holds messages for manual sending. Messages over `maxLength` characters
 * are rejected.
 */
export class QueuedSocialMessageAdapter implements SocialMessageAdapter {
  private queue: QueuedSocialMessage[] = [];
  private counter = 0;

  constructor(private maxLength = 300, private logger: Logger = defaultLogger) {}

  async queueMessage(recipient: string, message: string): Promise<DeliveryResult> {
    if (message.length > this.maxLength) {
      return {
        success: false,
        error: `Message exceeds ${this.maxLength} characters (${message.length})`,
      };
    }

    this.counter++;
    const entry: QueuedSocialMessage = {
      id: `social_${this.counter}`,
      recipient,
      message,
      queuedAt: new Date().toISOString(),
    };
    this.queue.push(entry);
    this.logger.info('Social message queued', { id: entry.id, to: recipient });

    return { success: true, id: entry.id, metadata: { queued: this.queue.length } };
  }

  pending(): QueuedSocialMessage[] {
    return [...this.queue];
  }

  /**
   * Remove and return every queued message
   */
  drain(): QueuedSocialMessage[] {
    const drained = this.queue;
    this.queue = [];
    return drained;
  }
}

// ============================================================================
// FACTORY AND HELPERS
// ============================================================================

export interface DeliveryAdapters {
  email: EmailDraftAdapter;
  social: SocialMessageAdapter;
}

/**
 * Create adapters from configuration, falling back to Null adapters
 */
export function createDeliveryAdapters(
  config: { gmailAccessToken?: string | undefined; queueSocialMessages?: boolean },
  logger: Logger = defaultLogger
): DeliveryAdapters {
  const email: EmailDraftAdapter = config.gmailAccessToken
    ? new GmailDraftAdapter({ accessToken: config.gmailAccessToken }, logger)
    : new NullEmailDraftAdapter(logger);

  const social: SocialMessageAdapter = config.queueSocialMessages
    ? new QueuedSocialMessageAdapter(300, logger)
    : new NullSocialMessageAdapter(logger);

  return { email, social };
}

/**
 * Map an adapter result to the outcome stored on workflow state.
 * Null adapters report success without an action, which counts as skipped.
 */
export function toDeliveryOutcome(result: DeliveryResult): DeliveryOutcome {
  if (!result.success) {
    return { status: 'failed', reference: null, error: result.error ?? 'Delivery failed' };
  }
  if (result.metadata?.['skipped'] === true) {
    return { status: 'skipped', reference: null, error: null };
  }
  return { status: 'success', reference: result.id ?? null, error: null };
}

export interface DeliveryMetrics {
  total: number;
  success: number;
  failed: number;
  skipped: number;
}

export function calculateDeliveryMetrics(
  deliveries: Record<ArtifactKind, DeliveryOutcome | null>
): DeliveryMetrics {
  const metrics: DeliveryMetrics = { total: 0, success: 0, failed: 0, skipped: 0 };
  for (const outcome of Object.values(deliveries)) {
    if (!outcome || outcome.status === 'not_attempted') {
      continue;
    }
    metrics.total++;
    metrics[outcome.status]++;
  }
  return metrics;
}
