/**
 * Guardrail Module
 *
 * Screens generated drafts (and optionally raw lead fields) against a
 * prioritized ruleset held by an external guardrail backend.
 *
 * Fail-open contract:
 * - Gate not initialized: the text passes with `error` recorded
 * - Backend throws or exceeds its timeout: the text passes with `error` recorded
 * - Backend overrides: the text is replaced by the override notice of the
 *   highest-priority triggered rule
 *
 * validate() and checkInputSafety() never throw.
 */

import axios from 'axios';
import { z } from 'zod';
import { CollaboratorUnavailableError, GuardrailTimeoutError, toErrorMessage } from '../errors/index.js';
import { createLogger, noopMetrics } from '../logger/index.js';
import type {
  ArtifactKind,
  GuardrailBackend,
  GuardrailEvaluation,
  GuardrailRuleset,
  GuardrailSummary,
  GuardrailVerdict,
  InputSafetyResult,
  JsonPoster,
  Logger,
  Metrics,
  Observability,
  Violation,
} from '../types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export interface GuardrailConfig {
  project_id: string;
  stage_id: string;
  strict_mode: boolean;
  content_timeout_ms?: number;
  input_timeout_ms?: number;
}

export const DEFAULT_CONTENT_TIMEOUT_MS = 10000;
export const DEFAULT_INPUT_TIMEOUT_MS = 5000;

export const STRICT_TOXICITY_THRESHOLD = 0.7;
export const LENIENT_TOXICITY_THRESHOLD = 0.85;

export const NOT_INITIALIZED_MESSAGE = 'Guardrail not initialized';
export const SENSITIVE_DATA_NOTICE = '[SENSITIVE DATA DETECTED]';

const SENSITIVE_INPUT_TYPES = ['ssn', 'credit_card', 'bank_account'];

const defaultLogger: Logger = createLogger('guardrail');

// ============================================================================
// Rules
// ============================================================================

/**
 * One prioritized rule with the notice that replaces a blocked draft
 */
export interface PrioritizedRule {
  metric: string;
  violation_class: string;
  ruleset: GuardrailRuleset;
  template: string;
}

export function blockedNotice(violationClass: string, kind: ArtifactKind, advice: string): string {
  return `[BLOCKED BY GUARDRAIL: ${violationClass} in ${kind}. ${advice}]`;
}

function rule(
  metric: string,
  operator: 'contains' | 'gt',
  targetValue: string | number | string[],
  violationClass: string,
  template: string
): PrioritizedRule {
  return {
    metric,
    violation_class: violationClass,
    template,
    ruleset: {
      rules: [{ metric, operator, target_value: targetValue }],
      action: { type: 'OVERRIDE', choices: [template] },
    },
  };
}

/**
 * Rules in priority order. Social messages also block fear and sadness.
 */
export function buildRules(kind: ArtifactKind, strictMode: boolean): PrioritizedRule[] {
  const rules: PrioritizedRule[] = [
    rule(
      'pii',
      'contains',
      'any',
      'PII detected',
      blockedNotice('PII detected', kind, 'Please regenerate without personal information.')
    ),
    rule(
      'toxicity',
      'gt',
      strictMode ? STRICT_TOXICITY_THRESHOLD : LENIENT_TOXICITY_THRESHOLD,
      'Toxic content detected',
      blockedNotice('Toxic content detected', kind, 'Please regenerate with professional language.')
    ),
    rule(
      'tone',
      'contains',
      ['anger', 'annoyance'],
      'Unprofessional tone',
      blockedNotice('Unprofessional tone', kind, 'Please regenerate with neutral/positive tone.')
    ),
  ];

  if (kind === 'SOCIAL_MESSAGE') {
    rules.push(
      rule(
        'tone',
        'contains',
        ['fear', 'sadness'],
        'Negative tone',
        blockedNotice('Negative tone', kind, 'Please regenerate with positive/professional tone.')
      )
    );
  }

  return rules;
}

/**
 * Override text for an overridden evaluation: the first rule, in priority
 * order, whose metric was triggered. Rules sharing a metric are told apart
 * by the backend's own output when it names one of them.
 */
export function selectOverride(rules: PrioritizedRule[], evaluation: GuardrailEvaluation): string {
  const triggered = new Set(evaluation.triggered_rules.map((v) => v.metric));
  const first = rules.find((r) => triggered.has(r.metric));
  if (!first) {
    return evaluation.output;
  }
  const sameMetric = rules.filter((r) => r.metric === first.metric);
  const named = sameMetric.find((r) => r.template === evaluation.output);
  return (named ?? first).template;
}

// ============================================================================
// Timeouts
// ============================================================================

/**
 * Run `task` with an abort signal, rejecting with GuardrailTimeoutError after
 * `timeoutMs`
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new GuardrailTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================================
// Gate
// ============================================================================

export class GuardrailGate {
  private available = false;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly contentTimeoutMs: number;
  private readonly inputTimeoutMs: number;

  constructor(
    private readonly config: GuardrailConfig,
    private readonly backend: GuardrailBackend | null,
    observability: Observability = {}
  ) {
    this.logger = observability.logger ?? defaultLogger;
    this.metrics = observability.metrics ?? noopMetrics;
    this.contentTimeoutMs = config.content_timeout_ms ?? DEFAULT_CONTENT_TIMEOUT_MS;
    this.inputTimeoutMs = config.input_timeout_ms ?? DEFAULT_INPUT_TIMEOUT_MS;
  }

  /**
   * One-time setup. Leaves the gate unavailable (and every call fail-open)
   * when no backend is configured or its setup fails.
   */
  async initialize(): Promise<boolean> {
    if (!this.backend) {
      this.logger.warn('No guardrail backend configured, drafts pass unchecked');
      this.available = false;
      return false;
    }

    try {
      await this.backend.initialize?.({
        project_id: this.config.project_id,
        stage_id: this.config.stage_id,
      });
      this.available = true;
      this.logger.info('Guardrail initialized', {
        projectId: this.config.project_id,
        stageId: this.config.stage_id,
        strictMode: this.config.strict_mode,
      });
    } catch (error) {
      this.available = false;
      this.logger.error('Guardrail initialization failed', { error: toErrorMessage(error) });
      this.metrics.increment('guardrail.init_error');
    }
    return this.available;
  }

  isAvailable(): boolean {
    return this.available;
  }

  /**
   * Validate a draft. `context` is the generation input the draft was built from.
   */
  async validate(text: string, kind: ArtifactKind, context: string): Promise<GuardrailVerdict> {
    if (!this.available || !this.backend) {
      this.metrics.increment('guardrail.pass_open', { kind });
      return passOpen(text, NOT_INITIALIZED_MESSAGE, 'PASS_OPEN');
    }

    const backend = this.backend;
    const rules = buildRules(kind, this.config.strict_mode);
    const startTime = Date.now();

    try {
      const evaluation = await withTimeout(
        (signal) =>
          backend.evaluate(
            context,
            text,
            rules.map((r) => r.ruleset),
            { stage_id: this.config.stage_id, timeout_ms: this.contentTimeoutMs, signal }
          ),
        this.contentTimeoutMs,
        `Guardrail check for ${kind}`
      );
      this.metrics.timing('guardrail.duration_ms', Date.now() - startTime, { kind });

      if (!evaluation.overridden) {
        this.metrics.increment('guardrail.safe', { kind });
        return {
          outcome: 'SAFE',
          safe: true,
          filtered_text: text,
          violations: evaluation.triggered_rules,
          original_text: text,
        };
      }

      this.logger.warn('Draft blocked by guardrail', {
        kind,
        violations: evaluation.triggered_rules.map((v) => v.metric),
      });
      this.metrics.increment('guardrail.blocked', { kind });
      return {
        outcome: 'BLOCKED',
        safe: false,
        filtered_text: selectOverride(rules, evaluation),
        violations: evaluation.triggered_rules,
        original_text: text,
      };
    } catch (error) {
      const message = toErrorMessage(error);
      this.logger.error('Guardrail check failed, passing draft through', { kind, error: message });
      this.metrics.increment('guardrail.error', { kind });
      return passOpen(text, message, 'PASS_OPEN_WITH_WARNING');
    }
  }

  /**
   * Screen raw lead fields for sensitive data before any generation
   */
  async checkInputSafety(fields: Record<string, string | null | undefined>): Promise<InputSafetyResult> {
    if (!this.available || !this.backend) {
      return { safe: true, violations: [], error: NOT_INITIALIZED_MESSAGE };
    }

    const backend = this.backend;
    const text = Object.values(fields)
      .filter((value): value is string => typeof value === 'string' && value.length > 0)
      .join(' ');

    const ruleset: GuardrailRuleset = {
      rules: [{ metric: 'pii', operator: 'contains', target_value: SENSITIVE_INPUT_TYPES }],
      action: { type: 'OVERRIDE', choices: [SENSITIVE_DATA_NOTICE] },
    };

    try {
      const evaluation = await withTimeout(
        (signal) =>
          backend.evaluate(text, '', [ruleset], {
            stage_id: this.config.stage_id,
            timeout_ms: this.inputTimeoutMs,
            signal,
          }),
        this.inputTimeoutMs,
        'Input safety check'
      );
      if (evaluation.overridden) {
        this.logger.warn('Sensitive data detected in lead input');
        this.metrics.increment('guardrail.input_flagged');
      }
      return { safe: !evaluation.overridden, violations: evaluation.triggered_rules };
    } catch (error) {
      const message = toErrorMessage(error);
      this.logger.error('Input safety check failed', { error: message });
      return { safe: true, violations: [], error: message };
    }
  }
}

function passOpen(text: string, error: string, outcome: 'PASS_OPEN' | 'PASS_OPEN_WITH_WARNING'): GuardrailVerdict {
  return {
    outcome,
    safe: true,
    filtered_text: text,
    violations: [],
    original_text: text,
    error,
  };
}

/**
 * Compact form of a verdict kept on workflow state
 */
export function summarizeVerdict(verdict: GuardrailVerdict): GuardrailSummary {
  return {
    safe: verdict.safe,
    violations: verdict.violations.map((v) => v.metric),
    error: verdict.error ?? null,
  };
}

// ============================================================================
// HTTP backend
// ============================================================================

export interface HttpGuardrailConfig {
  apiUrl: string;
  apiKey: string;
  timeout?: number;
}

const NumberLikeSchema = z
  .union([z.number(), z.string(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const InvokeResponseSchema = z.object({
  overridden: z.boolean().optional(),
  status: z.string().optional(),
  text: z.string().optional(),
  output: z.string().optional(),
  triggered_rules: z
    .array(
      z.object({
        metric: z.string(),
        value: NumberLikeSchema,
        threshold: NumberLikeSchema,
      })
    )
    .default([]),
});

/**
 * Normalize an invoke response. A `status` of "triggered" or an explicit
 * `overridden` flag both count as an override.
 */
export function normalizeInvokeResponse(raw: unknown): GuardrailEvaluation {
  const parsed = InvokeResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Malformed guardrail response: ${parsed.error.errors.map((e) => e.message).join('; ')}`);
  }
  const data = parsed.data;
  const violations: Violation[] = data.triggered_rules;
  return {
    overridden: data.overridden ?? data.status === 'triggered',
    output: data.output ?? data.text ?? '',
    triggered_rules: violations,
  };
}

/**
 * Guardrail backend reached over HTTP
 */
export class HttpGuardrailBackend implements GuardrailBackend {
  private readonly client: JsonPoster;
  private project: { project_id: string; stage_id: string } | null = null;

  constructor(config: HttpGuardrailConfig, client?: JsonPoster) {
    if (!config.apiKey) {
      throw new CollaboratorUnavailableError('guardrail_backend', 'Guardrail API key is required');
    }
    this.client =
      client ??
      axios.create({
        baseURL: config.apiUrl,
        timeout: config.timeout ?? DEFAULT_CONTENT_TIMEOUT_MS,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
      });
  }

  async initialize(config: { project_id: string; stage_id: string }): Promise<void> {
    if (!config.project_id || !config.stage_id) {
      throw new CollaboratorUnavailableError('guardrail_backend', 'project_id and stage_id are required');
    }
    this.project = config;
  }

  async evaluate(
    input: string,
    output: string,
    rulesets: GuardrailRuleset[],
    options: { stage_id: string; timeout_ms: number; signal?: AbortSignal }
  ): Promise<GuardrailEvaluation> {
    const body = {
      payload: { input, output },
      prioritized_rulesets: rulesets,
      project_id: this.project?.project_id,
      stage_id: options.stage_id,
      timeout: options.timeout_ms / 1000,
    };
    const response = await this.client.post('/v1/protect/invoke', body, {
      signal: options.signal,
      timeout: options.timeout_ms,
    });
    return normalizeInvokeResponse(response.data);
  }
}
