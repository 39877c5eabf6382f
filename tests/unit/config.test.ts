/**
 * Unit tests for configuration loading and dependency wiring
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, createDependenciesFromConfig, researchPolicyFromConfig } from '../../src/config/index.js';
import { ConfigError } from '../../src/errors/index.js';
import { MemoryProfileStore } from '../../src/enrichment/index.js';
import { NullSearchProvider, TavilySearchProvider } from '../../src/research/index.js';
import { MemoryStorageAdapter, FileStorageAdapter } from '../../src/storage/index.js';
import { NullEmailDraftAdapter, QueuedSocialMessageAdapter } from '../../src/adapters/index.js';
import { alwaysResearch, researchWhenInsufficient } from '../../src/workflow/index.js';
import { createMockLogger, createProfile } from '../helpers/fakes.js';

const observability = () => ({ logger: createMockLogger() });

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.STORAGE_TYPE).toBe('file');
    expect(config.OUTPUT_DIR).toBe('.');
    expect(config.AWS_REGION).toBe('us-east-1');
    expect(config.RESEARCH_POLICY).toBe('always');
    expect(config.GUARDRAIL_STRICT_MODE).toBe(false);
    expect(config.ANTHROPIC_API_KEY).toBeUndefined();
  });

  it('trims optional strings and drops blank ones', () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: ' test-secret ', TAVILY_API_KEY: '   ' });

    expect(config.ANTHROPIC_API_KEY).toBe('test-secret');
    expect(config.TAVILY_API_KEY).toBeUndefined();
  });

  it('parses booleans and numbers', () => {
    const config = loadConfig({ GUARDRAIL_STRICT_MODE: '1', ANTHROPIC_MAX_TOKENS: '512' });

    expect(config.GUARDRAIL_STRICT_MODE).toBe(true);
    expect(config.ANTHROPIC_MAX_TOKENS).toBe(512);
  });

  it('lists invalid variables', () => {
    expect(() => loadConfig({ GUARDRAIL_STRICT_MODE: 'yes' })).toThrow(ConfigError);
    expect(() => loadConfig({ ANTHROPIC_MAX_TOKENS: 'many' })).toThrow(/ANTHROPIC_MAX_TOKENS/);
  });

  it('requires a bucket for s3 storage', () => {
    expect(() => loadConfig({ STORAGE_TYPE: 's3' })).toThrow(
      'Invalid configuration: S3_BUCKET: required when STORAGE_TYPE is s3'
    );
  });
});

describe('researchPolicyFromConfig', () => {
  it('maps the policy name', () => {
    expect(researchPolicyFromConfig({ RESEARCH_POLICY: 'always' })).toBe(alwaysResearch);
    expect(researchPolicyFromConfig({ RESEARCH_POLICY: 'when_insufficient' })).toBe(researchWhenInsufficient);
  });
});

describe('createDependenciesFromConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'outreach-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('requires a generator key', async () => {
    await expect(createDependenciesFromConfig(loadConfig({}), observability())).rejects.toThrow(
      'Invalid configuration: ANTHROPIC_API_KEY: required'
    );
  });

  it('falls back to null collaborators for unconfigured channels', async () => {
    const deps = await createDependenciesFromConfig(
      loadConfig({ ANTHROPIC_API_KEY: 'test-secret', STORAGE_TYPE: 'memory', SENDER_OFFERING: 'We audit cloud spend.' }),
      observability()
    );

    expect(deps.searchProvider).toBeInstanceOf(NullSearchProvider);
    expect(deps.guardrail.isAvailable()).toBe(false);
    expect(deps.emailDrafts).toBeInstanceOf(NullEmailDraftAdapter);
    expect(deps.socialQueue).toBeInstanceOf(QueuedSocialMessageAdapter);
    expect(deps.storage).toBeInstanceOf(MemoryStorageAdapter);
    expect(deps.offering).toBe('We audit cloud spend.');
  });

  it('wires configured search, guardrail, storage and profiles', async () => {
    const profilePath = join(dir, 'profiles.json');
    await writeFile(profilePath, JSON.stringify([createProfile()]));

    const deps = await createDependenciesFromConfig(
      loadConfig({
        ANTHROPIC_API_KEY: 'test-secret',
        TAVILY_API_KEY: 'test-secret',
        GUARDRAIL_API_URL: 'https://guardrail.test',
        GUARDRAIL_API_KEY: 'test-secret',
        GUARDRAIL_PROJECT_ID: 'proj-1',
        GUARDRAIL_STAGE_ID: 'stage-1',
        OUTPUT_DIR: dir,
        PROFILE_DATA_PATH: profilePath,
      }),
      observability()
    );

    expect(deps.searchProvider).toBeInstanceOf(TavilySearchProvider);
    expect(deps.guardrail.isAvailable()).toBe(true);
    expect(deps.storage).toBeInstanceOf(FileStorageAdapter);
    expect(deps.profileStore).toBeInstanceOf(MemoryProfileStore);
    const matches = await deps.profileStore.search('jane.doe@acme.com', 1, { email: 'jane.doe@acme.com' });
    expect(matches[0]?.metadata['organization']).toBe('Acme');
  });

  it('leaves the guardrail unavailable without a project id', async () => {
    const deps = await createDependenciesFromConfig(
      loadConfig({
        ANTHROPIC_API_KEY: 'test-secret',
        GUARDRAIL_API_URL: 'https://guardrail.test',
        GUARDRAIL_API_KEY: 'test-secret',
        STORAGE_TYPE: 'memory',
      }),
      observability()
    );

    expect(deps.guardrail.isAvailable()).toBe(false);
  });
});
