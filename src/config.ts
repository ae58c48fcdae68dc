/**
 * Configuration loading.
 * Reads the environment once at process start, validates every recognised
 * option and returns a frozen AppConfig. Anything unrecognisable fails with
 * a ConfigurationError naming the reason; nothing is coerced silently.
 */

import { ConfigurationError } from './errors.js';
import type { LogLevel } from './providers/ILogProvider.js';
import type { DomainFilter, PolicyMode } from './types/models.js';

export interface PipelineConfig {
  readonly mode: PolicyMode;
  readonly confidenceThreshold: number;
  readonly domainFilter: DomainFilter;
  readonly language: string;
  readonly enableGrounding: boolean;
}

export interface DetectionServiceConfig {
  readonly endpoint: string;
  readonly apiKey: string;
}

export interface AgentServiceConfig {
  readonly endpoint: string;
  readonly apiKey: string;
  readonly apiVersion: string;
  readonly model: string;
  readonly agentName: string;
  readonly instructions: string;
  /** Reuse this agent instead of creating one. */
  readonly agentId: string | null;
  readonly bingConnectionId: string | null;
  readonly runTimeoutMs: number;
  readonly pollIntervalMs: number;
}

export interface AppConfig {
  readonly pipeline: PipelineConfig;
  readonly detection: DetectionServiceConfig;
  readonly agent: AgentServiceConfig;
  readonly logLevel: LogLevel;
}

export type Env = Record<string, string | undefined>;

export const POLICY_MODES: readonly PolicyMode[] = ['redact', 'reject'];
export const DOMAIN_FILTERS: readonly DomainFilter[] = ['general', 'healthcare'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  mode: 'redact',
  confidenceThreshold: 0.8,
  domainFilter: 'healthcare',
  language: 'en',
  enableGrounding: true,
};

const DEFAULT_AGENT_API_VERSION = '2025-05-01';
const DEFAULT_AGENT_MODEL = 'gpt-4o';
const DEFAULT_AGENT_NAME = 'HealthcareAssistant';
const DEFAULT_RUN_TIMEOUT_MS = 60_000;
const DEFAULT_POLL_INTERVAL_MS = 1_000;

export const DEFAULT_AGENT_INSTRUCTIONS = [
  'You are a knowledgeable healthcare assistant helping users find information about',
  'medical topics, treatments, and clinical guidelines. Use web search to provide',
  'up-to-date, evidence-based information.',
  '',
  'When answering:',
  '1. Prioritize recent, authoritative sources (medical journals, health organizations)',
  '2. Clearly cite your sources',
  '3. Distinguish between general information and specific medical advice',
  '4. Remind users to consult healthcare professionals for personal medical decisions',
  '',
  'Personally identifiable information in user queries has been replaced with',
  'bracketed category placeholders such as [PERSON].',
].join('\n');

export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = {
    pipeline: validatePipelineConfig({
      mode: env.PII_DETECTION_MODE ?? DEFAULT_PIPELINE_CONFIG.mode,
      confidenceThreshold: parseNumber(
        'PII_CONFIDENCE_THRESHOLD',
        env.PII_CONFIDENCE_THRESHOLD,
        DEFAULT_PIPELINE_CONFIG.confidenceThreshold
      ),
      domainFilter: env.PII_DOMAIN_FILTER ?? DEFAULT_PIPELINE_CONFIG.domainFilter,
      language: env.PII_LANGUAGE ?? DEFAULT_PIPELINE_CONFIG.language,
      enableGrounding: parseBoolean(
        'ENABLE_WEB_GROUNDING',
        env.ENABLE_WEB_GROUNDING,
        DEFAULT_PIPELINE_CONFIG.enableGrounding
      ),
    }),
    detection: {
      endpoint: required(env, 'AZURE_LANGUAGE_ENDPOINT'),
      apiKey: required(env, 'AZURE_LANGUAGE_KEY'),
    },
    agent: {
      endpoint: required(env, 'AGENT_SERVICE_ENDPOINT'),
      apiKey: required(env, 'AGENT_SERVICE_API_KEY'),
      apiVersion: env.AGENT_SERVICE_API_VERSION || DEFAULT_AGENT_API_VERSION,
      model: env.AGENT_MODEL || DEFAULT_AGENT_MODEL,
      agentName: env.AGENT_NAME || DEFAULT_AGENT_NAME,
      instructions: DEFAULT_AGENT_INSTRUCTIONS,
      agentId: env.AGENT_ID || null,
      bingConnectionId: env.BING_CONNECTION_ID || null,
      runTimeoutMs: parsePositiveInt('AGENT_RUN_TIMEOUT_MS', env.AGENT_RUN_TIMEOUT_MS, DEFAULT_RUN_TIMEOUT_MS),
      pollIntervalMs: parsePositiveInt('AGENT_POLL_INTERVAL_MS', env.AGENT_POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  return deepFreeze(config);
}

/**
 * Validate the per-query pipeline options. Also used on snapshots handed to
 * DetectionService directly, so a hand-built config gets the same checks.
 */
export function validatePipelineConfig(input: {
  mode: string;
  confidenceThreshold: number;
  domainFilter: string;
  language: string;
  enableGrounding: boolean;
}): PipelineConfig {
  const mode = POLICY_MODES.find((m) => m === input.mode);
  if (!mode) {
    throw new ConfigurationError(
      'INVALID_MODE',
      `mode must be one of: ${POLICY_MODES.join(', ')}`,
      { value: input.mode }
    );
  }

  assertThreshold(input.confidenceThreshold);

  const domainFilter = DOMAIN_FILTERS.find((d) => d === input.domainFilter);
  if (!domainFilter) {
    throw new ConfigurationError(
      'UNSUPPORTED_DOMAIN',
      `domainFilter must be one of: ${DOMAIN_FILTERS.join(', ')}`,
      { value: input.domainFilter }
    );
  }

  if (input.language.trim().length === 0) {
    throw new ConfigurationError('MISSING_SETTING', 'language must not be empty');
  }

  return Object.freeze({
    mode,
    confidenceThreshold: input.confidenceThreshold,
    domainFilter,
    language: input.language,
    enableGrounding: input.enableGrounding,
  });
}

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigurationError(
      'THRESHOLD_OUT_OF_RANGE',
      'confidenceThreshold must be a number between 0 and 1',
      { value: threshold }
    );
  }
}

// ── Private ──

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value || value.trim().length === 0) {
    throw new ConfigurationError('MISSING_SETTING', `${name} is required`, { setting: name });
  }
  return value.trim();
}

function parseNumber(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError('INVALID_NUMBER', `${name} must be a number`, { setting: name, value: raw });
  }
  return value;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  const value = parseNumber(name, raw, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError('INVALID_NUMBER', `${name} must be a positive integer`, { setting: name, value: raw });
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError('INVALID_BOOLEAN', `${name} must be true or false`, { setting: name, value: raw });
  }
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim() === '') return 'info';
  const level = LOG_LEVELS.find((l) => l === raw.trim().toLowerCase());
  if (!level) {
    throw new ConfigurationError(
      'INVALID_LOG_LEVEL',
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`,
      { value: raw }
    );
  }
  return level;
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
