/**
 * Azure AI Language PII/PHI detection provider.
 * Calls the analyze-text REST API (PiiEntityRecognition) with native fetch.
 * Offsets are requested in UTF-16 code units so they index JS strings directly.
 *
 * Responses are validated field by field: a payload that doesn't look like a
 * PII result fails closed with ServiceError instead of yielding "no entities".
 */

import { ConfigurationError, ServiceError } from '../errors.js';
import type { DomainFilter, RawEntity } from '../types/models.js';
import type { IEntityDetectionProvider } from './IEntityDetectionProvider.js';

const API_PATH = '/language/:analyze-text';
const DEFAULT_API_VERSION = '2023-04-01';

/** Service-side `domain` parameter for each filter. */
const DOMAIN_PARAMETER: Record<DomainFilter, string> = {
  general: 'none',
  healthcare: 'phi',
};

export interface AzureLanguageDetectionProviderOptions {
  endpoint: string;
  apiKey: string;
  apiVersion?: string;
  /** Domains this endpoint is provisioned for. Default: all. */
  supportedDomains?: readonly DomainFilter[];
}

interface AzureErrorBody {
  code?: string;
  message?: string;
  innererror?: { code?: string; message?: string };
}

export class AzureLanguageDetectionProvider implements IEntityDetectionProvider {
  private readonly url: string;
  private readonly apiKey: string;
  private readonly supportedDomains: ReadonlySet<DomainFilter>;

  constructor(opts: AzureLanguageDetectionProviderOptions) {
    const base = opts.endpoint.replace(/\/+$/, '');
    const apiVersion = opts.apiVersion ?? DEFAULT_API_VERSION;
    this.url = `${base}${API_PATH}?api-version=${encodeURIComponent(apiVersion)}`;
    this.apiKey = opts.apiKey;
    this.supportedDomains = new Set(opts.supportedDomains ?? ['general', 'healthcare']);
  }

  async detect(text: string, domainFilter: DomainFilter, language: string): Promise<RawEntity[]> {
    if (!this.supportedDomains.has(domainFilter)) {
      throw new ConfigurationError(
        'UNSUPPORTED_DOMAIN',
        `Domain filter "${domainFilter}" is not supported by the configured detection endpoint`,
        { domainFilter }
      );
    }

    const body = {
      kind: 'PiiEntityRecognition',
      parameters: {
        modelVersion: 'latest',
        domain: DOMAIN_PARAMETER[domainFilter],
        stringIndexType: 'Utf16CodeUnit',
      },
      analysisInput: {
        documents: [{ id: '1', language, text }],
      },
    };

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Ocp-Apim-Subscription-Key': this.apiKey,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ServiceError('detection', 'Detection service unreachable', true, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    if (!res.ok) {
      throw await this.toError(res, domainFilter);
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch {
      throw new ServiceError('detection', 'Detection service returned invalid JSON', false);
    }

    return parseAnalyzeTextResult(payload);
  }

  private async toError(res: Response, domainFilter: DomainFilter): Promise<Error> {
    const raw: unknown = await res.json().catch(() => ({}));
    const error = readErrorBody(raw);
    const detail = error.innererror?.message ?? error.message ?? 'Unknown error';

    if (res.status === 400 && /domain/i.test(detail)) {
      return new ConfigurationError(
        'UNSUPPORTED_DOMAIN',
        `Detection endpoint rejected domain filter "${domainFilter}": ${detail}`,
        { domainFilter }
      );
    }

    const retryable = res.status === 408 || res.status === 429 || res.status >= 500;
    return new ServiceError(
      'detection',
      `Detection service error (${res.status}): ${detail}`,
      retryable,
      { status: res.status, ...(error.code && { errorCode: error.code }) }
    );
  }
}

// ── Response parsing ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorBody(raw: unknown): AzureErrorBody {
  if (!isRecord(raw) || !isRecord(raw.error)) return {};
  const { code, message, innererror } = raw.error;
  return {
    ...(typeof code === 'string' && { code }),
    ...(typeof message === 'string' && { message }),
    ...(isRecord(innererror) && {
      innererror: {
        ...(typeof innererror.code === 'string' && { code: innererror.code }),
        ...(typeof innererror.message === 'string' && { message: innererror.message }),
      },
    }),
  };
}

function malformed(reason: string): ServiceError {
  return new ServiceError('detection', `Malformed detection response: ${reason}`, false);
}

/** Extract the single document's entities from an analyze-text result. */
export function parseAnalyzeTextResult(payload: unknown): RawEntity[] {
  if (!isRecord(payload) || !isRecord(payload.results)) {
    throw malformed('missing results');
  }

  const { documents, errors } = payload.results;

  if (Array.isArray(errors) && errors.length > 0) {
    const first: unknown = errors[0];
    const message = isRecord(first) && isRecord(first.error) && typeof first.error.message === 'string'
      ? first.error.message
      : 'unknown document error';
    throw new ServiceError('detection', `PII detection failed: ${message}`, false);
  }

  if (!Array.isArray(documents) || documents.length !== 1) {
    throw malformed('expected exactly one document');
  }

  const doc: unknown = documents[0];
  if (!isRecord(doc) || !Array.isArray(doc.entities)) {
    throw malformed('document has no entity list');
  }

  return doc.entities.map((entry: unknown, index: number) => parseEntity(entry, index));
}

function parseEntity(entry: unknown, index: number): RawEntity {
  if (!isRecord(entry)) throw malformed(`entity ${index} is not an object`);

  const { text, category, subcategory, offset, length, confidenceScore } = entry;
  if (
    typeof text !== 'string' ||
    typeof category !== 'string' ||
    typeof offset !== 'number' ||
    typeof length !== 'number' ||
    typeof confidenceScore !== 'number'
  ) {
    throw malformed(`entity ${index} is missing required fields`);
  }

  return {
    category,
    ...(typeof subcategory === 'string' && { subcategory }),
    text,
    offset,
    length,
    confidenceScore,
  };
}
