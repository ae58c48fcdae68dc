/**
 * Entity detection provider interface.
 * Wraps an external PII/PHI span classifier. Implementations must not retry:
 * retry policy belongs to the caller.
 */

import type { DomainFilter, RawEntity } from '../types/models.js';

export interface IEntityDetectionProvider {
  /**
   * Classify `text` and return every candidate span, whatever its score.
   * Rejects with ServiceError on transport/auth/throttling failures and with
   * ConfigurationError when the domain filter is not supported.
   */
  detect(text: string, domainFilter: DomainFilter, language: string): Promise<RawEntity[]>;
}
