import { describe, it, expect, beforeEach } from 'vitest';
import { DetectionService, MAX_QUERY_LENGTH } from '../../src/services/DetectionService.js';
import { DEFAULT_PIPELINE_CONFIG } from '../../src/config.js';
import { ConfigurationError, ServiceError, ValidationError } from '../../src/errors.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { MockDetectionProvider } from '../mocks/MockDetectionProvider.js';

const QUERY = 'Patient John Doe, MRN 12345678, has diabetes.';

describe('DetectionService', () => {
  let provider: MockDetectionProvider;
  let log: ConsoleLogProvider;
  let service: DetectionService;

  beforeEach(() => {
    provider = new MockDetectionProvider();
    log = new ConsoleLogProvider();
    service = new DetectionService(provider, log, DEFAULT_PIPELINE_CONFIG);
  });

  describe('process', () => {
    it('should redact every confident entity in redact mode', async () => {
      provider.willReturn(
        { category: 'Person', match: 'John Doe', score: 0.95 },
        { category: 'MedicalRecordNumber', match: '12345678', score: 0.9 }
      );

      const result = await service.process(QUERY);

      expect(result.originalText).toBe(QUERY);
      expect(result.redactedText).toBe('Patient [PERSON], MRN [MEDICALRECORDNUMBER], has diabetes.');
      expect(result.hasPii).toBe(true);
      expect(result.shouldReject).toBe(false);
      expect(result.entities.map((e) => [e.category, e.startOffset, e.length])).toEqual([
        ['Person', 8, 8],
        ['MedicalRecordNumber', 22, 8],
      ]);
    });

    it('should flag the query for rejection in reject mode', async () => {
      provider.willReturn({ category: 'Person', match: 'John Doe', score: 0.95 });

      const result = await service.process(QUERY, { mode: 'reject' });

      expect(result.shouldReject).toBe(true);
      expect(result.hasPii).toBe(true);
      expect(result.redactedText).toBe('Patient [PERSON], MRN 12345678, has diabetes.');
    });

    it('should ignore low-confidence entities entirely', async () => {
      provider.willReturn({ category: 'Age', match: '45', score: 0.5 });

      const result = await service.process('I am 45 years old', { mode: 'reject' });

      expect(result.entities).toEqual([]);
      expect(result.hasPii).toBe(false);
      expect(result.shouldReject).toBe(false);
      expect(result.redactedText).toBe('I am 45 years old');
    });

    it('should keep the stronger of two overlapping entities', async () => {
      provider.willReturn(
        { category: 'PersonType', match: 'Dr. Jane Smith', score: 0.85 },
        { category: 'Person', match: 'Jane Smith', score: 0.95 }
      );

      const result = await service.process('Call Dr. Jane Smith today.');

      expect(result.redactedText).toBe('Call Dr. [PERSON] today.');
      expect(result.entities).toHaveLength(1);
    });

    it('should return the text unchanged when nothing is detected', async () => {
      const result = await service.process('What are the symptoms of flu?');

      expect(result.redactedText).toBe('What are the symptoms of flu?');
      expect(result.hasPii).toBe(false);
    });

    it('should pass the configured domain and language to the provider', async () => {
      await service.process('hello');

      expect(provider.lastDomain).toBe('healthcare');
      expect(provider.lastLanguage).toBe('en');
    });

    it('should apply a per-query threshold override', async () => {
      provider.willReturn({ category: 'Person', match: 'John Doe', score: 0.95 });

      const result = await service.process(QUERY, { confidenceThreshold: 0.99 });

      expect(result.entities).toEqual([]);
    });

    it('should reject an out-of-range threshold override before calling the provider', async () => {
      await expect(service.process(QUERY, { confidenceThreshold: 1.5 })).rejects.toThrow(ConfigurationError);
      expect(provider.callCount).toBe(0);
    });

    it('should return a frozen result', async () => {
      provider.willReturn({ category: 'Person', match: 'John Doe', score: 0.95 });

      const result = await service.process(QUERY);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.entities)).toBe(true);
    });

    it('should reject an empty query without calling the provider', async () => {
      await expect(service.process('   ')).rejects.toThrow(ValidationError);
      expect(provider.callCount).toBe(0);
    });

    it('should reject a query over the length limit', async () => {
      await expect(service.process('a'.repeat(MAX_QUERY_LENGTH + 1))).rejects.toThrow(ValidationError);
    });

    it('should propagate provider failures', async () => {
      provider.willFail(new ServiceError('detection', 'Detection service unreachable', true));

      await expect(service.process(QUERY)).rejects.toThrow('Detection service unreachable');
    });

    it('should fail closed when a span falls outside the text', async () => {
      provider.willReturnRaw({
        category: 'Person',
        text: 'John',
        offset: 100,
        length: 4,
        confidenceScore: 0.9,
      });

      await expect(service.process(QUERY)).rejects.toThrow('Entity 0 span is outside the analysed text');
    });

    it('should fail closed when entity text does not match its span', async () => {
      provider.willReturnRaw({
        category: 'Person',
        text: 'Jane Roe',
        offset: 8,
        length: 8,
        confidenceScore: 0.9,
      });

      await expect(service.process(QUERY)).rejects.toThrow('Entity 0 text does not match its span');
    });

    it('should fail closed on a confidence score outside [0, 1]', async () => {
      provider.willReturnRaw({
        category: 'Person',
        text: 'John Doe',
        offset: 8,
        length: 8,
        confidenceScore: 1.2,
      });

      await expect(service.process(QUERY)).rejects.toThrow(ServiceError);
    });

    it('should log counts but never the query or entity text', async () => {
      provider.willReturn({ category: 'Person', match: 'John Doe', score: 0.95 });

      await service.process(QUERY);

      const event = log.events.find((e) => e.message === 'PII detection complete');
      expect(event?.fields).toMatchObject({
        queryLength: QUERY.length,
        candidateCount: 1,
        entityCount: 1,
        categories: ['Person'],
        mode: 'redact',
        threshold: 0.8,
        shouldReject: false,
      });
      expect(JSON.stringify(log.events)).not.toContain('John Doe');
    });
  });

  describe('summarize', () => {
    it('should count surviving entities per category', async () => {
      provider.willReturn(
        { category: 'Person', match: 'Ann', score: 0.9 },
        { category: 'Person', match: 'Bob', score: 0.9 },
        { category: 'PhoneNumber', match: '555-0100', score: 0.9 },
        { category: 'Age', match: '45', score: 0.3 }
      );

      const result = await service.process('Ann and Bob, 45, call 555-0100');

      expect(service.summarize(result)).toEqual({ Person: 2, PhoneNumber: 1 });
    });

    it('should return an empty summary when nothing was found', async () => {
      const result = await service.process('hello');

      expect(service.summarize(result)).toEqual({});
    });
  });
});
