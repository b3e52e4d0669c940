import { describe, it, expect } from 'vitest';
import {
  createLogger,
  generateCorrelationId,
  redactObject,
  shouldRedactKey,
} from '../logger.js';

function captureLogs() {
  const lines: Record<string, unknown>[] = [];
  const destination = {
    write(message: string) {
      const line: Record<string, unknown> = JSON.parse(message);
      lines.push(line);
    },
  };
  return { lines, destination };
}

describe('createLogger', () => {
  it('should honour an explicit level', () => {
    const logger = createLogger({ name: 'test', level: 'warn' });
    expect(logger.level).toBe('warn');
  });

  it('should read LOG_LEVEL by default', () => {
    const logger = createLogger({ name: 'test' });
    expect(logger.level).toBe('silent');
  });

  it('should redact clinical fields at any depth before writing', () => {
    const { lines, destination } = captureLogs();
    const logger = createLogger({ name: 'test', level: 'info', destination });

    logger.info(
      { patientId: 'p-1', entry: { status: 'deep_caries', description: 'pain at night' } },
      'Entry appended'
    );

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      msg: 'Entry appended',
      patientId: 'p-1',
      entry: { status: 'deep_caries', description: '[REDACTED]' },
    });
  });

  it('should keep errors intact for the err serializer', () => {
    const { lines, destination } = captureLogs();
    const logger = createLogger({ name: 'test', level: 'info', destination });

    logger.error({ err: new Error('connection reset') }, 'Append failed');

    expect(lines[0]).toMatchObject({
      msg: 'Append failed',
      err: { type: 'Error', message: 'connection reset' },
    });
  });
});

describe('generateCorrelationId', () => {
  it('should produce timestamp-prefixed ids', () => {
    expect(generateCorrelationId()).toMatch(/^\d+-[a-z0-9]+$/);
  });

  it('should not repeat', () => {
    expect(generateCorrelationId()).not.toBe(generateCorrelationId());
  });
});

describe('redaction', () => {
  it('should flag clinical free-text keys', () => {
    expect(shouldRedactKey('description')).toBe(true);
    expect(shouldRedactKey('treatmentPerformed')).toBe(true);
    expect(shouldRedactKey('Diagnosis')).toBe(true);
  });

  it('should keep identifiers', () => {
    expect(shouldRedactKey('patientId')).toBe(false);
    expect(shouldRedactKey('toothNumber')).toBe(false);
  });

  it('should redact nested objects and arrays', () => {
    const input = {
      patientId: 'p-1',
      toothNumber: 21,
      entry: { status: 'deep_caries', description: 'pain at night' },
      cells: [{ diagnosis: 'fracture', position: 3 }],
    };

    expect(redactObject(input)).toEqual({
      patientId: 'p-1',
      toothNumber: 21,
      entry: { status: 'deep_caries', description: '[REDACTED]' },
      cells: [{ diagnosis: '[REDACTED]', position: 3 }],
    });
  });

  it('should leave dates and errors as they are', () => {
    const at = new Date('2024-06-01T00:00:00.000Z');
    const error = new Error('x');

    expect(redactObject({ at, error })).toEqual({ at, error });
  });
});
