import { describe, test, expect } from 'vitest';
import { createLogger } from '../services/logger';
import {
  CleanupError,
  ConfigurationError,
  describeError,
  DivisionByZeroError,
  ExternalToolError,
  isAbortError
} from '../services/errors';

const fixedNow = () => new Date('2026-01-02T03:04:05.000Z');

describe('createLogger', () => {
  test('writes one tagged JSON line per event', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'info', sink: (line) => lines.push(line), now: fixedNow });

    logger.info('tone.ready', { phase: 'INHALE' });

    expect(lines).toEqual(['[pacer] {"ts":"2026-01-02T03:04:05.000Z","level":"INFO","event":"tone.ready","phase":"INHALE"}']);
  });

  test('drops events below the level', () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: (line) => lines.push(line), now: fixedNow });

    logger.debug('asset.removed');
    logger.info('cycle.start');
    logger.warn('asset.cleanup_failed');
    logger.error('tone.synthesis_failed');

    expect(lines.map((line) => JSON.parse(line.slice('[pacer] '.length)).level)).toEqual(['WARN', 'ERROR']);
  });

  test('never throws, even for a broken sink or an unserialisable payload', () => {
    const throwing = createLogger({
      sink: () => {
        throw new Error('stderr closed');
      }
    });
    expect(() => throwing.error('x')).not.toThrow();

    const lines: string[] = [];
    const logger = createLogger({ sink: (line) => lines.push(line) });
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    logger.warn('x', { circular });

    expect(lines).toEqual(['[pacer] {"unserializable":"[object Object]"}']);
  });
});

describe('errors', () => {
  test('each error carries its code', () => {
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION');
    expect(new DivisionByZeroError(3).code).toBe('DIVISION_BY_ZERO');
    expect(new ExternalToolError('sox', 'sox failed').tool).toBe('sox');
    expect(new CleanupError('/tmp/a.wav').message).toBe('Could not remove /tmp/a.wav');
    expect(new DivisionByZeroError(3).name).toBe('DivisionByZeroError');
  });

  test('describeError gives one printable line', () => {
    expect(describeError(new ConfigurationError('Invalid configuration: --columns: too small'))).toBe(
      'Invalid configuration: --columns: too small'
    );
    expect(describeError(new TypeError('not a function'))).toBe('TypeError: not a function');
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError('text')).toBe('text');
    expect(describeError(null)).toBe('');
  });

  test('isAbortError looks at the name', () => {
    expect(isAbortError(Object.assign(new Error('stop'), { name: 'AbortError' }))).toBe(true);
    expect(isAbortError(new Error('stop'))).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});
