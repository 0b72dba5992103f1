import { describe, it, expect } from 'vitest';
import { createLogger, errorMessage, resolveLogLevel } from '@stakewatch/logging';

describe('createLogger', () => {
  it('writes tagged lines with fields, prefixing non-info levels', () => {
    const lines: string[] = [];
    const log = createLogger('sync', { level: 'debug', write: (line) => lines.push(line) });

    log.info('Synchronized holdings', { upserted: 3, removed: 0 });
    log.warn('Dropped', { investors: 'Alpha Fund, Beta Fund', skipped: undefined });
    log.child('deals').debug('Locked');

    expect(lines).toEqual([
      '[sync] Synchronized holdings upserted=3 removed=0\n',
      'WARN [sync] Dropped investors="Alpha Fund, Beta Fund"\n',
      'DEBUG [sync:deals] Locked\n',
    ]);
  });

  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const log = createLogger('api', { level: 'warn', write: (line) => lines.push(line) });

    log.info('hidden');
    log.error('shown');

    expect(lines).toEqual(['ERROR [api] shown\n']);
  });
});

describe('resolveLogLevel', () => {
  it('normalizes known levels and falls back to info', () => {
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
