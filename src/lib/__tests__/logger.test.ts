import { describe, it, expect, vi } from 'vitest';
import { Logger } from '../logger.js';

describe('Logger', () => {
  it('writes one JSON line per message with its fields', () => {
    const writer = vi.fn();
    const logger = new Logger({ logLevel: 'info' }, writer);
    logger.info('replacing resource', { resource_id: 'abc/logs' });

    expect(writer).toHaveBeenCalledOnce();
    const line: string = writer.mock.calls[0]![0];
    expect(line.endsWith('\n')).toBe(true);
    const parsed = JSON.parse(line);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('replacing resource');
    expect(parsed.resource_id).toBe('abc/logs');
    expect(typeof parsed.timestamp).toBe('string');
  });

  it('drops messages below the configured level', () => {
    const writer = vi.fn();
    const logger = new Logger({ logLevel: 'warn' }, writer);
    logger.trace('request');
    logger.info('started');
    logger.warn('skipped action');

    expect(writer).toHaveBeenCalledOnce();
    expect(JSON.parse(writer.mock.calls[0]![0]).message).toBe('skipped action');
  });

  it('writes trace messages only at trace level', () => {
    const writer = vi.fn();
    const logger = new Logger({ logLevel: 'trace' }, writer);
    logger.trace('sending request');

    expect(logger.isEnabled('trace')).toBe(true);
    expect(JSON.parse(writer.mock.calls[0]![0]).level).toBe('trace');
    expect(new Logger({ logLevel: 'info' }, writer).isEnabled('trace')).toBe(false);
  });
});
