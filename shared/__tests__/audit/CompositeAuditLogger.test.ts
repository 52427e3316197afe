/**
 * Unit tests for CompositeAuditLogger and the BaseAuditLogger dispatch
 */

import { AuditLogger, BaseAuditLogger } from '../../audit/AuditLogger';
import { CompositeAuditLogger } from '../../audit/CompositeAuditLogger';
import { LogEntry } from '../../types/logging.types';
import { Logger } from '../../utils/logger';
import { RecordingAuditLogger } from '../fixtures/RecordingAuditLogger';

class ThrowingSink extends BaseAuditLogger {
  constructor(fallback: Logger) {
    super('geav-site-api', fallback);
  }

  protected async write(_entry: LogEntry): Promise<void> {
    throw new Error('sink exploded');
  }
}

describe('CompositeAuditLogger', () => {
  let fallback: Logger;
  let fallbackError: jest.SpyInstance;

  beforeEach(() => {
    fallback = new Logger('test');
    fallbackError = jest.spyOn(fallback, 'error').mockImplementation();
  });

  it('should forward every call to each logger in order', async () => {
    const order: string[] = [];
    const first = new RecordingAuditLogger();
    const second = new RecordingAuditLogger();
    jest.spyOn(first, 'info').mockImplementation(async () => {
      order.push('first');
    });
    jest.spyOn(second, 'info').mockImplementation(async () => {
      order.push('second');
    });
    const composite = new CompositeAuditLogger([first, second], fallback);

    await composite.info({ requestId: 'req-1' }, 'User retrieved successfully', { action: 'GetUser' });

    expect(order).toEqual(['first', 'second']);
    expect(first.info).toHaveBeenCalledWith({ requestId: 'req-1' }, 'User retrieved successfully', {
      action: 'GetUser',
    });
  });

  it('should pass the error through to each logger', async () => {
    const first = new RecordingAuditLogger();
    const second = new RecordingAuditLogger();
    const composite = new CompositeAuditLogger([first, second], fallback);
    const error = new Error('boom');

    await composite.fatal(undefined, 'Crash', error);

    expect(first.last).toEqual({ level: 'FATAL', ctx: undefined, message: 'Crash', error, audit: undefined });
    expect(second.last?.error).toBe(error);
  });

  it('should keep going when one logger rejects', async () => {
    const broken: AuditLogger = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn().mockRejectedValue(new Error('misbehaving sink')),
      error: jest.fn(),
      fatal: jest.fn(),
    };
    const healthy = new RecordingAuditLogger();
    const composite = new CompositeAuditLogger([broken, healthy], fallback);

    await expect(composite.warn({}, 'Lugar not found')).resolves.toBeUndefined();

    expect(healthy.summary()).toEqual(['WARN Lugar not found']);
    expect(fallbackError).toHaveBeenCalledWith('Audit logger rejected', expect.any(Error), {
      method: 'warn',
      index: 0,
    });
  });

  it('should not be affected by later changes to the input array', async () => {
    const loggers: AuditLogger[] = [new RecordingAuditLogger()];
    const composite = new CompositeAuditLogger(loggers, fallback);

    loggers.push(new RecordingAuditLogger());

    expect(composite.size).toBe(1);
  });

  it('should do nothing with no loggers', async () => {
    await expect(new CompositeAuditLogger([], fallback).debug(undefined, 'quiet')).resolves.toBeUndefined();
  });
});

describe('BaseAuditLogger', () => {
  it('should report a write that throws on the fallback channel and resolve', async () => {
    const fallback = new Logger('test');
    const fallbackError = jest.spyOn(fallback, 'error').mockImplementation();
    const sink = new ThrowingSink(fallback);

    await expect(sink.info({}, 'hello')).resolves.toBeUndefined();

    expect(fallbackError).toHaveBeenCalledWith('Unhandled audit sink failure', expect.any(Error), {
      level: 'INFO',
      message: 'hello',
    });
  });
});
