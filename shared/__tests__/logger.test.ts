/**
 * Unit tests for Logger
 */

import { Logger, createLogger } from '../utils/logger';
import { ConsoleLogLine } from '../types/logging.types';

describe('Logger', () => {
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;
  let logger: Logger;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    logger = new Logger('test-component');
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should log debug messages with correct structure', () => {
    logger.debug('Debug message', { foo: 'bar' });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;

    expect(line.severity).toBe('DEBUG');
    expect(line.message).toBe('Debug message');
    expect(line.component).toBe('test-component');
    expect(line.metadata).toEqual({ foo: 'bar' });
    expect(line.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should log warnings on stdout', () => {
    logger.warn('Warning message');

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.severity).toBe('WARN');
    expect(line).not.toHaveProperty('metadata');
  });

  it('should log errors on stderr with error details', () => {
    logger.error('Error occurred', new Error('Test error'), { table: 'api_logs' });

    expect(consoleLogSpy).not.toHaveBeenCalled();
    const line = JSON.parse(consoleErrorSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.severity).toBe('ERROR');
    expect(line.error?.name).toBe('Error');
    expect(line.error?.message).toBe('Test error');
    expect(line.error?.stack).toBeDefined();
    expect(line.metadata).toEqual({ table: 'api_logs' });
  });

  it('should log fatal messages on stderr', () => {
    logger.fatal('Failed to start', new Error('port in use'));

    const line = JSON.parse(consoleErrorSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.severity).toBe('FATAL');
  });

  it('should lift requestId and userId out of metadata', () => {
    logger.info('Incoming request', { requestId: 'req-789', userId: 3, method: 'GET' });

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.requestId).toBe('req-789');
    expect(line.userId).toBe(3);
  });

  it('should ignore an empty requestId and a zero userId', () => {
    logger.info('Message', { requestId: '', userId: 0 });

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line).not.toHaveProperty('requestId');
    expect(line).not.toHaveProperty('userId');
  });

  it('should write bigint metadata as a string', () => {
    logger.info('Message', { rows: BigInt('9007199254740993') });

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.metadata).toEqual({ rows: '9007199254740993' });
  });

  it('should create logger with createLogger function', () => {
    createLogger('new-component').info('Test message');

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]) as ConsoleLogLine;
    expect(line.component).toBe('new-component');
  });
});
