/**
 * Unit tests for LogEntry construction, serialization and context extraction
 */

import {
  auditContextFromMetadata,
  buildMetadata,
  createLogEntry,
  serializeLogEntry,
} from '../../audit/logEntry';
import { getRequestIdFromContext, getUserIdFromContext, toRequestContext } from '../../audit/context';

describe('request context extraction', () => {
  it('should read request id and user id', () => {
    const ctx = { requestId: 'req-1', userId: 3 };

    expect(getRequestIdFromContext(ctx)).toBe('req-1');
    expect(getUserIdFromContext(ctx)).toBe(3);
  });

  it('should read missing or mistyped values as absent', () => {
    expect(getRequestIdFromContext(undefined)).toBe('');
    expect(getRequestIdFromContext({ requestId: 42 })).toBe('');
    expect(getUserIdFromContext({ userId: '3' })).toBe(0);
    expect(getUserIdFromContext({ userId: 1.5 })).toBe(0);
    expect(getUserIdFromContext(null)).toBe(0);
  });

  it('should drop absent fields when normalizing', () => {
    expect(toRequestContext({ requestId: '', userId: 0 })).toEqual({});
    expect(toRequestContext({ requestId: 'req-1', other: true })).toEqual({ requestId: 'req-1' });
  });
});

describe('buildMetadata', () => {
  it('should return undefined for an empty context', () => {
    expect(buildMetadata()).toBeUndefined();
    expect(buildMetadata({})).toBeUndefined();
  });

  it('should merge extra with the promoted keys, promoted keys winning', () => {
    expect(
      buildMetadata({ action: 'GetUser', resource: 'users', resourceId: '7', extra: { count: 2, action: 'x' } })
    ).toEqual({ count: 2, action: 'GetUser', resource: 'users', resource_id: '7' });
  });
});

describe('auditContextFromMetadata', () => {
  it('should promote string action, resource and resource_id', () => {
    expect(
      auditContextFromMetadata({ action: 'CreateUser', resource: 'users', resource_id: '42', attempt: 2 })
    ).toEqual({ action: 'CreateUser', resource: 'users', resourceId: '42', extra: { attempt: 2 } });
  });

  it('should keep non-string promoted keys in extra and drop non-scalars', () => {
    expect(auditContextFromMetadata({ resource_id: 42, nested: { a: 1 } })).toEqual({ extra: { resource_id: 42 } });
  });
});

describe('createLogEntry', () => {
  it('should fill every field from context and audit', () => {
    const error = new Error('boom');

    const entry = createLogEntry(
      'geav-site-api',
      'ERROR',
      'Error creating user',
      { requestId: 'req-1', userId: 3 },
      error,
      { action: 'CreateUser', resource: 'users', resourceId: '42' }
    );

    expect(entry).toEqual({
      timestamp: expect.any(Date),
      level: 'ERROR',
      message: 'Error creating user',
      serviceName: 'geav-site-api',
      requestId: 'req-1',
      userId: 3,
      action: 'CreateUser',
      resource: 'users',
      resourceId: '42',
      metadata: { action: 'CreateUser', resource: 'users', resource_id: '42' },
      error,
    });
  });

  it('should use zero values when context and audit are absent', () => {
    const entry = createLogEntry('geav-site-api', 'INFO', 'hello', undefined, null);

    expect(entry.requestId).toBe('');
    expect(entry.userId).toBe(0);
    expect(entry.action).toBe('');
    expect(entry).not.toHaveProperty('metadata');
    expect(entry).not.toHaveProperty('error');
  });

  it('should stamp the time of creation', () => {
    const before = Date.now();
    const entry = createLogEntry('geav-site-api', 'DEBUG', 'tick', {});

    expect(entry.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    expect(entry.timestamp.getTime()).toBeLessThanOrEqual(Date.now());
  });
});

describe('serializeLogEntry', () => {
  it('should write snake_case keys and leave out empty fields and the error', () => {
    const timestamp = new Date('2024-01-15T10:00:00.000Z');

    const serialized = serializeLogEntry({
      timestamp,
      level: 'WARN',
      message: 'User not found',
      serviceName: 'geav-site-api',
      requestId: '',
      userId: 0,
      action: 'GetUser',
      resource: 'users',
      resourceId: '99',
      metadata: { action: 'GetUser', resource: 'users', resource_id: '99' },
      error: new Error('hidden'),
    });

    expect(serialized).toEqual({
      timestamp: '2024-01-15T10:00:00.000Z',
      level: 'WARN',
      message: 'User not found',
      service_name: 'geav-site-api',
      action: 'GetUser',
      resource: 'users',
      resource_id: '99',
      metadata: { action: 'GetUser', resource: 'users', resource_id: '99' },
    });
  });
});
