/**
 * Unit tests for CloudWatchAuditLogger
 */

import { PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { CloudWatchAuditLogger, buildMetricDatum, metricNameFor } from '../../audit/CloudWatchAuditLogger';
import { createLogEntry } from '../../audit/logEntry';
import { Logger } from '../../utils/logger';

describe('CloudWatchAuditLogger', () => {
  let client: { send: jest.Mock };
  let fallback: Logger;
  let fallbackError: jest.SpyInstance;
  let consoleLogSpy: jest.SpyInstance;
  let sink: CloudWatchAuditLogger;

  beforeEach(() => {
    client = { send: jest.fn().mockResolvedValue({}) };
    fallback = new Logger('test');
    fallbackError = jest.spyOn(fallback, 'error').mockImplementation();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    sink = new CloudWatchAuditLogger(client, 'geav-site-api', 'GeavSite/API', fallback);
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('metric naming', () => {
    it('should combine level and resource', () => {
      const entry = createLogEntry('geav-site-api', 'ERROR', 'boom', {}, null, { resource: 'users' });

      expect(metricNameFor(entry)).toBe('ERROR_users');
    });

    it('should use the bare level without a resource', () => {
      const entry = createLogEntry('geav-site-api', 'INFO', 'hello', {});

      expect(metricNameFor(entry)).toBe('INFO');
    });

    it('should add Resource and Action dimensions only when set', () => {
      const entry = createLogEntry('geav-site-api', 'INFO', 'ok', {}, null, {
        action: 'ListLugares',
        resource: 'lugares',
      });

      expect(buildMetricDatum(entry)).toEqual({
        MetricName: 'INFO_lugares',
        Dimensions: [
          { Name: 'ServiceName', Value: 'geav-site-api' },
          { Name: 'Resource', Value: 'lugares' },
          { Name: 'Action', Value: 'ListLugares' },
        ],
        Timestamp: entry.timestamp,
        Value: 1,
        Unit: 'Count',
      });
    });
  });

  it('should send one datum under the namespace and echo the entry on stdout', async () => {
    await sink.warn({ requestId: 'req-3', userId: 9 }, 'Cancao not found', {
      action: 'GetCancao',
      resource: 'cancoes',
      resourceId: '12',
    });

    expect(client.send).toHaveBeenCalledTimes(1);
    const command = client.send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutMetricDataCommand);
    expect(command.input.Namespace).toBe('GeavSite/API');
    expect(command.input.MetricData).toHaveLength(1);
    expect(command.input.MetricData[0].MetricName).toBe('WARN_cancoes');

    const line = JSON.parse(consoleLogSpy.mock.calls[0][0]);
    expect(line).toEqual({
      timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      level: 'WARN',
      message: 'Cancao not found',
      service_name: 'geav-site-api',
      request_id: 'req-3',
      user_id: 9,
      action: 'GetCancao',
      resource: 'cancoes',
      resource_id: '12',
      metadata: { action: 'GetCancao', resource: 'cancoes', resource_id: '12' },
    });
  });

  it('should still echo the entry when the metric call fails', async () => {
    client.send.mockRejectedValue(new Error('AccessDenied'));

    await expect(sink.error({}, 'boom', new Error('x'), { resource: 'users' })).resolves.toBeUndefined();

    expect(fallbackError).toHaveBeenCalledWith('Error sending metric to CloudWatch', expect.any(Error), {
      namespace: 'GeavSite/API',
      metricName: 'ERROR_users',
    });
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });

  it('should report an entry that cannot be serialized and skip the echo', async () => {
    await sink.info({}, 'big', { extra: { rows: BigInt(5) } });

    expect(client.send).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(fallbackError).toHaveBeenCalledWith('Error serializing log entry', expect.any(Error), {
      level: 'INFO',
      message: 'big',
    });
  });
});
