/**
 * CloudWatchAuditLogger - metrics sink
 *
 * Emits one Count datum per audit call and echoes the entry as a JSON line
 * on stdout for local visibility.
 */

import {
  CloudWatchClient,
  Dimension,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { LogEntry } from '../types/logging.types';
import { toError } from '../errors/AppError';
import { createLogger, Logger } from '../utils/logger';
import { BaseAuditLogger } from './AuditLogger';
import { serializeLogEntry } from './logEntry';

export type MetricsClient = Pick<CloudWatchClient, 'send'>;

/**
 * `{level}_{resource}`, or just the level when there is no resource
 */
export function metricNameFor(entry: LogEntry): string {
  return entry.resource !== '' ? `${entry.level}_${entry.resource}` : entry.level;
}

export function buildMetricDatum(entry: LogEntry): MetricDatum {
  const dimensions: Dimension[] = [{ Name: 'ServiceName', Value: entry.serviceName }];

  if (entry.resource !== '') {
    dimensions.push({ Name: 'Resource', Value: entry.resource });
  }

  if (entry.action !== '') {
    dimensions.push({ Name: 'Action', Value: entry.action });
  }

  return {
    MetricName: metricNameFor(entry),
    Dimensions: dimensions,
    Timestamp: entry.timestamp,
    Value: 1.0,
    Unit: StandardUnit.Count,
  };
}

export class CloudWatchAuditLogger extends BaseAuditLogger {
  constructor(
    private readonly client: MetricsClient,
    serviceName: string,
    private readonly namespace: string,
    fallback: Logger = createLogger('CloudWatchAuditLogger')
  ) {
    super(serviceName, fallback);
  }

  protected async write(entry: LogEntry): Promise<void> {
    try {
      await this.client.send(
        new PutMetricDataCommand({
          Namespace: this.namespace,
          MetricData: [buildMetricDatum(entry)],
        })
      );
    } catch (error) {
      this.fallback.error('Error sending metric to CloudWatch', toError(error), {
        namespace: this.namespace,
        metricName: metricNameFor(entry),
      });
    }

    let line: string;
    try {
      line = JSON.stringify(serializeLogEntry(entry));
    } catch (error) {
      this.fallback.error('Error serializing log entry', toError(error), {
        level: entry.level,
        message: entry.message,
      });
      return;
    }

    console.log(line);
  }
}
