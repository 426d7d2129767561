import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';
import type {MonitoringAlert} from '../types';
import type {MonitoringService} from '../pure/effects';
import type {AwsConfig} from './types';

export function describeAlert(alert: MonitoringAlert): string {
  switch (alert.type) {
    case 'stock_reconciliation':
      return `Stock reconciliation needed: ${alert.productName} has ${alert.available} left (order: ${alert.orderCode})`;
    case 'dispatch_failed':
      return `Dispatch failed for order ${alert.orderCode}: ${alert.reason}`;
  }
}

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

export class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    const clientConfig = {
      region: config.region,
      endpoint: config.endpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };
    this.cloudwatch = new CloudWatchClient(clientConfig);
    this.sns = new SNSClient(clientConfig);
  }

  async sendAlerts(alerts: MonitoringAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    const count = (type: MonitoringAlert['type']) => alerts.filter(alert => alert.type === type).length;

    try {
      const metricCommand = new PutMetricDataCommand({
        Namespace: 'CashOnDelivery',
        MetricData: [
          { MetricName: 'StockReconciliation', Value: count('stock_reconciliation'), Unit: 'Count', Timestamp: new Date() },
          { MetricName: 'DispatchFailed', Value: count('dispatch_failed'), Unit: 'Count', Timestamp: new Date() },
        ],
      });
      await this.cloudwatch.send(metricCommand);

      const snsCommand = new PublishCommand({
        TopicArn: this.config.alertTopicArn,
        Subject: 'Order Alert',
        Message: alerts.map(describeAlert).join('\n'),
      });
      await this.sns.send(snsCommand);

      console.log(`Sent ${alerts.length} alerts to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }
}

export class LoggingMonitoringService implements MonitoringService {
  async sendAlerts(alerts: MonitoringAlert[]): Promise<void> {
    for (const alert of alerts) {
      console.warn(`[alert] ${describeAlert(alert)}`);
    }
  }
}
