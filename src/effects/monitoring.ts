import type {SideEffectFailureAlert} from '../types';
import type {MonitoringService} from '../pure/effects';
import type {AwsConfig} from './types';
import {CloudWatchClient, PutMetricDataCommand} from '@aws-sdk/client-cloudwatch';
import {PublishCommand, SNSClient} from '@aws-sdk/client-sns';

// ============================================================================
// CloudWatch Monitoring Service (CloudWatch + SNS)
// ============================================================================

export function describeAlert(alert: SideEffectFailureAlert): string {
  return `${alert.sideEffect} failed for order ${alert.orderId} (user ${alert.userId}): ${alert.detail}`;
}

export class CloudWatchMonitoringService implements MonitoringService {
  private cloudwatch: CloudWatchClient;
  private sns: SNSClient;

  constructor(private config: AwsConfig) {
    const clientConfig = {
      region: config.region,
      endpoint: config.monitoringEndpoint,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    };
    this.cloudwatch = new CloudWatchClient(clientConfig);
    this.sns = new SNSClient(clientConfig);
  }

  async sendAlerts(alerts: SideEffectFailureAlert[]): Promise<void> {
    if (alerts.length === 0) {
      return;
    }

    try {
      await this.cloudwatch.send(new PutMetricDataCommand({
        Namespace: 'CoffeeCommerce',
        MetricData: [
          {
            MetricName: 'SideEffectFailures',
            Value: alerts.length,
            Unit: 'Count',
            Timestamp: new Date(),
          },
        ],
      }));

      await this.sns.send(new PublishCommand({
        TopicArn: this.config.alertsTopicArn,
        Subject: 'Commerce Alert: Post-commit side effects failed',
        Message: `The following writes need reconciliation:\n\n${alerts.map(describeAlert).join('\n')}`,
      }));

      console.log(`🚨 Sent ${alerts.length} side effect alert(s) to monitoring service`);
    } catch (error) {
      console.error('Failed to send monitoring alerts:', error);
      throw new Error('Monitoring service unavailable');
    }
  }

  destroy(): void {
    this.cloudwatch.destroy();
    this.sns.destroy();
  }
}
