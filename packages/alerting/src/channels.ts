/**
 * Notification channels
 *
 * primary channels (email) only receive critical alerts; secondary channels
 * (chat) receive warnings and criticals. Routing lives in AlertManager, a
 * channel only knows how to deliver.
 */

import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import { AlertEvent, Severity } from '@sentinel/shared-types';
import { HttpTransport } from './transport';

export type ChannelTier = 'primary' | 'secondary';

export interface NotificationChannel {
  readonly name: string;
  readonly tier: ChannelTier;
  send(alert: AlertEvent): Promise<void>;
}

const SEVERITY_EMOJI: Record<Severity, string> = {
  [Severity.INFO]: ':information_source:',
  [Severity.WARNING]: ':warning:',
  [Severity.CRITICAL]: ':rotating_light:',
};

const SEVERITY_COLOR: Record<Severity, string> = {
  [Severity.INFO]: '#439FE0',
  [Severity.WARNING]: '#FFA500',
  [Severity.CRITICAL]: '#FF0000',
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  // undefined, functions and symbols have no JSON form
  const json: string | undefined = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

export function buildSlackPayload(alert: AlertEvent): Record<string, unknown> {
  const fields = Object.entries(alert.context)
    .slice(0, 10)
    .map(([key, value]) => ({
      title: key,
      value: formatValue(value).slice(0, 500),
      short: formatValue(value).length < 40,
    }));

  return {
    text: `${SEVERITY_EMOJI[alert.severity]} *${alert.title}*`,
    attachments: [
      {
        color: SEVERITY_COLOR[alert.severity],
        text: alert.message,
        fields,
        footer: `${alert.category} | ${alert.timestamp.toISOString()}`,
      },
    ],
  };
}

export class SlackChannel implements NotificationChannel {
  readonly name = 'slack';
  readonly tier: ChannelTier = 'secondary';

  constructor(
    private readonly webhookUrl: string,
    private readonly transport: HttpTransport = new HttpTransport()
  ) {}

  async send(alert: AlertEvent): Promise<void> {
    await this.transport.postJson(this.webhookUrl, buildSlackPayload(alert));
  }
}

export interface EmailChannelConfig {
  region: string;
  from: string;
  to: string[];
}

export function formatEmail(alert: AlertEvent): { subject: string; body: string } {
  const lines = [
    alert.message,
    '',
    `Severity: ${alert.severity}`,
    `Category: ${alert.category}`,
    `Time: ${alert.timestamp.toISOString()}`,
  ];
  const contextKeys = Object.keys(alert.context);
  if (contextKeys.length > 0) {
    lines.push('', 'Context:');
    for (const key of contextKeys) {
      lines.push(`  ${key}: ${formatValue(alert.context[key])}`);
    }
  }

  return {
    subject: `[${alert.severity.toUpperCase()}] ${alert.title}`,
    body: lines.join('\n'),
  };
}

export class EmailChannel implements NotificationChannel {
  readonly name = 'email';
  readonly tier: ChannelTier = 'primary';
  private client: SESClient;

  constructor(private readonly config: EmailChannelConfig, client?: SESClient) {
    this.client = client ?? new SESClient({ region: config.region });
  }

  async send(alert: AlertEvent): Promise<void> {
    const { subject, body } = formatEmail(alert);
    await this.client.send(
      new SendEmailCommand({
        Source: this.config.from,
        Destination: { ToAddresses: this.config.to },
        Message: {
          Subject: { Data: subject, Charset: 'UTF-8' },
          Body: { Text: { Data: body, Charset: 'UTF-8' } },
        },
      })
    );
  }
}
