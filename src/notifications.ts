import type { StateManager } from './state.js';
import type { Logger } from './logger.js';
import type { Clock, Notification, NotificationPriority, NotificationReceipt, WebhookPayload } from './types.js';
import { preview } from './utils.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface NotificationDispatcherOptions {
  state: StateManager;
  logger: Logger;
  clock: Clock;
  webhookUrl: string | null;
  timeoutMs: number;
  fetch?: FetchLike;
}

const DEFAULT_CHANNEL = 'webhook';

export function isEscalated(priority: NotificationPriority): boolean {
  return priority === 'high' || priority === 'urgent';
}

export class NotificationDispatcher {
  private readonly state: StateManager;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly webhookUrl: string | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: NotificationDispatcherOptions) {
    this.state = options.state;
    this.logger = options.logger;
    this.clock = options.clock;
    this.webhookUrl = options.webhookUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Succeeds once the metric is counted and the notification logged; forwarding is best effort. */
  async dispatch(notification: Notification): Promise<NotificationReceipt> {
    const channel = notification.channel || DEFAULT_CHANNEL;
    this.logger.debug(`Sending notification (${notification.priority}): ${preview(notification.message)}`);
    const sent = await this.state.bumpMetric('notifications_sent');

    const escalated = isEscalated(notification.priority);
    if (escalated) {
      this.logger.warn(`NOTIFICATION [${notification.priority.toUpperCase()}]: ${notification.message}`);
    } else {
      this.logger.info(`NOTIFICATION [${notification.priority}]: ${notification.message}`);
    }

    const forwarded = this.webhookUrl && escalated
      ? await this.forward(this.webhookUrl, {
        message: notification.message,
        priority: notification.priority,
        timestamp: this.clock(),
      })
      : false;

    return { channel, notifications_sent: sent, forwarded };
  }

  private async forward(url: string, payload: WebhookPayload): Promise<boolean> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.logger.error({ status: response.status }, `Webhook responded with HTTP ${response.status}`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to send webhook');
      return false;
    }
  }
}
