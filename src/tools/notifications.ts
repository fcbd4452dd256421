import { getServices } from '../services.js';
import type { Notification } from '../types.js';

export async function handleSendNotification(args: Notification) {
  const { notifications } = getServices();
  const receipt = await notifications.dispatch(args);
  return {
    success: true as const,
    message: 'Notification sent',
    channel: receipt.channel,
    forwarded: receipt.forwarded,
  };
}

export const notificationTools = {
  send_notification: {
    description: 'Send a notification to the principal. Always logged; high and urgent notifications are also forwarded to the configured webhook.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        message: { type: 'string', description: 'Notification message' },
        priority: { type: 'string', enum: ['low', 'normal', 'high', 'urgent'], description: 'Notification priority' },
        channel: { type: 'string', description: 'Notification channel (default webhook)' },
      },
      required: ['message', 'priority'],
    },
    handler: handleSendNotification,
  },
};
