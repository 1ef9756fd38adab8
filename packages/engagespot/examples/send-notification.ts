/**
 * Sends one notification and updates one user's attributes.
 *
 * Reads ENGAGESPOT_API_KEY / ENGAGESPOT_API_SECRET from .env, and the
 * recipient from EXAMPLE_RECIPIENT.
 *
 *   npx tsx packages/engagespot/examples/send-notification.ts
 */

import { config } from 'dotenv';
import { Engagespot, NotificationBuilder, getLogger, serializeError } from '../src/index.js';

config();

const logger = getLogger('example');

interface OrderData {
  orderId: string;
}

async function main(): Promise<void> {
  const engagespot = Engagespot.fromEnv();
  const recipient = process.env.EXAMPLE_RECIPIENT || 'jane@example.com';

  const notification = new NotificationBuilder<OrderData>('Test', [recipient])
    .title('Message received')
    .message('New message received')
    .icon('favicon.png')
    .url('https://example.com')
    .data({ orderId: '42' })
    .build();

  const sent = await engagespot.send(notification);
  logger.info(sent.success ? `Response is ${sent.data}` : `Error: ${sent.error}`);

  const updated = await engagespot.createOrUpdateUserAttrs(recipient, { plan: 'pro' });
  logger.info(updated.success ? `Response is ${updated.data}` : `Error: ${updated.error}`);
}

main().catch((error: unknown) => {
  logger.error('Example failed', { error: serializeError(error) });
  process.exitCode = 1;
});
