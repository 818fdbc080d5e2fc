#!/usr/bin/env tsx

/**
 * Webhook listener for agent run callbacks.
 *
 * Usage:
 *   npm run webhook-listener -- [--port 3000] [--host 0.0.0.0] [--webhook-secret SECRET]
 *
 * Environment:
 *   MOSAIC_WEBHOOK_SECRET   validate the X-Mosaic-Signature header
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { ClientConfigLoader } from '../lib/api-config';
import { WebhookHistory } from '../lib/webhook-history';
import { createWebhookApp, SIGNATURE_HEADER } from '../lib/webhook-listener';

async function main() {
  const { values } = parseArgs({
    options: {
      port: { type: 'string', default: '3000' },
      host: { type: 'string', default: '0.0.0.0' },
      'webhook-secret': { type: 'string' },
    },
  });

  const port = Number(values.port);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    console.error('❌ --port must be a valid TCP port');
    process.exit(1);
  }

  const secret = values['webhook-secret'] || ClientConfigLoader.loadConfig().webhookSecret;
  const app = createWebhookApp({ secret, history: new WebhookHistory() });

  console.log('\n📡 Webhook listener starting...');
  console.log(`   Local:   http://localhost:${port}`);
  console.log(`   Health:  http://localhost:${port}/health`);
  console.log(`   History: http://localhost:${port}/history`);
  console.log(`   Webhook: http://localhost:${port}/webhooks/mosaic`);
  console.log(`   Alt:     http://localhost:${port}/webhook`);

  if (secret) {
    console.log('\n🔐 Webhook secret validation: ENABLED');
    console.log(`   Expecting ${SIGNATURE_HEADER} header to match secret`);
    console.log(`   Source: ${values['webhook-secret'] ? '--webhook-secret flag' : 'MOSAIC_WEBHOOK_SECRET env var'}`);
  } else {
    console.log('\n🔓 Webhook secret validation: DISABLED');
    console.log('   Set --webhook-secret flag or MOSAIC_WEBHOOK_SECRET env var to enable');
  }

  const server = app.listen(port, values.host ?? '0.0.0.0');
  server.on('error', (error) => {
    console.error('❌ Webhook listener failed:', error);
    process.exit(1);
  });
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

export { main as webhookListenerCli };
