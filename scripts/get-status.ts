#!/usr/bin/env tsx

/**
 * Fetch or watch the status of an agent run.
 *
 * Usage:
 *   npm run get-status -- --run-id RUN_ID [--watch] [--interval 5]
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { AgentRunClient, summarizeRunStatus } from '../lib/agent-runs';
import { ClientConfigLoader } from '../lib/api-config';
import { ApiRequestError, ControlPlaneClient } from '../lib/control-plane-client';

async function main() {
  const { values } = parseArgs({
    options: {
      'run-id': { type: 'string' },
      watch: { type: 'boolean', default: false },
      interval: { type: 'string', default: '5' },
      'api-key': { type: 'string' },
      'base-url': { type: 'string' },
    },
  });

  const runId = values['run-id'];
  if (!runId) {
    console.error('❌ --run-id is required');
    process.exit(1);
  }

  const intervalSeconds = Number(values.interval);
  if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
    console.error('❌ --interval must be a positive number of seconds');
    process.exit(1);
  }

  try {
    const config = ClientConfigLoader.loadConfig();
    const runs = new AgentRunClient(
      new ControlPlaneClient({
        baseUrl: values['base-url'] || config.baseUrl,
        apiKey: ClientConfigLoader.resolveApiKey(values['api-key']),
        timeoutMs: config.controlPlaneTimeoutMs,
      })
    );

    if (!values.watch) {
      const data = await runs.getRunStatus(runId);
      console.log(JSON.stringify(data, null, 2));
      return;
    }

    console.log(`👀 Watching run ${runId} (every ${intervalSeconds}s)...`);
    const final = await runs.watchRun(runId, {
      intervalMs: intervalSeconds * 1000,
      onUpdate: (status) => summarizeRunStatus(status).forEach((line) => console.log(line)),
    });
    console.log('\n📦 Full response:');
    console.log(JSON.stringify(final, null, 2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    if (error instanceof ApiRequestError && error.body) {
      console.error(error.body);
    }
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error(error);
    process.exit(1);
  });
}

export { main as getStatusCli };
