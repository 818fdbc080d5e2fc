#!/usr/bin/env tsx

/**
 * Run an agent on one or more uploaded videos.
 *
 * Usage:
 *   npm run run-agent -- --agent-id AGENT_ID --video-ids VID1,VID2 [--callback-url URL]
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { AgentRunClient, parseVideoIds } from '../lib/agent-runs';
import { ClientConfigLoader } from '../lib/api-config';
import { ApiRequestError, ControlPlaneClient } from '../lib/control-plane-client';

async function main() {
  const { values } = parseArgs({
    options: {
      'agent-id': { type: 'string' },
      'video-ids': { type: 'string' },
      'callback-url': { type: 'string' },
      'api-key': { type: 'string' },
      'base-url': { type: 'string' },
    },
  });

  const agentId = values['agent-id'];
  if (!agentId || !values['video-ids']) {
    console.error('❌ --agent-id and --video-ids are required');
    process.exit(1);
  }

  const videoIds = parseVideoIds(values['video-ids']);
  if (videoIds.length === 0) {
    console.error('❌ Provide at least one video id via --video-ids');
    process.exit(1);
  }

  try {
    const config = ClientConfigLoader.loadConfig();
    const client = new ControlPlaneClient({
      baseUrl: values['base-url'] || config.baseUrl,
      apiKey: ClientConfigLoader.resolveApiKey(values['api-key']),
      timeoutMs: config.controlPlaneTimeoutMs,
    });

    console.log('\n🚀 Starting agent run...');
    const runId = await new AgentRunClient(client).runAgent(agentId, videoIds, values['callback-url']);
    console.log(`✅ Run started\nrun_id ${runId}`);
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

export { main as runAgentCli };
