import { z } from 'zod';
import { AgentRunStatus } from '../types';
import { ApiRequestError, ControlPlaneClient, parseJsonBody } from './control-plane-client';
import { log } from './debug';

export const RUN_AGENT_TIMEOUT_MS = 60_000;
export const TERMINAL_RUN_STATUSES: readonly string[] = ['completed', 'failed'];

const runStartedSchema = z.object({ run_id: z.string().min(1) });

const runStatusSchema = z
  .object({
    status: z.string().optional(),
    outputs: z
      .array(
        z
          .object({
            video_url: z.string().optional(),
            url: z.string().optional(),
            thumbnail_url: z.string().optional(),
          })
          .passthrough()
      )
      .nullish()
      .transform((outputs) => outputs ?? undefined),
  })
  .passthrough();

export interface WatchOptions {
  intervalMs?: number;
  onUpdate?: (status: AgentRunStatus) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function parseVideoIds(ids: string): string[] {
  return ids
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class AgentRunClient {
  constructor(private client: ControlPlaneClient) {}

  /**
   * Start an agent run over uploaded videos and return its run id
   */
  async runAgent(agentId: string, videoIds: string[], callbackUrl?: string): Promise<string> {
    if (videoIds.length === 0) {
      throw new Error('Provide at least one video id');
    }

    const payload: { video_ids: string[]; callback_url?: string } = { video_ids: videoIds };
    if (callbackUrl) {
      payload.callback_url = callbackUrl;
    }

    const response = await this.client.postJson(
      `/agent/${encodeURIComponent(agentId)}/run`,
      payload,
      RUN_AGENT_TIMEOUT_MS
    );
    if (!response.ok) {
      throw new ApiRequestError(`Failed to start agent run: HTTP ${response.status}`, response.status, response.body);
    }

    const parsed = runStartedSchema.safeParse(parseJsonBody(response.body));
    if (!parsed.success) {
      throw new ApiRequestError(`No run_id returned: ${response.body}`, response.status, response.body);
    }

    log(`Started agent run ${parsed.data.run_id} for ${videoIds.length} video(s)`);
    return parsed.data.run_id;
  }

  async getRunStatus(runId: string): Promise<AgentRunStatus> {
    const response = await this.client.get(`/agent_run/${encodeURIComponent(runId)}`);
    if (!response.ok) {
      throw new ApiRequestError(`Failed to fetch status: HTTP ${response.status}`, response.status, response.body);
    }

    const parsed = runStatusSchema.safeParse(parseJsonBody(response.body));
    if (!parsed.success) {
      throw new ApiRequestError(`Unexpected status response: ${response.body}`, response.status, response.body);
    }
    return parsed.data;
  }

  /**
   * Poll until the run completes or fails
   */
  async watchRun(runId: string, options: WatchOptions = {}): Promise<AgentRunStatus> {
    const intervalMs = options.intervalMs ?? 5000;
    const sleep = options.sleep ?? defaultSleep;

    for (;;) {
      const status = await this.getRunStatus(runId);
      options.onUpdate?.(status);
      if (status.status && TERMINAL_RUN_STATUSES.includes(status.status)) {
        return status;
      }
      await sleep(intervalMs);
    }
  }
}

export function summarizeRunStatus(data: AgentRunStatus): string[] {
  const lines = [`status ${data.status}`];
  const outputs = data.outputs ?? [];
  if (outputs.length > 0) {
    lines.push(`outputs ${outputs.length}`);
    outputs.forEach((out, index) => {
      const url = out.video_url || out.url;
      if (url) {
        lines.push(`  ${index + 1}. ${url}`);
      }
    });
  }
  return lines;
}
