import { timingSafeEqual } from 'crypto';
import express, { Express, NextFunction, Request, Response } from 'express';
import { WebhookHistoryEntry } from '../types';
import { log } from './debug';
import { WebhookHistory } from './webhook-history';

export const SIGNATURE_HEADER = 'X-Mosaic-Signature';
export const HISTORY_PAGE_SIZE = 10;

// A token may span several path segments, e.g. /webhook/team/abc
export const WEBHOOK_PATHS = [
  '/',
  '/webhook',
  '/webhook/:token(*)',
  '/webhooks/mosaic',
  '/webhooks/mosaic/:token(*)',
];

export interface WebhookListenerOptions {
  secret?: string;
  history?: WebhookHistory;
  output?: (text: string) => void;
  now?: () => Date;
}

type EventData = Record<string, unknown>;

function isEventData(value: unknown): value is EventData {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function listOf(value: unknown): EventData[] {
  return Array.isArray(value) ? value.filter(isEventData) : [];
}

function text(value: unknown): string {
  return value === undefined || value === null ? 'None' : String(value);
}

export function formatWebhookEvent(data: EventData): string {
  const flag = typeof data.flag === 'string' ? data.flag : 'UNKNOWN';
  const rule = '='.repeat(80);
  const lines = ['\n' + rule, `🔔 ${flag}`, rule];

  lines.push(`agent: ${text(data.agent_id)}`);
  lines.push(`run:   ${text(data.run_id)}`);
  lines.push(`status:${text(data.status)}`);

  if (flag === 'RUN_STARTED') {
    const inputs = listOf(data.inputs);
    if (inputs.length > 0) {
      lines.push(`inputs: ${inputs.length}`);
      inputs.forEach((input, i) => {
        lines.push(`  ${i + 1}. ${text(input.video_url || input.file_url)}`);
      });
    }
  }

  const outputs = flag === 'OUTPUTS_FINISHED' ? listOf(data.output) : flag === 'RUN_FINISHED' ? listOf(data.outputs) : [];
  if (outputs.length > 0) {
    lines.push(`outputs: ${outputs.length}`);
    outputs.forEach((out, i) => {
      lines.push(`  ${i + 1}. ${text(out.video_url)} (thumb: ${text(out.thumbnail_url)})`);
    });
  }

  lines.push('\n' + rule);
  return lines.join('\n');
}

export function signaturesMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Build the webhook relay. All state (history, secret) belongs to the
 * returned application instance.
 */
export function createWebhookApp(options: WebhookListenerOptions = {}): Express {
  const history = options.history ?? new WebhookHistory();
  const output = options.output ?? ((line: string) => console.log(line));
  const now = options.now ?? (() => new Date());
  const app = express();

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy' });
  });

  app.get('/history', (_req: Request, res: Response) => {
    res.json({ total: history.size, history: history.latest(HISTORY_PAGE_SIZE) });
  });

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'running',
      service: 'Webhook Listener',
      endpoints: {
        webhook: '/webhook',
        webhook_with_token: '/webhook/<token>',
        webhooks_mosaic: '/webhooks/mosaic',
        webhooks_mosaic_with_token: '/webhooks/mosaic/<token>',
        history: '/history',
        health: '/health',
      },
      webhooks_received: history.size,
    });
  });

  app.post(WEBHOOK_PATHS, (req: Request, res: Response) => {
    let secretValid = true;
    if (options.secret) {
      const received = req.get(SIGNATURE_HEADER);
      if (!received) {
        output(`\n⚠️  WEBHOOK SECRET VALIDATION FAILED\n   Expected header: ${SIGNATURE_HEADER}\n   Received:        (header not present)`);
        secretValid = false;
      } else if (!signaturesMatch(options.secret, received)) {
        output('\n⚠️  WEBHOOK SECRET VALIDATION FAILED\n   Match:    ❌ MISMATCH');
        secretValid = false;
      }
    }

    const data: unknown = req.body;
    if (!isEventData(data) || Object.keys(data).length === 0) {
      res.status(400).json({ error: 'No JSON' });
      return;
    }

    const entry: WebhookHistoryEntry = {
      timestamp: now().toISOString(),
      path: req.path,
      token: req.params.token || null,
      data,
    };
    history.add(entry);
    log(`Webhook received on ${entry.path} (${history.size} in history)`);

    output(formatWebhookEvent(data));
    output(JSON.stringify(data, null, 2));

    if (!secretValid) {
      output('\n❌ Webhook rejected due to invalid secret (still displayed above for debugging)');
      res.status(401).json({ error: 'Invalid webhook secret', data });
      return;
    }

    res.status(200).json({ received: true, data });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isEventData(err) && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'No JSON' });
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    console.error('Webhook processing error:', err);
    res.status(500).json({ error: message });
  });

  return app;
}
