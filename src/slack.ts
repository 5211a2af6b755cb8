import { WebClient } from '@slack/web-api';
import type { Logger } from 'pino';
import type { AggregateBucket } from './types';
import type { SlackConfig } from './config';
import { totalsByCategory } from './aggregate';

export function summaryText(buckets: AggregateBucket[], runs: number): string {
  const totals = totalsByCategory(buckets);
  const total = Object.values(totals).reduce((a, b) => a + b, 0);
  const parts = Object.entries(totals).filter(([, v]) => v > 0).map(([k, v]) => `${k}:${v}`);
  return `CI failure summary: ${total} failures across ${runs} runs` + (parts.length ? ` | ${parts.join(', ')}` : '');
}

export type SlackPost = (message: { channel: string; text: string }) => Promise<unknown>;

export async function postSlack(text: string, config: SlackConfig, logger: Logger, post?: SlackPost) {
  const { token, channel } = config;
  if (!token || !channel) {
    logger.debug('Slack not configured, skipping summary');
    return false;
  }
  const send: SlackPost = post ?? (msg => new WebClient(token).chat.postMessage(msg));
  try {
    await send({ channel, text });
    return true;
  } catch (e) {
    logger.warn({ err: e instanceof Error ? e.message : String(e) }, 'Slack error');
    return false;
  }
}
