/**
 * gcc-forge - Telegram Notifications
 * Commit announcements go to the channel, run logs to the chat.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { logger } from './logger.js';
import { describeError } from './errors.js';
import { Credentials } from './config.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface Notifier {
  readonly canAnnounce: boolean;
  readonly canDeliverLogs: boolean;
  sendMessage(text: string): Promise<void>;
  sendDocument(file: string, caption: string): Promise<void>;
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly apiBase: string,
    private readonly credentials: Credentials,
    private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)
  ) {}

  get canAnnounce(): boolean {
    return Boolean(this.credentials.botToken && this.credentials.channelId);
  }

  get canDeliverLogs(): boolean {
    return Boolean(this.credentials.botToken && this.credentials.chatId);
  }

  private endpoint(method: string): string {
    const base = this.apiBase.replace(/\/+$/, '');
    return `${base}/bot${this.credentials.botToken ?? ''}/${method}`;
  }

  private async post(method: string, body: URLSearchParams | FormData): Promise<void> {
    const resp = await this.fetchFn(this.endpoint(method), { method: 'POST', body });
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`Telegram ${method} failed with HTTP ${resp.status}: ${text.slice(0, 200)}`);
    }
  }

  async sendMessage(text: string): Promise<void> {
    await this.post('sendMessage', new URLSearchParams({
      chat_id: this.credentials.channelId ?? '',
      disable_web_page_preview: 'true',
      parse_mode: 'markdown',
      text,
    }));
  }

  async sendDocument(file: string, caption: string): Promise<void> {
    const form = new FormData();
    form.append('chat_id', this.credentials.chatId ?? '');
    form.append('disable_web_page_preview', 'false');
    form.append('parse_mode', 'html');
    form.append('caption', caption);
    form.append('document', new Blob([await readFile(file)]), basename(file));
    await this.post('sendDocument', form);
  }
}

/**
 * Send the run log. Never throws: delivery problems are only warnings.
 */
export async function deliverLog(notifier: Notifier, logFile: string | null, caption: string): Promise<boolean> {
  if (!logFile) {
    logger.warn('No run log to deliver');
    return false;
  }
  if (!notifier.canDeliverLogs) {
    logger.warn('TG_BOT_API or CHAT_ID is not set, not delivering the build log');
    return false;
  }

  try {
    await notifier.sendDocument(logFile, caption);
    logger.debug(`Delivered ${logFile}`);
    return true;
  } catch (error) {
    logger.warn(`Could not deliver the build log: ${describeError(error)}`);
    return false;
  }
}
