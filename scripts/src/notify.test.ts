import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchFn, TelegramNotifier, deliverLog } from './notify.js';

const CREDENTIALS = { botToken: 'test-token', chatId: '1001', channelId: '@test-channel' };

function okFetch() {
  return vi.fn<FetchFn>(async () => new Response('{"ok":true}', { status: 200 }));
}

describe('TelegramNotifier', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'gcc-forge-notify-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('posts messages to the channel', async () => {
    const fetchFn = okFetch();
    const notifier = new TelegramNotifier('https://api.telegram.test/', CREDENTIALS, fetchFn);

    await notifier.sendMessage('hello');

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.test/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    const body = init?.body;
    expect(body).toBeInstanceOf(URLSearchParams);
    if (body instanceof URLSearchParams) {
      expect(body.get('chat_id')).toBe('@test-channel');
      expect(body.get('text')).toBe('hello');
      expect(body.get('parse_mode')).toBe('markdown');
    }
  });

  it('uploads documents to the chat', async () => {
    const fetchFn = okFetch();
    const notifier = new TelegramNotifier('https://api.telegram.test', CREDENTIALS, fetchFn);
    const log = join(dir, 'build.log');
    await writeFile(log, 'log text');

    await notifier.sendDocument(log, 'Build logs');

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.test/bottest-token/sendDocument');
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (body instanceof FormData) {
      expect(body.get('chat_id')).toBe('1001');
      expect(body.get('caption')).toBe('Build logs');
      const document = body.get('document');
      expect(document).toBeInstanceOf(Blob);
      if (document instanceof Blob) {
        expect(await document.text()).toBe('log text');
      }
    }
  });

  it('throws on an error response', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('Unauthorized', { status: 401 }));
    const notifier = new TelegramNotifier('https://api.telegram.test', CREDENTIALS, fetchFn);

    await expect(notifier.sendMessage('hello')).rejects.toThrow('Telegram sendMessage failed with HTTP 401: Unauthorized');
  });

  it('knows which credentials it has', () => {
    const notifier = new TelegramNotifier('https://api.telegram.test', { botToken: 'test-token', chatId: '1001' }, okFetch());

    expect(notifier.canDeliverLogs).toBe(true);
    expect(notifier.canAnnounce).toBe(false);
  });

  describe('deliverLog', () => {
    it('skips delivery without credentials', async () => {
      const fetchFn = okFetch();
      const notifier = new TelegramNotifier('https://api.telegram.test', {}, fetchFn);

      expect(await deliverLog(notifier, join(dir, 'build.log'), 'caption')).toBe(false);
      expect(fetchFn).not.toHaveBeenCalled();
    });

    it('turns delivery failures into a warning', async () => {
      const log = join(dir, 'build.log');
      await writeFile(log, '');
      const fetchFn = vi.fn<FetchFn>(async () => new Response('', { status: 500 }));
      const notifier = new TelegramNotifier('https://api.telegram.test', CREDENTIALS, fetchFn);

      expect(await deliverLog(notifier, log, 'caption')).toBe(false);
    });

    it('delivers the log', async () => {
      const log = join(dir, 'build.log');
      await writeFile(log, 'done');
      const fetchFn = okFetch();

      expect(await deliverLog(new TelegramNotifier('https://api.telegram.test', CREDENTIALS, fetchFn), log, 'caption')).toBe(true);
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });
  });
});
