import { describe, it, expect, vi } from 'vitest';
import { matchesChannel, TelegramSource } from '../src/telegram/source.js';
import { TelegramApiError } from '../src/telegram/client.js';
import type { RawMessage } from '../src/types/index.js';
import { FakeBotApi } from './fake-bot-api.js';

const DATE = 1_700_000_000;
const sourceChat = { id: -1001, type: 'channel', username: 'SourceChan' };
const otherChat = { id: -1002, type: 'channel', username: 'other' };

describe('matchesChannel', () => {
  it('matches a username case-insensitively with or without @ or t.me', () => {
    expect(matchesChannel(sourceChat, '@sourcechan')).toBe(true);
    expect(matchesChannel(sourceChat, 'SourceChan')).toBe(true);
    expect(matchesChannel(sourceChat, 'https://t.me/sourcechan')).toBe(true);
    expect(matchesChannel(otherChat, '@sourcechan')).toBe(false);
  });

  it('matches a numeric chat id', () => {
    expect(matchesChannel(sourceChat, '-1001')).toBe(true);
    expect(matchesChannel(otherChat, '-1001')).toBe(false);
    expect(matchesChannel({ id: -1003, type: 'channel' }, '@sourcechan')).toBe(false);
  });
});

describe('TelegramSource', () => {
  it('delivers only source channel posts and advances the offset past every update', async () => {
    const api = new FakeBotApi().enqueue([
      { update_id: 10, channel_post: { message_id: 1, date: DATE, chat: sourceChat, text: 'hi' } },
      { update_id: 11, channel_post: { message_id: 2, date: DATE, chat: otherChat, text: 'nope' } },
      { update_id: 12, message: { message_id: 3, date: DATE, chat: sourceChat, caption: 'cap' } },
      { update_id: 13 },
    ]);
    const source = new TelegramSource({ api, channel: '@sourcechan' });
    const received: RawMessage[] = [];

    const delivered = await source.pollOnce((m) => {
      received.push(m);
    });

    expect(delivered).toBe(2);
    expect(received).toEqual([
      { id: 1, text: 'hi', chatId: -1001, date: DATE },
      { id: 3, text: 'cap', chatId: -1001, date: DATE },
    ]);
    expect(source.nextOffset).toBe(14);

    await source.pollOnce(() => undefined);
    expect(api.calls[1]).toEqual({
      method: 'getUpdates',
      params: { offset: 14, timeout: 25, allowed_updates: ['channel_post', 'message'] },
    });
  });

  it('keeps going when the handler throws', async () => {
    const api = new FakeBotApi().enqueue([
      { update_id: 20, channel_post: { message_id: 1, date: DATE, chat: sourceChat, text: 'a' } },
      { update_id: 21, channel_post: { message_id: 2, date: DATE, chat: sourceChat, text: 'b' } },
    ]);
    const source = new TelegramSource({ api, channel: '-1001' });
    const handler = vi.fn().mockImplementationOnce(() => {
      throw new Error('boom');
    });

    await expect(source.pollOnce(handler)).resolves.toBe(1);
    expect(handler).toHaveBeenCalledTimes(2);
    expect(source.nextOffset).toBe(22);
  });

  it('skips the backlog by reading the last pending update', async () => {
    const api = new FakeBotApi().enqueue([{ update_id: 41 }]);
    const source = new TelegramSource({ api, channel: '@sourcechan' });

    await source.skipPending();

    expect(api.calls[0]).toEqual({ method: 'getUpdates', params: { offset: -1, timeout: 0 } });
    expect(source.nextOffset).toBe(42);
  });

  it('skips the backlog on start and stops cleanly', async () => {
    const api = new FakeBotApi(() => [], 5);
    const source = new TelegramSource({ api, channel: '@sourcechan' });

    source.start(() => undefined);
    expect(source.isRunning()).toBe(true);
    expect(api.calls[0]?.params).toEqual({ offset: -1, timeout: 0 });

    await source.stop();
    expect(source.isRunning()).toBe(false);
  });

  it('polls right away when skipBacklog is off', async () => {
    const api = new FakeBotApi(() => [], 5);
    const source = new TelegramSource({ api, channel: '@sourcechan', skipBacklog: false });

    source.start(() => undefined);
    expect(api.calls[0]?.params).toMatchObject({ offset: 0, timeout: 25 });

    await source.stop();
  });

  it('halts on an auth error and can be restarted', async () => {
    const api = new FakeBotApi(() => [], 5).enqueue(
      [],
      new TelegramApiError('Telegram auth error: 401', 'getUpdates', 401),
    );
    const source = new TelegramSource({ api, channel: '@sourcechan' });

    source.start(() => undefined);
    await vi.waitFor(() => expect(source.isRunning()).toBe(false));

    expect(source.restart()).toBe(true);
    expect(source.isRunning()).toBe(true);
    expect(source.restart()).toBe(false);
    await source.stop();
  });

  it('stops without waiting out the retry delay after a failed poll', async () => {
    const api = new FakeBotApi(() => [], 5).enqueue([], new Error('socket hang up'));
    const source = new TelegramSource({ api, channel: '@sourcechan', retryDelayMs: 60_000 });

    source.start(() => undefined);
    await vi.waitFor(() => expect(api.calls).toHaveLength(2));

    const startedAt = Date.now();
    await source.stop();
    expect(Date.now() - startedAt).toBeLessThan(1_000);
    expect(source.isRunning()).toBe(false);
  });

  it('does not restart before it was ever started', () => {
    const source = new TelegramSource({ api: new FakeBotApi(), channel: '@sourcechan' });
    expect(source.restart()).toBe(false);
  });
});
