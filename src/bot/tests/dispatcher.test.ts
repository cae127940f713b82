import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { MESSAGES } from '../config';
import { UpdateDispatcher, classifyMessage, parseCommand } from '../dispatcher';
import { TaskTracker } from '../queue';
import type { RelayOutcome, RelayRequest } from '../services';
import { MemorySeenUserStore, MemoryUserStateStore, UserState, botStateOf } from '../state';
import type { InboundMessage } from '../types';
import { FakeGateway } from './fakes';

const USER = 7;
const CHAT = 42;

describe('parseCommand', () => {
  it('extracts the command name and target', () => {
    expect(parseCommand('/baseurl')).toEqual({ name: 'baseurl', target: undefined });
    expect(parseCommand('/Start@Relay_Bot hello')).toEqual({ name: 'start', target: 'relay_bot' });
  });

  it('ignores plain text', () => {
    expect(parseCommand('https://share.example/s/abc')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('classifyMessage', () => {
  it('separates known, unknown and foreign commands', () => {
    expect(classifyMessage('/status', 'relay_bot')).toEqual({ kind: 'command', command: 'status' });
    expect(classifyMessage('/help', 'relay_bot')).toEqual({ kind: 'unknown-command', name: 'help' });
    expect(classifyMessage('/start@other_bot', 'relay_bot')).toEqual({ kind: 'foreign-command' });
    expect(classifyMessage('hello', 'relay_bot')).toEqual({ kind: 'text' });
  });
});

describe('UpdateDispatcher', () => {
  let gateway: FakeGateway;
  let store: MemoryUserStateStore;
  let seenUsers: MemorySeenUserStore;
  let tasks: TaskTracker;
  let relayProcess: Mock<(request: RelayRequest) => Promise<RelayOutcome>>;
  let dispatcher: UpdateDispatcher;
  let nextMessageId: number;

  beforeEach(() => {
    gateway = new FakeGateway();
    store = new MemoryUserStateStore();
    seenUsers = new MemorySeenUserStore();
    tasks = new TaskTracker();
    relayProcess = vi.fn(async (request: RelayRequest): Promise<RelayOutcome> => ({
      success: true,
      strategy: 'download',
      message: { chatId: request.chatId, messageId: 500 },
    }));
    dispatcher = new UpdateDispatcher({ gateway, store, seenUsers, relay: { process: relayProcess }, tasks }, 'relay_bot');
    nextMessageId = 1;
  });

  function send(text: string): Promise<unknown> {
    const message: InboundMessage = { userId: USER, chatId: CHAT, messageId: nextMessageId++, text };
    return dispatcher.dispatch(message);
  }

  it('answers /start with the active banner', async () => {
    await send('/start');
    expect(gateway.sentTexts[0].startsWith('Bot is Active ✅')).toBe(true);
  });

  it('welcomes a user once and greets them briefly after that', async () => {
    await send('/start');
    await send('/start');

    expect(gateway.sentTexts).toEqual([
      `${MESSAGES.ACTIVE}\n\n${MESSAGES.WELCOME}`,
      `${MESSAGES.ACTIVE}\n\n${MESSAGES.WELCOME_BACK}`,
    ]);
    expect(seenUsers.has(USER)).toBe(true);
    expect(seenUsers.size).toBe(1);
  });

  it('runs the base URL flow', async () => {
    await send('/baseurl');
    await send('https://api.example.com//');

    expect(gateway.sentTexts).toEqual([MESSAGES.ASK_BASE_URL, MESSAGES.BASE_URL_SAVED('https://api.example.com')]);
    expect(store.get(USER).baseUrl).toBe('https://api.example.com');
    expect(botStateOf(store, USER)).toBe(UserState.NORMAL);
  });

  it('lets commands win while a base URL is awaited', async () => {
    await send('/baseurl');
    await send('/status');

    expect(gateway.sentTexts[1]).toBe(MESSAGES.STATUS(undefined, true));
    expect(botStateOf(store, USER)).toBe(UserState.AWAITING_BASE_URL);
  });

  it('asks for configuration before relaying', async () => {
    await send('https://share.example/s/abc');

    expect(gateway.sentTexts).toEqual([MESSAGES.BASE_URL_REQUIRED]);
    expect(relayProcess).not.toHaveBeenCalled();
  });

  it('hands submissions to the relay without waiting for them', async () => {
    store.set(USER, { baseUrl: 'https://api.example.com', awaitingBaseUrl: false });

    await send('https://share.example/s/abc');
    await tasks.drain();

    expect(relayProcess).toHaveBeenCalledWith({
      chatId: CHAT,
      userId: USER,
      baseUrl: 'https://api.example.com',
      link: 'https://share.example/s/abc',
      replyTo: 1,
    });
  });

  it('clears the base URL on /stop', async () => {
    store.set(USER, { baseUrl: 'https://api.example.com', awaitingBaseUrl: false });

    await send('/stop');
    await send('https://share.example/s/abc');

    expect(gateway.sentTexts).toEqual([MESSAGES.BASE_URL_CLEARED, MESSAGES.BASE_URL_REQUIRED]);
    expect(relayProcess).not.toHaveBeenCalled();
  });

  it('replies to unknown commands and ignores other bots', async () => {
    await send('/help');
    await send('/start@other_bot');

    expect(gateway.sentTexts).toEqual([MESSAGES.UNKNOWN_COMMAND]);
  });
});
