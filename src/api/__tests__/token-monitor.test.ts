import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TokenMonitor } from '../token-monitor.js';
import { MonitorEvents } from '../../constants/events.js';
import type { FeedEvent, TokenTradeEvent } from '../../types/events.js';
import { InvalidTopicError } from '../../utils/errors.js';
import { FakeSocketFactory, type FakeFeedSocket, waitFor } from '../../test/fake-feed-socket.js';

const ENDPOINT = 'ws://feed.test/api/data';

const created = (mint: string) => ({
  signature: `sig-${mint}`,
  mint,
  traderPublicKey: 'CREATOR',
  txType: 'create',
  name: 'Test Token',
  symbol: 'TEST',
});

const trade = (mint: string, signature: string) => ({
  signature,
  mint,
  traderPublicKey: 'TRADER',
  txType: 'buy',
  solAmount: 0.5,
});

describe('TokenMonitor', () => {
  let factory: FakeSocketFactory;
  let monitor: TokenMonitor;

  const createMonitor = (seedTokens: string[] = [], discoverNewTokens = true): TokenMonitor => {
    monitor = new TokenMonitor({
      feed: {
        endpoint: ENDPOINT,
        reconnectDelay: 5,
        backoffJitter: 0,
        maxReconnectAttempts: 2,
        sendTimeout: 50,
        pingInterval: 0,
        createSocket: factory.create,
      },
      seedTokens,
      discoverNewTokens,
    });
    return monitor;
  };

  const sentOn = (socket: FakeFeedSocket) => socket.sentMessages();

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    factory = new FakeSocketFactory();
    factory.whenCreated(socket => queueMicrotask(() => socket.open()));
  });

  afterEach(async () => {
    await monitor.stop();
    jest.restoreAllMocks();
  });

  it('should subscribe to discovery and seeded tokens once connected', async () => {
    createMonitor(['MINT_S']);
    await monitor.start();

    const socket = factory.latest;
    await waitFor(() => socket.sent.length === 2);

    expect(sentOn(socket)).toEqual(expect.arrayContaining([
      { method: 'subscribeNewToken' },
      { method: 'subscribeTokenTrade', keys: ['MINT_S'] },
    ]));
    expect(monitor.trackedTokenCount).toBe(1);
  });

  it('should not subscribe to discovery when it is turned off', async () => {
    createMonitor(['MINT_S'], false);
    await monitor.start();

    const socket = factory.latest;
    await waitFor(() => socket.sent.length === 1);
    await new Promise(resolve => setTimeout(resolve, 10));

    expect(sentOn(socket)).toEqual([{ method: 'subscribeTokenTrade', keys: ['MINT_S'] }]);
  });

  it('should follow a newly created token', async () => {
    createMonitor();
    await monitor.start();
    const socket = factory.latest;
    await waitFor(() => socket.sent.length === 1);

    socket.deliver(created('MINT_A'));
    await waitFor(() => socket.sent.length === 2);

    expect(sentOn(socket)[1]).toEqual({ method: 'subscribeTokenTrade', keys: ['MINT_A'] });
    expect(monitor.getStats().discoveredTokens).toBe(1);
  });

  it('should pass events to handlers with the tracked count', async () => {
    createMonitor(['MINT_A', 'MINT_B', 'MINT_C']);
    const trades: TokenTradeEvent[] = [];
    monitor.onEvent('trade', event => {
      trades.push(event);
    });
    await monitor.start();

    factory.latest.deliver(trade('MINT_A', 'sig-1'));
    await waitFor(() => trades.length === 1);

    expect(trades[0]?.trackedCountAtEvent).toBe(3);
    expect(trades[0]?.mint).toBe('MINT_A');
  });

  it('should count tracked tokens even while subscribes fail', async () => {
    factory.whenCreated(socket => {
      socket.sendError = new Error('write EPIPE');
      queueMicrotask(() => socket.open());
    });
    createMonitor(['MINT_A', 'MINT_B', 'MINT_C'], false);
    const trades: TokenTradeEvent[] = [];
    monitor.onEvent('trade', event => {
      trades.push(event);
    });
    await monitor.start();
    await waitFor(() => factory.latest.sent.length === 1);

    factory.latest.deliver(trade('MINT_B', 'sig-2'));
    await waitFor(() => trades.length === 1);

    expect(trades[0]?.trackedCountAtEvent).toBe(3);
    expect(monitor.subscriptions.getActive('tokenTrade')).toEqual([]);
  });

  it('should re-subscribe everything after a reconnect', async () => {
    createMonitor(['MINT_A'], false);
    await monitor.start();
    const first = factory.latest;
    await waitFor(() => first.sent.length === 1);
    await monitor.addTopic('MINT_B');

    first.close(1006);
    await waitFor(() => factory.sockets.length === 2 && factory.latest.sent.length === 1);
    await new Promise(resolve => setTimeout(resolve, 10));

    expect(sentOn(factory.latest)).toEqual([{ method: 'subscribeTokenTrade', keys: ['MINT_A', 'MINT_B'] }]);
  });

  it('should unsubscribe a removed topic', async () => {
    createMonitor(['MINT_A', 'MINT_B'], false);
    await monitor.start();
    const socket = factory.latest;
    await waitFor(() => socket.sent.length === 1);

    await expect(monitor.removeTopic('MINT_A')).resolves.toBe(true);
    await expect(monitor.removeTopic('MINT_A')).resolves.toBe(false);

    expect(sentOn(socket)[1]).toEqual({ method: 'unsubscribeTokenTrade', keys: ['MINT_A'] });
    expect(monitor.trackedTokenCount).toBe(1);
  });

  it('should refuse foreign topics for the new token stream', async () => {
    createMonitor();
    await monitor.start();
    const socket = factory.latest;
    await waitFor(() => socket.sent.length === 1);

    await expect(monitor.addTopic('other', 'newToken')).rejects.toThrow(InvalidTopicError);

    expect(sentOn(socket)).toEqual([{ method: 'subscribeNewToken' }]);
    expect(monitor.subscriptions.getActive('newToken')).toEqual(['newToken']);
  });

  it('should route notices to their handlers', async () => {
    createMonitor([], false);
    const events: FeedEvent[] = [];
    monitor.onEvent('notice', event => {
      events.push(event);
    });
    await monitor.start();

    factory.latest.deliver({ message: 'Successfully subscribed to token creation events.' });
    await waitFor(() => events.length === 1);

    expect(events[0]).toMatchObject({ type: 'notice', isError: false });
  });

  it('should refuse to start twice', async () => {
    createMonitor([], false);
    await monitor.start();
    await expect(monitor.start()).rejects.toThrow('Token monitor already started');
  });

  it('should report a clean close after stop', async () => {
    createMonitor([], false);
    const closed = jest.fn();
    monitor.on(MonitorEvents.CLOSED, closed);
    await monitor.start();

    await monitor.stop();

    expect(closed).toHaveBeenCalledWith(null);
    expect(monitor.getStats().connected).toBe(false);
  });
});
