/**
 * Token Stream Monitor
 *
 * Keeps one PumpPortal feed connection open and:
 * 1. Subscribes to the new-token stream
 * 2. Follows the trade stream of every newly created token
 * 3. Adds and removes trade streams from SEED_TOKENS and an optional token file
 * 4. Logs every trade with the number of tokens tracked at that moment
 */

import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { TokenMonitor } from './api/token-monitor.js';
import { TokenFileWatcher } from './services/token-file-watcher.js';
import { FeedEvents, MonitorEvents } from './constants/events.js';
import { describeError } from './utils/errors.js';
import { shortId } from './utils/token-list.js';

dotenv.config();

async function main() {
  process.on('unhandledRejection', (reason) => {
    console.error('[Unhandled Rejection]', reason);
  });

  const config = loadConfig();

  console.log('===========================================');
  console.log('   TOKEN STREAM MONITOR');
  console.log('===========================================\n');

  console.log('Configuration:');
  console.log(`  Feed: ${config.feedEndpoint}`);
  console.log(`  New token discovery: ${config.discoverNewTokens ? 'ENABLED' : 'DISABLED'}`);
  console.log(`  Seed tokens: ${config.seedTokens.length}`);
  console.log(`  Token file: ${config.tokenFile ?? 'none'}`);
  console.log(`  Max reconnect attempts: ${config.maxReconnectAttempts}`);
  console.log('');

  const monitor = new TokenMonitor({
    feed: {
      endpoint: config.feedEndpoint,
      reconnectDelay: config.reconnectDelayMs,
      maxReconnectDelay: config.maxReconnectDelayMs,
      backoffMultiplier: config.backoffMultiplier,
      maxReconnectAttempts: config.maxReconnectAttempts,
      handshakeTimeout: config.handshakeTimeoutMs,
      sendTimeout: config.sendTimeoutMs,
      pingInterval: config.pingIntervalMs,
    },
    seedTokens: config.seedTokens,
    discoverNewTokens: config.discoverNewTokens,
  });

  monitor.onEvent('trade', (trade) => {
    console.log(
      `[Trade] ${trade.side.toUpperCase()} ${trade.solAmount.toFixed(4)} SOL of ${shortId(trade.mint)} ` +
      `by ${shortId(trade.traderPublicKey)} (tracking ${trade.trackedCountAtEvent} tokens)`
    );
  });

  monitor.onEvent('created', (token) => {
    console.log(`[New Token] ${token.name} (${token.symbol}) ${token.mint}`);
  });

  monitor.onEvent('notice', (notice) => {
    if (notice.isError) {
      console.error(`[Feed] Error reply: ${notice.message}`);
    } else {
      console.log(`[Feed] ${notice.message}`);
    }
  });

  monitor.client.on(FeedEvents.ERROR, (error: Error) => {
    console.error('[Feed] Error:', error.message);
  });

  let watcher: TokenFileWatcher | null = null;
  if (config.tokenFile) {
    watcher = new TokenFileWatcher(monitor, {
      path: config.tokenFile,
      pollInterval: config.tokenFilePollMs,
    });
  }

  monitor.on(MonitorEvents.CLOSED, (error: unknown) => {
    if (error) {
      console.error(`Feed stream closed: ${describeError(error)}`);
      process.exit(1);
    }
  });

  try {
    await monitor.start();
  } catch (error) {
    console.error('Failed to connect to feed:', describeError(error));
    process.exit(1);
  }

  if (watcher) {
    await watcher.sync();
    watcher.start();
  }

  // STATS_INTERVAL_SECONDS=0 turns the periodic summary off
  const statsTimer = config.statsIntervalMs > 0 ? setInterval(() => {
    const stats = monitor.getStats();
    console.log(
      `[Stats] ${stats.trackedTokens} tokens tracked (${stats.subscriptions.tokenTrade.active} active), ` +
      `${stats.discoveredTokens} discovered, ${stats.dispatcher.framesProcessed} frames, ` +
      `${stats.dispatcher.malformedFrames} malformed, ${stats.dispatcher.handlerFailures} handler failures`
    );
  }, config.statsIntervalMs) : null;

  console.log('');
  console.log('System is running! (Ctrl+C to stop)');
  console.log('');

  const shutdown = async () => {
    console.log('\nShutting down...');
    if (statsTimer) {
      clearInterval(statsTimer);
    }
    watcher?.stop();
    await monitor.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      console.error('Shutdown failed:', error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
