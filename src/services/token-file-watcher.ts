/**
 * Token File Watcher
 *
 * Polls a newline-separated token file and mirrors its contents into the
 * desired trade set. Only tokens that came from the file are ever removed,
 * so tokens found by discovery stay tracked.
 */

import { EventEmitter } from 'events';
import { TokenFileEvents } from '../constants/events.js';
import type { TopicSink } from '../api/token-monitor.js';
import type { TopicId } from '../types/feed.js';
import { readTokenFile, shortId } from '../utils/token-list.js';
import { describeError } from '../utils/errors.js';

export interface TokenFileWatcherConfig {
  path: string;
  pollInterval?: number;
}

export interface TokenFileSync {
  added: TopicId[];
  removed: TopicId[];
}

export class TokenFileWatcher extends EventEmitter {
  private readonly path: string;
  private readonly pollInterval: number;
  // File contents as of the last sync
  private fileTokens: Set<TopicId> = new Set();
  // Tokens this watcher put into the desired set
  private ownedTokens: Set<TopicId> = new Set();
  private pollTimer: NodeJS.Timeout | null = null;
  private syncing: Promise<TokenFileSync> | null = null;

  constructor(private readonly sink: TopicSink, config: TokenFileWatcherConfig) {
    super();
    this.path = config.path;
    this.pollInterval = config.pollInterval ?? 5000;
  }

  /**
   * Read the file once and apply the difference from the previous read.
   * Overlapping calls share one read.
   */
  sync(): Promise<TokenFileSync> {
    if (!this.syncing) {
      this.syncing = this.applyFile().finally(() => {
        this.syncing = null;
      });
    }
    return this.syncing;
  }

  start(): void {
    if (this.pollTimer) {
      return;
    }

    console.log(`[TokenFile] Watching ${this.path} every ${this.pollInterval}ms`);
    this.pollTimer = setInterval(() => {
      this.sync().catch((error: unknown) => {
        console.error(`[TokenFile] Failed to sync ${this.path}: ${describeError(error)}`);
        if (this.listenerCount(TokenFileEvents.ERROR) > 0) {
          this.emit(TokenFileEvents.ERROR, error);
        }
      });
    }, this.pollInterval);
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  getTokens(): TopicId[] {
    return Array.from(this.fileTokens);
  }

  private async applyFile(): Promise<TokenFileSync> {
    const current = new Set(await readTokenFile(this.path));
    const result: TokenFileSync = { added: [], removed: [] };

    for (const token of current) {
      if (this.fileTokens.has(token)) {
        continue;
      }
      this.fileTokens.add(token);
      if (await this.sink.addTopic(token)) {
        this.ownedTokens.add(token);
        result.added.push(token);
      }
    }

    for (const token of Array.from(this.fileTokens)) {
      if (current.has(token)) {
        continue;
      }
      this.fileTokens.delete(token);
      if (this.ownedTokens.delete(token)) {
        await this.sink.removeTopic(token);
        result.removed.push(token);
      }
    }

    if (result.added.length > 0 || result.removed.length > 0) {
      console.log(
        `[TokenFile] +${result.added.length} -${result.removed.length}` +
        (result.added.length > 0 ? ` (added ${result.added.map(shortId).join(', ')})` : '')
      );
      this.emit(TokenFileEvents.SYNCED, result);
    }

    return result;
  }
}
