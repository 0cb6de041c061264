/**
 * Token Monitor
 *
 * Entry point for code that consumes the feed. Wires the feed client,
 * subscription set manager, event dispatcher and discovery bridge together
 * and exposes two operations: listen to events of one type, and add or
 * remove desired topics.
 */

import { EventEmitter } from 'events';
import { FeedClient } from '../services/feed-client.js';
import { SubscriptionSetManager, type ReconcileResult } from '../services/subscription-set-manager.js';
import { EventDispatcher, type DispatcherStats } from '../services/event-dispatcher.js';
import { DiscoveryBridge } from '../services/discovery-bridge.js';
import { FeedEvents, MonitorEvents } from '../constants/events.js';
import { NEW_TOKEN_TOPIC, SubscriptionKinds } from '../constants/feed.js';
import type { FeedClientConfig, SubscriptionKind, TopicId } from '../types/feed.js';
import type { FeedEventHandler, FeedEventType } from '../types/events.js';
import { describeError } from '../utils/errors.js';
import { shortId } from '../utils/token-list.js';

export interface TokenMonitorConfig {
  feed: FeedClientConfig;
  /** Trade streams to subscribe to from the start */
  seedTokens?: TopicId[];
  /** Subscribe to the new-token stream and follow every new mint */
  discoverNewTokens?: boolean;
}

export interface TokenMonitorStats {
  connected: boolean;
  connectionId: number;
  trackedTokens: number;
  discoveredTokens: number;
  subscriptions: ReturnType<SubscriptionSetManager['getStats']>;
  dispatcher: DispatcherStats;
}

/**
 * Anything that accepts desired-topic changes
 */
export interface TopicSink {
  addTopic(topic: TopicId, kind?: SubscriptionKind): Promise<boolean>;
  removeTopic(topic: TopicId, kind?: SubscriptionKind): Promise<boolean>;
}

export class TokenMonitor extends EventEmitter implements TopicSink {
  readonly client: FeedClient;
  readonly subscriptions: SubscriptionSetManager;
  readonly dispatcher: EventDispatcher;
  readonly bridge: DiscoveryBridge;
  private readonly seedTokens: TopicId[];
  private readonly discoverNewTokens: boolean;
  private pump: Promise<void> | null = null;

  constructor(config: TokenMonitorConfig) {
    super();
    this.seedTokens = config.seedTokens ?? [];
    this.discoverNewTokens = config.discoverNewTokens ?? true;

    this.client = new FeedClient(config.feed);
    this.subscriptions = new SubscriptionSetManager(this.client);
    this.dispatcher = new EventDispatcher({
      trackedCount: () => this.subscriptions.desiredCount(SubscriptionKinds.TOKEN_TRADE),
    });
    this.bridge = new DiscoveryBridge(this.subscriptions);

    if (this.discoverNewTokens) {
      this.bridge.attach(this.dispatcher);
    }

    // Every new connection starts with no subscriptions
    this.client.on(FeedEvents.CONNECTED, () => {
      this.subscriptions.handleReconnect().catch((error: unknown) => {
        console.error(`[Monitor] Re-subscribe after connect failed: ${describeError(error)}`);
      });
    });
  }

  /**
   * Listen to events of one type. Returns a function that stops listening.
   */
  onEvent<K extends FeedEventType>(type: K, handler: FeedEventHandler<K>): () => void {
    return this.dispatcher.register(type, handler);
  }

  /**
   * Add a topic to the desired set and push the change to the feed
   */
  async addTopic(topic: TopicId, kind: SubscriptionKind = SubscriptionKinds.TOKEN_TRADE): Promise<boolean> {
    const added = await this.subscriptions.addDesired(kind, topic);
    if (added) {
      console.log(`[Monitor] Now tracking ${kind} ${shortId(topic)}`);
      await this.subscriptions.reconcile(kind);
    }
    return added;
  }

  /**
   * Remove a topic from the desired set and push the change to the feed
   */
  async removeTopic(topic: TopicId, kind: SubscriptionKind = SubscriptionKinds.TOKEN_TRADE): Promise<boolean> {
    const removed = await this.subscriptions.removeDesired(kind, topic);
    if (removed) {
      console.log(`[Monitor] Stopped tracking ${kind} ${shortId(topic)}`);
      await this.subscriptions.reconcile(kind);
    }
    return removed;
  }

  /**
   * Seed the desired sets, start consuming frames and connect.
   * Resolves once the first connection is up.
   */
  async start(): Promise<void> {
    if (this.pump) {
      throw new Error('Token monitor already started');
    }

    if (this.discoverNewTokens) {
      await this.subscriptions.setDesired(SubscriptionKinds.NEW_TOKEN, [NEW_TOKEN_TOPIC], 'add');
    }
    if (this.seedTokens.length > 0) {
      await this.subscriptions.setDesired(SubscriptionKinds.TOKEN_TRADE, this.seedTokens, 'add');
      console.log(`[Monitor] Seeded ${this.seedTokens.length} token(s)`);
    }

    this.pump = this.dispatcher.run(this.client.receive()).then(
      () => {
        this.emit(MonitorEvents.CLOSED, null);
      },
      (error: unknown) => {
        console.error(`[Monitor] Frame stream ended with error: ${describeError(error)}`);
        this.emit(MonitorEvents.CLOSED, error);
      }
    );

    await this.client.connect();
  }

  /**
   * Disconnect and wait for already received frames to be dispatched
   */
  async stop(): Promise<void> {
    this.client.disconnect();
    if (this.pump) {
      await this.pump;
    }
  }

  /**
   * Reconcile every kind now, e.g. after bulk setDesired() calls
   */
  sync(): Promise<ReconcileResult[]> {
    return this.subscriptions.reconcileAll();
  }

  get trackedTokenCount(): number {
    return this.subscriptions.desiredCount(SubscriptionKinds.TOKEN_TRADE);
  }

  getStats(): TokenMonitorStats {
    return {
      connected: this.client.connected,
      connectionId: this.client.connectionId,
      trackedTokens: this.trackedTokenCount,
      discoveredTokens: this.bridge.discovered,
      subscriptions: this.subscriptions.getStats(),
      dispatcher: this.dispatcher.getStats(),
    };
  }
}
