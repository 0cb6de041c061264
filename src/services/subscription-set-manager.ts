/**
 * Subscription Set Manager
 *
 * Tracks, per subscription kind, the topics the application wants (desired)
 * and the topics believed subscribed on the live connection (active), and
 * sends the minimal subscribe/unsubscribe frames to bring them together.
 */

import { EventEmitter } from 'events';
import { FEED_METHODS, NEW_TOKEN_TOPIC, SubscriptionKinds } from '../constants/feed.js';
import { SubscriptionEvents } from '../constants/events.js';
import type { ControlAction, ControlFrame, FrameSender, SubscriptionKind, TopicId } from '../types/feed.js';
import { AsyncMutex } from '../utils/async-mutex.js';
import { InvalidTopicError, NotConnectedError } from '../utils/errors.js';

export type DesiredUpdateMode = 'replace' | 'add' | 'remove';

export interface DesiredChange {
  added: TopicId[];
  removed: TopicId[];
}

export interface ReconcileResult {
  kind: SubscriptionKind;
  /** Topics sent in a subscribe frame */
  subscribed: TopicId[];
  /** Topics sent in an unsubscribe frame */
  unsubscribed: TopicId[];
  /** True when a send failed because the connection was down */
  deferred: boolean;
}

interface KindState {
  desired: Set<TopicId>;
  active: Set<TopicId>;
  // Connection the active set was built against
  activeConnectionId: number;
  mutex: AsyncMutex;
}

export class SubscriptionSetManager extends EventEmitter {
  private states: Record<SubscriptionKind, KindState>;

  constructor(private readonly sender: FrameSender) {
    super();
    this.states = {
      newToken: this.createState(),
      tokenTrade: this.createState(),
    };
  }

  /**
   * Replace, augment or shrink the desired set for a kind.
   * Does not reconcile; call reconcile() to push the change to the feed.
   *
   * @throws InvalidTopicError for a keyless kind given anything but its placeholder topic
   */
  setDesired(kind: SubscriptionKind, topics: Iterable<TopicId>, mode: DesiredUpdateMode = 'replace'): Promise<DesiredChange> {
    const state = this.states[kind];
    const incoming = new Set(topics);
    // Keyless frames cannot name a topic, so one placeholder stands for the whole stream
    if (!FEED_METHODS[kind].keyed) {
      for (const topic of incoming) {
        if (topic !== NEW_TOKEN_TOPIC) {
          return Promise.reject(new InvalidTopicError(kind, topic));
        }
      }
    }

    return state.mutex.runExclusive(() => {
      const change: DesiredChange = { added: [], removed: [] };

      if (mode === 'replace') {
        for (const topic of state.desired) {
          if (!incoming.has(topic)) {
            change.removed.push(topic);
          }
        }
      }

      if (mode === 'remove') {
        for (const topic of incoming) {
          if (state.desired.has(topic)) {
            change.removed.push(topic);
          }
        }
      } else {
        for (const topic of incoming) {
          if (!state.desired.has(topic)) {
            change.added.push(topic);
          }
        }
      }

      for (const topic of change.removed) {
        state.desired.delete(topic);
        this.emit(SubscriptionEvents.TOPIC_REMOVED, kind, topic);
      }
      for (const topic of change.added) {
        state.desired.add(topic);
        this.emit(SubscriptionEvents.TOPIC_ADDED, kind, topic);
      }

      return change;
    });
  }

  /**
   * Add one topic to the desired set; resolves true if it was not there yet
   */
  async addDesired(kind: SubscriptionKind, topic: TopicId): Promise<boolean> {
    const change = await this.setDesired(kind, [topic], 'add');
    return change.added.length > 0;
  }

  /**
   * Remove one topic from the desired set; resolves true if it was there
   */
  async removeDesired(kind: SubscriptionKind, topic: TopicId): Promise<boolean> {
    const change = await this.setDesired(kind, [topic], 'remove');
    return change.removed.length > 0;
  }

  /**
   * Send the frames that turn the active set into the desired set.
   * Calling it again with no desired-set change in between sends nothing.
   */
  reconcile(kind: SubscriptionKind): Promise<ReconcileResult> {
    const state = this.states[kind];
    return state.mutex.runExclusive(() => this.reconcileLocked(kind, state));
  }

  /**
   * Reconcile every kind; kinds run independently of each other
   */
  reconcileAll(): Promise<ReconcileResult[]> {
    return Promise.all([
      this.reconcile(SubscriptionKinds.NEW_TOKEN),
      this.reconcile(SubscriptionKinds.TOKEN_TRADE),
    ]);
  }

  /**
   * Called when the feed connection is (re)established. The new connection has
   * no subscriptions, so every kind re-subscribes its full desired set.
   */
  handleReconnect(): Promise<ReconcileResult[]> {
    return this.reconcileAll();
  }

  private async reconcileLocked(kind: SubscriptionKind, state: KindState): Promise<ReconcileResult> {
    const result: ReconcileResult = { kind, subscribed: [], unsubscribed: [], deferred: false };

    const connectionId = this.sender.connectionId;
    if (state.activeConnectionId !== connectionId) {
      // Nothing sent on an earlier connection carries over
      state.active.clear();
      state.activeConnectionId = connectionId;
    }

    const toAdd = Array.from(state.desired).filter(topic => !state.active.has(topic));
    const toRemove = Array.from(state.active).filter(topic => !state.desired.has(topic));

    try {
      if (toAdd.length > 0) {
        await this.sendFrame(kind, 'subscribe', toAdd);
        for (const topic of toAdd) {
          state.active.add(topic);
        }
        result.subscribed = toAdd;
      }

      if (toRemove.length > 0) {
        await this.sendFrame(kind, 'unsubscribe', toRemove);
        for (const topic of toRemove) {
          state.active.delete(topic);
        }
        result.unsubscribed = toRemove;
      }
    } catch (error) {
      if (!(error instanceof NotConnectedError)) {
        throw error;
      }
      // The next connection re-subscribes the full desired set
      console.warn(`[Subscriptions] Deferred ${kind} reconcile: ${error.message}`);
      result.deferred = true;
      this.emit(SubscriptionEvents.RECONCILE_DEFERRED, kind, error);
    }

    if (result.subscribed.length > 0 || result.unsubscribed.length > 0) {
      console.log(
        `[Subscriptions] ${kind}: +${result.subscribed.length} -${result.unsubscribed.length} ` +
        `(${state.active.size} active)`
      );
    }

    return result;
  }

  private async sendFrame(kind: SubscriptionKind, action: ControlAction, topics: TopicId[]): Promise<void> {
    const frame: ControlFrame = { kind, action, topics };
    await this.sender.send(frame);
    this.emit(SubscriptionEvents.FRAME_SENT, frame);
  }

  getDesired(kind: SubscriptionKind): TopicId[] {
    return Array.from(this.states[kind].desired);
  }

  getActive(kind: SubscriptionKind): TopicId[] {
    return Array.from(this.states[kind].active);
  }

  isDesired(kind: SubscriptionKind, topic: TopicId): boolean {
    return this.states[kind].desired.has(topic);
  }

  /**
   * Size of the desired set. Reads are synchronous, so the value is a
   * consistent snapshot relative to any mutation.
   */
  desiredCount(kind: SubscriptionKind): number {
    return this.states[kind].desired.size;
  }

  getStats(): Record<SubscriptionKind, { desired: number; active: number }> {
    return {
      newToken: this.kindStats(SubscriptionKinds.NEW_TOKEN),
      tokenTrade: this.kindStats(SubscriptionKinds.TOKEN_TRADE),
    };
  }

  private kindStats(kind: SubscriptionKind): { desired: number; active: number } {
    const state = this.states[kind];
    return { desired: state.desired.size, active: state.active.size };
  }

  private createState(): KindState {
    return {
      desired: new Set(),
      active: new Set(),
      activeConnectionId: 0,
      mutex: new AsyncMutex(),
    };
  }
}
