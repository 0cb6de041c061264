/**
 * Discovery-to-Subscription Bridge
 * Subscribes to the trade stream of every newly created token
 */

import { SubscriptionKinds } from '../constants/feed.js';
import type { TokenCreatedEvent } from '../types/events.js';
import type { EventDispatcher } from './event-dispatcher.js';
import type { ReconcileResult, SubscriptionSetManager } from './subscription-set-manager.js';
import { shortId } from '../utils/token-list.js';

export class DiscoveryBridge {
  private discoveredCount = 0;

  constructor(private readonly subscriptions: SubscriptionSetManager) {}

  /**
   * Register the bridge for 'created' events. Returns a function that detaches it.
   */
  attach(dispatcher: EventDispatcher): () => void {
    return dispatcher.register('created', async (event) => {
      await this.handleCreated(event);
    });
  }

  /**
   * Add the new mint to the trade desired set and reconcile.
   * A mint that is already tracked is ignored.
   */
  async handleCreated(event: TokenCreatedEvent): Promise<ReconcileResult | null> {
    const added = await this.subscriptions.addDesired(SubscriptionKinds.TOKEN_TRADE, event.mint);
    if (!added) {
      return null;
    }

    this.discoveredCount++;
    console.log(`[Bridge] New token ${event.name} (${event.symbol}) ${shortId(event.mint)}, subscribing to trades`);
    return this.subscriptions.reconcile(SubscriptionKinds.TOKEN_TRADE);
  }

  get discovered(): number {
    return this.discoveredCount;
  }
}
