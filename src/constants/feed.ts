/**
 * PumpPortal data feed constants
 */

import type { SubscriptionKind } from '../types/feed.js';

// Public PumpPortal real-time data endpoint
export const PUMPPORTAL_URI = 'wss://pumpportal.fun/api/data';

export const SubscriptionKinds = {
  NEW_TOKEN: 'newToken',
  TOKEN_TRADE: 'tokenTrade',
} as const;

// The discovery stream takes no keys, so its desired set holds this one placeholder topic
export const NEW_TOKEN_TOPIC = 'newToken';

interface KindMethods {
  subscribe: string;
  unsubscribe: string;
  /** Whether the method carries a `keys` list */
  keyed: boolean;
}

export const FEED_METHODS: Readonly<Record<SubscriptionKind, KindMethods>> = {
  newToken: {
    subscribe: 'subscribeNewToken',
    unsubscribe: 'unsubscribeNewToken',
    keyed: false,
  },
  tokenTrade: {
    subscribe: 'subscribeTokenTrade',
    unsubscribe: 'unsubscribeTokenTrade',
    keyed: true,
  },
};

// txType values carried by inbound frames
export const TX_TYPE_CREATE = 'create';
export const TX_TYPE_BUY = 'buy';
export const TX_TYPE_SELL = 'sell';
