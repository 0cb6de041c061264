/**
 * Inbound feed event type definitions
 */

import type { TopicId } from './feed.js';

export type TradeSide = 'buy' | 'sell';

/**
 * A new token was created on the launchpad
 */
export interface TokenCreatedEvent {
  readonly type: 'created';
  readonly mint: TopicId;
  readonly name: string;
  readonly symbol: string;
  readonly signature: string;
  readonly traderPublicKey?: string;
  /** Metadata URI */
  readonly uri?: string;
  /** Tokens bought by the creator in the create transaction */
  readonly initialBuy?: number;
  readonly solAmount?: number;
  readonly marketCapSol?: number;
  readonly pool?: string;
  readonly receivedAt: Date;
}

/**
 * A buy or sell on one of the subscribed token trade streams
 */
export interface TokenTradeEvent {
  readonly type: 'trade';
  readonly mint: TopicId;
  readonly side: TradeSide;
  readonly solAmount: number;
  readonly traderPublicKey: string;
  readonly signature: string;
  readonly tokenAmount?: number;
  /** Virtual token reserves of the bonding curve after the trade */
  readonly tokensInPool?: number;
  /** Virtual SOL reserves of the bonding curve after the trade */
  readonly solInPool?: number;
  readonly marketCapSol?: number;
  readonly pool?: string;
  /** Size of the trade-kind desired set when this trade was processed */
  readonly trackedCountAtEvent: number;
  readonly receivedAt: Date;
}

/**
 * Informational reply from the feed (subscription acknowledgements, errors)
 */
export interface FeedNoticeEvent {
  readonly type: 'notice';
  readonly message: string;
  readonly isError: boolean;
  readonly receivedAt: Date;
}

export type FeedEvent = TokenCreatedEvent | TokenTradeEvent | FeedNoticeEvent;

export type FeedEventType = FeedEvent['type'];

export type FeedEventOf<K extends FeedEventType> = Extract<FeedEvent, { type: K }>;

export type FeedEventHandler<K extends FeedEventType> = (event: FeedEventOf<K>) => void | Promise<void>;
