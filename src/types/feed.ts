/**
 * Feed connection and subscription type definitions
 */

import type { EventEmitter } from 'events';

/** Opaque, case-sensitive topic identifier (a token mint address) */
export type TopicId = string;

/** Subscription kinds with independent desired/active sets */
export type SubscriptionKind = 'newToken' | 'tokenTrade';

export type ControlAction = 'subscribe' | 'unsubscribe';

/**
 * Control message sent to the feed to change subscriptions
 */
export interface ControlFrame {
  kind: SubscriptionKind;
  action: ControlAction;
  /** Never empty */
  topics: TopicId[];
}

/**
 * Anything that can deliver control frames to the live connection
 */
export interface FrameSender {
  send(frame: ControlFrame): Promise<void>;
  /** Increments on every successful (re)connect; 0 before the first one */
  readonly connectionId: number;
}

/**
 * The part of a `ws` WebSocket the feed client relies on
 */
export interface FeedSocket extends EventEmitter {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
}

export type SocketFactory = (endpoint: string, handshakeTimeout: number) => FeedSocket;

export interface FeedClientConfig {
  endpoint: string;
  /** Base reconnect delay in ms */
  reconnectDelay?: number;
  maxReconnectDelay?: number;
  backoffMultiplier?: number;
  /** Random extra delay as a fraction of the computed delay */
  backoffJitter?: number;
  maxReconnectAttempts?: number;
  handshakeTimeout?: number;
  sendTimeout?: number;
  /** Keep-alive ping interval in ms; 0 disables pings */
  pingInterval?: number;
  createSocket?: SocketFactory;
}

export interface ConnectedInfo {
  connectionId: number;
  reconnect: boolean;
}

export interface DisconnectedInfo {
  code: number;
  reason: string;
}
