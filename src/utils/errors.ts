/**
 * Error classes for the feed pipeline
 */

import type { FeedEventType } from '../types/events.js';
import type { SubscriptionKind } from '../types/feed.js';

export class FeedError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Handshake or transport failure
 */
export class ConnectionError extends FeedError {
  constructor(message: string, public readonly endpoint: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * The reconnection budget is exhausted and the frame stream has ended
 */
export class ConnectionClosedError extends FeedError {
  constructor(public readonly endpoint: string, public readonly attempts: number, options?: ErrorOptions) {
    super(`Connection to ${endpoint} closed after ${attempts} reconnection attempts`, options);
  }
}

/**
 * A control frame could not be written to a live connection
 */
export class NotConnectedError extends FeedError {}

/**
 * A keyless kind only takes its placeholder topic
 */
export class InvalidTopicError extends FeedError {
  constructor(public readonly kind: SubscriptionKind, public readonly topic: string) {
    super(`Topic '${topic}' is not valid for '${kind}' subscriptions`);
  }
}

export class MalformedFrameError extends FeedError {
  constructor(message: string, public readonly rawFrame: string) {
    super(message);
  }
}

export class HandlerFailureError extends FeedError {
  constructor(
    public readonly eventType: FeedEventType,
    public readonly handlerIndex: number,
    cause: unknown
  ) {
    super(`Handler #${handlerIndex} for '${eventType}' events failed: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
