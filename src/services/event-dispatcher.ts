/**
 * Event Dispatcher
 * Classifies raw feed frames and routes each event to the handlers
 * registered for its type, in arrival order
 */

import { EventEmitter } from 'events';
import { DispatcherEvents } from '../constants/events.js';
import type { FeedEvent, FeedEventHandler, FeedEventOf, FeedEventType } from '../types/events.js';
import { classifyFrame } from '../utils/frames.js';
import { HandlerFailureError, MalformedFrameError } from '../utils/errors.js';

export interface EventDispatcherOptions {
  /** Current size of the trade-kind desired set */
  trackedCount: () => number;
  now?: () => Date;
}

export interface DispatcherStats {
  framesProcessed: number;
  malformedFrames: number;
  handlerFailures: number;
}

type HandlerRegistry = { [K in FeedEventType]: Array<FeedEventHandler<K>> };

export class EventDispatcher extends EventEmitter {
  private handlers: HandlerRegistry = { created: [], trade: [], notice: [] };
  private stats: DispatcherStats = { framesProcessed: 0, malformedFrames: 0, handlerFailures: 0 };
  private readonly trackedCount: () => number;
  private readonly now: () => Date;

  constructor(options: EventDispatcherOptions) {
    super();
    this.trackedCount = options.trackedCount;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Register a handler for one event type. Returns a function that removes it.
   */
  register<K extends FeedEventType>(type: K, handler: FeedEventHandler<K>): () => void {
    const list: Array<FeedEventHandler<K>> = this.handlers[type];
    list.push(handler);
    return () => {
      const index = list.indexOf(handler);
      if (index !== -1) {
        list.splice(index, 1);
      }
    };
  }

  handlerCount(type: FeedEventType): number {
    return this.handlers[type].length;
  }

  /**
   * Build an event from a raw frame. The tracked count is read here, so a
   * trade carries the desired-set size at the moment it was processed.
   */
  classify(raw: string): FeedEvent {
    return classifyFrame(raw, { trackedCount: this.trackedCount(), receivedAt: this.now() });
  }

  /**
   * Classify and dispatch one frame. Malformed frames are logged and dropped.
   */
  async process(raw: string): Promise<void> {
    this.stats.framesProcessed++;

    let event: FeedEvent;
    try {
      event = this.classify(raw);
    } catch (error) {
      if (!(error instanceof MalformedFrameError)) {
        throw error;
      }
      this.stats.malformedFrames++;
      console.warn(`[Dispatcher] Dropped malformed frame (${error.message}): ${raw.substring(0, 100)}`);
      this.emit(DispatcherEvents.MALFORMED_FRAME, error);
      return;
    }

    await this.dispatch(event);
  }

  /**
   * Run every handler registered for the event's type, in registration order.
   * A failing handler is logged and does not stop the others.
   */
  async dispatch(event: FeedEvent): Promise<void> {
    switch (event.type) {
      case 'created':
        return this.runHandlers('created', event);
      case 'trade':
        return this.runHandlers('trade', event);
      case 'notice':
        return this.runHandlers('notice', event);
    }
  }

  /**
   * Consume frames until the source ends
   */
  async run(frames: AsyncIterable<string> | Iterable<string>): Promise<void> {
    for await (const raw of frames) {
      await this.process(raw);
    }
  }

  getStats(): DispatcherStats {
    return { ...this.stats };
  }

  private async runHandlers<K extends FeedEventType>(type: K, event: FeedEventOf<K>): Promise<void> {
    // Copy so handlers that unregister themselves don't shift the iteration
    const handlers = [...this.handlers[type]];
    for (const [index, handler] of handlers.entries()) {
      try {
        await handler(event);
      } catch (error) {
        const failure = new HandlerFailureError(type, index, error);
        this.stats.handlerFailures++;
        console.error(`[Dispatcher] ${failure.message}`);
        this.emit(DispatcherEvents.HANDLER_FAILURE, failure);
      }
    }
  }
}
