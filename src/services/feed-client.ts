/**
 * Feed WebSocket Client
 * Owns the single connection to the PumpPortal data feed, reconnects with
 * exponential backoff, and exposes inbound frames as one async iterator
 */

import { EventEmitter } from 'events';
import { WebSocket, type RawData } from 'ws';
import type {
  ConnectedInfo,
  ControlFrame,
  DisconnectedInfo,
  FeedClientConfig,
  FeedSocket,
  FrameSender,
  SocketFactory,
} from '../types/feed.js';
import { FeedEvents } from '../constants/events.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { computeBackoffDelay } from '../utils/backoff.js';
import { encodeControlFrame } from '../utils/frames.js';
import {
  ConnectionClosedError,
  ConnectionError,
  NotConnectedError,
  describeError,
} from '../utils/errors.js';

export const createWebSocket: SocketFactory = (endpoint, handshakeTimeout) =>
  new WebSocket(endpoint, { handshakeTimeout });

/**
 * Client for the feed connection
 * Emits events defined in FeedEvents
 */
export class FeedClient extends EventEmitter implements FrameSender {
  private readonly config: Required<Omit<FeedClientConfig, 'createSocket'>>;
  private readonly createSocket: SocketFactory;
  private readonly frames = new AsyncQueue<string>();
  private socket: FeedSocket | null = null;
  // Socket still in its opening handshake
  private pendingSocket: FeedSocket | null = null;
  private connecting: Promise<void> | null = null;
  private receiving = false;
  private stopped = false;
  private reconnectAttempts = 0;
  private currentConnectionId = 0;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private awaitingPong = false;
  private cancelRetryWait: (() => void) | null = null;

  constructor(config: FeedClientConfig) {
    super();
    this.config = {
      endpoint: config.endpoint,
      reconnectDelay: config.reconnectDelay ?? 1000,
      maxReconnectDelay: config.maxReconnectDelay ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      backoffJitter: config.backoffJitter ?? 0.1,
      maxReconnectAttempts: config.maxReconnectAttempts ?? 10,
      handshakeTimeout: config.handshakeTimeout ?? 15000,
      sendTimeout: config.sendTimeout ?? 5000,
      pingInterval: config.pingInterval ?? 20000,
    };
    this.createSocket = config.createSocket ?? createWebSocket;
  }

  /**
   * Connect to the feed. Failed handshakes are retried with backoff; the
   * returned promise only rejects once the retry budget is spent.
   */
  connect(): Promise<void> {
    if (this.stopped) {
      return Promise.reject(new ConnectionError('Feed client has been disconnected', this.config.endpoint));
    }
    if (this.connected) {
      return Promise.resolve();
    }
    return this.startConnecting(0);
  }

  /**
   * Write a control frame to the live connection
   *
   * @throws NotConnectedError when there is no open socket, the write fails,
   * or it does not complete within the send timeout
   */
  async send(frame: ControlFrame): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      throw new NotConnectedError(`Cannot ${frame.action} '${frame.kind}' topics: not connected`);
    }

    const payload = encodeControlFrame(frame);
    const timeoutMs = this.config.sendTimeout;

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        console.warn(`[Feed] Send timed out after ${timeoutMs}ms, dropping connection`);
        reject(new NotConnectedError(`Send timed out after ${timeoutMs}ms`));
        // The close handler takes care of reconnecting
        socket.terminate();
      }, timeoutMs);

      socket.send(payload, (error) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(new NotConnectedError(`Send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * The inbound frame stream. It spans reconnects, ends after disconnect(),
   * and throws ConnectionClosedError once reconnection gives up.
   * Can only be called once.
   */
  receive(): AsyncIterableIterator<string> {
    if (this.receiving) {
      throw new Error('Feed frames can only be received once per client');
    }
    this.receiving = true;
    return this.frames;
  }

  /**
   * Close the connection and stop reconnecting. The client cannot be reused.
   */
  disconnect(): void {
    console.log('[Feed] Disconnecting...');
    this.stopped = true;

    if (this.cancelRetryWait) {
      this.cancelRetryWait();
    }
    this.stopHeartbeat();

    if (this.pendingSocket) {
      this.pendingSocket.terminate();
      this.pendingSocket = null;
    }

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      socket.close(1000, 'Client disconnect');
      const info: DisconnectedInfo = { code: 1000, reason: 'Client disconnect' };
      this.emit(FeedEvents.DISCONNECTED, info);
    }

    this.frames.end();
  }

  get connected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  get connectionId(): number {
    return this.currentConnectionId;
  }

  get reconnectAttemptCount(): number {
    return this.reconnectAttempts;
  }

  get endpoint(): string {
    return this.config.endpoint;
  }

  private startConnecting(initialDelay: number): Promise<void> {
    if (!this.connecting) {
      this.connecting = this.establish(initialDelay).finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async establish(initialDelay: number): Promise<void> {
    let delay = initialDelay;

    for (;;) {
      if (delay > 0) {
        await this.wait(delay);
      }
      if (this.stopped) {
        return;
      }

      try {
        console.log(`[Feed] Connecting to ${this.config.endpoint}...`);
        await this.openSocket();
        this.reconnectAttempts = 0;
        return;
      } catch (error) {
        if (this.stopped) {
          return;
        }

        const failure = error instanceof ConnectionError
          ? error
          : new ConnectionError(describeError(error), this.config.endpoint, { cause: error });
        console.error(`[Feed] Connection failed: ${failure.message}`);
        this.reportError(failure);

        if (this.reconnectAttempts >= this.config.maxReconnectAttempts) {
          console.error(`[Feed] Max reconnection attempts (${this.config.maxReconnectAttempts}) reached`);
          this.emit(FeedEvents.MAX_RECONNECT_ATTEMPTS_REACHED);
          this.frames.end(new ConnectionClosedError(this.config.endpoint, this.reconnectAttempts, { cause: failure }));
          throw failure;
        }

        this.reconnectAttempts++;
        delay = computeBackoffDelay(this.reconnectAttempts, {
          baseDelay: this.config.reconnectDelay,
          multiplier: this.config.backoffMultiplier,
          maxDelay: this.config.maxReconnectDelay,
          jitter: this.config.backoffJitter,
        });
        console.log(
          `[Feed] Reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.config.maxReconnectAttempts})...`
        );
      }
    }
  }

  /**
   * Open one socket; resolves on 'open', rejects with ConnectionError if the
   * handshake fails, times out, or the socket closes first
   */
  private openSocket(): Promise<void> {
    const endpoint = this.config.endpoint;
    const handshakeTimeout = this.config.handshakeTimeout;

    return new Promise((resolve, reject) => {
      let socket: FeedSocket;
      try {
        socket = this.createSocket(endpoint, handshakeTimeout);
      } catch (error) {
        reject(new ConnectionError(describeError(error), endpoint, { cause: error }));
        return;
      }
      this.pendingSocket = socket;

      let opened = false;
      let settled = false;

      const fail = (error: ConnectionError): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (this.pendingSocket === socket) {
          this.pendingSocket = null;
        }
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new ConnectionError(`Handshake timed out after ${handshakeTimeout}ms`, endpoint));
        socket.terminate();
      }, handshakeTimeout);

      socket.on('open', () => {
        if (settled) {
          socket.terminate();
          return;
        }
        settled = true;
        opened = true;
        clearTimeout(timer);
        this.pendingSocket = null;

        if (this.stopped) {
          socket.close(1000, 'Client disconnect');
        } else {
          this.attach(socket);
        }
        resolve();
      });

      socket.on('message', (data: RawData) => {
        if (socket === this.socket) {
          this.frames.push(rawDataToString(data));
        }
      });

      socket.on('pong', () => {
        if (socket === this.socket) {
          this.awaitingPong = false;
        }
      });

      socket.on('error', (error: Error) => {
        if (!opened) {
          fail(new ConnectionError(error.message, endpoint, { cause: error }));
          return;
        }
        // An error on an open socket is followed by 'close'
        console.error(`[Feed] Socket error: ${error.message}`);
        this.reportError(error);
      });

      socket.on('close', (code: number, reason?: Buffer | string) => {
        if (!opened) {
          fail(new ConnectionError(`Connection closed during handshake (code: ${code})`, endpoint));
          return;
        }
        this.handleClose(socket, code, reason === undefined ? '' : String(reason));
      });
    });
  }

  private attach(socket: FeedSocket): void {
    this.socket = socket;
    this.currentConnectionId++;

    const info: ConnectedInfo = {
      connectionId: this.currentConnectionId,
      reconnect: this.currentConnectionId > 1,
    };
    console.log(`[Feed] Connected${info.reconnect ? ` (connection #${info.connectionId})` : ''}`);

    this.startHeartbeat(socket);
    this.emit(FeedEvents.CONNECTED, info);
  }

  private handleClose(socket: FeedSocket, code: number, reason: string): void {
    // Sockets replaced or closed by disconnect() are already accounted for
    if (socket !== this.socket) {
      return;
    }
    this.socket = null;
    this.stopHeartbeat();

    console.log(`[Feed] Connection closed (code: ${code}${reason ? `, reason: ${reason}` : ''})`);
    const info: DisconnectedInfo = { code, reason };
    this.emit(FeedEvents.DISCONNECTED, info);

    if (this.stopped) {
      return;
    }

    this.startConnecting(this.config.reconnectDelay).catch((error: unknown) => {
      console.error(`[Feed] Gave up reconnecting: ${describeError(error)}`);
    });
  }

  private startHeartbeat(socket: FeedSocket): void {
    this.stopHeartbeat();
    if (this.config.pingInterval <= 0) {
      return;
    }

    this.awaitingPong = false;
    this.heartbeatTimer = setInterval(() => {
      if (this.awaitingPong) {
        console.warn('[Feed] No pong since last ping, terminating connection');
        socket.terminate();
        return;
      }
      this.awaitingPong = true;
      socket.ping();
    }, this.config.pingInterval);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private wait(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelRetryWait = null;
        resolve();
      }, ms);

      this.cancelRetryWait = () => {
        clearTimeout(timer);
        this.cancelRetryWait = null;
        resolve();
      };
    });
  }

  // Unhandled 'error' events throw, so only emit when someone listens
  private reportError(error: Error): void {
    if (this.listenerCount(FeedEvents.ERROR) > 0) {
      this.emit(FeedEvents.ERROR, error);
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}
