/**
 * Event name constants to avoid typos when emitting/listening
 */

export const FeedEvents = {
  CONNECTED: 'connected',
  DISCONNECTED: 'disconnected',
  ERROR: 'error',
  MAX_RECONNECT_ATTEMPTS_REACHED: 'maxReconnectAttemptsReached',
} as const;

export const SubscriptionEvents = {
  TOPIC_ADDED: 'topicAdded',
  TOPIC_REMOVED: 'topicRemoved',
  FRAME_SENT: 'frameSent',
  RECONCILE_DEFERRED: 'reconcileDeferred',
} as const;

export const DispatcherEvents = {
  MALFORMED_FRAME: 'malformedFrame',
  HANDLER_FAILURE: 'handlerFailure',
} as const;

export const MonitorEvents = {
  CLOSED: 'closed',
} as const;

export const TokenFileEvents = {
  SYNCED: 'synced',
  ERROR: 'error',
} as const;
