/**
 * Feed frame encoding and classification
 *
 * Inbound PumpPortal frames are JSON objects. Creations and trades are told
 * apart by `txType`; acknowledgements carry a `message` string and error
 * replies an `errors` string.
 */

import { FEED_METHODS, TX_TYPE_BUY, TX_TYPE_CREATE, TX_TYPE_SELL } from '../constants/feed.js';
import type { ControlFrame } from '../types/feed.js';
import type { FeedEvent, FeedNoticeEvent, TokenCreatedEvent, TokenTradeEvent } from '../types/events.js';
import { MalformedFrameError } from './errors.js';

export interface ClassifyContext {
  /** Trade-kind desired set size at classification time */
  trackedCount: number;
  /** Used when the frame carries no timestamp of its own */
  receivedAt: Date;
}

type FrameRecord = Record<string, unknown>;

/**
 * Serialize a control frame into the feed's wire format
 */
export function encodeControlFrame(frame: ControlFrame): string {
  if (frame.topics.length === 0) {
    throw new Error(`Refusing to encode ${frame.action} frame for '${frame.kind}' with no topics`);
  }

  const methods = FEED_METHODS[frame.kind];
  const method = frame.action === 'subscribe' ? methods.subscribe : methods.unsubscribe;

  return methods.keyed
    ? JSON.stringify({ method, keys: frame.topics })
    : JSON.stringify({ method });
}

/**
 * Turn a raw inbound frame into a typed, frozen event
 *
 * @throws MalformedFrameError when the frame is not JSON, has no known
 * discriminator, or lacks a field its event type requires
 */
export function classifyFrame(raw: string, context: ClassifyContext): FeedEvent {
  const record = parseRecord(raw);
  const receivedAt = readTimestamp(record) ?? context.receivedAt;

  const txType = record.txType;
  if (txType === TX_TYPE_CREATE) {
    return Object.freeze(buildCreated(record, raw, receivedAt));
  }
  if (txType === TX_TYPE_BUY || txType === TX_TYPE_SELL) {
    return Object.freeze(buildTrade(record, raw, txType, context.trackedCount, receivedAt));
  }
  if (txType !== undefined) {
    throw new MalformedFrameError(`Unknown txType: ${String(txType)}`, raw);
  }

  const notice = buildNotice(record, receivedAt);
  if (notice) {
    return Object.freeze(notice);
  }

  throw new MalformedFrameError('Frame has no recognized event discriminator', raw);
}

function parseRecord(raw: string): FrameRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedFrameError('Frame is not valid JSON', raw);
  }

  if (!isRecord(parsed)) {
    throw new MalformedFrameError('Frame is not a JSON object', raw);
  }
  return parsed;
}

function buildCreated(record: FrameRecord, raw: string, receivedAt: Date): TokenCreatedEvent {
  return {
    type: 'created',
    mint: requireString(record, 'mint', raw),
    name: requirePresentString(record, 'name', raw),
    symbol: requirePresentString(record, 'symbol', raw),
    signature: requireString(record, 'signature', raw),
    traderPublicKey: optionalString(record, 'traderPublicKey'),
    uri: optionalString(record, 'uri'),
    initialBuy: optionalNumber(record, 'initialBuy'),
    solAmount: optionalNumber(record, 'solAmount'),
    marketCapSol: optionalNumber(record, 'marketCapSol'),
    pool: optionalString(record, 'pool'),
    receivedAt,
  };
}

function buildTrade(
  record: FrameRecord,
  raw: string,
  side: TokenTradeEvent['side'],
  trackedCount: number,
  receivedAt: Date
): TokenTradeEvent {
  return {
    type: 'trade',
    mint: requireString(record, 'mint', raw),
    side,
    solAmount: requireNumber(record, 'solAmount', raw),
    traderPublicKey: requireString(record, 'traderPublicKey', raw),
    signature: requireString(record, 'signature', raw),
    tokenAmount: optionalNumber(record, 'tokenAmount'),
    tokensInPool: optionalNumber(record, 'vTokensInBondingCurve') ?? optionalNumber(record, 'tokensInPool'),
    solInPool: optionalNumber(record, 'vSolInBondingCurve') ?? optionalNumber(record, 'solInPool'),
    marketCapSol: optionalNumber(record, 'marketCapSol'),
    pool: optionalString(record, 'pool'),
    trackedCountAtEvent: trackedCount,
    receivedAt,
  };
}

function buildNotice(record: FrameRecord, receivedAt: Date): FeedNoticeEvent | null {
  const errors = optionalString(record, 'errors');
  if (errors !== undefined) {
    return { type: 'notice', message: errors, isError: true, receivedAt };
  }

  const message = optionalString(record, 'message');
  if (message !== undefined) {
    return { type: 'notice', message, isError: false, receivedAt };
  }

  return null;
}

function readTimestamp(record: FrameRecord): Date | undefined {
  const millis = optionalNumber(record, 'timestamp');
  return millis === undefined ? undefined : new Date(millis);
}

function requireString(record: FrameRecord, key: string, raw: string): string {
  const value = optionalString(record, key);
  if (value === undefined || value.length === 0) {
    throw new MalformedFrameError(`Missing required field: ${key}`, raw);
  }
  return value;
}

// Display-only fields: must be strings, may be empty
function requirePresentString(record: FrameRecord, key: string, raw: string): string {
  const value = optionalString(record, key);
  if (value === undefined) {
    throw new MalformedFrameError(`Missing required field: ${key}`, raw);
  }
  return value;
}

function requireNumber(record: FrameRecord, key: string, raw: string): number {
  const value = optionalNumber(record, key);
  if (value === undefined) {
    throw new MalformedFrameError(`Missing or non-numeric field: ${key}`, raw);
  }
  return value;
}

function optionalString(record: FrameRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

// Accepts numbers and numeric strings
function optionalNumber(record: FrameRecord, key: string): number | undefined {
  const value = record[key];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function isRecord(value: unknown): value is FrameRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
