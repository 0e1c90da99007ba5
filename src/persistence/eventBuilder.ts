import * as crypto from 'crypto';
import { DistributorEvent, DistributorEventType, GENESIS_HASH } from './eventTypes';
import { canonicalStringify, computeHash } from './canonicalSerialize';

/**
 * Compute the hash of a distributor event (wall-clock timestamp excluded).
 */
export function computeEventHash(
  event: Omit<DistributorEvent, 'eventHash'>
): string {
  const data = canonicalStringify({
    eventId: event.eventId,
    sequenceNumber: event.sequenceNumber,
    blockTime: event.blockTime,
    eventType: event.eventType,
    account: event.account,
    payload: event.payload,
    prevEventHash: event.prevEventHash,
  });
  return computeHash(data);
}

export interface EventDraft {
  eventType: DistributorEventType;
  account?: string;
  payload: Record<string, string>;
}

/**
 * Build the next event in the chain after `prev` (or after genesis).
 */
export function buildEvent(
  draft: EventDraft,
  prev: DistributorEvent | undefined,
  blockTime: number,
  timestamp?: string
): DistributorEvent {
  const partial: Omit<DistributorEvent, 'eventHash'> = {
    eventId: crypto.randomUUID(),
    sequenceNumber: prev ? prev.sequenceNumber + 1 : 0,
    timestamp: timestamp ?? new Date().toISOString(),
    blockTime,
    eventType: draft.eventType,
    account: draft.account,
    payload: draft.payload,
    prevEventHash: prev ? prev.eventHash : GENESIS_HASH,
  };
  return { ...partial, eventHash: computeEventHash(partial) };
}

/**
 * Verify the hash chain of a sequence of events.
 */
export function verifyEventChain(
  events: DistributorEvent[],
  expectedPrevHash?: string
): { valid: boolean; brokenAt?: number; error?: string } {
  if (events.length === 0) {
    return { valid: true };
  }

  if (expectedPrevHash !== undefined && events[0].prevEventHash !== expectedPrevHash) {
    return {
      valid: false,
      brokenAt: 0,
      error: `First event prevEventHash mismatch: expected ${expectedPrevHash}, got ${events[0].prevEventHash}`,
    };
  }

  for (let i = 0; i < events.length; i++) {
    const { eventHash, ...rest } = events[i];
    const expectedHash = computeEventHash(rest);

    if (eventHash !== expectedHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} hash mismatch: expected ${expectedHash}, got ${eventHash}`,
      };
    }

    if (i > 0 && events[i].prevEventHash !== events[i - 1].eventHash) {
      return {
        valid: false,
        brokenAt: i,
        error: `Event ${i} chain broken: prevEventHash doesn't match previous event's hash`,
      };
    }
  }

  return { valid: true };
}
