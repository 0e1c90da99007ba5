import { DistributorEvent, DistributorEventType } from './eventTypes';
import { AuthorityState, Participant, PoolState } from '../types';

export interface EventFilter {
  eventType?: DistributorEventType;
  account?: string;
  limit?: number;
}

/**
 * Storage for one distributor: pool accumulator, participant map,
 * authority and the event log.
 *
 * All methods are synchronous so that a whole entry point runs inside a
 * single transaction() call with nothing else interleaved.
 */
export interface IDistributorStore {
  getPool(): PoolState | undefined;
  putPool(pool: PoolState): void;

  getAuthority(): AuthorityState | undefined;
  putAuthority(authority: AuthorityState): void;

  getParticipant(account: string): Participant | undefined;
  putParticipant(participant: Participant): void;
  listParticipants(): Participant[];

  appendEvent(event: DistributorEvent): void;
  getLastEvent(): DistributorEvent | undefined;
  queryEvents(filter?: EventFilter): DistributorEvent[];

  /**
   * Run fn atomically. If fn throws, every write made inside it is undone
   * and the error is rethrown. Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T;
}
