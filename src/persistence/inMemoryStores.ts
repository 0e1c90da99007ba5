import { DistributorEvent } from './eventTypes';
import { EventFilter, IDistributorStore } from './interfaces';
import { AuthorityState, Participant, PoolState } from '../types';

interface StoreSnapshot {
  pool: PoolState | undefined;
  authority: AuthorityState | undefined;
  participants: Map<string, Participant>;
  eventCount: number;
}

export class InMemoryDistributorStore implements IDistributorStore {
  private pool: PoolState | undefined;
  private authority: AuthorityState | undefined;
  private participants = new Map<string, Participant>();
  private events: DistributorEvent[] = [];
  private depth = 0;

  getPool(): PoolState | undefined {
    return this.pool ? { ...this.pool } : undefined;
  }

  putPool(pool: PoolState): void {
    this.pool = { ...pool };
  }

  getAuthority(): AuthorityState | undefined {
    return this.authority ? { ...this.authority } : undefined;
  }

  putAuthority(authority: AuthorityState): void {
    this.authority = { ...authority };
  }

  getParticipant(account: string): Participant | undefined {
    const p = this.participants.get(account);
    return p ? { ...p } : undefined;
  }

  putParticipant(participant: Participant): void {
    this.participants.set(participant.account, { ...participant });
  }

  listParticipants(): Participant[] {
    return [...this.participants.values()]
      .map(p => ({ ...p }))
      .sort((a, b) => a.account.localeCompare(b.account));
  }

  appendEvent(event: DistributorEvent): void {
    this.events.push(event);
  }

  getLastEvent(): DistributorEvent | undefined {
    return this.events.length > 0 ? this.events[this.events.length - 1] : undefined;
  }

  queryEvents(filter: EventFilter = {}): DistributorEvent[] {
    const matched = this.events.filter(e => {
      if (filter.eventType && e.eventType !== filter.eventType) return false;
      if (filter.account && e.account !== filter.account) return false;
      return true;
    });
    return filter.limit !== undefined ? matched.slice(-filter.limit) : matched;
  }

  transaction<T>(fn: () => T): T {
    if (this.depth > 0) {
      return fn();
    }

    const snapshot = this.takeSnapshot();
    this.depth++;
    try {
      return fn();
    } catch (err) {
      this.restore(snapshot);
      throw err;
    } finally {
      this.depth--;
    }
  }

  private takeSnapshot(): StoreSnapshot {
    const participants = new Map<string, Participant>();
    for (const [account, p] of this.participants) {
      participants.set(account, { ...p });
    }
    return {
      pool: this.getPool(),
      authority: this.getAuthority(),
      participants,
      eventCount: this.events.length,
    };
  }

  private restore(snapshot: StoreSnapshot): void {
    this.pool = snapshot.pool;
    this.authority = snapshot.authority;
    this.participants = snapshot.participants;
    this.events.length = snapshot.eventCount;
  }
}

export function createInMemoryStore(): InMemoryDistributorStore {
  return new InMemoryDistributorStore();
}
