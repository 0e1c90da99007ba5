/**
 * SQLite distributor store. All amounts stored as TEXT-encoded bigint base units.
 */

import type Database from 'better-sqlite3';
import { DistributorEvent, isDistributorEventType } from '../eventTypes';
import { EventFilter, IDistributorStore } from '../interfaces';
import { AuthorityState, Participant, PoolState } from '../../types';

interface PoolRow {
  total_staked: string;
  reward_per_token_stored: string;
  last_update_time: number;
  reward_rate: string;
  period_finish: number;
  duration: number;
}

interface AuthorityRow {
  owner: string;
  reward_distribution: string;
}

interface ParticipantRow {
  account: string;
  staked_amount: string;
  reward_per_token_paid: string;
  rewards: string;
}

interface EventRow {
  event_id: string;
  sequence_number: number;
  timestamp: string;
  block_time: number;
  event_type: string;
  account: string | null;
  payload: string;
  prev_event_hash: string;
  event_hash: string;
}

export class SqliteDistributorStore implements IDistributorStore {
  private stmtGetPool: Database.Statement;
  private stmtPutPool: Database.Statement;
  private stmtGetAuthority: Database.Statement;
  private stmtPutAuthority: Database.Statement;
  private stmtGetParticipant: Database.Statement;
  private stmtPutParticipant: Database.Statement;
  private stmtListParticipants: Database.Statement;
  private stmtInsertEvent: Database.Statement;
  private stmtLastEvent: Database.Statement;

  constructor(private db: Database.Database) {
    this.stmtGetPool = db.prepare(
      `SELECT total_staked, reward_per_token_stored, last_update_time, reward_rate, period_finish, duration
       FROM pool WHERE id = 1`
    );
    this.stmtPutPool = db.prepare(
      `INSERT INTO pool (id, total_staked, reward_per_token_stored, last_update_time, reward_rate, period_finish, duration)
       VALUES (1, @totalStaked, @rewardPerTokenStored, @lastUpdateTime, @rewardRate, @periodFinish, @duration)
       ON CONFLICT(id) DO UPDATE SET
         total_staked = @totalStaked,
         reward_per_token_stored = @rewardPerTokenStored,
         last_update_time = @lastUpdateTime,
         reward_rate = @rewardRate,
         period_finish = @periodFinish,
         duration = @duration`
    );

    this.stmtGetAuthority = db.prepare(
      'SELECT owner, reward_distribution FROM authority WHERE id = 1'
    );
    this.stmtPutAuthority = db.prepare(
      `INSERT INTO authority (id, owner, reward_distribution)
       VALUES (1, @owner, @rewardDistribution)
       ON CONFLICT(id) DO UPDATE SET owner = @owner, reward_distribution = @rewardDistribution`
    );

    this.stmtGetParticipant = db.prepare(
      `SELECT account, staked_amount, reward_per_token_paid, rewards
       FROM participants WHERE account = ?`
    );
    this.stmtPutParticipant = db.prepare(
      `INSERT INTO participants (account, staked_amount, reward_per_token_paid, rewards)
       VALUES (@account, @stakedAmount, @rewardPerTokenPaid, @rewards)
       ON CONFLICT(account) DO UPDATE SET
         staked_amount = @stakedAmount,
         reward_per_token_paid = @rewardPerTokenPaid,
         rewards = @rewards`
    );
    this.stmtListParticipants = db.prepare(
      `SELECT account, staked_amount, reward_per_token_paid, rewards
       FROM participants ORDER BY account ASC`
    );

    this.stmtInsertEvent = db.prepare(`
      INSERT INTO events (event_id, sequence_number, timestamp, block_time, event_type, account, payload, prev_event_hash, event_hash)
      VALUES (@eventId, @sequenceNumber, @timestamp, @blockTime, @eventType, @account, @payload, @prevEventHash, @eventHash)
    `);
    this.stmtLastEvent = db.prepare(
      'SELECT * FROM events ORDER BY sequence_number DESC LIMIT 1'
    );
  }

  getPool(): PoolState | undefined {
    const row = this.stmtGetPool.get() as PoolRow | undefined;
    if (!row) return undefined;

    return {
      totalStaked: BigInt(row.total_staked),
      rewardPerTokenStored: BigInt(row.reward_per_token_stored),
      lastUpdateTime: row.last_update_time,
      rewardRate: BigInt(row.reward_rate),
      periodFinish: row.period_finish,
      duration: row.duration,
    };
  }

  putPool(pool: PoolState): void {
    this.stmtPutPool.run({
      totalStaked: pool.totalStaked.toString(),
      rewardPerTokenStored: pool.rewardPerTokenStored.toString(),
      lastUpdateTime: pool.lastUpdateTime,
      rewardRate: pool.rewardRate.toString(),
      periodFinish: pool.periodFinish,
      duration: pool.duration,
    });
  }

  getAuthority(): AuthorityState | undefined {
    const row = this.stmtGetAuthority.get() as AuthorityRow | undefined;
    return row ? { owner: row.owner, rewardDistribution: row.reward_distribution } : undefined;
  }

  putAuthority(authority: AuthorityState): void {
    this.stmtPutAuthority.run({
      owner: authority.owner,
      rewardDistribution: authority.rewardDistribution,
    });
  }

  getParticipant(account: string): Participant | undefined {
    const row = this.stmtGetParticipant.get(account) as ParticipantRow | undefined;
    return row ? rowToParticipant(row) : undefined;
  }

  putParticipant(participant: Participant): void {
    this.stmtPutParticipant.run({
      account: participant.account,
      stakedAmount: participant.stakedAmount.toString(),
      rewardPerTokenPaid: participant.rewardPerTokenPaid.toString(),
      rewards: participant.rewards.toString(),
    });
  }

  listParticipants(): Participant[] {
    const rows = this.stmtListParticipants.all() as ParticipantRow[];
    return rows.map(rowToParticipant);
  }

  appendEvent(event: DistributorEvent): void {
    this.stmtInsertEvent.run({
      eventId: event.eventId,
      sequenceNumber: event.sequenceNumber,
      timestamp: event.timestamp,
      blockTime: event.blockTime,
      eventType: event.eventType,
      account: event.account ?? null,
      payload: JSON.stringify(event.payload),
      prevEventHash: event.prevEventHash,
      eventHash: event.eventHash,
    });
  }

  getLastEvent(): DistributorEvent | undefined {
    const row = this.stmtLastEvent.get() as EventRow | undefined;
    return row ? rowToEvent(row) : undefined;
  }

  queryEvents(filter: EventFilter = {}): DistributorEvent[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.eventType) {
      clauses.push('event_type = ?');
      params.push(filter.eventType);
    }
    if (filter.account) {
      clauses.push('account = ?');
      params.push(filter.account);
    }

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    if (filter.limit !== undefined) {
      // Most recent N, returned oldest first
      const rows = this.db
        .prepare(`SELECT * FROM events ${where} ORDER BY sequence_number DESC LIMIT ?`)
        .all(...params, filter.limit) as EventRow[];
      return rows.reverse().map(rowToEvent);
    }

    const rows = this.db
      .prepare(`SELECT * FROM events ${where} ORDER BY sequence_number ASC`)
      .all(...params) as EventRow[];
    return rows.map(rowToEvent);
  }

  transaction<T>(fn: () => T): T {
    // better-sqlite3 turns nested transactions into savepoints
    return this.db.transaction(fn)();
  }
}

function rowToParticipant(row: ParticipantRow): Participant {
  return {
    account: row.account,
    stakedAmount: BigInt(row.staked_amount),
    rewardPerTokenPaid: BigInt(row.reward_per_token_paid),
    rewards: BigInt(row.rewards),
  };
}

function parsePayload(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw);
  const payload: Record<string, string> = {};
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') {
        payload[key] = value;
      }
    }
  }
  return payload;
}

function rowToEvent(row: EventRow): DistributorEvent {
  if (!isDistributorEventType(row.event_type)) {
    throw new Error(`Unknown event type in store: ${row.event_type}`);
  }

  return {
    eventId: row.event_id,
    sequenceNumber: row.sequence_number,
    timestamp: row.timestamp,
    blockTime: row.block_time,
    eventType: row.event_type,
    account: row.account ?? undefined,
    payload: parsePayload(row.payload),
    prevEventHash: row.prev_event_hash,
    eventHash: row.event_hash,
  };
}
