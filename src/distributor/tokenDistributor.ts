/**
 * Token distributor: the staking pool's public surface.
 *
 * Wires the balance ledger, accrual engine, reward scheduler, authorization
 * and transfer hook over one store. Every mutating method runs inside
 * runAtomic(): time is read once, all writes and events go through a single
 * store transaction, and events reach subscribers only after it commits.
 * Any throw (our own checks or the allocation ledger's) rolls back everything.
 */

import { IAllocationLedger } from '../allocation/interfaces';
import { DistributorError, ErrorCodes } from '../errors';
import { TypedEmitter } from '../events/typedEmitter';
import { buildEvent, EventDraft } from '../persistence/eventBuilder';
import { DistributorEvent } from '../persistence/eventTypes';
import { EventFilter, IDistributorStore } from '../persistence/interfaces';
import {
  AuthorityState,
  DEFAULT_REWARD_DURATION_SECS,
  DistributorConfig,
  Participant,
  PoolState,
  ZERO_ADDRESS,
  createInitialPool,
  isZeroAddress,
  normalizeAccount,
} from '../types';
import { AccrualEngine } from './accrualEngine';
import { Authorization } from './authorization';
import { BalanceLedger } from './balanceLedger';
import { Clock } from './clock';
import { requirePool } from './poolAccess';
import { RewardNotification, RewardScheduler } from './rewardScheduler';
import { StakeActions, TransferHook, TransferOutcome } from './transferHook';

interface DistributorEvents {
  event: [DistributorEvent];
}

interface Operation {
  now: number;
  record(draft: EventDraft): void;
}

export interface ParticipantView extends Participant {
  earned: bigint;
}

export interface PoolView extends PoolState {
  rewardPerToken: bigint;
  lastTimeRewardApplicable: number;
  now: number;
}

export class TokenDistributor {
  private readonly ledger: BalanceLedger;
  private readonly engine: AccrualEngine;
  private readonly auth: Authorization;
  private readonly scheduler: RewardScheduler;
  private readonly bus = new TypedEmitter<DistributorEvents>();
  private readonly distributorAccount: string;
  private inOperation = false;

  constructor(
    private readonly store: IDistributorStore,
    private readonly allocationLedger: IAllocationLedger,
    private readonly clock: Clock,
    config: DistributorConfig
  ) {
    this.distributorAccount = normalizeAccount(config.distributorAccount);
    this.ledger = new BalanceLedger(store);
    this.engine = new AccrualEngine(store, this.ledger);
    this.auth = new Authorization(store);
    this.scheduler = new RewardScheduler(store, this.engine, this.auth);

    this.initialize(config);
  }

  // ── Views ─────────────────────────────────────────────────────────

  lastTimeRewardApplicable(): number {
    return this.engine.lastTimeRewardApplicable(this.clock.now());
  }

  rewardPerToken(): bigint {
    return this.engine.rewardPerToken(this.clock.now());
  }

  earned(account: string): bigint {
    return this.engine.earned(normalizeAccount(account), this.clock.now());
  }

  balanceOf(account: string): bigint {
    return this.ledger.balanceOf(normalizeAccount(account));
  }

  totalSupply(): bigint {
    return this.ledger.totalSupply();
  }

  getPool(): PoolView {
    const now = this.clock.now();
    const pool = requirePool(this.store);
    return {
      ...pool,
      rewardPerToken: this.engine.rewardPerToken(now),
      lastTimeRewardApplicable: this.engine.lastTimeRewardApplicable(now),
      now,
    };
  }

  getParticipant(account: string): ParticipantView {
    const key = normalizeAccount(account);
    const participant = this.ledger.getParticipant(key);
    return { ...participant, earned: this.engine.earned(key, this.clock.now()) };
  }

  listParticipants(): Participant[] {
    return this.store.listParticipants();
  }

  getAuthority(): AuthorityState {
    return this.auth.getAuthority();
  }

  getEvents(filter?: EventFilter): DistributorEvent[] {
    return this.store.queryEvents(filter);
  }

  /**
   * Subscribe to committed events. Returns an unsubscribe function.
   */
  subscribe(listener: (event: DistributorEvent) => void): () => void {
    return this.bus.onEvent('event', listener);
  }

  // ── Mutations ─────────────────────────────────────────────────────

  stake(account: string, amount: bigint): Participant {
    return this.runAtomic(op => this.stakeFor(normalizeAccount(account), amount, op));
  }

  withdraw(account: string, amount: bigint): Participant {
    return this.runAtomic(op => this.withdrawFrom(normalizeAccount(account), amount, op));
  }

  /** Claim everything earned so far. Returns the amount paid. */
  getReward(account: string): bigint {
    return this.runAtomic(op => this.claim(normalizeAccount(account), op));
  }

  /** Withdraw the whole stake, then claim. Returns the amount paid. */
  exit(account: string): bigint {
    return this.runAtomic(op => {
      const key = normalizeAccount(account);
      const staked = this.ledger.balanceOf(key);
      if (staked > 0n) {
        this.withdrawFrom(key, staked, op);
      }
      return this.claim(key, op);
    });
  }

  /**
   * Hooked-token notification; see TransferHook.
   */
  onTransfer(from: string, to: string, amount: bigint): TransferOutcome {
    return this.runAtomic(op => new TransferHook(this.actionsFor(op)).onTransfer(from, to, amount));
  }

  notifyRewardAmount(caller: string, amount: bigint): RewardNotification {
    return this.runAtomic(op => {
      const result = this.scheduler.notifyRewardAmount(caller, amount, op.now);
      op.record({ eventType: 'REWARD_ADDED', payload: { amount: amount.toString() } });
      console.log(
        `Distributor: reward added ${amount}, rate=${result.rewardRate}/s, periodFinish=${result.periodFinish}`
      );
      return result;
    });
  }

  setRewardDistribution(caller: string, account: string): AuthorityState {
    return this.runAtomic(op => {
      const authority = this.auth.setRewardDistribution(caller, account);
      op.record({
        eventType: 'REWARD_DISTRIBUTION_SET',
        account: authority.rewardDistribution,
        payload: {},
      });
      return authority;
    });
  }

  transferOwnership(caller: string, newOwner: string): AuthorityState {
    return this.runAtomic(op => {
      const { previous, next } = this.auth.transferOwnership(caller, newOwner);
      op.record({
        eventType: 'OWNERSHIP_TRANSFERRED',
        account: next,
        payload: { previousOwner: previous, newOwner: next },
      });
      return this.auth.getAuthority();
    });
  }

  // ── Internals ─────────────────────────────────────────────────────

  private initialize(config: DistributorConfig): void {
    if (this.store.getPool()) {
      return;
    }

    const duration = config.duration ?? DEFAULT_REWARD_DURATION_SECS;
    if (!Number.isInteger(duration) || duration <= 0) {
      throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `Invalid reward duration: ${duration}`);
    }

    this.store.transaction(() => {
      this.store.putPool(createInitialPool(duration));
      this.store.putAuthority({
        owner: normalizeAccount(config.owner),
        rewardDistribution: normalizeAccount(config.rewardDistribution ?? ZERO_ADDRESS),
      });
    });
  }

  private runAtomic<T>(fn: (op: Operation) => T): T {
    if (this.inOperation) {
      throw new DistributorError(
        ErrorCodes.REENTRANT_CALL,
        'Distributor operation already in progress'
      );
    }

    const now = this.clock.now();
    const pending: DistributorEvent[] = [];
    const op: Operation = {
      now,
      record: draft => {
        const event = buildEvent(draft, this.store.getLastEvent(), now);
        this.store.appendEvent(event);
        pending.push(event);
      },
    };

    this.inOperation = true;
    let result: T;
    try {
      result = this.store.transaction(() => fn(op));
    } finally {
      this.inOperation = false;
    }

    for (const event of pending) {
      this.publish(event);
    }
    return result;
  }

  private publish(event: DistributorEvent): void {
    try {
      this.bus.emitEvent('event', event);
    } catch (err) {
      console.error(`Distributor: subscriber failed on ${event.eventType} #${event.sequenceNumber}:`, err);
    }
  }

  private actionsFor(op: Operation): StakeActions {
    return {
      stake: (account, amount) => {
        this.stakeFor(normalizeAccount(account), amount, op);
      },
      withdraw: (account, amount) => {
        this.withdrawFrom(normalizeAccount(account), amount, op);
      },
      payReward: account => this.payReward(normalizeAccount(account), op),
      balanceOf: account => this.ledger.balanceOf(normalizeAccount(account)),
    };
  }

  private stakeFor(account: string, amount: bigint, op: Operation): Participant {
    requireParticipantAccount(account);
    return this.engine.withCheckpoint(account, op.now, () => {
      const participant = this.ledger.stake(account, amount);
      op.record({ eventType: 'STAKED', account, payload: { amount: amount.toString() } });
      return participant;
    });
  }

  private withdrawFrom(account: string, amount: bigint, op: Operation): Participant {
    requireParticipantAccount(account);
    return this.engine.withCheckpoint(account, op.now, () => {
      const participant = this.ledger.withdraw(account, amount);
      op.record({ eventType: 'WITHDRAWN', account, payload: { amount: amount.toString() } });
      return participant;
    });
  }

  private claim(account: string, op: Operation): bigint {
    requireParticipantAccount(account);
    return this.engine.withCheckpoint(account, op.now, () => this.payReward(account, op));
  }

  /**
   * Zero the owed reward and hand it to the allocation ledger. If allocate
   * throws, the enclosing transaction restores `rewards`.
   */
  private payReward(account: string, op: Operation): bigint {
    const reward = this.engine.earned(account, op.now);
    if (reward === 0n) {
      return 0n;
    }

    const participant = this.ledger.getParticipant(account);
    participant.rewards = 0n;
    participant.rewardPerTokenPaid = this.engine.rewardPerToken(op.now);
    this.store.putParticipant(participant);

    this.allocationLedger.allocate(this.distributorAccount, account, reward);
    op.record({ eventType: 'REWARD_PAID', account, payload: { amount: reward.toString() } });
    return reward;
  }
}

function requireParticipantAccount(account: string): void {
  if (account === '' || isZeroAddress(account)) {
    throw new DistributorError(ErrorCodes.INVALID_ACCOUNT, `Invalid participant account: "${account}"`);
  }
}
