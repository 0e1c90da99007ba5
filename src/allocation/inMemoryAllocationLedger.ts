import { DistributorError, ErrorCodes } from '../errors';
import { normalizeAccount } from '../types';
import {
  AllocationBalance,
  AllocationRecord,
  IAllocationLedger,
  IAllocationLedgerReader,
} from './interfaces';

export const DISTRIBUTOR_ROLE = 'DISTRIBUTOR_ROLE';

/**
 * In-process allocation ledger. Holds a fixed token supply which the admin
 * assigns to distributor accounts; distributors then allocate from their
 * assignment to recipients.
 *
 * Every method validates before writing, so a rejected call changes nothing.
 */
export class InMemoryAllocationLedger implements IAllocationLedger, IAllocationLedgerReader {
  private readonly admin: string;
  private unassigned: bigint;
  private readonly roles = new Map<string, Set<string>>();
  private readonly accounts = new Map<string, AllocationBalance>();
  private readonly allocations: AllocationRecord[] = [];

  constructor(totalTokens: bigint, admin: string) {
    if (totalTokens < 0n) {
      throw new Error(`Negative token supply: ${totalTokens}`);
    }
    this.admin = normalizeAccount(admin);
    this.unassigned = totalTokens;
  }

  hasRole(role: string, account: string): boolean {
    return this.roles.get(role)?.has(normalizeAccount(account)) ?? false;
  }

  grantRole(caller: string, role: string, account: string): void {
    this.requireAdmin(caller);
    const members = this.roles.get(role) ?? new Set<string>();
    members.add(normalizeAccount(account));
    this.roles.set(role, members);
  }

  revokeRole(caller: string, role: string, account: string): void {
    this.requireAdmin(caller);
    this.roles.get(role)?.delete(normalizeAccount(account));
  }

  /**
   * Give a distributor a budget out of the unassigned supply.
   */
  assign(caller: string, distributor: string, amount: bigint): void {
    this.requireAdmin(caller);
    if (!this.hasRole(DISTRIBUTOR_ROLE, distributor)) {
      throw new DistributorError(
        ErrorCodes.ONLY_DISTRIBUTOR_ROLE,
        'AllocationLedger::assign: ONLY_TO_DISTRIBUTOR_ROLE'
      );
    }
    if (amount > this.unassigned) {
      throw new DistributorError(
        ErrorCodes.ASSIGN_EXCEEDS_SUPPLY,
        `AllocationLedger::assign: amount ${amount} exceeds unassigned supply ${this.unassigned}`
      );
    }

    const balance = this.getOrCreate(distributor);
    this.unassigned -= amount;
    balance.allocatedTokens += amount;
  }

  allocate(distributor: string, recipient: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new DistributorError(ErrorCodes.INVALID_AMOUNT, `AllocationLedger::allocate: invalid amount ${amount}`);
    }
    if (!this.hasRole(DISTRIBUTOR_ROLE, distributor)) {
      throw new DistributorError(
        ErrorCodes.ONLY_DISTRIBUTOR_ROLE,
        'AllocationLedger::allocate: ONLY_DISTRIBUTOR_ROLE'
      );
    }

    const source = this.getOrCreate(distributor);
    if (source.allocatedTokens < amount) {
      throw new DistributorError(
        ErrorCodes.INSUFFICIENT_ASSIGNED,
        `AllocationLedger::allocate: amount ${amount} exceeds assigned ${source.allocatedTokens}`
      );
    }

    const target = this.getOrCreate(recipient);
    source.allocatedTokens -= amount;
    target.allocatedTokens += amount;
    this.allocations.push({
      distributor: normalizeAccount(distributor),
      recipient: normalizeAccount(recipient),
      amount,
    });
  }

  balances(account: string): AllocationBalance {
    const balance = this.accounts.get(normalizeAccount(account));
    return balance ? { ...balance } : { allocatedTokens: 0n };
  }

  getUnassigned(): bigint {
    return this.unassigned;
  }

  getAllocations(): AllocationRecord[] {
    return this.allocations.map(a => ({ ...a }));
  }

  private requireAdmin(caller: string): void {
    if (normalizeAccount(caller) !== this.admin) {
      throw new DistributorError(ErrorCodes.NOT_OWNER, 'AllocationLedger: caller is not the admin');
    }
  }

  private getOrCreate(account: string): AllocationBalance {
    const key = normalizeAccount(account);
    let balance = this.accounts.get(key);
    if (!balance) {
      balance = { allocatedTokens: 0n };
      this.accounts.set(key, balance);
    }
    return balance;
  }
}
