import { DISTRIBUTOR_ROLE, InMemoryAllocationLedger } from '../inMemoryAllocationLedger';
import { ErrorCodes } from '../../errors';
import { errorCodeOf } from '../../distributor/tests/helpers';

const ADMIN = '0x00000000000000000000000000000000000000a1';
const DISTRIBUTOR = '0x00000000000000000000000000000000000000d1';

describe('InMemoryAllocationLedger', () => {
  let ledger: InMemoryAllocationLedger;

  beforeEach(() => {
    ledger = new InMemoryAllocationLedger(1000n, ADMIN);
  });

  describe('roles', () => {
    it('should grant and revoke the distributor role', () => {
      ledger.grantRole(ADMIN, DISTRIBUTOR_ROLE, DISTRIBUTOR);
      expect(ledger.hasRole(DISTRIBUTOR_ROLE, '0x00000000000000000000000000000000000000D1')).toBe(true);

      ledger.revokeRole(ADMIN, DISTRIBUTOR_ROLE, DISTRIBUTOR);
      expect(ledger.hasRole(DISTRIBUTOR_ROLE, DISTRIBUTOR)).toBe(false);
    });

    it('should only let the admin manage roles', () => {
      expect(errorCodeOf(() => ledger.grantRole('mallory', DISTRIBUTOR_ROLE, 'mallory'))).toBe(
        ErrorCodes.NOT_OWNER
      );
      expect(ledger.hasRole(DISTRIBUTOR_ROLE, 'mallory')).toBe(false);
    });
  });

  describe('assign', () => {
    it('should move supply into a distributor budget', () => {
      ledger.grantRole(ADMIN, DISTRIBUTOR_ROLE, DISTRIBUTOR);
      ledger.assign(ADMIN, DISTRIBUTOR, 600n);

      expect(ledger.balances(DISTRIBUTOR).allocatedTokens).toBe(600n);
      expect(ledger.getUnassigned()).toBe(400n);
    });

    it('should require the role on the target', () => {
      expect(() => ledger.assign(ADMIN, DISTRIBUTOR, 1n)).toThrow(
        'AllocationLedger::assign: ONLY_TO_DISTRIBUTOR_ROLE'
      );
    });

    it('should not assign more than the unassigned supply', () => {
      ledger.grantRole(ADMIN, DISTRIBUTOR_ROLE, DISTRIBUTOR);
      ledger.assign(ADMIN, DISTRIBUTOR, 600n);

      expect(errorCodeOf(() => ledger.assign(ADMIN, DISTRIBUTOR, 401n))).toBe(ErrorCodes.ASSIGN_EXCEEDS_SUPPLY);
      expect(ledger.getUnassigned()).toBe(400n);
    });
  });

  describe('allocate', () => {
    beforeEach(() => {
      ledger.grantRole(ADMIN, DISTRIBUTOR_ROLE, DISTRIBUTOR);
      ledger.assign(ADMIN, DISTRIBUTOR, 500n);
    });

    it('should move budget to the recipient and record it', () => {
      ledger.allocate(DISTRIBUTOR, 'alice', 200n);
      ledger.allocate(DISTRIBUTOR, 'alice', 50n);

      expect(ledger.balances('alice').allocatedTokens).toBe(250n);
      expect(ledger.balances(DISTRIBUTOR).allocatedTokens).toBe(250n);
      expect(ledger.getAllocations()).toEqual([
        { distributor: DISTRIBUTOR, recipient: 'alice', amount: 200n },
        { distributor: DISTRIBUTOR, recipient: 'alice', amount: 50n },
      ]);
    });

    it('should reject callers without the role', () => {
      expect(() => ledger.allocate('mallory', 'alice', 1n)).toThrow(
        'AllocationLedger::allocate: ONLY_DISTRIBUTOR_ROLE'
      );
    });

    it('should reject amounts above the budget and change nothing', () => {
      expect(errorCodeOf(() => ledger.allocate(DISTRIBUTOR, 'alice', 501n))).toBe(
        ErrorCodes.INSUFFICIENT_ASSIGNED
      );
      expect(ledger.balances('alice').allocatedTokens).toBe(0n);
      expect(ledger.balances(DISTRIBUTOR).allocatedTokens).toBe(500n);
      expect(ledger.getAllocations()).toEqual([]);
    });

    it('should reject non-positive amounts', () => {
      expect(errorCodeOf(() => ledger.allocate(DISTRIBUTOR, 'alice', 0n))).toBe(ErrorCodes.INVALID_AMOUNT);
    });
  });

  it('should reject a negative supply', () => {
    expect(() => new InMemoryAllocationLedger(-1n, ADMIN)).toThrow('Negative token supply: -1');
  });
});
