import { RewardToken } from './rewardToken';
import { DISTRIBUTOR_ROLE, InMemoryAllocationLedger } from '../allocation/inMemoryAllocationLedger';
import { ErrorCodes } from '../errors';
import { errorCodeOf } from '../distributor/tests/helpers';
import { parseTokens } from '../fixedPoint';
import { ZERO_ADDRESS } from '../types';

const OWNER = '0x00000000000000000000000000000000000000a1';
const STAKER = '0x00000000000000000000000000000000000000c1';
const TOKEN = '0x00000000000000000000000000000000000000e1';
const RECIPIENTS = [
  '0x0000000000000000000000000000000000000101',
  '0x0000000000000000000000000000000000000102',
  '0x0000000000000000000000000000000000000103',
  '0x0000000000000000000000000000000000000104',
];

describe('RewardToken', () => {
  const amount = parseTokens('80000000');
  let allocation: InMemoryAllocationLedger;
  let token: RewardToken;

  beforeEach(() => {
    allocation = new InMemoryAllocationLedger(amount, OWNER);
    token = new RewardToken(allocation, { owner: OWNER, staker: STAKER, tokenAccount: TOKEN });
  });

  function fund(assigned: bigint, minted: bigint): void {
    allocation.grantRole(OWNER, DISTRIBUTOR_ROLE, TOKEN);
    allocation.assign(OWNER, TOKEN, assigned);
    token.mint(OWNER, STAKER, minted);
  }

  it('should expose token metadata', () => {
    expect(token.name).toBe('Staker Reward Token');
    expect(token.symbol).toBe('SRT');
    expect(token.decimals).toBe(18);
  });

  it('should mint to the staker only', () => {
    const transfers = jest.fn();
    token.on('Transfer', transfers);

    token.mint(OWNER, STAKER, 5n);

    expect(token.totalSupply()).toBe(5n);
    expect(token.balanceOf(STAKER)).toBe(5n);
    expect(token.balanceOf(OWNER)).toBe(0n);
    expect(transfers).toHaveBeenCalledWith(ZERO_ADDRESS, STAKER, 5n);
    expect(errorCodeOf(() => token.mint(OWNER, OWNER, 5n))).toBe(ErrorCodes.ONLY_TO_STAKER);
  });

  it('should only let the owner mint', () => {
    expect(errorCodeOf(() => token.mint(STAKER, STAKER, 5n))).toBe(ErrorCodes.NOT_OWNER);
  });

  it('should forward halving shares into the allocation ledger', () => {
    fund(amount, amount);
    const paid = jest.fn();
    token.onEvent('RewardPaid', paid);

    let share = amount;
    for (const recipient of RECIPIENTS) {
      share = share / 2n;
      token.transfer(STAKER, recipient, share);

      expect(allocation.balances(recipient).allocatedTokens).toBe(share);
      expect(paid).toHaveBeenLastCalledWith(recipient, share);
    }

    // 1/2 + 1/4 + 1/8 + 1/16 of the amount has left
    expect(token.totalSupply()).toBe(amount / 16n);
    expect(allocation.balances(TOKEN).allocatedTokens).toBe(amount / 16n);
  });

  it('should fail without the distributor role and keep the supply', () => {
    token.mint(OWNER, STAKER, amount);

    expect(errorCodeOf(() => token.transfer(STAKER, RECIPIENTS[0], amount / 2n))).toBe(
      ErrorCodes.ONLY_DISTRIBUTOR_ROLE
    );
    expect(token.totalSupply()).toBe(amount);
  });

  it('should fail when the ledger budget is too small', () => {
    fund(amount / 2n, amount);

    expect(errorCodeOf(() => token.transfer(STAKER, RECIPIENTS[0], amount))).toBe(
      ErrorCodes.INSUFFICIENT_ASSIGNED
    );
    expect(token.totalSupply()).toBe(amount);
  });

  it('should fail when the staker holds too little', () => {
    fund(amount, amount / 2n);

    expect(errorCodeOf(() => token.transfer(STAKER, RECIPIENTS[0], amount))).toBe(
      ErrorCodes.INSUFFICIENT_BALANCE
    );
  });

  it('should only let the staker transfer', () => {
    fund(amount, amount);

    expect(errorCodeOf(() => token.transfer(OWNER, RECIPIENTS[0], 1n))).toBe(ErrorCodes.ONLY_STAKER);
    expect(errorCodeOf(() => token.transfer(STAKER, ZERO_ADDRESS, 1n))).toBe(ErrorCodes.INVALID_ACCOUNT);
    expect(errorCodeOf(() => token.transfer(STAKER, RECIPIENTS[0], 0n))).toBe(ErrorCodes.INVALID_AMOUNT);
  });
});
