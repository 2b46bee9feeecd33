import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryToken, StakingError } from '../src/staking';
import { generateWallet } from '../src/utils/wallet';

const OWNER = generateWallet();
const ALICE = generateWallet();
const BOB = generateWallet();
const SPENDER = generateWallet();

describe('InMemoryToken', () => {
  let token: InMemoryToken;

  beforeEach(() => {
    token = new InMemoryToken({ name: 'Test Token', symbol: 'TST', decimals: 9 }, OWNER);
    token.mint(OWNER, ALICE, 1000n);
  });

  describe('mint', () => {
    it('should credit the recipient and grow supply', async () => {
      expect(await token.balanceOf(ALICE)).toBe(1000n);
      expect(token.totalSupply()).toBe(1000n);
    });

    it('should reject non-owner callers', () => {
      expect(() => token.mint(ALICE, ALICE, 1n)).toThrow(StakingError);
      expect(token.totalSupply()).toBe(1000n);
    });

    it('should reject zero amounts', () => {
      expect(() => token.mint(OWNER, ALICE, 0n)).toThrow('Amount must be greater than zero');
    });
  });

  describe('burn', () => {
    it('should debit the holder and shrink supply', async () => {
      token.burn(ALICE, 400n);
      expect(await token.balanceOf(ALICE)).toBe(600n);
      expect(token.totalSupply()).toBe(600n);
    });

    it('should reject burning more than the balance', () => {
      expect(() => token.burn(ALICE, 1001n)).toThrow('Burn amount exceeds balance');
    });
  });

  describe('transfer', () => {
    it('should move tokens between accounts', async () => {
      expect(await token.transfer(ALICE, BOB, 300n)).toBe(true);
      expect(await token.balanceOf(ALICE)).toBe(700n);
      expect(await token.balanceOf(BOB)).toBe(300n);
    });

    it('should return false on insufficient balance and leave balances alone', async () => {
      expect(await token.transfer(BOB, ALICE, 1n)).toBe(false);
      expect(await token.balanceOf(ALICE)).toBe(1000n);
      expect(await token.balanceOf(BOB)).toBe(0n);
    });
  });

  describe('transferFrom', () => {
    it('should spend the allowance', async () => {
      token.approve(ALICE, SPENDER, 500n);
      expect(await token.transferFrom(SPENDER, ALICE, BOB, 200n)).toBe(true);
      expect(token.allowance(ALICE, SPENDER)).toBe(300n);
      expect(await token.balanceOf(BOB)).toBe(200n);
    });

    it('should return false without enough allowance', async () => {
      token.approve(ALICE, SPENDER, 100n);
      expect(await token.transferFrom(SPENDER, ALICE, BOB, 200n)).toBe(false);
      expect(token.allowance(ALICE, SPENDER)).toBe(100n);
      expect(await token.balanceOf(ALICE)).toBe(1000n);
    });

    it('should return false without enough balance', async () => {
      token.approve(ALICE, SPENDER, 5000n);
      expect(await token.transferFrom(SPENDER, ALICE, BOB, 2000n)).toBe(false);
      expect(token.allowance(ALICE, SPENDER)).toBe(5000n);
    });
  });

  it('should report token info', () => {
    expect(token.getInfo()).toEqual({
      name: 'Test Token',
      symbol: 'TST',
      decimals: 9,
      owner: OWNER,
      totalSupply: 1000n,
      holders: 1,
    });
  });
});
