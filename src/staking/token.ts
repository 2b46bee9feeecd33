/**
 * Stake Token
 *
 * The fungible token the ledger takes custody of. The ledger only sees
 * `TokenCollaborator`; `InMemoryToken` is the ledger-backed implementation
 * the service runs on, with owner-gated minting.
 */

import { StakingError } from './errors';
import { moduleLogger } from '../utils/logger';

// ============ Types ============

export interface TokenCollaborator {
  /** Move `amount` from `sender` to `to`. Resolves false if the sender cannot cover it. */
  transfer(sender: string, to: string, amount: bigint): Promise<boolean>;
  /** Move `amount` from `from` to `to` against the allowance `from` granted `spender`. */
  transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean>;
  balanceOf(account: string): Promise<bigint>;
}

export interface TokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
}

export interface TokenInfo extends TokenMetadata {
  owner: string;
  totalSupply: bigint;
  holders: number;
}

// ============ In-Memory Token ============

export class InMemoryToken implements TokenCollaborator {
  private balances: Map<string, bigint> = new Map();
  private allowances: Map<string, Map<string, bigint>> = new Map();
  private supply = 0n;
  private log = moduleLogger('token');

  constructor(
    readonly metadata: TokenMetadata,
    readonly owner: string
  ) {}

  async transfer(sender: string, to: string, amount: bigint): Promise<boolean> {
    assertPositive(amount);
    if (this.balance(sender) < amount) {
      this.log.debug('Transfer rejected: insufficient balance', { sender, to, amount });
      return false;
    }
    this.move(sender, to, amount);
    return true;
  }

  async transferFrom(spender: string, from: string, to: string, amount: bigint): Promise<boolean> {
    assertPositive(amount);
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      this.log.debug('TransferFrom rejected: insufficient allowance', { spender, from, amount, allowed });
      return false;
    }
    if (this.balance(from) < amount) {
      this.log.debug('TransferFrom rejected: insufficient balance', { spender, from, amount });
      return false;
    }
    this.setAllowance(from, spender, allowed - amount);
    this.move(from, to, amount);
    return true;
  }

  async balanceOf(account: string): Promise<bigint> {
    return this.balance(account);
  }

  approve(holder: string, spender: string, amount: bigint): void {
    if (amount < 0n) {
      throw new StakingError('InvalidAmount', 'Allowance cannot be negative');
    }
    this.setAllowance(holder, spender, amount);
  }

  allowance(holder: string, spender: string): bigint {
    return this.allowances.get(holder)?.get(spender) ?? 0n;
  }

  mint(caller: string, to: string, amount: bigint): void {
    if (caller !== this.owner) {
      throw new StakingError('Unauthorized', 'Only the token owner can mint', { caller });
    }
    assertPositive(amount);
    this.balances.set(to, this.balance(to) + amount);
    this.supply += amount;
    this.log.info(`Minted ${amount} ${this.metadata.symbol}`, { to });
  }

  burn(holder: string, amount: bigint): void {
    assertPositive(amount);
    const current = this.balance(holder);
    if (current < amount) {
      throw new StakingError('InvalidAmount', 'Burn amount exceeds balance', {
        holder,
        balance: current.toString(),
      });
    }
    this.setBalance(holder, current - amount);
    this.supply -= amount;
    this.log.info(`Burned ${amount} ${this.metadata.symbol}`, { holder });
  }

  totalSupply(): bigint {
    return this.supply;
  }

  getInfo(): TokenInfo {
    return {
      ...this.metadata,
      owner: this.owner,
      totalSupply: this.supply,
      holders: this.balances.size,
    };
  }

  private balance(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  private move(from: string, to: string, amount: bigint): void {
    this.setBalance(from, this.balance(from) - amount);
    this.balances.set(to, this.balance(to) + amount);
  }

  private setBalance(account: string, amount: bigint): void {
    if (amount === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, amount);
    }
  }

  private setAllowance(holder: string, spender: string, amount: bigint): void {
    let granted = this.allowances.get(holder);
    if (!granted) {
      granted = new Map();
      this.allowances.set(holder, granted);
    }
    granted.set(spender, amount);
  }
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new StakingError('InvalidAmount', 'Amount must be greater than zero');
  }
}
