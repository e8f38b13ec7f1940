import { MaxUint256, ZeroAddress } from "ethers";
import type { Chain } from "../Chain";
import { Contract } from "../utils/Contract";
import { InsufficientAllowance, InsufficientBalance } from "../utils/ERC20Errors";
import type { IERC20 } from "../interfaces/IERC20";

export interface ERC20Storage {
  name: string;
  symbol: string;
  decimals: number;
  totalSupply: bigint;
  balances: Map<string, bigint>;
  allowances: Map<string, Map<string, bigint>>;
}

export type ERC20Events = {
  Transfer: { from: string; to: string; amount: bigint };
  Approval: { owner: string; spender: string; amount: bigint };
};

export class MockERC20 extends Contract<ERC20Storage, ERC20Events> implements IERC20 {
  static deploy(chain: Chain, name: string, symbol: string, decimals: number, from: string) {
    const storage = chain.track<ERC20Storage>({
      name,
      symbol,
      decimals,
      totalSupply: 0n,
      balances: new Map(),
      allowances: new Map(),
    });
    return new MockERC20(chain, chain.deployAddress(from), storage, from);
  }

  connect(account: string) {
    return new MockERC20(this.chain, this.address, this.storage, account);
  }

  name() {
    return this.storage.name;
  }

  symbol() {
    return this.storage.symbol;
  }

  decimals() {
    return this.storage.decimals;
  }

  totalSupply() {
    return this.storage.totalSupply;
  }

  balanceOf(account: string) {
    return this.storage.balances.get(account) ?? 0n;
  }

  allowance(owner: string, spender: string) {
    return this.storage.allowances.get(owner)?.get(spender) ?? 0n;
  }

  mint(to: string, amount: bigint) {
    this.chain.transaction(() => {
      this.storage.totalSupply += amount;
      this.storage.balances.set(to, this.balanceOf(to) + amount);
      this.emit("Transfer", { from: ZeroAddress, to, amount });
    });
  }

  approve(spender: string, amount: bigint) {
    return this.chain.transaction(() => {
      const allowances = this.storage.allowances.get(this.sender) ?? new Map<string, bigint>();
      allowances.set(spender, amount);
      this.storage.allowances.set(this.sender, allowances);
      this.emit("Approval", { owner: this.sender, spender, amount });
      return true;
    });
  }

  transfer(to: string, amount: bigint) {
    return this.chain.transaction(() => {
      this.move(this.sender, to, amount);
      return true;
    });
  }

  transferFrom(from: string, to: string, amount: bigint) {
    return this.chain.transaction(() => {
      const allowed = this.allowance(from, this.sender);
      if (allowed !== MaxUint256) {
        if (allowed < amount) throw new InsufficientAllowance(from, this.sender, amount);
        this.storage.allowances.get(from)?.set(this.sender, allowed - amount);
      }
      this.move(from, to, amount);
      return true;
    });
  }

  private move(from: string, to: string, amount: bigint) {
    const balance = this.balanceOf(from);
    if (balance < amount) throw new InsufficientBalance(from, amount);
    this.storage.balances.set(from, balance - amount);
    this.storage.balances.set(to, this.balanceOf(to) + amount);
    this.emit("Transfer", { from, to, amount });
  }
}
