import type { Chain, EventArg } from "../Chain";
import { CustomError } from "./CustomError";

export type EventMap = Record<string, Readonly<Record<string, EventArg>>>;

/** Shared plumbing of every ledger contract: the host, its address, its storage and the bound caller. */
export abstract class Contract<S extends object, E extends EventMap> {
  protected constructor(
    readonly chain: Chain,
    readonly address: string,
    protected readonly storage: S,
    readonly sender: string,
  ) {}

  abstract connect(account: string): Contract<S, E>;

  protected emit<K extends keyof E & string>(event: K, args: E[K]) {
    this.chain.emit({ address: this.address, event, args });
  }
}

export interface Owned {
  readonly address: string;
  readonly owner: string;
  connect(account: string): Owned;
  transferOwnership(newOwner: string): void;
}

export abstract class Ownable<S extends { owner: string }, E extends EventMap> extends Contract<S, E> implements Owned {
  abstract connect(account: string): Ownable<S, E>;

  get owner() {
    return this.storage.owner;
  }

  transferOwnership(newOwner: string) {
    this.chain.transaction(() => {
      this.onlyOwner();
      const previousOwner = this.storage.owner;
      this.storage.owner = newOwner;
      this.chain.emit({ address: this.address, event: "OwnershipTransferred", args: { previousOwner, newOwner } });
    });
  }

  protected onlyOwner() {
    if (this.sender !== this.storage.owner) throw new NotOwner(this.sender);
  }
}

export class NotOwner extends CustomError {
  constructor(account: string) {
    super([account]);
  }
}
