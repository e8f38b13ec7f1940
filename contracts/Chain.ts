import { Subject } from "rxjs";
import { getCreateAddress } from "ethers";
import { CustomError } from "./utils/CustomError";

export type EventArg = bigint | number | string | boolean;

export interface Log<E extends string = string, A extends object = Readonly<Record<string, EventArg>>> {
  address: string;
  event: E;
  args: A;
}

export interface Receipt {
  timestamp: number;
  logs: Log[];
}

/**
 * Host of every contract: owns the clock, deploys addresses, and makes each top-level call atomic.
 *
 * Contracts hand their storage to {@link track}; a transaction clones all tracked storage before running and
 * puts it back if the call throws. Logs are buffered and only published once the transaction commits.
 */
export class Chain {
  readonly events$ = new Subject<Log>();
  lastReceipt?: Receipt;

  #timestamp: number;
  #pending?: Log[];
  readonly #states: object[] = [];
  readonly #nonces = new Map<string, number>();
  readonly #snapshots = new Map<string, { timestamp: number; states: object[] }>();
  #snapshotCount = 0;

  constructor(timestamp = Math.floor(Date.now() / 1_000)) {
    this.#timestamp = timestamp;
  }

  get timestamp() {
    return this.#timestamp;
  }

  increaseTime(seconds: number) {
    if (seconds < 0) throw new InvalidTimestamp(this.#timestamp + seconds);
    this.#timestamp += seconds;
  }

  setNextBlockTimestamp(timestamp: number) {
    if (timestamp < this.#timestamp) throw new InvalidTimestamp(timestamp);
    this.#timestamp = timestamp;
  }

  deployAddress(deployer: string) {
    const nonce = this.#nonces.get(deployer) ?? 0;
    this.#nonces.set(deployer, nonce + 1);
    return getCreateAddress({ from: deployer, nonce });
  }

  track<T extends object>(state: T) {
    this.#states.push(state);
    return state;
  }

  /** Runs `call` atomically. Nested calls join the outer transaction. */
  transaction<T>(call: () => T): T {
    if (this.#pending) return call();

    const states = this.#states.map((state) => structuredClone(state));
    const logs: Log[] = [];
    this.#pending = logs;
    try {
      const result = call();
      this.#pending = undefined;
      this.lastReceipt = { timestamp: this.#timestamp, logs };
      for (const log of logs) this.events$.next(log);
      return result;
    } catch (error) {
      this.#pending = undefined;
      this.#states.forEach((state, i) => Object.assign(state, structuredClone(states[i])));
      throw error;
    }
  }

  emit(log: Log) {
    if (!this.#pending) throw new NotInTransaction(log.event);
    this.#pending.push(log);
  }

  snapshot() {
    const id = `0x${(++this.#snapshotCount).toString(16)}`;
    this.#snapshots.set(id, {
      timestamp: this.#timestamp,
      states: this.#states.map((state) => structuredClone(state)),
    });
    return id;
  }

  revert(id: string) {
    const snapshot = this.#snapshots.get(id);
    if (!snapshot) return false;

    this.#timestamp = snapshot.timestamp;
    this.#states.forEach((state, i) => {
      if (i < snapshot.states.length) Object.assign(state, structuredClone(snapshot.states[i]));
    });
    for (const key of [...this.#snapshots.keys()]) if (Number(key) >= Number(id)) this.#snapshots.delete(key);
    return true;
  }
}

export class InvalidTimestamp extends CustomError {
  constructor(timestamp: number) {
    super([timestamp]);
  }
}

export class NotInTransaction extends CustomError {
  constructor(event: string) {
    super([event]);
  }
}
