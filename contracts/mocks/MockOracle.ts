import type { Chain } from "../Chain";
import type { IOracle } from "../interfaces/IOracle";
import { Contract } from "../utils/Contract";

export interface OracleStorage {
  prices: Map<string, bigint>;
}

export type OracleEvents = {
  PriceSet: { market: string; price: bigint };
};

export class MockOracle extends Contract<OracleStorage, OracleEvents> implements IOracle {
  static deploy(chain: Chain, from: string) {
    return new MockOracle(chain, chain.deployAddress(from), chain.track<OracleStorage>({ prices: new Map() }), from);
  }

  connect(account: string) {
    return new MockOracle(this.chain, this.address, this.storage, account);
  }

  price(market: string) {
    return this.storage.prices.get(market) ?? 0n;
  }

  setPrice(market: string, price: bigint) {
    this.chain.transaction(() => {
      this.storage.prices.set(market, price);
      this.emit("PriceSet", { market, price });
    });
  }
}
