import type { Chain } from "../Chain";
import type { IInterestRateModel } from "../interfaces/IInterestRateModel";
import { Contract } from "../utils/Contract";

export interface MockInterestRateModelStorage {
  borrowRate: bigint;
}

export type MockInterestRateModelEvents = {
  BorrowRateSet: { borrowRate: bigint };
};

/** Rate model returning the same constant for fixed and flexible borrows, whatever the utilization. */
export class MockInterestRateModel
  extends Contract<MockInterestRateModelStorage, MockInterestRateModelEvents>
  implements IInterestRateModel
{
  static deploy(chain: Chain, borrowRate: bigint, from: string) {
    const storage = chain.track<MockInterestRateModelStorage>({ borrowRate });
    return new MockInterestRateModel(chain, chain.deployAddress(from), storage, from);
  }

  connect(account: string) {
    return new MockInterestRateModel(this.chain, this.address, this.storage, account);
  }

  get borrowRate() {
    return this.storage.borrowRate;
  }

  getRateToBorrow() {
    return this.storage.borrowRate;
  }

  getFlexibleBorrowRate() {
    return this.storage.borrowRate;
  }

  setBorrowRate(borrowRate: bigint) {
    this.chain.transaction(() => {
      this.storage.borrowRate = borrowRate;
      this.emit("BorrowRateSet", { borrowRate });
    });
  }
}
