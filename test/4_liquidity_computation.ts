import { expect } from "chai";
import { parseUnits } from "ethers";
import type { Auditor } from "../contracts/Auditor";
import { InsufficientLiquidity, InvalidPrice, RemainingDebt } from "../contracts/Auditor";
import type { Market } from "../contracts/Market";
import defaultEnv, { alice, type DefaultEnv } from "./defaultEnv";

describe("Liquidity computations", function () {
  let env: DefaultEnv;
  let auditor: Auditor;
  let marketDAI: Market;

  beforeEach(() => {
    env = defaultEnv();
    auditor = env.auditor.connect(alice);
    marketDAI = env.market("DAI").connect(alice);
  });

  describe("GIVEN alice deposits 1000 DAI", () => {
    beforeEach(() => {
      marketDAI.deposit(parseUnits("1000"), alice);
    });

    it("THEN it is not collateral until the market is entered", () => {
      expect(auditor.accountLiquidity(alice)).to.deep.equal([0n, 0n]);
    });

    describe("WHEN alice enters the DAI market", () => {
      beforeEach(() => {
        auditor.enterMarket(marketDAI.address);
      });

      it("THEN the deposit counts as collateral scaled by the adjust factor", () => {
        expect(auditor.accountLiquidity(alice)).to.deep.equal([parseUnits("800"), 0n]);
      });

      it("AND a withdrawal can be simulated", () => {
        expect(auditor.accountLiquidity(alice, marketDAI.address, parseUnits("100"))).to.deep.equal([
          parseUnits("800"),
          parseUnits("80"),
        ]);
      });

      it("AND the collateral follows the price", () => {
        env.oracle.connect(env.namedAccounts.deployer).setPrice(marketDAI.address, parseUnits("0.5"));
        expect(auditor.accountLiquidity(alice)).to.deep.equal([parseUnits("400"), 0n]);
      });

      it("AND a market without price reverts", () => {
        env.oracle.connect(env.namedAccounts.deployer).setPrice(marketDAI.address, 0n);
        expect(() => auditor.accountLiquidity(alice)).to.throw(InvalidPrice, `InvalidPrice(${marketDAI.address})`);
      });

      it("AND alice can exit the market", () => {
        auditor.exitMarket(marketDAI.address);
        expect(auditor.accountMarkets(alice)).to.equal(0n);
        expect(auditor.accountLiquidity(alice)).to.deep.equal([0n, 0n]);
      });

      describe("AND WHEN alice borrows 640 DAI", () => {
        beforeEach(() => {
          marketDAI.borrow(parseUnits("640"), alice, alice);
        });

        it("THEN the debt is scaled up by the adjust factor", () => {
          expect(auditor.accountLiquidity(alice)).to.deep.equal([parseUnits("800"), parseUnits("800")]);
        });

        it("AND borrowing one more wei reverts", () => {
          expect(() => marketDAI.borrow(1n, alice, alice)).to.throw(
            InsufficientLiquidity,
            `InsufficientLiquidity(${alice}, ${parseUnits("800")}, ${parseUnits("800") + 2n})`,
          );
        });

        it("AND withdrawing collateral reverts", () => {
          expect(() => marketDAI.withdraw(parseUnits("1"), alice, alice)).to.throw(
            InsufficientLiquidity,
            `InsufficientLiquidity(${alice}, ${parseUnits("800")}, ${parseUnits("800.8")})`,
          );
        });

        it("AND exiting the market reverts", () => {
          expect(() => auditor.exitMarket(marketDAI.address)).to.throw(
            RemainingDebt,
            `RemainingDebt(${marketDAI.address}, ${parseUnits("640")})`,
          );
        });
      });
    });
  });

  it("WHEN alice deposits 1000 USDC THEN decimals are normalized", () => {
    const marketUSDC = env.market("USDC").connect(alice);
    marketUSDC.deposit(parseUnits("1000", 6), alice);
    auditor.enterMarket(marketUSDC.address);

    expect(auditor.accountLiquidity(alice)).to.deep.equal([parseUnits("800"), 0n]);
  });

  it("WHEN alice deposits 1 WETH AND 1 WBTC THEN collateral is summed across markets", () => {
    for (const [symbol, decimals] of [
      ["WETH", 18],
      ["WBTC", 8],
    ] as const) {
      const market = env.market(symbol).connect(alice);
      market.deposit(parseUnits("1", decimals), alice);
      auditor.enterMarket(market.address);
    }

    expect(auditor.accountLiquidity(alice)).to.deep.equal([parseUnits("38660"), 0n]);
  });
});
