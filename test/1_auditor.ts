import { expect } from "chai";
import { parseUnits } from "ethers";
import type { Auditor } from "../contracts/Auditor";
import { InvalidParameter, InvalidPrice, MarketAlreadyListed, MarketNotListed, NotMarket } from "../contracts/Auditor";
import type { Market } from "../contracts/Market";
import { NotAuditor } from "../contracts/Market";
import { MockOracle } from "../contracts/mocks/MockOracle";
import { NotOwner } from "../contracts/utils/Contract";
import defaultEnv, { alice, bob, type DefaultEnv } from "./defaultEnv";
import lastEvent from "./utils/lastEvent";

describe("Auditor from User Space", function () {
  let env: DefaultEnv;
  let auditor: Auditor;
  let admin: Auditor;
  let marketDAI: Market;
  let marketWETH: Market;

  beforeEach(() => {
    env = defaultEnv();
    auditor = env.auditor.connect(alice);
    admin = env.auditor.connect(env.namedAccounts.multisig);
    marketDAI = env.market("DAI").connect(alice);
    marketWETH = env.market("WETH").connect(alice);
  });

  it("THEN every configured market is listed in order", () => {
    expect(auditor.allMarkets()).to.deep.equal(
      ["DAI", "USDC", "WETH", "WBTC"].map((symbol) => env.market(symbol).address),
    );
    expect(auditor.markets(marketWETH.address)).to.deep.equal({
      adjustFactor: parseUnits("0.86"),
      decimals: 18,
      index: 2,
      isListed: true,
    });
  });

  it("WHEN listing a market twice THEN it reverts", () => {
    expect(() => admin.enableMarket(marketDAI, parseUnits("0.5"), 18)).to.throw(
      MarketAlreadyListed,
      `MarketAlreadyListed(${marketDAI.address})`,
    );
  });

  it("WHEN alice lists a market THEN it reverts", () => {
    expect(() => auditor.enableMarket(marketDAI, parseUnits("0.5"), 18)).to.throw(NotOwner, `NotOwner(${alice})`);
  });

  it("WHEN entering an unlisted market THEN it reverts", () => {
    expect(() => auditor.enterMarket(alice)).to.throw(MarketNotListed, `MarketNotListed(${alice})`);
  });

  it("WHEN entering markets THEN they are tracked as a bitmap", () => {
    auditor.enterMarket(marketDAI.address);
    expect(auditor.accountMarkets(alice)).to.equal(1n);
    expect(lastEvent(env.chain, auditor.address, "MarketEntered")).to.deep.equal({
      market: marketDAI.address,
      account: alice,
    });

    auditor.enterMarket(marketWETH.address);
    expect(auditor.accountMarkets(alice)).to.equal(5n);
  });

  it("WHEN an account calls the borrow check for a market it did not enter THEN it reverts", () => {
    expect(() => auditor.checkBorrow(marketDAI.address, alice)).to.throw(NotMarket, `NotMarket(${alice})`);
  });

  it("WHEN a market borrows for an account THEN the account enters it", () => {
    marketDAI.deposit(parseUnits("100"), alice);
    marketDAI.borrow(parseUnits("10"), alice, alice);
    expect(auditor.accountMarkets(alice)).to.equal(1n);
  });

  describe("adjust factor", () => {
    it("WHEN set above the maximum THEN it reverts", () => {
      expect(() => admin.setAdjustFactor(marketDAI.address, parseUnits("0.95"))).to.throw(
        InvalidParameter,
        "InvalidParameter(adjustFactor, 950000000000000000)",
      );
    });

    it("WHEN set within bounds THEN it is stored", () => {
      admin.setAdjustFactor(marketDAI.address, parseUnits("0.7"));
      expect(auditor.markets(marketDAI.address).adjustFactor).to.equal(parseUnits("0.7"));
      expect(lastEvent(env.chain, auditor.address, "AdjustFactorSet")).to.deep.equal({
        market: marketDAI.address,
        adjustFactor: parseUnits("0.7"),
      });
    });

    it("WHEN set for an unlisted market THEN it reverts", () => {
      expect(() => admin.setAdjustFactor(bob, parseUnits("0.7"))).to.throw(MarketNotListed, `MarketNotListed(${bob})`);
    });
  });

  describe("liquidation incentive", () => {
    it("THEN it is the configured one", () => {
      expect(auditor.liquidationIncentive).to.deep.equal({
        liquidator: parseUnits("0.05"),
        lenders: parseUnits("0.0025"),
      });
    });

    it("WHEN the liquidator's share is too high THEN it reverts", () => {
      expect(() => admin.setLiquidationIncentive({ liquidator: parseUnits("0.3"), lenders: 0n })).to.throw(
        InvalidParameter,
        "InvalidParameter(liquidator, 300000000000000000)",
      );
    });

    it("WHEN the lenders' share is too high THEN it reverts", () => {
      expect(() => admin.setLiquidationIncentive({ liquidator: 0n, lenders: parseUnits("0.2") })).to.throw(
        InvalidParameter,
        "InvalidParameter(lenders, 200000000000000000)",
      );
    });

    it("WHEN set within bounds THEN it is stored", () => {
      admin.setLiquidationIncentive({ liquidator: parseUnits("0.1"), lenders: parseUnits("0.01") });
      expect(auditor.liquidationIncentive).to.deep.equal({ liquidator: parseUnits("0.1"), lenders: parseUnits("0.01") });
    });
  });

  it("WHEN the oracle is replaced by one without prices THEN liquidity can't be computed", () => {
    marketDAI.deposit(parseUnits("100"), alice);
    auditor.enterMarket(marketDAI.address);
    admin.setOracle(MockOracle.deploy(env.chain, env.namedAccounts.deployer));

    expect(() => auditor.accountLiquidity(alice)).to.throw(InvalidPrice, `InvalidPrice(${marketDAI.address})`);
  });

  it("WHEN an account clears bad debt THEN it reverts", () => {
    expect(() => marketDAI.clearBadDebt(alice)).to.throw(NotAuditor, `NotAuditor(${alice})`);
  });

  it("WHEN an unlisted account seizes THEN it reverts", () => {
    expect(() => marketDAI.seize(bob, alice, 1n)).to.throw(MarketNotListed, `MarketNotListed(${alice})`);
  });

  it("WHEN ownership is transferred THEN the new owner administers", () => {
    admin.transferOwnership(alice);
    expect(auditor.owner).to.equal(alice);
    expect(lastEvent(env.chain, auditor.address, "OwnershipTransferred")).to.deep.equal({
      previousOwner: env.namedAccounts.multisig,
      newOwner: alice,
    });
    auditor.setAdjustFactor(marketDAI.address, parseUnits("0.5"));
    expect(auditor.markets(marketDAI.address).adjustFactor).to.equal(parseUnits("0.5"));
  });
});
