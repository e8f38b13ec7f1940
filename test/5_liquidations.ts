import { expect } from "chai";
import { MaxUint256, parseUnits } from "ethers";
import { InsufficientShortfall } from "../contracts/Auditor";
import type { Market } from "../contracts/Market";
import { SelfLiquidation, ZeroRepay } from "../contracts/Market";
import { maturities } from "../contracts/utils/FixedLib";
import defaultEnv, { alice, bob, john, type DefaultEnv } from "./defaultEnv";
import futurePools from "./utils/futurePools";
import lastEvent from "./utils/lastEvent";

describe("Liquidations", function () {
  let env: DefaultEnv;
  let marketDAI: Market;
  let marketWETH: Market;
  let snapshot: string;

  const setPrice = (market: Market, price: string) =>
    env.oracle.connect(env.namedAccounts.deployer).setPrice(market.address, parseUnits(price));

  before(() => {
    env = defaultEnv();
    marketDAI = env.market("DAI").connect(bob);
    marketWETH = env.market("WETH").connect(alice);

    marketDAI.deposit(parseUnits("10000"), bob);
    marketWETH.deposit(parseUnits("1"), alice);
    env.auditor.connect(alice).enterMarket(marketWETH.address);
  });

  beforeEach(() => {
    snapshot = env.chain.snapshot();
  });

  afterEach(() => {
    env.chain.revert(snapshot);
  });

  describe("GIVEN alice borrows 500 DAI flexible against 1 WETH", () => {
    beforeEach(() => {
      marketDAI.connect(alice).borrow(parseUnits("500"), alice, alice);
    });

    it("WHEN the account is solvent THEN it can't be liquidated", () => {
      expect(() => marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.throw(
        InsufficientShortfall,
        `InsufficientShortfall(${alice})`,
      );
    });

    it("WHEN alice liquidates herself THEN it reverts", () => {
      setPrice(marketWETH, "600");
      expect(() => marketDAI.connect(alice).liquidate(alice, MaxUint256, marketWETH)).to.throw(
        SelfLiquidation,
        "SelfLiquidation()",
      );
    });

    describe("AND WHEN the WETH price drops to 600", () => {
      beforeEach(() => {
        setPrice(marketWETH, "600");
      });

      it("THEN the whole debt is repaid AND collateral seized with the incentive", () => {
        expect(marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.equal(parseUnits("500"));
        expect(lastEvent(env.chain, marketDAI.address, "LiquidateBorrow")).to.deep.equal({
          receiver: bob,
          borrower: alice,
          assets: parseUnits("500"),
          lendersAssets: parseUnits("1.25"),
          seizeMarket: marketWETH.address,
          seizedAssets: 877_083_333_333_333_335n,
        });
        expect(marketDAI.previewDebt(alice)).to.equal(0n);
        expect(marketWETH.maxWithdraw(alice)).to.equal(122_916_666_666_666_665n);
        expect(env.asset("WETH").balanceOf(bob)).to.equal(parseUnits("1000000") + 877_083_333_333_333_335n);
      });

      it("AND the lenders' incentive goes to the earnings accumulator", () => {
        marketDAI.liquidate(alice, MaxUint256, marketWETH);
        expect(marketDAI.smartPoolEarningsAccumulator).to.equal(parseUnits("1.25"));
        expect(env.asset("DAI").balanceOf(bob)).to.equal(parseUnits("989498.75"));
      });

      it("WHEN the liquidator caps the repay THEN the lenders' incentive comes out of the cap", () => {
        expect(marketDAI.liquidate(alice, parseUnits("100"), marketWETH)).to.equal(99_750_623_441_396_508_728n);
        expect(marketDAI.previewDebt(alice)).to.equal(400_249_376_558_603_491_272n);
      });

      it("WHEN the cap is zero THEN nothing is repaid", () => {
        expect(() => marketDAI.liquidate(alice, 0n, marketWETH)).to.throw(ZeroRepay, "ZeroRepay()");
      });
    });

    describe("AND WHEN the WETH price drops to 400", () => {
      beforeEach(() => {
        setPrice(marketWETH, "400");
        expect(marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.equal(380_047_505_938_242_280_286n);
      });

      it("THEN all the collateral is seized", () => {
        expect(marketWETH.maxWithdraw(alice)).to.equal(0n);
        expect(marketWETH.balanceOf(alice)).to.equal(0n);
      });

      it("AND the remaining debt is spread among the lenders", () => {
        expect(lastEvent(env.chain, marketDAI.address, "SpreadBadDebt")).to.deep.equal({
          borrower: alice,
          assets: 119_952_494_061_757_719_714n,
        });
        expect(marketDAI.previewDebt(alice)).to.equal(0n);
        expect(marketDAI.flexibleDebt).to.equal(0n);
      });

      it("AND the accumulator absorbs it first", () => {
        expect(marketDAI.smartPoolEarningsAccumulator).to.equal(0n);
        expect(marketDAI.smartPoolAssets).to.equal(9_880_997_624_703_087_885_986n);
      });
    });
  });

  describe("GIVEN alice borrows 500 DAI at maturity AND is a day late", () => {
    let maturity: number;

    beforeEach(() => {
      [maturity] = futurePools(env.chain.timestamp, 1);
      marketDAI.connect(alice).borrowAtMaturity(maturity, parseUnits("500"), parseUnits("500"), alice, alice);
      env.chain.setNextBlockTimestamp(maturity + 86_400);
      setPrice(marketWETH, "600");
    });

    it("THEN the debt includes the late penalty", () => {
      expect(marketDAI.previewDebt(alice)).to.equal(502_249_999_999_985_600_000n);
    });

    it("WHEN liquidated THEN the position and its penalty are repaid", () => {
      expect(marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.equal(502_249_999_999_985_600_000n);
      expect(marketDAI.accounts(alice).fixedBorrows).to.equal(0n);
      expect(marketDAI.smartPoolFixedBorrows).to.equal(0n);
      expect(marketDAI.smartPoolEarningsAccumulator).to.equal(3_505_624_999_985_564_000n);
      expect(marketWETH.maxWithdraw(alice)).to.equal(118_969_791_666_691_925n);
    });
  });

  describe("GIVEN alice borrows 100 DAI at two maturities AND 100 DAI flexible", () => {
    let first: number;
    let second: number;

    beforeEach(() => {
      [first, second] = futurePools(env.chain.timestamp, 2);
      marketDAI.connect(alice).borrowAtMaturity(first, parseUnits("100"), parseUnits("100"), alice, alice);
      marketDAI.connect(alice).borrowAtMaturity(second, parseUnits("100"), parseUnits("100"), alice, alice);
      marketDAI.connect(alice).borrow(parseUnits("100"), alice, alice);
      env.chain.setNextBlockTimestamp(first + 86_400);
      setPrice(marketWETH, "400");
    });

    it("WHEN the budget falls short of the matured position THEN it is repaid in proportion to its penalty", () => {
      expect(marketDAI.liquidate(alice, parseUnits("50.125"), marketWETH)).to.equal(49_999_999_999_999_999_999n);
      expect(marketDAI.fixedBorrowPositions(first, alice)).to.deep.equal({
        principal: 50_223_992_035_837_298_608n,
        fee: 0n,
      });
      expect(marketDAI.fixedBorrowPositions(second, alice)).to.deep.equal({ principal: parseUnits("100"), fee: 0n });
      expect(marketDAI.accounts(alice).flexibleBorrowShares).to.equal(parseUnits("100"));
      expect(marketDAI.smartPoolEarningsAccumulator).to.equal(348_992_035_837_298_606n);
    });

    it("WHEN the budget runs out in the second maturity THEN the flexible debt is left untouched", () => {
      expect(marketDAI.liquidate(alice, 140_801_124_999_997_112_800n, marketWETH)).to.equal(
        140_449_999_999_997_120_000n,
      );
      expect(maturities(marketDAI.accounts(alice).fixedBorrows)).to.deep.equal([second]);
      expect(marketDAI.fixedBorrowPositions(second, alice)).to.deep.equal({ principal: parseUnits("60"), fee: 0n });
      expect(marketDAI.accounts(alice).flexibleBorrowShares).to.equal(parseUnits("100"));
      expect(marketDAI.smartPoolEarningsAccumulator).to.equal(801_124_999_997_112_800n);
    });

    it("WHEN the budget covers everything THEN maturities are repaid in order AND the flexible debt last", () => {
      expect(marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.equal(300_449_999_999_997_120_000n);
      expect(marketDAI.previewDebt(alice)).to.equal(0n);
      expect(marketDAI.smartPoolEarningsAccumulator).to.equal(1_201_124_999_997_112_800n);
      expect(
        env.chain.lastReceipt?.logs
          .filter(({ address, event }) => address === marketDAI.address && /^Repay/.test(event))
          .map(({ event, args }) => [event, args.assets]),
      ).to.deep.equal([
        ["RepayAtMaturity", 100_449_999_999_997_120_000n],
        ["RepayAtMaturity", parseUnits("100")],
        ["Repay", parseUnits("100")],
      ]);
    });
  });
});

describe("Liquidations of borrows funded by fixed depositors", function () {
  let env: DefaultEnv;
  let marketDAI: Market;
  let marketWETH: Market;
  let maturity: number;

  beforeEach(() => {
    env = defaultEnv();
    marketDAI = env.market("DAI").connect(bob);
    marketWETH = env.market("WETH").connect(alice);
    [maturity] = futurePools(env.chain.timestamp, 1);

    marketDAI.deposit(parseUnits("10"), bob);
    marketWETH.deposit(parseUnits("1"), alice);
    env.auditor.connect(alice).enterMarket(marketWETH.address);
    marketDAI.connect(john).depositAtMaturity(maturity, parseUnits("1000"), parseUnits("1000"), john);
    marketDAI.connect(alice).borrowAtMaturity(maturity, parseUnits("500"), parseUnits("500"), alice, alice);
    env.oracle.connect(env.namedAccounts.deployer).setPrice(marketWETH.address, parseUnits("400"));
    expect(marketDAI.liquidate(alice, MaxUint256, marketWETH)).to.equal(380_047_505_938_242_280_286n);
  });

  it("THEN the bad debt is charged to the maturity's depositors", () => {
    expect(lastEvent(env.chain, marketDAI.address, "SpreadBadDebt")).to.deep.equal({
      borrower: alice,
      assets: 119_952_494_061_757_719_714n,
    });
    expect(marketDAI.fixedDepositPositions(maturity, john)).to.deep.equal({
      principal: 880_047_505_938_242_280_286n,
      fee: 0n,
    });
    expect(marketDAI.fixedPools(maturity).supplied).to.equal(880_047_505_938_242_280_286n);
  });

  it("AND the smart pool keeps its assets", () => {
    expect(marketDAI.smartPoolAssets).to.equal(parseUnits("10"));
    expect(marketDAI.totalAssets()).to.equal(parseUnits("10"));
    expect(marketDAI.maxWithdraw(bob)).to.equal(parseUnits("10"));
    expect(marketDAI.smartPoolEarningsAccumulator).to.equal(950_118_764_845_605_700n);
  });

  it("AND at maturity john withdraws what is left of his deposit", () => {
    env.chain.setNextBlockTimestamp(maturity);
    expect(marketDAI.connect(john).withdrawAtMaturity(maturity, parseUnits("1000"), 0n, john, john)).to.equal(
      880_047_505_938_242_280_286n,
    );
    expect(marketDAI.accounts(john).fixedDeposits).to.equal(0n);
  });
});
