import { expect } from "chai";
import { parseUnits } from "ethers";
import { YEAR } from "../contracts/InterestRateModel";
import type { Market } from "../contracts/Market";
import { ZeroBorrow, ZeroRepay } from "../contracts/Market";
import { InsufficientAllowance } from "../contracts/utils/ERC20Errors";
import defaultEnv, { alice, bob, type DefaultEnv } from "./defaultEnv";
import lastEvent from "./utils/lastEvent";

describe("Flexible Borrows", function () {
  let env: DefaultEnv;
  let marketDAI: Market;

  beforeEach(() => {
    env = defaultEnv({ borrowRate: parseUnits("0.1") });
    marketDAI = env.market("DAI").connect(alice);
    marketDAI.deposit(parseUnits("10"), alice);
  });

  describe("GIVEN alice borrows 1 DAI", () => {
    beforeEach(() => {
      expect(marketDAI.borrow(parseUnits("1"), alice, alice)).to.equal(parseUnits("1"));
    });

    it("THEN the borrow is logged", () => {
      expect(lastEvent(env.chain, marketDAI.address, "Borrow")).to.deep.equal({
        caller: alice,
        receiver: alice,
        borrower: alice,
        assets: parseUnits("1"),
        shares: parseUnits("1"),
      });
    });

    it("THEN the debt is tracked in shares", () => {
      expect(marketDAI.flexibleDebt).to.equal(parseUnits("1"));
      expect(marketDAI.totalFlexibleBorrowShares).to.equal(parseUnits("1"));
      expect(marketDAI.accounts(alice).flexibleBorrowShares).to.equal(parseUnits("1"));
      expect(marketDAI.previewDebt(alice)).to.equal(parseUnits("1"));
    });

    it("WHEN bob borrows on her behalf without allowance THEN it reverts", () => {
      expect(() => marketDAI.connect(bob).borrow(parseUnits("1"), bob, alice)).to.throw(
        InsufficientAllowance,
        `InsufficientAllowance(${alice}, ${bob}, ${parseUnits("1")})`,
      );
    });

    it("WHEN bob borrows on her behalf with allowance THEN alice owes it", () => {
      marketDAI.approve(bob, parseUnits("1"));
      marketDAI.connect(bob).borrow(parseUnits("1"), bob, alice);

      expect(marketDAI.accounts(alice).flexibleBorrowShares).to.equal(parseUnits("2"));
      expect(marketDAI.allowance(alice, bob)).to.equal(0n);
      expect(env.asset("DAI").balanceOf(bob)).to.equal(parseUnits("1000001"));
    });

    describe("WHEN a year passes", () => {
      beforeEach(() => {
        env.chain.increaseTime(YEAR);
      });

      it("THEN the debt grows at the flexible rate", () => {
        expect(marketDAI.previewDebt(alice)).to.equal(parseUnits("1.1"));
        expect(marketDAI.totalFlexibleBorrowAssets()).to.equal(parseUnits("1.1"));
      });

      it("AND the smart pool counts the interest before it accrues", () => {
        expect(marketDAI.flexibleDebt).to.equal(parseUnits("1"));
        expect(marketDAI.totalAssets()).to.equal(parseUnits("10.1"));
      });

      it("AND the next operation accrues it", () => {
        marketDAI.borrow(1n, alice, alice);
        expect(marketDAI.smartPoolAssets).to.equal(parseUnits("10.1"));
        expect(marketDAI.flexibleDebt).to.equal(parseUnits("1.1") + 1n);
        expect(marketDAI.lastFlexibleDebtUpdate).to.equal(env.chain.timestamp);
      });

      it("AND repaying half the assets burns half the shares", () => {
        expect(marketDAI.repay(parseUnits("0.55"), alice)).to.deep.equal([parseUnits("0.55"), parseUnits("0.5")]);
        expect(marketDAI.accounts(alice).flexibleBorrowShares).to.equal(parseUnits("0.5"));
        expect(marketDAI.flexibleDebt).to.equal(parseUnits("0.55"));
      });

      it("AND refunding every share clears the debt", () => {
        expect(marketDAI.refund(parseUnits("1"), alice)).to.deep.equal([parseUnits("1.1"), parseUnits("1")]);
        expect(marketDAI.flexibleDebt).to.equal(0n);
        expect(marketDAI.totalFlexibleBorrowShares).to.equal(0n);
        expect(marketDAI.previewDebt(alice)).to.equal(0n);
        expect(env.asset("DAI").balanceOf(alice)).to.equal(parseUnits("999989.9"));
      });

      it("AND refunding more shares than owed only burns the owed ones", () => {
        expect(marketDAI.refund(parseUnits("5"), alice)).to.deep.equal([parseUnits("1.1"), parseUnits("1")]);
      });
    });

    it("WHEN bob repays without debt THEN it reverts", () => {
      expect(() => marketDAI.connect(bob).repay(parseUnits("1"), bob)).to.throw(ZeroRepay, "ZeroRepay()");
    });
  });

  it("WHEN borrowing nothing THEN it reverts", () => {
    expect(() => marketDAI.borrow(0n, alice, alice)).to.throw(ZeroBorrow, "ZeroBorrow()");
  });

  it("WHEN nothing is borrowed THEN time does not add interest", () => {
    env.chain.increaseTime(YEAR);
    expect(marketDAI.totalFlexibleBorrowAssets()).to.equal(0n);
    expect(marketDAI.totalAssets()).to.equal(parseUnits("10"));
  });
});
