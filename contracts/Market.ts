import { MaxUint256, ZeroAddress } from "ethers";
import type { Auditor } from "./Auditor";
import type { Chain } from "./Chain";
import { InsufficientProtocolLiquidity, YEAR } from "./InterestRateModel";
import type { IERC20 } from "./interfaces/IERC20";
import type { IInterestRateModel } from "./interfaces/IInterestRateModel";
import { Ownable } from "./utils/Contract";
import { CustomError } from "./utils/CustomError";
import { InsufficientAllowance, InsufficientBalance } from "./utils/ERC20Errors";
import {
  INTERVAL,
  State,
  accrueEarnings,
  calculateDeposit,
  calculateWithdraw,
  clearMaturity,
  distributeEarnings,
  emptyPool,
  getPoolState,
  maturities,
  pendingEarnings,
  reduceProportionally,
  scaleProportionally,
  setMaturity,
  type Pool,
  type Position,
} from "./utils/FixedLib";
import * as FixedLib from "./utils/FixedLib";
import {
  WAD,
  divWadUp,
  expWad,
  min,
  mulDivDown,
  mulDivUp,
  mulWadDown,
  mulWadUp,
} from "./utils/FixedPointMath";

export interface MarketParameters {
  maxFuturePools: number;
  earningsAccumulatorSmoothFactor: bigint;
  interestRateModel: IInterestRateModel;
  /** per second, 18 decimals. */
  penaltyRate: bigint;
  backupFeeRate: bigint;
  reserveFactor: bigint;
  dampSpeedUp: bigint;
  dampSpeedDown: bigint;
}

export interface Account {
  /** packed maturities, see {@link FixedLib.setMaturity}. */
  fixedDeposits: bigint;
  fixedBorrows: bigint;
  flexibleBorrowShares: bigint;
}

export interface MarketStorage {
  owner: string;
  name: string;
  symbol: string;
  decimals: number;

  maxFuturePools: number;
  earningsAccumulatorSmoothFactor: bigint;
  interestRateModel: string;
  penaltyRate: bigint;
  backupFeeRate: bigint;
  reserveFactor: bigint;
  dampSpeedUp: bigint;
  dampSpeedDown: bigint;
  treasury: string;
  treasuryFeeRate: bigint;

  smartPoolAssets: bigint;
  smartPoolAssetsAverage: bigint;
  lastAverageUpdate: number;
  smartPoolEarningsAccumulator: bigint;
  lastAccumulatedEarningsAccrual: number;
  /** sum of `suppliedSP` over every maturity. */
  smartPoolFixedBorrows: bigint;
  flexibleDebt: bigint;
  totalFlexibleBorrowShares: bigint;
  lastFlexibleDebtUpdate: number;

  totalSupply: bigint;
  balances: Map<string, bigint>;
  allowances: Map<string, Map<string, bigint>>;

  fixedPools: Map<number, Pool>;
  fixedDepositPositions: Map<number, Map<string, Position>>;
  fixedBorrowPositions: Map<number, Map<string, Position>>;
  accounts: Map<string, Account>;
}

interface MarketLinks {
  asset: IERC20;
  auditor: Auditor;
  interestRateModels: Map<string, IInterestRateModel>;
}

export type MarketEvents = {
  Transfer: { from: string; to: string; amount: bigint };
  Approval: { owner: string; spender: string; amount: bigint };
  Deposit: { caller: string; owner: string; assets: bigint; shares: bigint };
  Withdraw: { caller: string; receiver: string; owner: string; assets: bigint; shares: bigint };
  DepositAtMaturity: { maturity: number; caller: string; owner: string; assets: bigint; fee: bigint };
  WithdrawAtMaturity: {
    maturity: number;
    caller: string;
    receiver: string;
    owner: string;
    positionAssets: bigint;
    assets: bigint;
  };
  BorrowAtMaturity: {
    maturity: number;
    caller: string;
    receiver: string;
    borrower: string;
    assets: bigint;
    fee: bigint;
  };
  RepayAtMaturity: { maturity: number; caller: string; borrower: string; assets: bigint; positionAssets: bigint };
  Borrow: { caller: string; receiver: string; borrower: string; assets: bigint; shares: bigint };
  Repay: { caller: string; borrower: string; assets: bigint; shares: bigint };
  LiquidateBorrow: {
    receiver: string;
    borrower: string;
    assets: bigint;
    lendersAssets: bigint;
    seizeMarket: string;
    seizedAssets: bigint;
  };
  Seize: { liquidator: string; borrower: string; assets: bigint };
  SpreadBadDebt: { borrower: string; assets: bigint };
  MaxFuturePoolsSet: { maxFuturePools: number };
  EarningsAccumulatorSmoothFactorSet: { earningsAccumulatorSmoothFactor: bigint };
  InterestRateModelSet: { interestRateModel: string };
  PenaltyRateSet: { penaltyRate: bigint };
  BackupFeeRateSet: { backupFeeRate: bigint };
  ReserveFactorSet: { reserveFactor: bigint };
  DampSpeedSet: { dampSpeedUp: bigint; dampSpeedDown: bigint };
  TreasurySet: { treasury: string; treasuryFeeRate: bigint };
};

/**
 * Lending market of a single asset. Depositors share a smart pool vault that backs fixed-rate borrows at discrete
 * maturities and a flexible-rate borrow pool; fixed-rate depositors can also lend directly to a maturity.
 */
export class Market extends Ownable<MarketStorage, MarketEvents> {
  static deploy(chain: Chain, asset: IERC20, auditor: Auditor, parameters: MarketParameters, from: string) {
    const { timestamp } = chain;
    const { interestRateModel, ...rest } = parameters;
    const symbol = asset.symbol();
    const storage = chain.track<MarketStorage>({
      owner: from,
      name: `${symbol} market`,
      symbol: `m${symbol}`,
      decimals: asset.decimals(),
      ...rest,
      interestRateModel: interestRateModel.address,
      treasury: ZeroAddress,
      treasuryFeeRate: 0n,
      smartPoolAssets: 0n,
      smartPoolAssetsAverage: 0n,
      lastAverageUpdate: timestamp,
      smartPoolEarningsAccumulator: 0n,
      lastAccumulatedEarningsAccrual: timestamp,
      smartPoolFixedBorrows: 0n,
      flexibleDebt: 0n,
      totalFlexibleBorrowShares: 0n,
      lastFlexibleDebtUpdate: timestamp,
      totalSupply: 0n,
      balances: new Map(),
      allowances: new Map(),
      fixedPools: new Map(),
      fixedDepositPositions: new Map(),
      fixedBorrowPositions: new Map(),
      accounts: new Map(),
    });
    const links: MarketLinks = {
      asset,
      auditor,
      interestRateModels: new Map([[interestRateModel.address, interestRateModel]]),
    };
    return new Market(chain, chain.deployAddress(from), storage, links, from);
  }

  private constructor(
    chain: Chain,
    address: string,
    storage: MarketStorage,
    private readonly links: MarketLinks,
    sender: string,
  ) {
    super(chain, address, storage, sender);
  }

  connect(account: string) {
    return new Market(this.chain, this.address, this.storage, this.links, account);
  }

  get asset() {
    return this.links.asset.address;
  }

  get auditor() {
    return this.links.auditor.address;
  }

  // #region smart pool

  deposit(assets: bigint, receiver: string) {
    return this.chain.transaction(() => {
      this.accrue();
      const shares = this.previewDeposit(assets);
      if (shares === 0n) throw new ZeroDeposit();

      this.storage.smartPoolAssets += assets;
      this.mintShares(receiver, shares);
      this.emit("Deposit", { caller: this.sender, owner: receiver, assets, shares });
      this.pull(assets);
      return shares;
    });
  }

  mint(shares: bigint, receiver: string) {
    return this.chain.transaction(() => {
      this.accrue();
      const assets = this.previewMint(shares);
      if (assets === 0n) throw new ZeroDeposit();

      this.storage.smartPoolAssets += assets;
      this.mintShares(receiver, shares);
      this.emit("Deposit", { caller: this.sender, owner: receiver, assets, shares });
      this.pull(assets);
      return assets;
    });
  }

  withdraw(assets: bigint, receiver: string, owner: string) {
    return this.chain.transaction(() => {
      if (assets === 0n) throw new ZeroWithdraw();
      this.accrue();
      const shares = this.previewWithdraw(assets);
      this.exit(assets, shares, receiver, owner);
      return shares;
    });
  }

  redeem(shares: bigint, receiver: string, owner: string) {
    return this.chain.transaction(() => {
      this.accrue();
      const assets = this.previewRedeem(shares);
      if (assets === 0n) throw new ZeroWithdraw();
      this.exit(assets, shares, receiver, owner);
      return assets;
    });
  }

  transfer(to: string, shares: bigint) {
    return this.chain.transaction(() => {
      this.links.auditor.checkShortfall(this.address, this.sender, this.previewRedeem(shares));
      this.moveShares(this.sender, to, shares);
      return true;
    });
  }

  transferFrom(from: string, to: string, shares: bigint) {
    return this.chain.transaction(() => {
      this.links.auditor.checkShortfall(this.address, from, this.previewRedeem(shares));
      this.spendShares(from, shares);
      this.moveShares(from, to, shares);
      return true;
    });
  }

  approve(spender: string, shares: bigint) {
    return this.chain.transaction(() => {
      const allowances = this.storage.allowances.get(this.sender) ?? new Map<string, bigint>();
      allowances.set(spender, shares);
      this.storage.allowances.set(this.sender, allowances);
      this.emit("Approval", { owner: this.sender, spender, amount: shares });
      return true;
    });
  }

  // #endregion

  // #region fixed rate

  /** @returns the assets the position will be worth at maturity. */
  depositAtMaturity(maturity: number, assets: bigint, minAssetsRequired: bigint, receiver: string) {
    return this.chain.transaction(() => {
      if (assets === 0n) throw new ZeroDeposit();
      this.checkPoolState(maturity, State.VALID);
      this.accrue();

      const pool = this.pool(maturity);
      this.storage.smartPoolAssets += accrueEarnings(pool, maturity, this.chain.timestamp);

      const [fee, backupFee] = calculateDeposit(pool, assets, this.storage.backupFeeRate);
      const positionAssets = assets + fee;
      if (positionAssets < minAssetsRequired) throw new TooMuchSlippage(positionAssets, minAssetsRequired);

      this.storage.smartPoolFixedBorrows -= FixedLib.deposit(pool, assets);
      pool.unassignedEarnings -= fee + backupFee;
      this.storage.smartPoolEarningsAccumulator += backupFee;

      const account = this.account(receiver);
      account.fixedDeposits = setMaturity(account.fixedDeposits, maturity);
      const position = this.position(this.storage.fixedDepositPositions, maturity, receiver);
      position.principal += assets;
      position.fee += fee;

      this.emit("DepositAtMaturity", { maturity, caller: this.sender, owner: receiver, assets, fee });
      this.pull(assets);
      return positionAssets;
    });
  }

  /**
   * Before maturity the position pays back the share of unassigned earnings a deposit of its principal would take
   * right after the withdrawal, so a deposit withdrawn at once returns what was deposited. From maturity on the
   * position is worth its face value.
   *
   * @returns the assets sent to `receiver`.
   */
  withdrawAtMaturity(
    maturity: number,
    positionAssets: bigint,
    minAssetsRequired: bigint,
    receiver: string,
    owner: string,
  ) {
    return this.chain.transaction(() => {
      if (positionAssets === 0n) throw new ZeroWithdraw();
      this.checkPoolState(maturity, State.VALID, State.MATURED);
      this.accrue();

      const { timestamp } = this.chain;
      const pool = this.pool(maturity);
      this.storage.smartPoolAssets += accrueEarnings(pool, maturity, timestamp);

      const position = this.position(this.storage.fixedDepositPositions, maturity, owner);
      positionAssets = min(positionAssets, position.principal + position.fee);
      if (positionAssets === 0n) throw new ZeroWithdraw();

      const { principal, fee } = scaleProportionally(position, positionAssets);
      const newFixedBorrows = this.storage.smartPoolFixedBorrows + FixedLib.withdraw(pool, principal);
      if (newFixedBorrows + this.storage.flexibleDebt > this.storage.smartPoolAssets) {
        throw new InsufficientProtocolLiquidity();
      }
      this.storage.smartPoolFixedBorrows = newFixedBorrows;

      const discount = timestamp < maturity ? min(positionAssets, calculateWithdraw(pool, principal, fee)) : 0n;
      const assetsDiscounted = positionAssets - discount;
      if (assetsDiscounted < minAssetsRequired) throw new TooMuchSlippage(assetsDiscounted, minAssetsRequired);
      this.spendAllowance(owner, assetsDiscounted);
      pool.unassignedEarnings += discount;

      reduceProportionally(position, positionAssets);
      if (position.principal === 0n && position.fee === 0n) {
        const account = this.account(owner);
        account.fixedDeposits = clearMaturity(account.fixedDeposits, maturity);
        this.storage.fixedDepositPositions.get(maturity)?.delete(owner);
      }

      this.emit("WithdrawAtMaturity", {
        maturity,
        caller: this.sender,
        receiver,
        owner,
        positionAssets,
        assets: assetsDiscounted,
      });
      this.push(receiver, assetsDiscounted);
      return assetsDiscounted;
    });
  }

  /** @returns the assets owed at maturity, fee included. */
  borrowAtMaturity(maturity: number, assets: bigint, maxAssets: bigint, receiver: string, borrower: string) {
    return this.chain.transaction(() => {
      if (assets === 0n) throw new ZeroBorrow();
      this.checkPoolState(maturity, State.VALID);
      this.accrue();

      const { timestamp } = this.chain;
      const pool = this.pool(maturity);
      this.storage.smartPoolAssets += accrueEarnings(pool, maturity, timestamp);

      const fee = mulWadUp(
        assets,
        this.rateModel().getRateToBorrow(
          maturity,
          timestamp,
          pool.borrowed + assets,
          pool.supplied,
          this.storage.smartPoolAssetsAverage,
        ),
      );
      const assetsOwed = assets + fee;
      if (assetsOwed > maxAssets) throw new TooMuchSlippage(assetsOwed, maxAssets);
      this.spendAllowance(borrower, assetsOwed);

      const backupAddition = FixedLib.borrow(pool, assets);
      if (backupAddition !== 0n) {
        const newFixedBorrows = this.storage.smartPoolFixedBorrows + backupAddition;
        this.checkReserve(newFixedBorrows + this.storage.flexibleDebt);
        this.storage.smartPoolFixedBorrows = newFixedBorrows;
      }

      const account = this.account(borrower);
      account.fixedBorrows = setMaturity(account.fixedBorrows, maturity);
      this.distributeFee(pool, fee, assets);
      const position = this.position(this.storage.fixedBorrowPositions, maturity, borrower);
      position.principal += assets;
      position.fee += fee;

      this.emit("BorrowAtMaturity", { maturity, caller: this.sender, receiver, borrower, assets, fee });
      this.links.auditor.connect(this.address).checkBorrow(this.address, borrower);
      this.push(receiver, assets);
      return assetsOwed;
    });
  }

  /** @returns the assets actually paid, penalties added or discount taken. */
  repayAtMaturity(maturity: number, positionAssets: bigint, maxAssets: bigint, borrower: string) {
    return this.chain.transaction(() => {
      if (positionAssets === 0n) throw new ZeroRepay();
      this.checkPoolState(maturity, State.VALID, State.MATURED);
      this.accrue();

      const actualRepayAssets = this.noTransferRepayAtMaturity(maturity, positionAssets, maxAssets, borrower, true);
      this.pull(actualRepayAssets);
      return actualRepayAssets;
    });
  }

  // #endregion

  // #region flexible rate

  /** @returns the borrow shares minted to `borrower`. */
  borrow(assets: bigint, receiver: string, borrower: string) {
    return this.chain.transaction(() => {
      if (assets === 0n) throw new ZeroBorrow();
      this.accrue();
      this.spendAllowance(borrower, assets);

      const shares = this.previewBorrow(assets);
      const newDebt = this.storage.flexibleDebt + assets;
      this.checkReserve(this.storage.smartPoolFixedBorrows + newDebt);
      this.storage.flexibleDebt = newDebt;
      this.storage.totalFlexibleBorrowShares += shares;
      this.account(borrower).flexibleBorrowShares += shares;

      this.emit("Borrow", { caller: this.sender, receiver, borrower, assets, shares });
      this.links.auditor.connect(this.address).checkBorrow(this.address, borrower);
      this.push(receiver, assets);
      return shares;
    });
  }

  /** @returns the assets paid and the borrow shares burned. */
  repay(assets: bigint, borrower: string): [bigint, bigint] {
    return this.chain.transaction(() => {
      this.accrue();
      const repaid = this.noTransferRefund(this.previewRepay(assets), borrower);
      this.pull(repaid[0]);
      return repaid;
    });
  }

  /** @returns the assets paid and the borrow shares burned. */
  refund(shares: bigint, borrower: string): [bigint, bigint] {
    return this.chain.transaction(() => {
      this.accrue();
      const repaid = this.noTransferRefund(shares, borrower);
      this.pull(repaid[0]);
      return repaid;
    });
  }

  // #endregion

  // #region liquidation

  /**
   * Repays debt of an account in shortfall, matured and upcoming maturities first in ascending order, then the
   * flexible debt, and seizes the equivalent collateral plus incentive from `seizeMarket`. Whatever debt is left
   * once the account runs out of collateral everywhere is written off against the lenders.
   *
   * @returns the assets repaid, not counting the lenders' incentive the liquidator also pays.
   */
  liquidate(borrower: string, maxAssets: bigint, seizeMarket: Market) {
    return this.chain.transaction(() => {
      if (this.sender === borrower) throw new SelfLiquidation();
      this.accrue();

      const auditor = this.links.auditor.connect(this.address);
      let budget = auditor.checkLiquidation(this.address, seizeMarket.address, borrower, maxAssets);
      if (budget === 0n) throw new ZeroRepay();

      const { timestamp } = this.chain;
      const { penaltyRate } = this.storage;
      let repaidAssets = 0n;
      for (const maturity of maturities(this.account(borrower).fixedBorrows)) {
        let covered = budget;
        let short = false;
        if (timestamp >= maturity) {
          // matured positions owe a penalty on top, so the budget covers a proportional part of them
          const { principal, fee } = this.fixedBorrowPositions(maturity, borrower);
          const position = principal + fee;
          const debt = position + mulWadDown(position, BigInt(timestamp - maturity) * penaltyRate);
          if (debt > budget) {
            covered = mulDivDown(budget, position, debt);
            short = true;
          }
        }
        if (covered === 0n) {
          budget = 0n;
          break;
        }

        const actualRepay = this.noTransferRepayAtMaturity(maturity, covered, budget, borrower, false);
        repaidAssets += actualRepay;
        if (short) {
          budget = 0n;
          break;
        }
        budget -= actualRepay;
      }

      if (budget !== 0n && this.account(borrower).flexibleBorrowShares !== 0n) {
        const shares = this.previewRepay(budget);
        if (shares !== 0n) repaidAssets += this.noTransferRefund(shares, borrower)[0];
      }
      if (repaidAssets === 0n) throw new ZeroRepay();

      const [lendersAssets, seizedAssets] = auditor.calculateSeize(
        this.address,
        seizeMarket.address,
        borrower,
        repaidAssets,
      );
      this.storage.smartPoolEarningsAccumulator += lendersAssets;

      if (seizeMarket.address === this.address) this.internalSeize(this.address, this.sender, borrower, seizedAssets);
      else seizeMarket.connect(this.address).seize(this.sender, borrower, seizedAssets);

      this.emit("LiquidateBorrow", {
        receiver: this.sender,
        borrower,
        assets: repaidAssets,
        lendersAssets,
        seizeMarket: seizeMarket.address,
        seizedAssets,
      });
      auditor.handleBadDebt(borrower);
      this.pull(repaidAssets + lendersAssets);
      return repaidAssets;
    });
  }

  /** Hands collateral of `borrower` to `liquidator` on behalf of the listed market calling it. */
  seize(liquidator: string, borrower: string, assets: bigint) {
    this.chain.transaction(() => {
      this.accrue();
      this.internalSeize(this.sender, liquidator, borrower, assets);
    });
  }

  /**
   * Writes off every fixed and flexible debt of `borrower`. The loss on principal funded by a maturity's depositors is
   * charged to them pro rata; the rest is absorbed by the earnings accumulator first, then by the smart pool.
   */
  clearBadDebt(borrower: string) {
    this.chain.transaction(() => {
      if (this.sender !== this.links.auditor.address) throw new NotAuditor(this.sender);
      this.accrue();

      let totalBadDebt = 0n;
      let smartPoolLoss = 0n;
      const account = this.account(borrower);
      for (const maturity of maturities(account.fixedBorrows)) {
        const { principal, fee } = this.fixedBorrowPositions(maturity, borrower);
        const badDebt = principal + fee;
        const pool = this.pool(maturity);
        this.storage.smartPoolAssets += accrueEarnings(pool, maturity, this.chain.timestamp);

        const backupRepaid = FixedLib.repay(pool, principal);
        this.storage.smartPoolFixedBorrows -= backupRepaid;
        const depositorsLoss = principal - backupRepaid;
        smartPoolLoss += badDebt - this.chargeDepositors(maturity, pool, depositorsLoss);

        this.storage.fixedBorrowPositions.get(maturity)?.delete(borrower);
        account.fixedBorrows = clearMaturity(account.fixedBorrows, maturity);
        totalBadDebt += badDebt;
        this.emit("RepayAtMaturity", {
          maturity,
          caller: this.sender,
          borrower,
          assets: badDebt,
          positionAssets: badDebt,
        });
      }
      if (account.flexibleBorrowShares !== 0n) {
        const [assets] = this.noTransferRefund(account.flexibleBorrowShares, borrower);
        totalBadDebt += assets;
        smartPoolLoss += assets;
      }
      if (totalBadDebt === 0n) return;

      const fromAccumulator = min(smartPoolLoss, this.storage.smartPoolEarningsAccumulator);
      this.storage.smartPoolEarningsAccumulator -= fromAccumulator;
      this.storage.smartPoolAssets -= min(smartPoolLoss - fromAccumulator, this.storage.smartPoolAssets);
      this.emit("SpreadBadDebt", { borrower, assets: totalBadDebt });
    });
  }

  // #endregion

  // #region views

  get name() {
    return this.storage.name;
  }

  get symbol() {
    return this.storage.symbol;
  }

  get decimals() {
    return this.storage.decimals;
  }

  get maxFuturePools() {
    return this.storage.maxFuturePools;
  }

  get earningsAccumulatorSmoothFactor() {
    return this.storage.earningsAccumulatorSmoothFactor;
  }

  get interestRateModel() {
    return this.storage.interestRateModel;
  }

  get penaltyRate() {
    return this.storage.penaltyRate;
  }

  get backupFeeRate() {
    return this.storage.backupFeeRate;
  }

  get reserveFactor() {
    return this.storage.reserveFactor;
  }

  get dampSpeedUp() {
    return this.storage.dampSpeedUp;
  }

  get dampSpeedDown() {
    return this.storage.dampSpeedDown;
  }

  get treasury() {
    return this.storage.treasury;
  }

  get treasuryFeeRate() {
    return this.storage.treasuryFeeRate;
  }

  get smartPoolAssets() {
    return this.storage.smartPoolAssets;
  }

  get smartPoolAssetsAverage() {
    return this.storage.smartPoolAssetsAverage;
  }

  get lastAverageUpdate() {
    return this.storage.lastAverageUpdate;
  }

  get smartPoolEarningsAccumulator() {
    return this.storage.smartPoolEarningsAccumulator;
  }

  get lastAccumulatedEarningsAccrual() {
    return this.storage.lastAccumulatedEarningsAccrual;
  }

  get smartPoolFixedBorrows() {
    return this.storage.smartPoolFixedBorrows;
  }

  get flexibleDebt() {
    return this.storage.flexibleDebt;
  }

  get totalFlexibleBorrowShares() {
    return this.storage.totalFlexibleBorrowShares;
  }

  get lastFlexibleDebtUpdate() {
    return this.storage.lastFlexibleDebtUpdate;
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

  fixedPools(maturity: number): Readonly<Pool> {
    const pool = this.storage.fixedPools.get(maturity);
    return pool ? { ...pool } : emptyPool(0);
  }

  fixedDepositPositions(maturity: number, account: string): Readonly<Position> {
    const position = this.storage.fixedDepositPositions.get(maturity)?.get(account);
    return position ? { ...position } : { principal: 0n, fee: 0n };
  }

  fixedBorrowPositions(maturity: number, account: string): Readonly<Position> {
    const position = this.storage.fixedBorrowPositions.get(maturity)?.get(account);
    return position ? { ...position } : { principal: 0n, fee: 0n };
  }

  accounts(account: string): Readonly<Account> {
    const data = this.storage.accounts.get(account);
    return data ? { ...data } : { fixedDeposits: 0n, fixedBorrows: 0n, flexibleBorrowShares: 0n };
  }

  /**
   * Assets owned by the smart pool as if every pending accrual ran now: maturity earnings released so far, the
   * accumulator slice, and flexible interest net of the treasury's cut.
   */
  totalAssets() {
    const { timestamp } = this.chain;
    let backupEarnings = 0n;
    for (const [maturity, pool] of this.storage.fixedPools) backupEarnings += pendingEarnings(pool, maturity, timestamp);

    return (
      this.storage.smartPoolAssets +
      backupEarnings +
      this.accumulatedEarnings() +
      mulWadDown(this.totalFlexibleBorrowAssets() - this.storage.flexibleDebt, WAD - this.storage.treasuryFeeRate)
    );
  }

  convertToShares(assets: bigint) {
    const supply = this.storage.totalSupply;
    return supply === 0n ? assets : mulDivDown(assets, supply, this.totalAssets());
  }

  convertToAssets(shares: bigint) {
    const supply = this.storage.totalSupply;
    return supply === 0n ? shares : mulDivDown(shares, this.totalAssets(), supply);
  }

  previewDeposit(assets: bigint) {
    return this.convertToShares(assets);
  }

  previewMint(shares: bigint) {
    const supply = this.storage.totalSupply;
    return supply === 0n ? shares : mulDivUp(shares, this.totalAssets(), supply);
  }

  previewWithdraw(assets: bigint) {
    const supply = this.storage.totalSupply;
    return supply === 0n ? assets : mulDivUp(assets, supply, this.totalAssets());
  }

  previewRedeem(shares: bigint) {
    return this.convertToAssets(shares);
  }

  maxWithdraw(owner: string) {
    return this.convertToAssets(this.balanceOf(owner));
  }

  maxRedeem(owner: string) {
    return this.balanceOf(owner);
  }

  /** Fixed positions with their late penalties, plus the flexible debt, of `account`. */
  previewDebt(account: string) {
    const { timestamp } = this.chain;
    const { penaltyRate } = this.storage;
    const { fixedBorrows, flexibleBorrowShares } = this.accounts(account);

    let debt = 0n;
    for (const maturity of maturities(fixedBorrows)) {
      const { principal, fee } = this.fixedBorrowPositions(maturity, account);
      const positionAssets = principal + fee;
      debt += positionAssets;
      if (timestamp > maturity) debt += mulWadDown(positionAssets, BigInt(timestamp - maturity) * penaltyRate);
    }
    if (flexibleBorrowShares !== 0n) debt += this.previewRefund(flexibleBorrowShares);
    return debt;
  }

  accountSnapshot(account: string): [bigint, bigint] {
    return [this.convertToAssets(this.balanceOf(account)), this.previewDebt(account)];
  }

  previewSmartPoolAssetsAverage() {
    const { smartPoolAssets, smartPoolAssetsAverage, dampSpeedUp, dampSpeedDown, lastAverageUpdate } = this.storage;
    const dampSpeed = smartPoolAssets < smartPoolAssetsAverage ? dampSpeedDown : dampSpeedUp;
    const averageFactor = WAD - expWad(-(dampSpeed * BigInt(this.chain.timestamp - lastAverageUpdate)));
    return mulWadDown(smartPoolAssetsAverage, WAD - averageFactor) + mulWadDown(averageFactor, smartPoolAssets);
  }

  totalFlexibleBorrowAssets() {
    return this.storage.flexibleDebt + this.pendingFlexibleDebt();
  }

  previewBorrow(assets: bigint) {
    const supply = this.storage.totalFlexibleBorrowShares;
    return supply === 0n ? assets : mulDivUp(assets, supply, this.totalFlexibleBorrowAssets());
  }

  previewRepay(assets: bigint) {
    const supply = this.storage.totalFlexibleBorrowShares;
    return supply === 0n ? assets : mulDivDown(assets, supply, this.totalFlexibleBorrowAssets());
  }

  previewRefund(shares: bigint) {
    const supply = this.storage.totalFlexibleBorrowShares;
    return supply === 0n ? shares : mulDivUp(shares, this.totalFlexibleBorrowAssets(), supply);
  }

  // #endregion

  // #region admin

  setMaxFuturePools(maxFuturePools: number) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.storage.maxFuturePools = maxFuturePools;
      this.emit("MaxFuturePoolsSet", { maxFuturePools });
    });
  }

  setEarningsAccumulatorSmoothFactor(earningsAccumulatorSmoothFactor: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.accrue();
      this.storage.earningsAccumulatorSmoothFactor = earningsAccumulatorSmoothFactor;
      this.emit("EarningsAccumulatorSmoothFactorSet", { earningsAccumulatorSmoothFactor });
    });
  }

  setInterestRateModel(interestRateModel: IInterestRateModel) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.accrue();
      this.links.interestRateModels.set(interestRateModel.address, interestRateModel);
      this.storage.interestRateModel = interestRateModel.address;
      this.emit("InterestRateModelSet", { interestRateModel: interestRateModel.address });
    });
  }

  setPenaltyRate(penaltyRate: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.storage.penaltyRate = penaltyRate;
      this.emit("PenaltyRateSet", { penaltyRate });
    });
  }

  setBackupFeeRate(backupFeeRate: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.storage.backupFeeRate = backupFeeRate;
      this.emit("BackupFeeRateSet", { backupFeeRate });
    });
  }

  setReserveFactor(reserveFactor: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.storage.reserveFactor = reserveFactor;
      this.emit("ReserveFactorSet", { reserveFactor });
    });
  }

  setDampSpeed(dampSpeedUp: bigint, dampSpeedDown: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.accrue();
      this.storage.dampSpeedUp = dampSpeedUp;
      this.storage.dampSpeedDown = dampSpeedDown;
      this.emit("DampSpeedSet", { dampSpeedUp, dampSpeedDown });
    });
  }

  /** Without a treasury the fee rate is forced to zero. */
  setTreasury(treasury: string, treasuryFeeRate: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.accrue();
      if (treasury === ZeroAddress) treasuryFeeRate = 0n;
      this.storage.treasury = treasury;
      this.storage.treasuryFeeRate = treasuryFeeRate;
      this.emit("TreasurySet", { treasury, treasuryFeeRate });
    });
  }

  // #endregion

  // #region internal

  /** Brings the average, the flexible debt and the accumulator up to date, paying the treasury its share. */
  private accrue() {
    this.updateAverage();
    const treasuryFee = this.updateFlexibleDebt();
    this.storage.smartPoolAssets += this.accrueAccumulatedEarnings();
    this.depositToTreasury(treasuryFee);
  }

  private updateAverage() {
    this.storage.smartPoolAssetsAverage = this.previewSmartPoolAssetsAverage();
    this.storage.lastAverageUpdate = this.chain.timestamp;
  }

  private updateFlexibleDebt() {
    const newDebt = this.pendingFlexibleDebt();
    const treasuryFee = mulWadDown(newDebt, this.storage.treasuryFeeRate);
    this.storage.flexibleDebt += newDebt;
    this.storage.smartPoolAssets += newDebt - treasuryFee;
    this.storage.lastFlexibleDebtUpdate = this.chain.timestamp;
    return treasuryFee;
  }

  private pendingFlexibleDebt() {
    const { flexibleDebt, smartPoolAssets, lastFlexibleDebtUpdate } = this.storage;
    const elapsed = this.chain.timestamp - lastFlexibleDebtUpdate;
    if (elapsed === 0 || flexibleDebt === 0n) return 0n;

    const utilization = smartPoolAssets === 0n ? 0n : divWadUp(flexibleDebt, smartPoolAssets);
    const rate = this.rateModel().getFlexibleBorrowRate(utilization);
    return mulWadDown(flexibleDebt, mulDivDown(rate, BigInt(elapsed), BigInt(YEAR)));
  }

  /** Slice of the accumulator released since the last accrual, `1 - e^(-elapsed / window)` of it. */
  private accumulatedEarnings() {
    const { smartPoolEarningsAccumulator, earningsAccumulatorSmoothFactor, maxFuturePools } = this.storage;
    const elapsed = this.chain.timestamp - this.storage.lastAccumulatedEarningsAccrual;
    if (elapsed === 0 || smartPoolEarningsAccumulator === 0n) return 0n;

    const window = mulWadDown(earningsAccumulatorSmoothFactor, BigInt(maxFuturePools * INTERVAL));
    if (window === 0n) return smartPoolEarningsAccumulator;
    return mulWadDown(smartPoolEarningsAccumulator, WAD - expWad(-mulDivDown(BigInt(elapsed), WAD, window)));
  }

  private accrueAccumulatedEarnings() {
    const earnings = this.accumulatedEarnings();
    this.storage.smartPoolEarningsAccumulator -= earnings;
    this.storage.lastAccumulatedEarningsAccrual = this.chain.timestamp;
    return earnings;
  }

  private depositToTreasury(fee: bigint) {
    if (fee === 0n) return;
    this.mintShares(this.storage.treasury, this.previewDeposit(fee));
    this.storage.smartPoolAssets += fee;
  }

  /** @returns what is left of `earnings` once the treasury took its share. */
  private chargeTreasuryFee(earnings: bigint) {
    const fee = mulWadDown(earnings, this.storage.treasuryFeeRate);
    this.depositToTreasury(fee);
    return earnings - fee;
  }

  /**
   * The share of a fee backed by smart pool liquidity is earned by the pool over the maturity's lifetime. The rest
   * cost the smart pool nothing and is split between the maturity and the accumulator.
   */
  private distributeFee(pool: Pool, fee: bigint, amount: bigint) {
    const [backupEarnings, freeLunch] = distributeEarnings(pool, this.chargeTreasuryFee(fee), amount);
    const half = freeLunch / 2n;
    pool.unassignedEarnings += backupEarnings + half;
    this.storage.smartPoolEarningsAccumulator += freeLunch - half;
  }

  private noTransferRepayAtMaturity(
    maturity: number,
    positionAssets: bigint,
    maxAssets: bigint,
    borrower: string,
    canDiscount: boolean,
  ) {
    if (positionAssets === 0n) throw new ZeroRepay();

    const { timestamp } = this.chain;
    const pool = this.pool(maturity);
    this.storage.smartPoolAssets += accrueEarnings(pool, maturity, timestamp);

    const position = this.position(this.storage.fixedBorrowPositions, maturity, borrower);
    const debtCovered = min(positionAssets, position.principal + position.fee);
    if (debtCovered === 0n) throw new ZeroRepay();
    const principalCovered = scaleProportionally(position, debtCovered).principal;

    let actualRepayAssets: bigint;
    if (timestamp < maturity) {
      if (canDiscount) {
        const [discountFee, backupFee] = calculateDeposit(pool, principalCovered, this.storage.backupFeeRate);
        pool.unassignedEarnings -= discountFee + backupFee;
        this.storage.smartPoolEarningsAccumulator += backupFee;
        actualRepayAssets = debtCovered - discountFee;
      } else actualRepayAssets = debtCovered;
    } else {
      actualRepayAssets =
        debtCovered + mulWadDown(debtCovered, BigInt(timestamp - maturity) * this.storage.penaltyRate);
      this.storage.smartPoolEarningsAccumulator += actualRepayAssets - debtCovered;
    }
    if (actualRepayAssets > maxAssets) throw new TooMuchSlippage(actualRepayAssets, maxAssets);

    this.storage.smartPoolFixedBorrows -= FixedLib.repay(pool, principalCovered);
    reduceProportionally(position, debtCovered);
    if (position.principal === 0n && position.fee === 0n) {
      const account = this.account(borrower);
      account.fixedBorrows = clearMaturity(account.fixedBorrows, maturity);
      this.storage.fixedBorrowPositions.get(maturity)?.delete(borrower);
    }

    this.emit("RepayAtMaturity", {
      maturity,
      caller: this.sender,
      borrower,
      assets: actualRepayAssets,
      positionAssets: debtCovered,
    });
    return actualRepayAssets;
  }

  private noTransferRefund(shares: bigint, borrower: string): [bigint, bigint] {
    const account = this.account(borrower);
    const actualShares = min(shares, account.flexibleBorrowShares);
    const assets = this.previewRefund(actualShares);
    if (assets === 0n) throw new ZeroRepay();

    this.storage.flexibleDebt -= assets;
    account.flexibleBorrowShares -= actualShares;
    this.storage.totalFlexibleBorrowShares -= actualShares;
    this.emit("Repay", { caller: this.sender, borrower, assets, shares: actualShares });
    return [assets, actualShares];
  }

  /**
   * Reduces the principal of every deposit at `maturity` in proportion to its size. `loss` never exceeds the
   * pool's `supplied`.
   *
   * @returns the loss actually charged, rounding dust excluded.
   */
  private chargeDepositors(maturity: number, pool: Pool, loss: bigint) {
    const { supplied } = pool;
    if (loss === 0n || supplied === 0n) return 0n;

    let charged = 0n;
    for (const [owner, position] of this.storage.fixedDepositPositions.get(maturity) ?? []) {
      const share = mulDivDown(loss, position.principal, supplied);
      position.principal -= share;
      charged += share;
      if (position.principal === 0n && position.fee === 0n) {
        const account = this.account(owner);
        account.fixedDeposits = clearMaturity(account.fixedDeposits, maturity);
        this.storage.fixedDepositPositions.get(maturity)?.delete(owner);
      }
    }
    pool.supplied -= charged;
    return charged;
  }

  private internalSeize(repayMarket: string, liquidator: string, borrower: string, assets: bigint) {
    if (assets === 0n) throw new ZeroWithdraw();
    this.links.auditor.checkSeize(this.address, repayMarket);

    const shares = this.previewWithdraw(assets);
    this.takeAssets(assets);
    this.burnShares(borrower, shares);
    this.emit("Withdraw", { caller: this.sender, receiver: liquidator, owner: borrower, assets, shares });
    this.emit("Seize", { liquidator, borrower, assets });
    this.push(liquidator, assets);
  }

  private exit(assets: bigint, shares: bigint, receiver: string, owner: string) {
    if (this.sender !== owner) this.spendShares(owner, shares);
    this.links.auditor.checkShortfall(this.address, owner, assets);
    this.takeAssets(assets);
    this.burnShares(owner, shares);
    this.emit("Withdraw", { caller: this.sender, receiver, owner, assets, shares });
    this.push(receiver, assets);
  }

  /** Removes `assets` from the smart pool, which must still cover every outstanding borrow. */
  private takeAssets(assets: bigint) {
    const { smartPoolFixedBorrows, flexibleDebt } = this.storage;
    const newAssets = this.storage.smartPoolAssets - assets;
    if (smartPoolFixedBorrows + flexibleDebt > newAssets) throw new InsufficientProtocolLiquidity();
    this.storage.smartPoolAssets = newAssets;
  }

  private checkReserve(borrows: bigint) {
    const { smartPoolAssets, reserveFactor } = this.storage;
    if (borrows > smartPoolAssets) throw new InsufficientProtocolLiquidity();
    if (borrows > mulWadDown(smartPoolAssets, WAD - reserveFactor)) throw new SmartPoolReserveExceeded();
  }

  private checkPoolState(maturity: number, required: State, alternative = State.NONE) {
    const state = getPoolState(maturity, this.chain.timestamp, this.storage.maxFuturePools);
    if (state === required || state === alternative) return;
    if (alternative === State.NONE) throw new UnmatchedPoolState(state, required);
    throw new UnmatchedPoolStates(state, required, alternative);
  }

  /** Operations on behalf of another account spend its share allowance, valued at the current share price. */
  private spendAllowance(account: string, assets: bigint) {
    if (this.sender !== account) this.spendShares(account, this.previewWithdraw(assets));
  }

  private spendShares(owner: string, shares: bigint) {
    const allowed = this.allowance(owner, this.sender);
    if (allowed === MaxUint256) return;
    if (allowed < shares) throw new InsufficientAllowance(owner, this.sender, shares);
    this.storage.allowances.get(owner)?.set(this.sender, allowed - shares);
  }

  private mintShares(to: string, shares: bigint) {
    this.storage.totalSupply += shares;
    this.storage.balances.set(to, this.balanceOf(to) + shares);
    this.emit("Transfer", { from: ZeroAddress, to, amount: shares });
  }

  private burnShares(from: string, shares: bigint) {
    const balance = this.balanceOf(from);
    if (balance < shares) throw new InsufficientBalance(from, shares);
    this.storage.balances.set(from, balance - shares);
    this.storage.totalSupply -= shares;
    this.emit("Transfer", { from, to: ZeroAddress, amount: shares });
  }

  private moveShares(from: string, to: string, shares: bigint) {
    const balance = this.balanceOf(from);
    if (balance < shares) throw new InsufficientBalance(from, shares);
    this.storage.balances.set(from, balance - shares);
    this.storage.balances.set(to, this.balanceOf(to) + shares);
    this.emit("Transfer", { from, to, amount: shares });
  }

  private pull(assets: bigint) {
    this.links.asset.connect(this.address).transferFrom(this.sender, this.address, assets);
  }

  private push(to: string, assets: bigint) {
    this.links.asset.connect(this.address).transfer(to, assets);
  }

  private rateModel() {
    const model = this.links.interestRateModels.get(this.storage.interestRateModel);
    if (!model) throw new InvalidInterestRateModel(this.storage.interestRateModel);
    return model;
  }

  private pool(maturity: number) {
    let pool = this.storage.fixedPools.get(maturity);
    if (!pool) {
      pool = emptyPool(this.chain.timestamp);
      this.storage.fixedPools.set(maturity, pool);
    }
    return pool;
  }

  private account(account: string) {
    let data = this.storage.accounts.get(account);
    if (!data) {
      data = { fixedDeposits: 0n, fixedBorrows: 0n, flexibleBorrowShares: 0n };
      this.storage.accounts.set(account, data);
    }
    return data;
  }

  private position(positions: Map<number, Map<string, Position>>, maturity: number, account: string) {
    let accounts = positions.get(maturity);
    if (!accounts) {
      accounts = new Map();
      positions.set(maturity, accounts);
    }
    let position = accounts.get(account);
    if (!position) {
      position = { principal: 0n, fee: 0n };
      accounts.set(account, position);
    }
    return position;
  }

  // #endregion
}

export { InsufficientProtocolLiquidity };

export class TooMuchSlippage extends CustomError {
  constructor(assets: bigint, limit: bigint) {
    super([assets, limit]);
  }
}

export class SmartPoolReserveExceeded extends CustomError {}

export class ZeroDeposit extends CustomError {}

export class ZeroWithdraw extends CustomError {}

export class ZeroBorrow extends CustomError {}

export class ZeroRepay extends CustomError {}

export class SelfLiquidation extends CustomError {}

export class NotAuditor extends CustomError {
  constructor(account: string) {
    super([account]);
  }
}

export class UnmatchedPoolState extends CustomError {
  constructor(state: State, required: State) {
    super([state, required]);
  }
}

export class UnmatchedPoolStates extends CustomError {
  constructor(state: State, required: State, alternative: State) {
    super([state, required, alternative]);
  }
}

export class InvalidInterestRateModel extends CustomError {
  constructor(interestRateModel: string) {
    super([interestRateModel]);
  }
}
