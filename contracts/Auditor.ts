import { MaxUint256, ZeroAddress } from "ethers";
import type { Chain } from "./Chain";
import type { IOracle } from "./interfaces/IOracle";
import { Ownable } from "./utils/Contract";
import { CustomError } from "./utils/CustomError";
import { WAD, divWadDown, divWadUp, min, mulDivDown, mulDivUp, mulWadDown, mulWadUp } from "./utils/FixedPointMath";

/** What the auditor reads from, and asks of, the markets it governs. */
export interface AuditedMarket {
  readonly address: string;
  connect(account: string): AuditedMarket;
  accountSnapshot(account: string): [bigint, bigint];
  maxWithdraw(owner: string): bigint;
  clearBadDebt(borrower: string): void;
}

export interface MarketData {
  adjustFactor: bigint;
  decimals: number;
  index: number;
  isListed: boolean;
}

export interface LiquidationIncentive {
  liquidator: bigint;
  lenders: bigint;
}

export interface AuditorStorage {
  owner: string;
  oracle: string;
  liquidationIncentive: LiquidationIncentive;
  markets: Map<string, MarketData>;
  marketList: string[];
  accountMarkets: Map<string, bigint>;
}

/** Contract references; kept outside storage so they survive a rollback untouched. */
interface AuditorLinks {
  oracles: Map<string, IOracle>;
  markets: Map<string, AuditedMarket>;
}

export type AuditorEvents = {
  MarketListed: { market: string; decimals: number };
  MarketEntered: { market: string; account: string };
  MarketExited: { market: string; account: string };
  AdjustFactorSet: { market: string; adjustFactor: bigint };
  LiquidationIncentiveSet: { liquidator: bigint; lenders: bigint };
  OracleSet: { oracle: string };
};

export class Auditor extends Ownable<AuditorStorage, AuditorEvents> {
  static deploy(chain: Chain, oracle: IOracle, liquidationIncentive: LiquidationIncentive, from: string) {
    validateIncentive(liquidationIncentive);
    const storage = chain.track<AuditorStorage>({
      owner: from,
      oracle: oracle.address,
      liquidationIncentive: { ...liquidationIncentive },
      markets: new Map(),
      marketList: [],
      accountMarkets: new Map(),
    });
    const links: AuditorLinks = { oracles: new Map([[oracle.address, oracle]]), markets: new Map() };
    return new Auditor(chain, chain.deployAddress(from), storage, links, from);
  }

  private constructor(
    chain: Chain,
    address: string,
    storage: AuditorStorage,
    private readonly links: AuditorLinks,
    sender: string,
  ) {
    super(chain, address, storage, sender);
  }

  connect(account: string) {
    return new Auditor(this.chain, this.address, this.storage, this.links, account);
  }

  get oracle() {
    return this.storage.oracle;
  }

  get liquidationIncentive(): Readonly<LiquidationIncentive> {
    return { ...this.storage.liquidationIncentive };
  }

  markets(market: string): Readonly<MarketData> {
    const data = this.storage.markets.get(market);
    return data ? { ...data } : { adjustFactor: 0n, decimals: 0, index: 0, isListed: false };
  }

  allMarkets() {
    return [...this.storage.marketList];
  }

  /** Bitmap of the markets `account` entered, bit `i` standing for `allMarkets()[i]`. */
  accountMarkets(account: string) {
    return this.storage.accountMarkets.get(account) ?? 0n;
  }

  assetPrice(market: string) {
    const price = this.oracleContract().price(market);
    if (price <= 0n) throw new InvalidPrice(market);
    return price;
  }

  /**
   * Sums, across every market entered by `account`, the collateral scaled down and the debt scaled up by each
   * market's adjust factor, in USD. When `marketToSimulate` is given, `withdrawAmount` of its collateral is
   * counted as debt so the caller can tell whether that withdrawal leaves the account solvent.
   */
  accountLiquidity(account: string, marketToSimulate: string = ZeroAddress, withdrawAmount = 0n): [bigint, bigint] {
    let sumCollateral = 0n;
    let sumDebtPlusEffects = 0n;
    for (const market of this.enteredMarkets(account)) {
      const { adjustFactor, decimals } = this.listed(market.address);
      const baseUnit = 10n ** BigInt(decimals);
      const price = this.assetPrice(market.address);
      const [balance, borrowBalance] = market.accountSnapshot(account);

      sumCollateral += mulWadDown(mulDivDown(balance, price, baseUnit), adjustFactor);
      sumDebtPlusEffects += divWadUp(mulDivUp(borrowBalance, price, baseUnit), adjustFactor);
      if (market.address === marketToSimulate) {
        sumDebtPlusEffects += mulWadDown(mulDivDown(withdrawAmount, price, baseUnit), adjustFactor);
      }
    }
    return [sumCollateral, sumDebtPlusEffects];
  }

  enableMarket(market: AuditedMarket, adjustFactor: bigint, decimals: number) {
    this.chain.transaction(() => {
      this.onlyOwner();
      if (this.storage.markets.get(market.address)?.isListed) throw new MarketAlreadyListed(market.address);
      validateAdjustFactor(adjustFactor);

      this.storage.markets.set(market.address, {
        adjustFactor,
        decimals,
        index: this.storage.marketList.length,
        isListed: true,
      });
      this.storage.marketList.push(market.address);
      this.links.markets.set(market.address, market);
      this.emit("MarketListed", { market: market.address, decimals });
      this.emit("AdjustFactorSet", { market: market.address, adjustFactor });
    });
  }

  enterMarket(market: string) {
    this.chain.transaction(() => {
      const { index } = this.listed(market);
      if (hasBit(this.accountMarkets(this.sender), index)) return;
      this.addMarket(market, index, this.sender);
    });
  }

  exitMarket(market: string) {
    this.chain.transaction(() => {
      const { index } = this.listed(market);
      const marketMap = this.accountMarkets(this.sender);
      if (!hasBit(marketMap, index)) return;

      const [assets, debt] = this.marketContract(market).accountSnapshot(this.sender);
      if (debt !== 0n) throw new RemainingDebt(market, debt);
      this.checkShortfall(market, this.sender, assets);

      this.storage.accountMarkets.set(this.sender, marketMap & ~(1n << BigInt(index)));
      this.emit("MarketExited", { market, account: this.sender });
    });
  }

  /** Enters `borrower` into `market` when the market itself asks, then requires the account to stay solvent. */
  checkBorrow(market: string, borrower: string) {
    this.chain.transaction(() => {
      const { index } = this.listed(market);
      if (!hasBit(this.accountMarkets(borrower), index)) {
        if (this.sender !== market) throw new NotMarket(this.sender);
        this.addMarket(market, index, borrower);
      }

      const [collateral, debt] = this.accountLiquidity(borrower);
      if (debt > collateral) throw new InsufficientLiquidity(borrower, collateral, debt);
    });
  }

  checkShortfall(market: string, account: string, amount: bigint) {
    const { index } = this.listed(market);
    if (!hasBit(this.accountMarkets(account), index)) return;

    const [collateral, debt] = this.accountLiquidity(account, market, amount);
    if (debt > collateral) throw new InsufficientLiquidity(account, collateral, debt);
  }

  /**
   * Largest amount, in `repayMarket` assets, a liquidator may repay for `borrower`: the whole debt, bounded by the
   * collateral available in `seizeMarket` once incentives are paid out of it, and by `maxLiquidatorAssets` net of
   * the lenders' incentive the liquidator pays on top.
   */
  checkLiquidation(repayMarket: string, seizeMarket: string, borrower: string, maxLiquidatorAssets: bigint) {
    this.listed(repayMarket);
    this.listed(seizeMarket);

    let totalDebt = 0n;
    let adjustedDebt = 0n;
    let adjustedCollateral = 0n;
    let seizeAvailable = 0n;
    for (const market of this.enteredMarkets(borrower)) {
      const { adjustFactor, decimals } = this.listed(market.address);
      const baseUnit = 10n ** BigInt(decimals);
      const price = this.assetPrice(market.address);
      const [collateral, debt] = market.accountSnapshot(borrower);

      const debtValue = mulDivUp(debt, price, baseUnit);
      totalDebt += debtValue;
      adjustedDebt += divWadUp(debtValue, adjustFactor);

      const collateralValue = mulDivDown(collateral, price, baseUnit);
      adjustedCollateral += mulWadDown(collateralValue, adjustFactor);
      if (market.address === seizeMarket) seizeAvailable = collateralValue;
    }
    if (adjustedCollateral >= adjustedDebt) throw new InsufficientShortfall(borrower);

    const { liquidator, lenders } = this.storage.liquidationIncentive;
    const { decimals } = this.listed(repayMarket);
    const maxRepayAssets = mulDivUp(
      min(totalDebt, divWadUp(seizeAvailable, WAD + liquidator + lenders)),
      10n ** BigInt(decimals),
      this.assetPrice(repayMarket),
    );
    return min(
      maxRepayAssets,
      maxLiquidatorAssets < MaxUint256 ? divWadDown(maxLiquidatorAssets, WAD + lenders) : MaxUint256,
    );
  }

  /** @returns the lenders' incentive, in `repayMarket` assets, and the assets to seize from `seizeMarket`. */
  calculateSeize(repayMarket: string, seizeMarket: string, borrower: string, actualRepayAssets: bigint): [bigint, bigint] {
    const repay = this.listed(repayMarket);
    const seize = this.listed(seizeMarket);
    const { liquidator, lenders } = this.storage.liquidationIncentive;

    const baseAmount = mulDivUp(actualRepayAssets, this.assetPrice(repayMarket), 10n ** BigInt(repay.decimals));
    const lendersAssets = mulWadDown(actualRepayAssets, lenders);
    const seizeAssets = min(
      mulWadUp(
        mulDivUp(baseAmount, 10n ** BigInt(seize.decimals), this.assetPrice(seizeMarket)),
        WAD + liquidator + lenders,
      ),
      this.marketContract(seizeMarket).maxWithdraw(borrower),
    );
    return [lendersAssets, seizeAssets];
  }

  checkSeize(seizeMarket: string, repayMarket: string) {
    this.listed(seizeMarket);
    this.listed(repayMarket);
  }

  /** Clears every debt of `account` in all its markets once no collateral value is left in any of them. */
  handleBadDebt(account: string) {
    this.chain.transaction(() => {
      const markets = this.enteredMarkets(account);
      for (const market of markets) {
        const { adjustFactor, decimals } = this.listed(market.address);
        const assets = market.maxWithdraw(account);
        const value = mulDivDown(assets, this.assetPrice(market.address), 10n ** BigInt(decimals));
        if (mulWadDown(value, adjustFactor) > 0n) return;
      }
      for (const market of markets) market.connect(this.address).clearBadDebt(account);
    });
  }

  setAdjustFactor(market: string, adjustFactor: bigint) {
    this.chain.transaction(() => {
      this.onlyOwner();
      const data = this.listed(market);
      validateAdjustFactor(adjustFactor);
      data.adjustFactor = adjustFactor;
      this.emit("AdjustFactorSet", { market, adjustFactor });
    });
  }

  setLiquidationIncentive(liquidationIncentive: LiquidationIncentive) {
    this.chain.transaction(() => {
      this.onlyOwner();
      validateIncentive(liquidationIncentive);
      this.storage.liquidationIncentive = { ...liquidationIncentive };
      this.emit("LiquidationIncentiveSet", { ...liquidationIncentive });
    });
  }

  setOracle(oracle: IOracle) {
    this.chain.transaction(() => {
      this.onlyOwner();
      this.links.oracles.set(oracle.address, oracle);
      this.storage.oracle = oracle.address;
      this.emit("OracleSet", { oracle: oracle.address });
    });
  }

  private listed(market: string) {
    const data = this.storage.markets.get(market);
    if (!data?.isListed) throw new MarketNotListed(market);
    return data;
  }

  private addMarket(market: string, index: number, account: string) {
    this.storage.accountMarkets.set(account, this.accountMarkets(account) | (1n << BigInt(index)));
    this.emit("MarketEntered", { market, account });
  }

  private enteredMarkets(account: string) {
    const marketMap = this.accountMarkets(account);
    return this.storage.marketList
      .filter((_, i) => hasBit(marketMap, i))
      .map((market) => this.marketContract(market));
  }

  private marketContract(market: string) {
    const contract = this.links.markets.get(market);
    if (!contract) throw new MarketNotListed(market);
    return contract;
  }

  private oracleContract() {
    const oracle = this.links.oracles.get(this.storage.oracle);
    if (!oracle) throw new InvalidPrice(this.storage.oracle);
    return oracle;
  }
}

function hasBit(map: bigint, index: number) {
  return ((map >> BigInt(index)) & 1n) === 1n;
}

function validateAdjustFactor(adjustFactor: bigint) {
  if (adjustFactor > 900_000_000_000_000_000n || adjustFactor < 250_000_000_000_000_000n) {
    throw new InvalidParameter("adjustFactor", adjustFactor);
  }
}

function validateIncentive({ liquidator, lenders }: LiquidationIncentive) {
  if (liquidator > 200_000_000_000_000_000n || liquidator < 0n) throw new InvalidParameter("liquidator", liquidator);
  if (lenders > 100_000_000_000_000_000n || lenders < 0n) throw new InvalidParameter("lenders", lenders);
}

export class MarketNotListed extends CustomError {
  constructor(market: string) {
    super([market]);
  }
}

export class MarketAlreadyListed extends CustomError {
  constructor(market: string) {
    super([market]);
  }
}

export class InsufficientShortfall extends CustomError {
  constructor(account: string) {
    super([account]);
  }
}

export class RemainingDebt extends CustomError {
  constructor(market: string, debt: bigint) {
    super([market, debt]);
  }
}

export class InvalidPrice extends CustomError {
  constructor(market: string) {
    super([market]);
  }
}

export class NotMarket extends CustomError {
  constructor(account: string) {
    super([account]);
  }
}

export class InsufficientLiquidity extends CustomError {
  constructor(account: string, collateral: bigint, debt: bigint) {
    super([account, collateral, debt]);
  }
}

export class InvalidParameter extends CustomError {
  constructor(parameter: string, value: bigint) {
    super([parameter, value]);
  }
}
