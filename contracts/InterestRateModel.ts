import type { Chain } from "./Chain";
import type { IInterestRateModel } from "./interfaces/IInterestRateModel";
import { Ownable } from "./utils/Contract";
import { CustomError } from "./utils/CustomError";
import { WAD, divWadDown, max, mulDivDown } from "./utils/FixedPointMath";

export const YEAR = 365 * 86_400;

/** `rate = a / (maxUtilization - utilization) + b`, yearly, 18 decimals. `b` may be negative. */
export interface Curve {
  a: bigint;
  b: bigint;
  maxUtilization: bigint;
}

export interface InterestRateModelStorage {
  owner: string;
  fixedCurve: Curve;
  flexibleCurve: Curve;
}

export type InterestRateModelEvents = {
  FixedParametersSet: { a: bigint; b: bigint; maxUtilization: bigint };
  FlexibleParametersSet: { a: bigint; b: bigint; maxUtilization: bigint };
};

export class InterestRateModel
  extends Ownable<InterestRateModelStorage, InterestRateModelEvents>
  implements IInterestRateModel
{
  static deploy(chain: Chain, fixedCurve: Curve, flexibleCurve: Curve, from: string) {
    InterestRateModel.validate(fixedCurve);
    InterestRateModel.validate(flexibleCurve);
    const storage = chain.track<InterestRateModelStorage>({
      owner: from,
      fixedCurve: { ...fixedCurve },
      flexibleCurve: { ...flexibleCurve },
    });
    return new InterestRateModel(chain, chain.deployAddress(from), storage, from);
  }

  connect(account: string) {
    return new InterestRateModel(this.chain, this.address, this.storage, account);
  }

  get fixedCurve(): Readonly<Curve> {
    return { ...this.storage.fixedCurve };
  }

  get flexibleCurve(): Readonly<Curve> {
    return { ...this.storage.flexibleCurve };
  }

  /**
   * Utilization is measured against whichever source offers more liquidity: the maturity's own deposits or the
   * smart pool's average assets. The yearly rate is prorated to the time left until maturity.
   */
  getRateToBorrow(maturity: number, timestamp: number, borrowed: bigint, suppliedMP: bigint, suppliedSP: bigint) {
    if (maturity <= timestamp) throw new InvalidTimeDifference(maturity, timestamp);

    const liquidity = max(suppliedMP, suppliedSP);
    if (liquidity === 0n) throw new InsufficientProtocolLiquidity();

    const yearlyRate = curveRate(this.storage.fixedCurve, divWadDown(borrowed, liquidity));
    return mulDivDown(yearlyRate, BigInt(maturity - timestamp), BigInt(YEAR));
  }

  getFlexibleBorrowRate(utilization: bigint) {
    return curveRate(this.storage.flexibleCurve, utilization);
  }

  setCurves(fixedCurve: Curve, flexibleCurve: Curve) {
    this.chain.transaction(() => {
      this.onlyOwner();
      InterestRateModel.validate(fixedCurve);
      InterestRateModel.validate(flexibleCurve);
      this.storage.fixedCurve = { ...fixedCurve };
      this.storage.flexibleCurve = { ...flexibleCurve };
      this.emit("FixedParametersSet", { ...fixedCurve });
      this.emit("FlexibleParametersSet", { ...flexibleCurve });
    });
  }

  private static validate({ a, b, maxUtilization }: Curve) {
    if (maxUtilization <= WAD) throw new InvalidCurve("maxUtilization", maxUtilization);
    // the rate at zero utilization must not be negative
    if (divWadDown(a, maxUtilization) + b < 0n) throw new InvalidCurve("b", b);
  }
}

function curveRate({ a, b, maxUtilization }: Curve, utilization: bigint) {
  if (utilization >= maxUtilization) throw new InsufficientProtocolLiquidity();
  return divWadDown(a, maxUtilization - utilization) + b;
}

export class InvalidTimeDifference extends CustomError {
  constructor(maturity: number, timestamp: number) {
    super([maturity, timestamp]);
  }
}

export class InsufficientProtocolLiquidity extends CustomError {}

export class InvalidCurve extends CustomError {
  constructor(parameter: string, value: bigint) {
    super([parameter, value]);
  }
}
