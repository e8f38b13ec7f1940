import "dotenv/config";
import { readFileSync } from "fs";
import { join } from "path";
import { env } from "process";
import { parseUnits } from "ethers";
import { parse } from "yaml";
import type { Curve } from "./contracts/InterestRateModel";
import { CustomError } from "./contracts/utils/CustomError";

export const DEFAULT_CONFIG = join(__dirname, "config", "finance.yml");

export const LOG_EVENTS = !!JSON.parse(env.LOG_EVENTS ?? "false");

export interface InterestRateModelConfig {
  fixedCurve: Curve;
  flexibleCurve: Curve;
}

export interface MarketConfig {
  adjustFactor: bigint;
  decimals: number;
  /** usd, 18 decimals. */
  price: bigint;
  interestRateModel: InterestRateModelConfig;
}

export interface FinanceConfig {
  initialTimestamp: number;
  treasuryFeeRate: bigint;
  liquidationIncentive: { liquidator: bigint; lenders: bigint };
  /** per second. */
  penaltyRate: bigint;
  backupFeeRate: bigint;
  reserveFactor: bigint;
  dampSpeed: { up: bigint; down: bigint };
  futurePools: number;
  earningsAccumulatorSmoothFactor: bigint;
  markets: Record<string, MarketConfig>;
}

type Raw = Record<string, unknown>;

export default function loadConfig(path = env.FINANCE_CONFIG || DEFAULT_CONFIG): FinanceConfig {
  return parseConfig(parse(readFileSync(path, "utf8")));
}

export function parseConfig(document: unknown): FinanceConfig {
  const finance = record("finance", document);
  const liquidationIncentive = record("liquidationIncentive", finance.liquidationIncentive);
  const dampSpeed = record("dampSpeed", finance.dampSpeed);
  const baseModel = record("interestRateModel", finance.interestRateModel);
  const initialDate = text("initialDate", finance.initialDate);
  const initialTimestamp = Math.floor(Date.parse(initialDate) / 1_000);
  if (Number.isNaN(initialTimestamp)) throw new InvalidConfig("initialDate", initialDate);

  return {
    initialTimestamp,
    treasuryFeeRate: fixed("treasuryFeeRate", finance.treasuryFeeRate ?? 0),
    liquidationIncentive: {
      liquidator: fixed("liquidationIncentive.liquidator", liquidationIncentive.liquidator),
      lenders: fixed("liquidationIncentive.lenders", liquidationIncentive.lenders),
    },
    penaltyRate: fixed("penaltyRatePerDay", finance.penaltyRatePerDay) / 86_400n,
    backupFeeRate: fixed("backupFeeRate", finance.backupFeeRate),
    reserveFactor: fixed("reserveFactor", finance.reserveFactor),
    dampSpeed: { up: fixed("dampSpeed.up", dampSpeed.up), down: fixed("dampSpeed.down", dampSpeed.down) },
    futurePools: integer("futurePools", finance.futurePools),
    earningsAccumulatorSmoothFactor: fixed("earningsAccumulatorSmoothFactor", finance.earningsAccumulatorSmoothFactor),
    markets: Object.fromEntries(
      Object.entries(record("markets", finance.markets)).map(([symbol, value]) => {
        const { adjustFactor, decimals, price, interestRateModel = {} } = record(`markets.${symbol}`, value);
        const model = record(`markets.${symbol}.interestRateModel`, interestRateModel);
        const envPrice = env[`${symbol}_PRICE`];
        return [
          symbol,
          {
            adjustFactor: fixed(`markets.${symbol}.adjustFactor`, adjustFactor),
            decimals: integer(`markets.${symbol}.decimals`, decimals),
            price: fixed(`markets.${symbol}.price`, envPrice ?? price),
            interestRateModel: {
              fixedCurve: curve(`markets.${symbol}.fixedCurve`, {
                ...record("interestRateModel.fixedCurve", baseModel.fixedCurve),
                ...record(`markets.${symbol}.fixedCurve`, model.fixedCurve ?? {}),
              }),
              flexibleCurve: curve(`markets.${symbol}.flexibleCurve`, {
                ...record("interestRateModel.flexibleCurve", baseModel.flexibleCurve),
                ...record(`markets.${symbol}.flexibleCurve`, model.flexibleCurve ?? {}),
              }),
            },
          } satisfies MarketConfig,
        ] as const;
      }),
    ),
  };
}

function curve(path: string, { a, b, maxUtilization }: Raw): Curve {
  return {
    a: fixed(`${path}.a`, a),
    b: fixed(`${path}.b`, b),
    maxUtilization: fixed(`${path}.maxUtilization`, maxUtilization),
  };
}

function record(path: string, value: unknown): Raw {
  if (typeof value !== "object" || value === null || Array.isArray(value)) throw new InvalidConfig(path, value);
  return Object.fromEntries(Object.entries(value));
}

function text(path: string, value: unknown) {
  if (typeof value !== "string") throw new InvalidConfig(path, value);
  return value;
}

function integer(path: string, value: unknown) {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) throw new InvalidConfig(path, value);
  return value;
}

/** Decimal number or numeric string to 18 decimals fixed point. */
function fixed(path: string, value: unknown) {
  if (typeof value !== "number" && typeof value !== "string") throw new InvalidConfig(path, value);
  try {
    return parseUnits(String(value));
  } catch (error) {
    throw new InvalidConfig(path, value, error);
  }
}

export class InvalidConfig extends CustomError {
  constructor(path: string, value: unknown, cause?: unknown) {
    super([path, String(value)]);
    this.cause = cause;
  }
}
