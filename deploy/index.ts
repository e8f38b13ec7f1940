import { dataSlice, getAddress, id } from "ethers";
import { Chain } from "../contracts/Chain";
import { CustomError } from "../contracts/utils/CustomError";
import loadConfig, { LOG_EVENTS, type FinanceConfig } from "../market.config";
import { Deployments, type DeployFunction, type NamedAccounts } from "./.utils/deployments";
import logEvents from "./.utils/logEvents";
import Assets from "./mocks/Assets";
import MockOracle from "./mocks/MockOracle";
import Auditor from "./Auditor";
import InterestRateModel from "./InterestRateModel";
import Markets from "./Markets";
import PriceFeeds from "./PriceFeeds";

export const functions: readonly DeployFunction[] = [Assets, MockOracle, Auditor, InterestRateModel, Markets, PriceFeeds];

/** Deterministic address for a labelled account. */
export const account = (name: string) => getAddress(dataSlice(id(name), 12));

export const namedAccounts: NamedAccounts = {
  deployer: account("deployer"),
  multisig: account("multisig"),
  treasury: account("treasury"),
};

export interface FixtureOptions {
  finance?: FinanceConfig;
  verbose?: boolean;
}

/** Deploys a fresh ledger running every function `tags` needs, dependencies first. */
export default function fixture(tags = ["PriceFeeds"], { finance = loadConfig(), verbose = LOG_EVENTS }: FixtureOptions = {}) {
  const chain = new Chain(finance.initialTimestamp);
  const deployments = new Deployments(namedAccounts, verbose);
  if (verbose) logEvents(chain, deployments);

  const done = new Set<DeployFunction>();
  const run = (tag: string, path: readonly string[]) => {
    if (path.includes(tag)) throw new CircularDependency([...path, tag].join(" > "));
    const matches = functions.filter(({ tags: funcTags }) => funcTags?.includes(tag));
    if (!matches.length) throw new UnknownTag(tag);
    for (const func of matches) {
      if (done.has(func)) continue;
      for (const dependency of func.dependencies ?? []) run(dependency, [...path, tag]);
      func({ chain, finance, namedAccounts, deployments });
      done.add(func);
    }
  };
  for (const tag of tags) run(tag, []);

  return { chain, finance, namedAccounts, deployments };
}

export class UnknownTag extends CustomError {
  constructor(tag: string) {
    super([tag]);
  }
}

export class CircularDependency extends CustomError {
  constructor(path: string) {
    super([path]);
  }
}
