import type { Auditor } from "../../contracts/Auditor";
import type { Chain } from "../../contracts/Chain";
import type { InterestRateModel } from "../../contracts/InterestRateModel";
import type { Market } from "../../contracts/Market";
import type { MockERC20 } from "../../contracts/mocks/MockERC20";
import type { MockOracle } from "../../contracts/mocks/MockOracle";
import { CustomError } from "../../contracts/utils/CustomError";
import type { FinanceConfig } from "../../market.config";

export interface NamedAccounts {
  deployer: string;
  multisig: string;
  treasury: string;
}

export interface DeployEnvironment {
  chain: Chain;
  finance: FinanceConfig;
  namedAccounts: NamedAccounts;
  deployments: Deployments;
}

export interface DeployFunction {
  (environment: DeployEnvironment): void;
  tags?: string[];
  dependencies?: string[];
}

/** Registry of everything a fixture deployed, by name. */
export class Deployments {
  readonly assets = new Map<string, MockERC20>();
  readonly interestRateModels = new Map<string, InterestRateModel>();
  readonly markets = new Map<string, Market>();

  #oracle?: MockOracle;
  #auditor?: Auditor;
  readonly #names = new Map<string, string>();

  constructor(
    namedAccounts: NamedAccounts,
    readonly verbose = false,
  ) {
    for (const [name, address] of Object.entries(namedAccounts)) this.#names.set(address, name);
  }

  get oracle() {
    if (!this.#oracle) throw new DeploymentNotFound("MockOracle");
    return this.#oracle;
  }

  set oracle(oracle: MockOracle) {
    this.#oracle = this.save("MockOracle", oracle);
  }

  get auditor() {
    if (!this.#auditor) throw new DeploymentNotFound("Auditor");
    return this.#auditor;
  }

  set auditor(auditor: Auditor) {
    this.#auditor = this.save("Auditor", auditor);
  }

  save<T extends { readonly address: string }>(name: string, contract: T) {
    this.#names.set(contract.address, name);
    this.log(`deployed "${name}" at ${contract.address}`);
    return contract;
  }

  get<T>(deployments: ReadonlyMap<string, T>, name: string) {
    const contract = deployments.get(name);
    if (!contract) throw new DeploymentNotFound(name);
    return contract;
  }

  /** Deployment or named account behind `address`. */
  nameOf(address: string) {
    return this.#names.get(address);
  }

  log(...args: unknown[]) {
    if (this.verbose) console.log(...args);
  }
}

export class DeploymentNotFound extends CustomError {
  constructor(name: string) {
    super([name]);
  }
}
