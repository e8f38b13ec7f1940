import { MockERC20 } from "../../contracts/mocks/MockERC20";
import type { DeployFunction } from "../.utils/deployments";

const func: DeployFunction = ({ chain, finance: { markets }, namedAccounts: { deployer }, deployments }) => {
  for (const [symbol, { decimals }] of Object.entries(markets)) {
    if (deployments.assets.has(symbol)) continue;
    deployments.assets.set(symbol, deployments.save(symbol, MockERC20.deploy(chain, symbol, symbol, decimals, deployer)));
  }
};

func.tags = ["Assets"];

export default func;
