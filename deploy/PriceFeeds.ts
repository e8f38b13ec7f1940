import { formatUnits } from "ethers";
import type { DeployFunction } from "./.utils/deployments";

const func: DeployFunction = ({ finance: { markets }, namedAccounts: { deployer }, deployments }) => {
  const oracle = deployments.oracle.connect(deployer);
  for (const [symbol, { price }] of Object.entries(markets)) {
    const { address } = deployments.get(deployments.markets, symbol);
    if (oracle.price(address) === price) continue;

    deployments.log("setting price", symbol, formatUnits(price));
    oracle.setPrice(address, price);
  }
};

func.tags = ["PriceFeeds"];
func.dependencies = ["Markets"];

export default func;
