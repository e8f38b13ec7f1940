import { MockOracle } from "../../contracts/mocks/MockOracle";
import type { DeployFunction } from "../.utils/deployments";

const func: DeployFunction = ({ chain, namedAccounts: { deployer }, deployments }) => {
  deployments.oracle = MockOracle.deploy(chain, deployer);
};

func.tags = ["MockOracle"];

export default func;
