import { Auditor } from "../contracts/Auditor";
import type { DeployFunction } from "./.utils/deployments";

const func: DeployFunction = ({ chain, finance: { liquidationIncentive }, namedAccounts: { deployer }, deployments }) => {
  deployments.auditor = Auditor.deploy(chain, deployments.oracle, liquidationIncentive, deployer);
};

func.tags = ["Auditor"];
func.dependencies = ["MockOracle"];

export default func;
