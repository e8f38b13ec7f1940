import { formatUnits } from "ethers";
import { argv, exit } from "process";
import fixture from "../deploy";

async function main() {
  const tags = argv.slice(2);
  const { deployments } = fixture(tags.length ? tags : undefined, { verbose: true });

  for (const [symbol, market] of deployments.markets) {
    const { adjustFactor } = deployments.auditor.markets(market.address);
    console.log("%s market deployed to:", symbol, market.address, "adjust factor", formatUnits(adjustFactor));
  }
}

main()
  .then(() => exit(0))
  .catch((error: unknown) => {
    console.error(error);
    exit(1);
  });
