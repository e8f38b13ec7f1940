import { inspect } from "util";
import { isAddress } from "ethers";
import type { Deployments } from "./deployments";

inspect.defaultOptions.depth = null;

export default function format(v: unknown, deployments: Deployments): unknown {
  if (typeof v === "string" && isAddress(v)) return deployments.nameOf(v) ?? v;

  if (Array.isArray(v)) return v.map((v_: unknown) => format(v_, deployments));

  if (v && typeof v === "object") {
    return Object.fromEntries(Object.entries(v).map(([k, v_]) => [k, format(v_, deployments)]));
  }

  return v;
}
