import { describe, expect, test } from "vitest";
import {
  networksByTier,
  networksWithTraces,
  resolveNetworkToName,
  resolveNetworkToNumber,
  SUPPORTED_NETWORKS,
  supportedNetworkIds,
  validateNetwork,
} from "./networks.js";

describe("network lookup", () => {
  test("names resolve to chain ids, case-insensitively", () => {
    expect(resolveNetworkToNumber("Optimism")).toBe("10");
    expect(resolveNetworkToNumber("ethereum mainnet")).toBe("1");
    expect(resolveNetworkToNumber(" 137 ")).toBe("137");
  });

  test("chain ids resolve to names", () => {
    expect(resolveNetworkToName("1")).toBe("Ethereum Mainnet");
    expect(resolveNetworkToName("137")).toBe("Polygon");
  });

  test("unknown values pass through unchanged", () => {
    expect(resolveNetworkToNumber("my-devnet")).toBe("my-devnet");
    expect(resolveNetworkToName("999999")).toBe("999999");
    expect(resolveNetworkToName("Optimism")).toBe("Optimism");
  });

  test("validateNetwork returns the entry or throws", () => {
    expect(validateNetwork(1)).toEqual({
      networkId: 1,
      name: "Ethereum Mainnet",
      rpcUrl: "https://eth.hypersync.xyz",
      tier: "gold",
      supportsTraces: true,
    });
    expect(() => validateNetwork(999999)).toThrow("Unsupported network ID: 999999");
  });

  test("table queries", () => {
    expect(supportedNetworkIds()).toHaveLength(SUPPORTED_NETWORKS.size);
    expect(supportedNetworkIds()).toContain(42161);
    expect(networksWithTraces().map((n) => n.networkId)).toEqual([1, 100, 204]);
    expect(networksByTier("gold")).toHaveLength(17);
    expect(networksByTier("gold").every((n) => n.tier === "gold")).toBe(true);
  });
});
