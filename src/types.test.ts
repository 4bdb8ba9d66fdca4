import { describe, expect, test } from "vitest";
import { ConfigValidationError, isSafePathSegment, validateIndexerConfig } from "./types.js";

const validContract = {
  name: "Token",
  source: { kind: "explorer" },
  deployments: [{ networkId: 1, address: "0xabc" }],
};

describe("validateIndexerConfig", () => {
  test("fills defaults and stringifies numeric network ids", () => {
    const config = validateIndexerConfig({
      name: "my-indexer",
      contracts: [
        validContract,
        {
          name: "Vault",
          source: { kind: "abi", abi: "[]" },
          deployments: [
            {
              networkId: "Optimism",
              address: "0xdef",
              rpcUrl: "http://localhost:8545",
              proxyAddress: "0x123",
              startBlock: 42,
            },
          ],
        },
      ],
    });

    expect(config).toEqual({
      name: "my-indexer",
      contracts: [
        {
          name: "Token",
          source: { kind: "explorer", apiUrl: "" },
          deployments: [
            { networkId: "1", address: "0xabc", rpcUrl: "", proxyAddress: undefined, startBlock: undefined },
          ],
        },
        {
          name: "Vault",
          source: { kind: "abi", abi: "[]", url: undefined },
          deployments: [
            {
              networkId: "Optimism",
              address: "0xdef",
              rpcUrl: "http://localhost:8545",
              proxyAddress: "0x123",
              startBlock: 42,
            },
          ],
        },
      ],
    });
  });

  test.each<[unknown, string]>([
    [{ name: " ", contracts: [validContract] }, "Indexer name cannot be empty"],
    [{ name: "x", contracts: [] }, "At least one contract configuration is required"],
    [
      { name: "x", contracts: [{ ...validContract, deployments: [] }] },
      "Contract Token has no deployments",
    ],
    [{ name: "../escape", contracts: [validContract] }, 'config.name must not contain path separators or ".."'],
    [
      { name: "x", contracts: [{ ...validContract, name: "abis/../../Token" }] },
      'contracts[0].name must not contain path separators or ".."',
    ],
    [
      { name: "x", contracts: [{ ...validContract, name: "sub\\Token" }] },
      'contracts[0].name must not contain path separators or ".."',
    ],
    [
      { name: "x", contracts: [{ ...validContract, deployments: [{ networkId: 1 }] }] },
      "contracts[0].deployments[0].address is required",
    ],
    [
      { name: "x", contracts: [{ ...validContract, source: { kind: "abi" } }] },
      'contracts[0].source needs either "abi" or "url"',
    ],
    [
      { name: "x", contracts: [{ ...validContract, source: { kind: "magic" } }] },
      'contracts[0].source.kind must be one of "abi", "explorer", "inferred"',
    ],
    [
      {
        name: "x",
        contracts: [
          { ...validContract, deployments: [{ networkId: 1, address: "0x1", startBlock: -1 }] },
        ],
      },
      "contracts[0].deployments[0].startBlock must be a non-negative integer",
    ],
  ])("rejects invalid input (%#)", (input, message) => {
    expect(() => validateIndexerConfig(input)).toThrow(ConfigValidationError);
    expect(() => validateIndexerConfig(input)).toThrow(message);
  });

  test("rejects non-objects", () => {
    expect(() => validateIndexerConfig([])).toThrow("Indexer config must be an object");
  });

  test("isSafePathSegment allows plain names only", () => {
    expect(isSafePathSegment("Token_v2.final")).toBe(true);
    expect(isSafePathSegment("..")).toBe(false);
    expect(isSafePathSegment("a/b")).toBe(false);
  });
});
