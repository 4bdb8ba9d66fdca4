import { describe, expect, test } from "vitest";
import path from "path";
import {
  abiFilePath,
  applyAdvance,
  downPresses,
  normalizeAddress,
  planResponse,
} from "./response-planner.js";
import { KEYS } from "./terminal-session.js";
import { deployment, explorerContract, localContract } from "../test-utils/fake-wizard.js";
import type { ContractConfig } from "../types.js";
import type { Cursor, PromptKind, PromptKindName } from "./types.js";

const context = { projectDir: "/work/indexer" };
const start: Cursor = { contractIndex: 0, deploymentIndex: 0 };
const prompt = (kind: PromptKindName): PromptKind => ({ kind });

describe("add another contract", () => {
  test("same network next: one move down, next deployment", () => {
    const contracts = [localContract("Token", [deployment("1", "0xa"), deployment("1", "0xb")])];

    const planned = planResponse(prompt("add_another_contract"), start, contracts, context);

    expect(planned.action).toEqual({ type: "press_keys", value: [KEYS.DOWN] });
    expect(planned.advance).toBe("next_deployment");
  });

  test("network names and ids that resolve to the same chain count as the same network", () => {
    const contracts = [
      localContract("Token", [deployment("Optimism", "0xa"), deployment("10", "0xb")]),
    ];

    const planned = planResponse(prompt("add_another_contract"), start, contracts, context);

    expect(downPresses(planned.action)).toBe(1);
  });

  test("different network next: two moves down", () => {
    const contracts = [localContract("Token", [deployment("1", "0xa"), deployment("10", "0xb")])];

    const planned = planResponse(prompt("add_another_contract"), start, contracts, context);

    expect(planned.action).toEqual({ type: "press_keys", value: [KEYS.DOWN, KEYS.DOWN] });
    expect(planned.advance).toBe("next_deployment");
  });

  test("deployments exhausted with another contract: three moves down, next contract", () => {
    const contracts = [
      localContract("Token", [deployment("1", "0xa")]),
      localContract("Vault", [deployment("1", "0xc")]),
    ];

    const planned = planResponse(prompt("add_another_contract"), start, contracts, context);

    expect(downPresses(planned.action)).toBe(3);
    expect(planned.advance).toBe("next_contract");
  });

  test("everything exhausted: plain Enter, no advance", () => {
    const contracts = [localContract("Token", [deployment("1", "0xa")])];

    const planned = planResponse(prompt("add_another_contract"), start, contracts, context);

    expect(planned).toEqual({ action: { type: "press_enter" } });
    expect(downPresses(planned.action)).toBe(0);
  });

  test("two contracts, same-network pair then one deployment: offsets 1, 3, 0", () => {
    const contracts = [
      localContract("Token", [deployment("1", "0xa"), deployment("1", "0xb")]),
      localContract("Bridge", [deployment("10", "0xc")]),
    ];
    let cursor = start;
    const offsets: number[] = [];

    for (let i = 0; i < 3; i++) {
      const planned = planResponse(prompt("add_another_contract"), cursor, contracts, context);
      offsets.push(downPresses(planned.action));
      if (planned.advance) cursor = applyAdvance(cursor, planned.advance, contracts);
    }

    expect(offsets).toEqual([1, 3, 0]);
    expect(cursor).toEqual({ contractIndex: 1, deploymentIndex: 0 });
  });
});

describe("field prompts", () => {
  const contracts: ContractConfig[] = [
    localContract("Token", [
      deployment("Optimism", "AbCd", { startBlock: 120, rpcUrl: "https://rpc.example" }),
    ]),
    explorerContract("Pool", [deployment("1", "0x1234", { proxyAddress: "5678" })]),
  ];
  const second: Cursor = { contractIndex: 1, deploymentIndex: 0 };

  test("folder name is the current directory", () => {
    expect(planResponse(prompt("folder_name"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: ".",
    });
  });

  test.each<PromptKindName>(["language", "event_selection", "network_choice"])(
    "%s accepts the default",
    (kind) => {
      expect(planResponse(prompt(kind), start, contracts, context).action).toEqual({
        type: "press_enter",
      });
    }
  );

  test("abi path points into abis/", () => {
    expect(planResponse(prompt("abi_path"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: path.join("/work/indexer", "abis", "Token_abi.json"),
    });
  });

  test("import source: local ABI is one down, explorer is the default", () => {
    expect(planResponse(prompt("import_source"), start, contracts, context).action).toEqual({
      type: "press_keys",
      value: [KEYS.DOWN],
    });
    expect(planResponse(prompt("import_source"), second, contracts, context).action).toEqual({
      type: "press_enter",
    });
  });

  test("inferred sources take the explorer default", () => {
    const inferred: ContractConfig[] = [
      { name: "Lens", source: { kind: "inferred" }, deployments: [deployment("1", "0x1")] },
    ];

    expect(planResponse(prompt("import_source"), start, inferred, context).action).toEqual({
      type: "press_enter",
    });
  });

  test("network id is typed as a chain id, blockchain list filter as a name", () => {
    expect(planResponse(prompt("network_id"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: "10",
    });
    expect(planResponse(prompt("blockchain_from_list"), second, contracts, context).action).toEqual({
      type: "type_text",
      value: "Ethereum Mainnet",
    });
  });

  test("address is 0x-prefixed; proxy address is preferred", () => {
    expect(planResponse(prompt("contract_address"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: "0xAbCd",
    });
    expect(planResponse(prompt("contract_address"), second, contracts, context).action).toEqual({
      type: "type_text",
      value: "0x5678",
    });
  });

  test("rpc url and start block come from the deployment", () => {
    expect(planResponse(prompt("rpc_url"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: "https://rpc.example",
    });
    expect(planResponse(prompt("start_block"), start, contracts, context).action).toEqual({
      type: "type_text",
      value: "120",
    });
    expect(planResponse(prompt("start_block"), second, contracts, context).action).toEqual({
      type: "press_enter",
    });
  });

  test("api token: skip without a token, add existing with one", () => {
    expect(downPresses(planResponse(prompt("api_token"), start, contracts, context).action)).toBe(2);

    const withToken = { ...context, apiToken: "test-token" };
    expect(downPresses(planResponse(prompt("api_token"), start, contracts, withToken).action)).toBe(1);
    expect(planResponse(prompt("api_token_value"), start, contracts, withToken).action).toEqual({
      type: "type_text",
      value: "test-token",
    });
  });

  test.each<PromptKindName>(["template_ready", "final_done"])("%s finishes", (kind) => {
    expect(planResponse(prompt(kind), start, contracts, context)).toEqual({
      action: { type: "finish", success: true },
    });
  });

  test("unrecognized prompts get Enter", () => {
    const unknown: PromptKind = { kind: "unrecognized", text: "? Enable telemetry?" };

    expect(planResponse(unknown, start, contracts, context).action).toEqual({
      type: "press_enter",
    });
  });
});

describe("single explorer contract walkthrough", () => {
  test("answers every prompt in order", () => {
    const contracts = [explorerContract("Greeter", [deployment("1", "c0ffee")])];
    const sequence: PromptKindName[] = [
      "folder_name",
      "language",
      "event_selection",
      "import_source",
      "contract_name",
      "network_id",
      "contract_address",
      "add_another_contract",
      "template_ready",
    ];

    const actions = sequence.map((kind) => planResponse(prompt(kind), start, contracts, context).action);

    expect(actions).toEqual([
      { type: "type_text", value: "." },
      { type: "press_enter" },
      { type: "press_enter" },
      { type: "press_enter" },
      { type: "type_text", value: "Greeter" },
      { type: "type_text", value: "1" },
      { type: "type_text", value: "0xc0ffee" },
      { type: "press_enter" },
      { type: "finish", success: true },
    ]);
  });
});

describe("normalizeAddress", () => {
  test("prefixes bare addresses and leaves prefixed ones alone", () => {
    expect(normalizeAddress("AB12")).toBe("0xAB12");
    expect(normalizeAddress("0xAB12")).toBe("0xAB12");
    expect(normalizeAddress("0XAB12")).toBe("0xAB12");
  });

  test("is idempotent", () => {
    for (const address of ["ab", "0xab", " 0xAB ", "0X1"]) {
      const once = normalizeAddress(address);
      expect(normalizeAddress(once)).toBe(once);
    }
  });
});

describe("applyAdvance", () => {
  test("refuses to move past the contract list", () => {
    const contracts = [localContract("Token", [deployment("1", "0xa")])];

    expect(() => applyAdvance(start, "next_contract", contracts)).toThrow(
      "Cannot advance cursor to contract #1, deployment #0"
    );
  });

  test("abiFilePath uses the <name>_abi.json layout", () => {
    expect(abiFilePath("/p", "Vault")).toBe(path.join("/p", "abis", "Vault_abi.json"));
  });
});
