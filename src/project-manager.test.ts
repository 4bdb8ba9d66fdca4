import { describe, expect, test } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { IndexerProjectManager, ProjectStateError, type ProjectManagerOptions } from "./project-manager.js";
import { ImportError } from "./wizard/index.js";
import { deployment, FakeWizard } from "./test-utils/fake-wizard.js";
import type { FetchFn } from "./abi-resolver.js";
import type { ContractConfig } from "./types.js";

const poolAbi = [{ type: "event", name: "Swap", inputs: [] }];

function setup(overrides: Partial<ProjectManagerOptions> = {}) {
  const baseDir = fs.mkdtempSync(path.join(os.tmpdir(), "indexers-"));
  const wizards: FakeWizard[] = [];
  const fetched: string[] = [];
  const fetchFn: FetchFn = async (url) => {
    fetched.push(url);
    return new Response(JSON.stringify({ status: "1", message: "OK", result: JSON.stringify(poolAbi) }));
  };

  const manager = new IndexerProjectManager(baseDir, {
    envioBin: "envio",
    explorerFallbackUrl: "http://explorer.test/api",
    readTimeoutMs: 1,
    pollDelayMs: 1,
    maxIdleReads: 5,
    spawnSession: (_command, _args, options) => {
      const wizard = new FakeWizard({ artifactDir: options.cwd });
      wizards.push(wizard);
      return wizard;
    },
    fetchFn,
    ...overrides,
  });
  return { baseDir, manager, wizards, fetched };
}

const contracts: ContractConfig[] = [
  {
    name: "Token",
    source: { kind: "abi", abi: '{"abi": []}' },
    deployments: [deployment("1", "0xa")],
  },
  {
    name: "Pool",
    source: { kind: "explorer", apiUrl: "" },
    deployments: [deployment("10", "0xb")],
  },
];

describe("IndexerProjectManager", () => {
  test("initProject writes ABIs and runs the wizard in the project directory", async () => {
    const { baseDir, manager, wizards, fetched } = setup();

    const project = await manager.initProject("demo", contracts);

    const dir = path.join(baseDir, "demo");
    expect(project).toEqual({ id: "demo", dir, process: null });
    expect(fs.readFileSync(path.join(dir, "abis", "Token_abi.json"), "utf-8")).toBe("[]");
    expect(fs.readFileSync(path.join(dir, "abis", "Pool_abi.json"), "utf-8")).toBe(
      JSON.stringify(poolAbi, null, 2)
    );
    expect(fetched).toEqual(["http://explorer.test/api"]);
    expect(wizards).toHaveLength(1);
    expect(wizards[0].accepted.map((e) => [e.name, e.networkId, e.address])).toEqual([
      ["Token", "1", "0xa"],
      ["Pool", "10", "0xb"],
    ]);
    expect(fs.existsSync(path.join(dir, "config.yaml"))).toBe(true);
  });

  test("initProject fails when the wizard leaves no config.yaml", async () => {
    const { manager } = setup({ spawnSession: () => new FakeWizard() });

    const promise = manager.initProject("empty", contracts);

    await expect(promise).rejects.toBeInstanceOf(ImportError);
    await expect(promise).rejects.toThrow("config.yaml");
  });

  test("initProject needs contracts", async () => {
    const { manager } = setup();

    await expect(manager.initProject("none", [])).rejects.toThrow(
      "No contracts provided for initialization"
    );
  });

  test("initProject keeps the project and ABI files inside the base directory", async () => {
    const { baseDir, manager, wizards } = setup();
    const escaping: ContractConfig[] = [{ ...contracts[0], name: "../Token" }];

    await expect(manager.initProject("../outside", contracts)).rejects.toThrow(
      '"../outside" cannot be used as a file name'
    );
    await expect(manager.initProject("demo", escaping)).rejects.toBeInstanceOf(ProjectStateError);
    expect(fs.existsSync(path.join(baseDir, "..", "outside"))).toBe(false);
    expect(wizards).toEqual([]);
  });

  test("runCodegen refuses an uninitialized project", async () => {
    const { baseDir, manager } = setup();
    const project = { id: "raw", dir: path.join(baseDir, "raw"), process: null };

    const promise = manager.runCodegen(project);

    await expect(promise).rejects.toBeInstanceOf(ProjectStateError);
    await expect(promise).rejects.toThrow(
      "config.yaml not found. Project may not be properly initialized"
    );
  });

  test("a project without a dev process is not healthy and stops as a no-op", async () => {
    const { baseDir, manager } = setup();
    const project = { id: "idle", dir: baseDir, process: null };

    expect(manager.checkHealth(project)).toBe(false);
    await expect(manager.stopDev(project)).resolves.toBeUndefined();
  });
});
