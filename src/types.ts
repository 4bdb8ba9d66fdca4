/**
 * Indexer input types
 *
 * These describe the contracts a caller wants indexed and where each one is
 * deployed. The list is supplied once per import run and never mutated.
 */

/** Where the wizard should get a contract's ABI from */
export type ContractSource =
  | { kind: "abi"; abi?: string; url?: string }
  | { kind: "explorer"; apiUrl: string }
  | { kind: "inferred" };

/** One address of a contract on one network */
export interface ContractDeployment {
  /** Numeric chain id ("1") or network name ("Ethereum Mainnet") */
  networkId: string;
  address: string;
  rpcUrl: string;
  proxyAddress?: string;
  startBlock?: number;
}

export interface ContractConfig {
  name: string;
  source: ContractSource;
  /** Ordered, never empty */
  deployments: ContractDeployment[];
}

export interface IndexerConfig {
  name: string;
  contracts: ContractConfig[];
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

/**
 * Names end up as directory and file names, so they must stay one path segment
 */
export function isSafePathSegment(value: string): boolean {
  return !/[\\/]/.test(value) && !value.includes("..");
}

function requireSafeName(value: string, where: string): string {
  if (!isSafePathSegment(value)) {
    throw new ConfigValidationError(`${where} must not contain path separators or ".."`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  where: string
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigValidationError(`${where}.${key} must be a string`);
  }
  return value;
}

function requiredString(
  record: Record<string, unknown>,
  key: string,
  where: string
): string {
  const value = optionalString(record, key, where);
  if (value === undefined || value.trim() === "") {
    throw new ConfigValidationError(`${where}.${key} is required`);
  }
  return value;
}

function parseSource(value: unknown, where: string): ContractSource {
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${where} must be an object`);
  }

  switch (value.kind) {
    case "abi": {
      const abi = optionalString(value, "abi", where);
      const url = optionalString(value, "url", where);
      if (abi === undefined && url === undefined) {
        throw new ConfigValidationError(`${where} needs either "abi" or "url"`);
      }
      return { kind: "abi", abi, url };
    }
    case "explorer":
      return { kind: "explorer", apiUrl: optionalString(value, "apiUrl", where) ?? "" };
    case "inferred":
      return { kind: "inferred" };
    default:
      throw new ConfigValidationError(
        `${where}.kind must be one of "abi", "explorer", "inferred"`
      );
  }
}

function parseDeployment(value: unknown, where: string): ContractDeployment {
  if (!isRecord(value)) {
    throw new ConfigValidationError(`${where} must be an object`);
  }

  const networkId =
    typeof value.networkId === "number"
      ? String(value.networkId)
      : requiredString(value, "networkId", where);

  const startBlock = value.startBlock;
  if (
    startBlock !== undefined &&
    startBlock !== null &&
    !(typeof startBlock === "number" && Number.isInteger(startBlock) && startBlock >= 0)
  ) {
    throw new ConfigValidationError(`${where}.startBlock must be a non-negative integer`);
  }

  return {
    networkId,
    address: requiredString(value, "address", where),
    rpcUrl: optionalString(value, "rpcUrl", where) ?? "",
    proxyAddress: optionalString(value, "proxyAddress", where),
    startBlock: typeof startBlock === "number" ? startBlock : undefined,
  };
}

/**
 * Validate untrusted JSON into an IndexerConfig.
 * Name must be non-empty, at least one contract, every contract has deployments.
 */
export function validateIndexerConfig(value: unknown): IndexerConfig {
  if (!isRecord(value)) {
    throw new ConfigValidationError("Indexer config must be an object");
  }

  const name = optionalString(value, "name", "config") ?? "";
  if (name.trim() === "") {
    throw new ConfigValidationError("Indexer name cannot be empty");
  }
  requireSafeName(name, "config.name");

  const rawContracts = value.contracts;
  if (!Array.isArray(rawContracts) || rawContracts.length === 0) {
    throw new ConfigValidationError("At least one contract configuration is required");
  }

  const contracts = rawContracts.map((raw: unknown, i): ContractConfig => {
    const where = `contracts[${i}]`;
    if (!isRecord(raw)) {
      throw new ConfigValidationError(`${where} must be an object`);
    }
    const contractName = requireSafeName(requiredString(raw, "name", where), `${where}.name`);
    const rawDeployments = raw.deployments;
    if (!Array.isArray(rawDeployments) || rawDeployments.length === 0) {
      throw new ConfigValidationError(`Contract ${contractName} has no deployments`);
    }

    return {
      name: contractName,
      source: parseSource(raw.source, `${where}.source`),
      deployments: rawDeployments.map((d: unknown, j) =>
        parseDeployment(d, `${where}.deployments[${j}]`)
      ),
    };
  });

  return { name, contracts };
}
