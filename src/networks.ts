import fs from "fs";
import { fileURLToPath } from "url";

export type NetworkTier =
  | "development"
  | "experimental"
  | "bronze"
  | "silver"
  | "gold";

export interface NetworkInfo {
  networkId: number;
  name: string;
  /** HyperSync endpoint */
  rpcUrl: string;
  tier: NetworkTier;
  supportsTraces: boolean;
}

const TIERS: readonly NetworkTier[] = [
  "development",
  "experimental",
  "bronze",
  "silver",
  "gold",
];

const NETWORKS_FILE = fileURLToPath(
  new URL("../data/networks.json", import.meta.url)
);

function isTier(value: unknown): value is NetworkTier {
  return typeof value === "string" && TIERS.some((tier) => tier === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function loadNetworks(file: string): Map<number, NetworkInfo> {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
  const entries: unknown = isRecord(parsed) ? parsed.networks : undefined;
  if (!Array.isArray(entries)) {
    throw new Error(`Invalid network table: ${file}`);
  }

  const networks = new Map<number, NetworkInfo>();
  const list: unknown[] = entries;
  for (const entry of list) {
    if (!isRecord(entry)) {
      throw new Error(`Invalid network entry in ${file}: ${JSON.stringify(entry)}`);
    }
    const { networkId, name, hypersync, tier, supportsTraces } = entry;
    if (
      typeof networkId !== "number" ||
      typeof name !== "string" ||
      typeof hypersync !== "string" ||
      !isTier(tier)
    ) {
      throw new Error(`Invalid network entry in ${file}: ${JSON.stringify(entry)}`);
    }
    networks.set(networkId, {
      networkId,
      name,
      rpcUrl: `https://${hypersync}.hypersync.xyz`,
      tier,
      supportsTraces: supportsTraces === true,
    });
  }
  return networks;
}

export const SUPPORTED_NETWORKS: ReadonlyMap<number, NetworkInfo> =
  loadNetworks(NETWORKS_FILE);

function parseNumericId(networkId: string): number | null {
  const trimmed = networkId.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

/**
 * "Optimism" -> "10". Numeric ids and unknown names are returned unchanged.
 */
export function resolveNetworkToNumber(networkId: string): string {
  const numeric = parseNumericId(networkId);
  if (numeric !== null) return String(numeric);

  const wanted = networkId.trim().toLowerCase();
  for (const info of SUPPORTED_NETWORKS.values()) {
    if (info.name.toLowerCase() === wanted) {
      return String(info.networkId);
    }
  }
  return networkId;
}

/**
 * "10" -> "Optimism". Names and unknown ids are returned unchanged.
 */
export function resolveNetworkToName(networkId: string): string {
  const numeric = parseNumericId(networkId);
  if (numeric !== null) {
    const info = SUPPORTED_NETWORKS.get(numeric);
    if (info) return info.name;
  }
  return networkId;
}

export function validateNetwork(networkId: number): NetworkInfo {
  const info = SUPPORTED_NETWORKS.get(networkId);
  if (!info) {
    throw new Error(`Unsupported network ID: ${networkId}`);
  }
  return info;
}

export function supportedNetworkIds(): number[] {
  return Array.from(SUPPORTED_NETWORKS.keys());
}

export function networksWithTraces(): NetworkInfo[] {
  return Array.from(SUPPORTED_NETWORKS.values()).filter(
    (network) => network.supportsTraces
  );
}

export function networksByTier(tier: NetworkTier): NetworkInfo[] {
  return Array.from(SUPPORTED_NETWORKS.values()).filter(
    (network) => network.tier === tier
  );
}
