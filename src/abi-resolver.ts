import chalk from "chalk";
import type { ContractSource } from "./types.js";

export class AbiFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AbiFetchError";
  }
}

export type FetchFn = (url: string) => Promise<Response>;

export interface AbiResolverOptions {
  /** Explorer endpoint used when a contract does not name its own */
  explorerFallbackUrl: string;
  fetchFn?: FetchFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Accept a bare ABI array or a build artifact with an `abi` field.
 * Returns the ABI re-serialized as a pretty JSON array.
 */
export function normalizeAbi(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new AbiFetchError("ABI is not valid JSON", { cause: error });
  }

  const abi = isRecord(parsed) ? parsed.abi : parsed;
  if (!Array.isArray(abi)) {
    throw new AbiFetchError("ABI must be a JSON array (or an artifact with an abi array)");
  }
  return JSON.stringify(abi, null, 2);
}

/**
 * Explorer APIs answer `{ status, message, result }` with the ABI as a
 * string in `result`; anything else is taken to be the ABI itself.
 */
function unwrapExplorerResponse(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (!isRecord(parsed) || !("result" in parsed) || !("status" in parsed)) {
    return body;
  }
  if (parsed.status !== "1" || typeof parsed.result !== "string") {
    const reason = typeof parsed.result === "string" ? parsed.result : String(parsed.message);
    throw new AbiFetchError(`Explorer returned no ABI: ${reason}`);
  }
  return parsed.result;
}

async function fetchText(url: string, fetchFn: FetchFn): Promise<string> {
  let response: Response;
  try {
    response = await fetchFn(url);
  } catch (error) {
    throw new AbiFetchError(`Failed to fetch ABI from ${url}`, { cause: error });
  }
  if (!response.ok) {
    throw new AbiFetchError(`Failed to fetch ABI from ${url}: HTTP ${response.status}`);
  }
  return response.text();
}

/**
 * Get the ABI text for a contract source.
 * Resolves null for inferred sources: the wizard looks those up itself.
 */
export async function resolveAbi(
  source: ContractSource,
  options: AbiResolverOptions
): Promise<string | null> {
  const fetchFn = options.fetchFn ?? fetch;

  switch (source.kind) {
    case "abi":
      if (source.abi !== undefined) return normalizeAbi(source.abi);
      if (source.url !== undefined) {
        console.log(chalk.gray(`  Fetching ABI from ${source.url}`));
        return normalizeAbi(await fetchText(source.url, fetchFn));
      }
      throw new AbiFetchError("No ABI source provided");

    case "explorer": {
      const url = source.apiUrl || options.explorerFallbackUrl;
      console.log(chalk.gray(`  Fetching ABI from explorer ${url}`));
      return normalizeAbi(unwrapExplorerResponse(await fetchText(url, fetchFn)));
    }

    case "inferred":
      return null;
  }
}
