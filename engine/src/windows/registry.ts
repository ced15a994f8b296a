/**
 * c2r-deploy Engine — Registry Access
 *
 * Reads the Click-to-Run configuration key and the Windows Uninstall keys.
 * Everything here is read-only; this tool never writes to the registry.
 *
 * Registry access goes through a RegistryReader so inventory detection can be
 * exercised without reg.exe. The production reader shells out to
 * `reg query` and parses its text output.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import { channelFromCdnUrl, isProductId } from "../products";
import { InstalledInventory, Platform, ProductId } from "../types";
import { Logger } from "../utils/logger";
import { RegistryKey, RegistryValue } from "./types";

const execFileAsync = promisify(execFile);

export const CLICK_TO_RUN_CONFIG_KEY =
  "HKLM\\SOFTWARE\\Microsoft\\Office\\ClickToRun\\Configuration";

/**
 * Well-known registry paths where Windows tracks installed software.
 */
export const UNINSTALL_KEYS = [
  "HKLM\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
  "HKLM\\Software\\Wow6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
  "HKCU\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall",
];

export interface RegistryReader {
  /**
   * Read `key` (and its subkeys when `recursive`). Resolves an empty list
   * when the key does not exist.
   */
  query(key: string, recursive?: boolean): Promise<RegistryKey[]>;
}

// ─── reg.exe Output Parsing ────────────────────────────────────

const VALUE_LINE = /^\s+(.+?)\s{4}(REG_[A-Z_]+)(?:\s{4}(.*))?$/;

/**
 * Parse the text printed by `reg query`.
 *
 * Key lines start at column 0 with the hive name; value lines are indented
 * and separated into name, type and data by runs of four spaces.
 */
export function parseRegQueryOutput(output: string): RegistryKey[] {
  const keys: RegistryKey[] = [];
  let current: RegistryKey | null = null;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.replace(/\s+$/, "");
    if (!line) continue;

    if (/^HKEY_/i.test(line)) {
      current = { path: line, values: [] };
      keys.push(current);
      continue;
    }

    const match = line.match(VALUE_LINE);
    if (match && current) {
      current.values.push({
        name: match[1],
        type: match[2],
        data: match[3] ?? "",
      });
    }
  }

  return keys;
}

export class RegExeRegistryReader implements RegistryReader {
  constructor(private readonly logger: Logger) {}

  async query(key: string, recursive = false): Promise<RegistryKey[]> {
    const args = ["query", key];
    if (recursive) args.push("/s");

    try {
      const { stdout } = await execFileAsync("reg", args, {
        windowsHide: true,
        maxBuffer: 64 * 1024 * 1024,
      });
      return parseRegQueryOutput(stdout);
    } catch (err: unknown) {
      // reg.exe exits 1 when the key does not exist
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.debug({ key, error: msg }, "Registry key not readable");
      return [];
    }
  }
}

// ─── Lookups ───────────────────────────────────────────────────

export function findValue(
  values: RegistryValue[],
  name: string,
): string | undefined {
  const wanted = name.toLowerCase();
  return values.find((v) => v.name.toLowerCase() === wanted)?.data;
}

function parsePlatform(value: string | undefined): Platform | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "x64") return "x64";
  if (normalized === "x86") return "x86";
  return undefined;
}

/**
 * Read the current Click-to-Run inventory: installed release ids, platform
 * and update channel. A machine without Click-to-Run yields an empty
 * inventory.
 */
export async function readInventory(
  reader: RegistryReader,
  logger: Logger,
): Promise<InstalledInventory> {
  const keys = await reader.query(CLICK_TO_RUN_CONFIG_KEY);
  const values = keys[0]?.values ?? [];

  const products: ProductId[] = [];
  const unrecognized: string[] = [];
  const releaseIds = findValue(values, "ProductReleaseIds") ?? "";

  for (const raw of releaseIds.split(",")) {
    const id = raw.trim();
    if (!id) continue;
    if (isProductId(id)) {
      if (!products.includes(id)) products.push(id);
    } else if (!unrecognized.includes(id)) {
      unrecognized.push(id);
    }
  }

  const cdnBaseUrl = findValue(values, "CDNBaseUrl");
  const inventory: InstalledInventory = {
    products,
    platform: parsePlatform(findValue(values, "Platform")),
    channel: cdnBaseUrl ? channelFromCdnUrl(cdnBaseUrl) : undefined,
    cdn_base_url: cdnBaseUrl,
    unrecognized,
  };

  logger.info(
    {
      products: inventory.products,
      platform: inventory.platform,
      channel: inventory.channel,
    },
    products.length > 0
      ? "Click-to-Run installation detected"
      : "No Click-to-Run installation detected",
  );
  if (unrecognized.length > 0) {
    logger.warn(
      { releaseIds: unrecognized },
      "Installed release ids outside the product catalog will not be carried over",
    );
  }

  return inventory;
}

/**
 * List the display names of installed applications from the Uninstall keys.
 *
 * @param filter - Optional case-insensitive substring the name must contain
 */
export async function listInstalledApplications(
  reader: RegistryReader,
  filter?: string,
): Promise<string[]> {
  const names: string[] = [];
  const needle = filter?.toLowerCase();

  for (const key of UNINSTALL_KEYS) {
    const subkeys = await reader.query(key, true);
    for (const sub of subkeys) {
      const name = findValue(sub.values, "DisplayName");
      if (!name) continue;
      if (needle && !name.toLowerCase().includes(needle)) continue;
      if (!names.includes(name)) names.push(name);
    }
  }

  return names;
}
