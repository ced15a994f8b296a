/**
 * c2r-deploy Engine — Test Doubles
 *
 * In-process stand-ins for the registry and for external processes.
 */

import type { ProcessRunner } from "../src/windows/process";
import type { RegistryReader } from "../src/windows/registry";
import { CLICK_TO_RUN_CONFIG_KEY, UNINSTALL_KEYS } from "../src/windows/registry";
import type { RegistryKey, RegistryValue } from "../src/windows/types";

export class FakeRegistry implements RegistryReader {
  readonly queries: string[] = [];

  constructor(private readonly keys: Record<string, RegistryKey[]> = {}) {}

  async query(key: string): Promise<RegistryKey[]> {
    this.queries.push(key);
    return this.keys[key] ?? [];
  }
}

export interface FakeC2R {
  products?: string;
  platform?: string;
  cdnBaseUrl?: string;
  /** Display names placed under the first Uninstall key */
  applications?: string[];
}

/**
 * Registry contents for a machine with the given Click-to-Run state.
 */
export function fakeMachine(state: FakeC2R = {}): FakeRegistry {
  const keys: Record<string, RegistryKey[]> = {};

  const values: RegistryValue[] = [];
  if (state.platform !== undefined) {
    values.push({ name: "Platform", type: "REG_SZ", data: state.platform });
  }
  if (state.cdnBaseUrl !== undefined) {
    values.push({ name: "CDNBaseUrl", type: "REG_SZ", data: state.cdnBaseUrl });
  }
  if (state.products !== undefined) {
    values.push({
      name: "ProductReleaseIds",
      type: "REG_SZ",
      data: state.products,
    });
  }
  if (values.length > 0) {
    keys[CLICK_TO_RUN_CONFIG_KEY] = [
      {
        path: "HKEY_LOCAL_MACHINE\\SOFTWARE\\Microsoft\\Office\\ClickToRun\\Configuration",
        values,
      },
    ];
  }

  if (state.applications) {
    keys[UNINSTALL_KEYS[0]] = state.applications.map((name, i) => ({
      path: `HKEY_LOCAL_MACHINE\\Software\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\App${i}`,
      values: [{ name: "DisplayName", type: "REG_SZ", data: name }],
    }));
  }

  return new FakeRegistry(keys);
}

export interface RecordedCall {
  file: string;
  args: string[];
}

/**
 * Records every call. `exitCodeFor` picks the exit code per call; a thrown
 * error from it is rethrown from execute().
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly exitCodeFor: (call: RecordedCall) => number = () => 0,
  ) {}

  async execute(file: string, args: string[]): Promise<number> {
    const call = { file, args: [...args] };
    this.calls.push(call);
    return this.exitCodeFor(call);
  }
}

/** Name of the removal script a cscript.exe call ran, if any. */
export function scriptOf(call: RecordedCall): string | undefined {
  if (call.file !== "cscript.exe") return undefined;
  return call.args[1]?.split(/[\\/]/).pop();
}
