/**
 * c2r-deploy Engine — Windows Plumbing (Barrel Export)
 *
 * Registry access, process execution and exit codes re-exported
 * from a single entry point.
 */

// Registry access (read-only)
export {
  readInventory,
  listInstalledApplications,
  parseRegQueryOutput,
  findValue,
  RegExeRegistryReader,
  CLICK_TO_RUN_CONFIG_KEY,
  UNINSTALL_KEYS,
  type RegistryReader,
} from "./registry";

// External processes
export {
  SpawnProcessRunner,
  formatCommand,
  type ProcessRunner,
} from "./process";

// Shared types
export {
  lookupExitCode,
  isRebootCode,
  EXIT_CODES,
  EXIT_GENERIC_FAILURE,
  EXIT_BOOTSTRAP_FAILURE,
  EXIT_USER_CANCELLED,
  EXIT_LAUNCH_FAILURE,
  type ExitCodeInfo,
  type RegistryKey,
  type RegistryValue,
} from "./types";
