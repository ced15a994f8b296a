/**
 * c2r-deploy Engine — Windows Pipeline Types
 *
 * Shared types for the registry, process and exit-code modules.
 */

// ─── Exit Codes ────────────────────────────────────────────────

export interface ExitCodeInfo {
  code: number;
  name: string;
  category:
    | "success"
    | "reboot"
    | "cancelled"
    | "busy"
    | "fatal"
    | "script"
    | "unknown";
  message: string;
  /** Whether this code still counts as a successful deployment */
  ok: boolean;
}

/** Generic failure, used for any unexpected exception. */
export const EXIT_GENERIC_FAILURE = 60001;
/** A support file or the settings could not be loaded. */
export const EXIT_BOOTSTRAP_FAILURE = 60008;
/** The user declined the welcome prompt. */
export const EXIT_USER_CANCELLED = 1602;
/** Recorded when an external process could not be launched at all. */
export const EXIT_LAUNCH_FAILURE = -1;

/**
 * Exit codes returned by setup.exe, the removal scripts and this tool.
 * See: https://learn.microsoft.com/en-us/windows/win32/msi/error-codes
 */
export const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    category: "success",
    message: "Completed successfully.",
    ok: true,
  },
  [EXIT_LAUNCH_FAILURE]: {
    code: EXIT_LAUNCH_FAILURE,
    name: "LAUNCH_FAILURE",
    category: "fatal",
    message: "The process could not be started.",
    ok: false,
  },
  1602: {
    code: 1602,
    name: "ERROR_INSTALL_USEREXIT",
    category: "cancelled",
    message: "The deployment was cancelled by the user.",
    ok: false,
  },
  1603: {
    code: 1603,
    name: "ERROR_INSTALL_FAILURE",
    category: "fatal",
    message: "Fatal error during installation. Check the setup log for details.",
    ok: false,
  },
  1618: {
    code: 1618,
    name: "ERROR_INSTALL_ALREADY_RUNNING",
    category: "busy",
    message: "Another installation is already in progress.",
    ok: false,
  },
  1641: {
    code: 1641,
    name: "ERROR_SUCCESS_REBOOT_INITIATED",
    category: "reboot",
    message: "Completed. A system restart was initiated.",
    ok: true,
  },
  3010: {
    code: 3010,
    name: "ERROR_SUCCESS_REBOOT_REQUIRED",
    category: "reboot",
    message: "Completed. A system restart is required.",
    ok: true,
  },
  17002: {
    code: 17002,
    name: "ODT_PROCESS_FAILED",
    category: "fatal",
    message:
      "setup.exe failed to complete. An Office application may be open " +
      "or the source files may be missing.",
    ok: false,
  },
  17004: {
    code: 17004,
    name: "ODT_CONTENT_UNAVAILABLE",
    category: "fatal",
    message: "Requested products or languages are not available in the source.",
    ok: false,
  },
  [EXIT_GENERIC_FAILURE]: {
    code: EXIT_GENERIC_FAILURE,
    name: "DEPLOY_GENERIC_FAILURE",
    category: "script",
    message: "The deployment failed with an unexpected error.",
    ok: false,
  },
  [EXIT_BOOTSTRAP_FAILURE]: {
    code: EXIT_BOOTSTRAP_FAILURE,
    name: "DEPLOY_BOOTSTRAP_FAILURE",
    category: "script",
    message: "Required support files or settings could not be loaded.",
    ok: false,
  },
};

/**
 * Look up an exit code. Returns a structured description.
 */
export function lookupExitCode(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      category: "unknown" as const,
      message: `Unrecognised exit code: ${code}`,
      ok: false,
    }
  );
}

export function isRebootCode(code: number): boolean {
  return code === 3010 || code === 1641;
}

// ─── Registry ──────────────────────────────────────────────────

export interface RegistryValue {
  name: string;
  type: string;
  data: string;
}

export interface RegistryKey {
  /** Full key path as printed by reg.exe */
  path: string;
  values: RegistryValue[];
}
