/**
 * c2r-deploy Engine — Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here — never from internal modules.
 */

// Main engine class
export { DeploymentEngine, verifySupportFiles } from "./engine";
export type {
  EngineOptions,
  EngineCollaborators,
  DetectionReport,
} from "./engine";

// All types
export type {
  // Product types
  ProductId,
  ProductFamily,
  LicenseTier,
  ProductInfo,
  SubstitutionRule,
  Platform,
  Channel,

  // Inventory & reconciliation types
  InstalledInventory,
  DeploymentTarget,
  MigrationFlags,
  ReconcileResult,
  LegacyVersionTag,
  LegacyVersionInfo,

  // Deployment types
  DeploymentType,
  DeployMode,
  DeploymentPhase,
  DeploymentRequest,
  DeploymentResult,
  ProcessFailure,
  ErrorCategory,

  // Event types
  EngineEvent,
  EngineEventType,
  EngineEventHandler,
  PhaseChange,
} from "./types";

// Catalog & reconciliation
export {
  PRODUCT_CATALOG,
  PRODUCT_IDS,
  SUBSTITUTION_RULES,
  CHANNELS,
  CHANNEL_CDN_URLS,
  isProductId,
  isChannel,
  parseProductId,
  getProduct,
  channelFromCdnUrl,
} from "./products";
export { reconcile, computeMigrationFlags } from "./reconciler";

// Legacy removal
export {
  LEGACY_VERSIONS,
  CLICK_TO_RUN_REMOVAL_SCRIPT,
  detectLegacy,
  removeLegacy,
  removeClickToRun,
  shouldRemoveClickToRun,
  getLegacyVersion,
} from "./legacy";
export type { RemovalOptions } from "./legacy";

// Configuration document
export {
  buildInstallConfiguration,
  buildUninstallConfiguration,
  renderConfiguration,
  writeConfiguration,
} from "./configuration";
export type {
  ConfigurationDocument,
  ConfigurationProduct,
} from "./configuration";

// Settings
export { loadSettings, parseSettings, DeploymentSettingsSchema } from "./settings";
export type { DeploymentSettings } from "./settings";

// Errors
export { DeploymentError, exitCodeForError } from "./errors";

// Utilities (exposed for CLI use)
export {
  resolveVariables,
  getResolvedVariables,
} from "./utils/variables";
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";

// Windows plumbing (exposed for advanced use / testing)
export {
  readInventory,
  listInstalledApplications,
  parseRegQueryOutput,
  RegExeRegistryReader,
  CLICK_TO_RUN_CONFIG_KEY,
  UNINSTALL_KEYS,
  SpawnProcessRunner,
  formatCommand,
  lookupExitCode,
  isRebootCode,
  EXIT_CODES,
  EXIT_GENERIC_FAILURE,
  EXIT_BOOTSTRAP_FAILURE,
  EXIT_USER_CANCELLED,
  EXIT_LAUNCH_FAILURE,
} from "./windows";

export type {
  RegistryReader,
  ProcessRunner,
  ExitCodeInfo,
  RegistryKey,
  RegistryValue,
} from "./windows";
