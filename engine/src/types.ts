/**
 * c2r-deploy Engine — Core Type Definitions
 *
 * Products, inventory, reconciliation results and the deployment lifecycle.
 * The product and rule tables themselves live in ./products.
 */

// ─── Products ────────────────────────────────────────────────────

export type ProductId =
  | "O365ProPlusRetail"
  | "VisioStdXVolume"
  | "VisioProXVolume"
  | "VisioProRetail"
  | "ProjectStdXVolume"
  | "ProjectProXVolume"
  | "ProjectProRetail";

export type ProductFamily = "suite" | "visio" | "project";
export type LicenseTier = "volume" | "retail-subscription";

export interface ProductInfo {
  id: ProductId;
  name: string;
  family: ProductFamily;
  tier: LicenseTier;
  /** Whether the configuration must carry a PIDKEY for this product */
  requires_key: boolean;
}

export interface SubstitutionRule {
  /** Installed edition that is dropped when the rule fires */
  source: ProductId;
  /** Requested edition that triggers the rule */
  target: ProductId;
}

// ─── Platform & Channel ──────────────────────────────────────────

export type Platform = "x86" | "x64";

export type Channel =
  | "Current"
  | "Deferred"
  | "FirstReleaseCurrent"
  | "FirstReleaseDeferred";

// ─── Inventory ───────────────────────────────────────────────────

export interface InstalledInventory {
  products: ProductId[];
  platform?: Platform;
  channel?: Channel | "unknown";
  cdn_base_url?: string;
  /** Release ids found in the registry that are not in the catalog */
  unrecognized: string[];
}

export interface DeploymentTarget {
  platform: Platform;
  channel: Channel;
}

// ─── Reconciliation ──────────────────────────────────────────────

export interface MigrationFlags {
  platform_migration: boolean;
  channel_migration: boolean;
  product_migration: boolean;
}

export interface ReconcileResult {
  requested: ProductId;
  target_set: ProductId[];
  removed: ProductId[];
  applied_rules: SubstitutionRule[];
  flags: MigrationFlags;
}

// ─── Legacy Versions ─────────────────────────────────────────────

export type LegacyVersionTag =
  | "office2003"
  | "office2007"
  | "office2010"
  | "office2013"
  | "office2016";

export interface LegacyVersionInfo {
  tag: LegacyVersionTag;
  year: number;
  /** Display-name fragment matched case-insensitively */
  label: string;
  /** Removal script file name inside the support-files directory */
  script: string;
}

// ─── Deployment Lifecycle ────────────────────────────────────────

export type DeploymentType = "install" | "uninstall";
export type DeployMode = "interactive" | "silent" | "noninteractive";

export type DeploymentPhase =
  | "PENDING"
  | "DETECTING"
  | "RECONCILING"
  | "REMOVING_LEGACY"
  | "REMOVING_CLICK_TO_RUN"
  | "CONFIGURING"
  | "EXECUTING"
  | "COMPLETED"
  | "FAILED";

export type ErrorCategory =
  | "VALIDATION_ERROR"
  | "BOOTSTRAP_ERROR"
  | "CONFIGURATION_ERROR";

export interface DeploymentRequest {
  product: ProductId;
  target: DeploymentTarget;
  /** Override dry-run for this run */
  dry_run?: boolean;
}

export interface ProcessFailure {
  /** Step that produced the exit code, e.g. "office2007" or "click-to-run" */
  step: string;
  exit_code: number;
}

export interface DeploymentResult {
  execution_id: string;
  type: DeploymentType;
  product: ProductId;
  final_state: DeploymentPhase;
  exit_code: number;
  reboot_required: boolean;
  started_at: string;
  finished_at: string;
  dry_run: boolean;
  inventory: InstalledInventory;
  reconcile?: ReconcileResult;
  legacy_removed: Partial<Record<LegacyVersionTag, number>>;
  click_to_run_removal?: number;
  config_path: string;
  configuration_xml: string;
  failures: ProcessFailure[];
}

// ─── Engine Events ───────────────────────────────────────────────

export type EngineEventType = "phase_change";

export interface PhaseChange {
  execution_id: string;
  phase: DeploymentPhase;
  message?: string;
}

export interface EngineEvent {
  type: EngineEventType;
  timestamp: string;
  data: PhaseChange;
}

export type EngineEventHandler = (event: EngineEvent) => void;
