/**
 * c2r-deploy Engine — Deployment Engine
 *
 * Orchestrates one deployment run:
 *
 *   PENDING → DETECTING → RECONCILING → REMOVING_LEGACY →
 *   REMOVING_CLICK_TO_RUN → CONFIGURING → EXECUTING → COMPLETED | FAILED
 *
 * Every external process is awaited before the next step starts. A removal
 * script that fails is logged and recorded in `failures`, and the run goes
 * on; the exit code of setup.exe is the exit code of the run.
 *
 * The engine has NO UI logic. It doesn't know if it's called from a CLI or a
 * management agent; it communicates via return values and event callbacks.
 * Registry access and process execution are injected so runs can be
 * exercised without touching the machine.
 */

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import {
  buildInstallConfiguration,
  buildUninstallConfiguration,
  ConfigurationDocument,
  renderConfiguration,
  writeConfiguration,
} from "./configuration";
import {
  CLICK_TO_RUN_REMOVAL_SCRIPT,
  detectLegacy,
  LEGACY_VERSIONS,
  RemovalOptions,
  removeClickToRun,
  removeLegacy,
  shouldRemoveClickToRun,
} from "./legacy";
import { getProduct } from "./products";
import { reconcile } from "./reconciler";
import { DeploymentSettings } from "./settings";
import {
  DeploymentPhase,
  DeploymentRequest,
  DeploymentResult,
  DeploymentType,
  EngineEvent,
  EngineEventHandler,
  InstalledInventory,
  LegacyVersionTag,
  ProcessFailure,
} from "./types";
import { createLogger, Logger } from "./utils/logger";
import { ProcessRunner, SpawnProcessRunner } from "./windows/process";
import {
  listInstalledApplications,
  readInventory,
  RegExeRegistryReader,
  RegistryReader,
} from "./windows/registry";
import { isRebootCode, lookupExitCode } from "./windows/types";

export interface EngineOptions {
  settings: DeploymentSettings;
  /** Enable dry-run mode globally: the configuration is written, nothing runs */
  dry_run: boolean;
  /** Enable debug logging to stderr */
  verbose: boolean;
  /** Also append logs to a file under settings.log_dir */
  log_to_file?: boolean;
}

export interface EngineCollaborators {
  registry?: RegistryReader;
  runner?: ProcessRunner;
  logger?: Logger;
}

export interface DetectionReport {
  inventory: InstalledInventory;
  /** Display names of installed Office applications */
  installed_applications: string[];
  legacy_versions: LegacyVersionTag[];
}

/** Office display names all start with this; used to narrow the scan. */
const OFFICE_NAME_FILTER = "Microsoft Office";

/**
 * List support files that are missing on disk: setup.exe and every removal
 * script. An empty list means the deployment can start.
 */
export function verifySupportFiles(settings: DeploymentSettings): string[] {
  const required = [
    settings.setup_path,
    ...LEGACY_VERSIONS.map((v) => path.join(settings.support_files_dir, v.script)),
    path.join(settings.support_files_dir, CLICK_TO_RUN_REMOVAL_SCRIPT),
  ];
  return required.filter((file) => !fs.existsSync(file));
}

export class DeploymentEngine {
  private readonly logger: Logger;
  private readonly registry: RegistryReader;
  private readonly runner: ProcessRunner;
  private readonly options: EngineOptions;
  private eventHandlers: EngineEventHandler[] = [];

  constructor(options: EngineOptions, collaborators: EngineCollaborators = {}) {
    this.options = options;
    this.logger =
      collaborators.logger ??
      createLogger({
        level: options.verbose ? "debug" : "silent",
        file: options.log_to_file
          ? path.join(
              options.settings.log_dir,
              `c2r-deploy-${new Date().toISOString().replace(/[:.]/g, "-")}.log`,
            )
          : undefined,
      });
    this.registry =
      collaborators.registry ?? new RegExeRegistryReader(this.logger);
    this.runner = collaborators.runner ?? new SpawnProcessRunner(this.logger);
  }

  get settings(): DeploymentSettings {
    return this.options.settings;
  }

  // ─── Event System ────────────────────────────────────────────

  /**
   * Register an event handler. The CLI uses this to drive its spinner.
   */
  on(handler: EngineEventHandler): void {
    this.eventHandlers.push(handler);
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err: unknown) {
        // A broken handler must not abort a deployment half-way
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.warn({ error: msg }, "Event handler threw");
      }
    }
  }

  private emitPhase(
    executionId: string,
    phase: DeploymentPhase,
    message?: string,
  ): void {
    this.emit({
      type: "phase_change",
      timestamp: new Date().toISOString(),
      data: { execution_id: executionId, phase, message },
    });
  }

  // ─── Detection ───────────────────────────────────────────────

  /**
   * Read the Click-to-Run inventory and look for legacy Office releases.
   */
  async detect(): Promise<DetectionReport> {
    const inventory = await readInventory(this.registry, this.logger);
    const installed = await listInstalledApplications(
      this.registry,
      OFFICE_NAME_FILTER,
    );
    const legacy = detectLegacy(installed);
    if (legacy.length > 0) {
      this.logger.info({ legacy }, "Legacy Office versions detected");
    }
    return {
      inventory,
      installed_applications: installed,
      legacy_versions: legacy,
    };
  }

  // ─── Core: Install ───────────────────────────────────────────

  /**
   * Install (or migrate to) the requested edition, keeping every other
   * installed product that no substitution rule replaces.
   */
  async install(request: DeploymentRequest): Promise<DeploymentResult> {
    return this.run("install", request, async (ctx) => {
      // ─── DETECTING ───
      ctx.phase("DETECTING");
      const detection = await this.detect();
      ctx.result.inventory = detection.inventory;

      // ─── RECONCILING ───
      ctx.phase("RECONCILING");
      const plan = reconcile(
        request.product,
        detection.inventory,
        request.target,
      );
      ctx.result.reconcile = plan;

      this.logger.info(
        {
          targetSet: plan.target_set,
          removed: plan.removed,
          flags: plan.flags,
        },
        "Product set reconciled",
      );
      for (const rule of plan.applied_rules) {
        this.logger.info(
          { from: rule.source, to: rule.target },
          `Migrating ${getProduct(rule.source).name} to ${getProduct(rule.target).name}`,
        );
      }
      if (plan.flags.platform_migration) {
        this.logger.info(
          { from: detection.inventory.platform, to: request.target.platform },
          "Platform migration",
        );
      }
      if (plan.flags.channel_migration) {
        this.logger.info(
          { from: detection.inventory.channel, to: request.target.channel },
          "Channel migration",
        );
      }

      // Validate the document before anything is removed from the machine
      const doc = buildInstallConfiguration(
        plan.target_set,
        request.target,
        this.settings,
      );

      // ─── REMOVING_LEGACY ───
      const legacy = detection.legacy_versions;
      if (legacy.length > 0) {
        ctx.phase("REMOVING_LEGACY", legacy.join(", "));
        if (ctx.dryRun) {
          this.logger.info({ legacy }, "[DRY RUN] Would remove legacy Office");
        } else {
          const results = await removeLegacy(legacy, this.removalOptions());
          for (const [tag, exitCode] of results) {
            ctx.result.legacy_removed[tag] = exitCode;
            ctx.recordExit(tag, exitCode);
          }
        }
      }

      // ─── REMOVING_CLICK_TO_RUN ───
      if (shouldRemoveClickToRun(legacy.length > 0, plan.flags)) {
        ctx.phase("REMOVING_CLICK_TO_RUN");
        if (ctx.dryRun) {
          this.logger.info("[DRY RUN] Would remove the Click-to-Run installation");
        } else {
          const exitCode = await removeClickToRun(this.removalOptions());
          ctx.result.click_to_run_removal = exitCode;
          ctx.recordExit("click-to-run", exitCode);
        }
      }

      return doc;
    });
  }

  // ─── Core: Uninstall ─────────────────────────────────────────

  /**
   * Remove the requested edition. Other installed products are untouched.
   */
  async uninstall(request: DeploymentRequest): Promise<DeploymentResult> {
    return this.run("uninstall", request, async (ctx) => {
      ctx.phase("DETECTING");
      const inventory = await readInventory(this.registry, this.logger);
      ctx.result.inventory = inventory;

      if (!inventory.products.includes(request.product)) {
        this.logger.warn(
          { product: request.product, installed: inventory.products },
          "Requested product is not installed; running removal anyway",
        );
      }

      return buildUninstallConfiguration([request.product], this.settings);
    });
  }

  // ─── Shared Run Lifecycle ────────────────────────────────────

  private removalOptions(): RemovalOptions {
    return {
      supportFilesDir: this.settings.support_files_dir,
      logDir: this.settings.log_dir,
      runner: this.runner,
      logger: this.logger,
    };
  }

  /**
   * Wrap the type-specific steps with the shared lifecycle: writing the
   * configuration document, running setup.exe and building the result.
   */
  private async run(
    type: DeploymentType,
    request: DeploymentRequest,
    steps: (ctx: RunContext) => Promise<ConfigurationDocument>,
  ): Promise<DeploymentResult> {
    const executionId = crypto.randomUUID();
    const dryRun = request.dry_run ?? this.options.dry_run;
    const configPath = this.settings.config_path;

    const result: DeploymentResult = {
      execution_id: executionId,
      type,
      product: request.product,
      final_state: "PENDING",
      exit_code: 0,
      reboot_required: false,
      started_at: new Date().toISOString(),
      finished_at: "",
      dry_run: dryRun,
      inventory: { products: [], unrecognized: [] },
      legacy_removed: {},
      config_path: configPath,
      configuration_xml: "",
      failures: [],
    };

    const ctx: RunContext = {
      dryRun,
      result,
      phase: (phase, message) => {
        result.final_state = phase;
        this.emitPhase(executionId, phase, message);
      },
      recordExit: (step, exitCode) => {
        if (exitCode === 0) return;
        const failure: ProcessFailure = { step, exit_code: exitCode };
        result.failures.push(failure);
        result.exit_code = exitCode;
      },
    };

    ctx.phase("PENDING");
    this.logger.info(
      {
        executionId,
        type,
        product: request.product,
        platform: request.target.platform,
        channel: request.target.channel,
        dryRun,
      },
      `Starting ${type}: ${getProduct(request.product).name}`,
    );

    try {
      const doc = await steps(ctx);

      // ─── CONFIGURING ───
      ctx.phase("CONFIGURING", configPath);
      const xml = renderConfiguration(doc);
      writeConfiguration(configPath, xml);
      result.configuration_xml = xml;
      this.logger.info(
        { configPath, products: doc.products.map((p) => p.id) },
        "Configuration document written",
      );

      // ─── EXECUTING ───
      ctx.phase("EXECUTING");
      const setupArgs = ["/configure", configPath];
      let exitCode = 0;
      if (dryRun) {
        this.logger.info(
          { setup: this.settings.setup_path, args: setupArgs },
          "[DRY RUN] Would run setup",
        );
      } else {
        exitCode = await this.runner.execute(this.settings.setup_path, setupArgs);
      }

      const info = lookupExitCode(exitCode);
      result.exit_code = exitCode;
      result.reboot_required = isRebootCode(exitCode);
      if (!info.ok) {
        result.failures.push({ step: "setup", exit_code: exitCode });
        this.logger.error(
          { exitCode, exitCodeName: info.name },
          `Setup failed: ${info.message}`,
        );
      }

      result.finished_at = new Date().toISOString();
      ctx.phase(info.ok ? "COMPLETED" : "FAILED", info.message);
      this.logger.info(
        { exitCode, failures: result.failures, rebootRequired: result.reboot_required },
        `Finished ${type}: ${getProduct(request.product).name}`,
      );
      return result;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error({ error: msg, type }, "Deployment aborted");
      ctx.phase("FAILED", msg);
      throw err;
    }
  }
}

interface RunContext {
  dryRun: boolean;
  result: DeploymentResult;
  phase(phase: DeploymentPhase, message?: string): void;
  /** Record a non-zero exit code from an intermediate step */
  recordExit(step: string, exitCode: number): void;
}
