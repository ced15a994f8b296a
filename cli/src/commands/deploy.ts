/**
 * c2r-deploy CLI -- Deploy Command
 *
 * Installs, migrates or removes one Office product edition.
 *
 * Usage:
 *   c2r-deploy deploy <product> --type install --mode interactive
 *   c2r-deploy deploy VisioProRetail --type install --mode silent
 *   c2r-deploy deploy ProjectStdXVolume --type uninstall --mode noninteractive
 *   c2r-deploy deploy O365ProPlusRetail --type install --dry-run
 *
 * Output (interactive / noninteractive):
 *
 *   Installing Visio Professional (x64, Deferred)
 *
 *     ✔ Read installed products
 *     ✔ Computed product set
 *     ✔ Removed Click-to-Run installation
 *     ✔ Wrote configuration document
 *     ✔ Ran setup.exe
 *
 *   ✔ Installed Visio Professional in 6m 12s
 *
 * Silent mode prints nothing; the process exit code is setup.exe's.
 */

import { Command, Option } from "commander";
import { Ora } from "ora";
import {
  CHANNELS,
  DeploymentEngine,
  DeploymentError,
  DeploymentPhase,
  DeploymentResult,
  DeploymentTarget,
  DeploymentType,
  DeployMode,
  EngineCollaborators,
  EXIT_USER_CANCELLED,
  exitCodeForError,
  getProduct,
  loadSettings,
  lookupExitCode,
  parseProductId,
  Platform,
  ProductInfo,
  verifySupportFiles,
} from "@c2r-deploy/engine";
import { getEngineOptions, resolveSettingsPath } from "../config";
import { confirmDeployment } from "../prompt";
import {
  colors,
  createSpinner,
  formatDuration,
  formatErrorCategory,
  formatPhase,
  isDebugMode,
  phaseLabel,
  printBlank,
  printBullet,
  printDebug,
  printDetail,
  printDryRun,
  printError,
  printHeader,
  printInfo,
  printStageError,
  printStageSuccess,
  printStageWarn,
  printSuccess,
  printWarn,
  setSilentMode,
} from "../output";

export const DEPLOYMENT_TYPES: readonly DeploymentType[] = ["install", "uninstall"];
export const DEPLOY_MODES: readonly DeployMode[] = [
  "interactive",
  "silent",
  "noninteractive",
];
export const PLATFORMS: readonly Platform[] = ["x86", "x64"];

export interface DeployCommandOptions {
  type: string;
  mode: string;
  platform?: string;
  channel?: string;
  config?: string;
  dryRun: boolean;
  yes: boolean;
}

/** Seams for tests: machine access and the welcome prompt */
export interface DeployDependencies {
  collaborators?: EngineCollaborators;
  confirm?: (type: DeploymentType, product: ProductInfo) => Promise<boolean>;
}

/** Spinner text while a phase runs */
const STAGE_MESSAGES: Partial<Record<DeploymentPhase, string>> = {
  DETECTING: "Reading installed products...",
  RECONCILING: "Computing product set...",
  REMOVING_LEGACY: "Removing legacy Office...",
  REMOVING_CLICK_TO_RUN: "Removing Click-to-Run installation...",
  CONFIGURING: "Writing configuration document...",
  EXECUTING: "Running setup.exe...",
};

/** After each phase completes, print a check-marked line */
const STAGE_DONE: Partial<Record<DeploymentPhase, string>> = {
  DETECTING: "Read installed products",
  RECONCILING: "Computed product set",
  REMOVING_LEGACY: "Removed legacy Office",
  REMOVING_CLICK_TO_RUN: "Removed Click-to-Run installation",
  CONFIGURING: "Wrote configuration document",
  EXECUTING: "Ran setup.exe",
};

/**
 * Narrow a flag value to one of its allowed literals.
 *
 * @throws DeploymentError (VALIDATION_ERROR)
 */
export function choose<T extends string>(
  value: string,
  allowed: readonly T[],
  name: string,
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new DeploymentError(
      "VALIDATION_ERROR",
      `Invalid ${name} "${value}". Expected one of: ${allowed.join(", ")}`,
      { [name]: value },
    );
  }
  return match;
}

/**
 * Drive the spinner and the stage lines from engine phase events.
 */
function attachProgress(
  engine: DeploymentEngine,
  spinner: Ora,
  dryRun: boolean,
): void {
  let current: DeploymentPhase | undefined;

  engine.on((event) => {
    if (event.type !== "phase_change") return;
    const { phase, message } = event.data;

    if (message) {
      printDebug(`${phase}: ${message}`);
    }
    if (phase === current) return;

    const previous = current;
    current = phase;

    if (previous) {
      const done =
        previous === "EXECUTING" && dryRun
          ? "Skipped setup.exe (dry run)"
          : STAGE_DONE[previous];
      if (done) {
        spinner.stop();
        if (phase === "FAILED") {
          printStageError(`${phaseLabel(previous)} failed`);
        } else {
          printStageSuccess(done);
        }
        spinner.start();
      }
    }

    if (phase === "COMPLETED" || phase === "FAILED") {
      spinner.stop();
      return;
    }

    const text = STAGE_MESSAGES[phase];
    if (text) {
      spinner.text = text;
    }
  });
}

function printSummary(
  result: DeploymentResult,
  product: ProductInfo,
  elapsed: number,
): void {
  const verb = result.type === "install" ? "Installed" : "Removed";

  if (result.reconcile) {
    for (const rule of result.reconcile.applied_rules) {
      printStageWarn(
        `Replaced ${getProduct(rule.source).name} with ${getProduct(rule.target).name}`,
      );
    }
  }
  for (const failure of result.failures) {
    if (failure.step === "setup") continue;
    printStageWarn(
      `${failure.step} removal exited with ${failure.exit_code}`,
    );
  }

  printBlank();
  if (result.dry_run) {
    printDryRun(
      `Dry run complete for ${colors.product(product.name)}; configuration written to ${result.config_path}`,
    );
    return;
  }

  if (result.final_state === "COMPLETED") {
    printSuccess(
      `${verb} ${colors.product(product.name)} in ${formatDuration(elapsed)}`,
    );
    if (result.reboot_required) {
      printWarn("A restart is required to finish the deployment.");
    }
    return;
  }

  const info = lookupExitCode(result.exit_code);
  printError(
    `Failed to ${result.type} ${colors.product(product.name)}`,
  );
  printDetail("Exit code", `${result.exit_code} (${info.name})`);
  printDetail("Details", info.message);
  printDetail("Phase", formatPhase(result.final_state));
  printDetail("Configuration", result.config_path);
}

function reportError(err: unknown): void {
  printBlank();
  if (err instanceof DeploymentError) {
    printError(formatErrorCategory(err.category));
    printDetail("Details", err.message);
    const missing = err.details?.missing;
    if (Array.isArray(missing)) {
      for (const file of missing) {
        printBullet(String(file));
      }
    }
    return;
  }

  printError("Unexpected error during deployment");
  if (isDebugMode()) {
    console.error(err);
  } else {
    printDetail("Message", err instanceof Error ? err.message : String(err));
    printInfo(`Use ${colors.bold("--debug")} to see the full stack trace.`);
  }
}

/**
 * Run one deployment and return the process exit code.
 */
export async function runDeploy(
  productArg: string,
  opts: DeployCommandOptions,
  deps: DeployDependencies = {},
): Promise<number> {
  let spinner: Ora | undefined;

  try {
    // 1. Validate arguments
    const type = choose(opts.type, DEPLOYMENT_TYPES, "type");
    const mode = choose(opts.mode, DEPLOY_MODES, "mode");
    setSilentMode(mode === "silent");
    const product = getProduct(parseProductId(productArg));

    // 2. Load settings and check deployment files
    const settings = loadSettings(resolveSettingsPath(opts.config));
    const target: DeploymentTarget = {
      platform: opts.platform
        ? choose(opts.platform, PLATFORMS, "platform")
        : settings.platform,
      channel: opts.channel
        ? choose(opts.channel, CHANNELS, "channel")
        : settings.channel,
    };

    if (!opts.dryRun) {
      const missing = verifySupportFiles(settings);
      if (missing.length > 0) {
        throw new DeploymentError(
          "BOOTSTRAP_ERROR",
          `${missing.length} deployment file(s) missing`,
          { missing },
        );
      }
    }

    // 3. Welcome prompt
    if (mode === "interactive" && !opts.yes) {
      const ask = deps.confirm ?? confirmDeployment;
      if (!(await ask(type, product))) {
        printWarn("Deployment cancelled.");
        return EXIT_USER_CANCELLED;
      }
    }

    // 4. Create engine
    const engine = new DeploymentEngine(
      getEngineOptions(settings, isDebugMode(), opts.dryRun),
      deps.collaborators,
    );

    const title = `${type === "install" ? "Installing" : "Removing"} ${colors.product(product.name)} (${target.platform}, ${target.channel})`;
    if (opts.dryRun) {
      printDryRun(title);
    } else {
      printHeader(title);
    }

    // 5. Deploy
    spinner = createSpinner("Starting...");
    attachProgress(engine, spinner, opts.dryRun);
    spinner.start();
    const startTime = Date.now();

    const request = { product: product.id, target, dry_run: opts.dryRun };
    const result =
      type === "install"
        ? await engine.install(request)
        : await engine.uninstall(request);

    spinner.stop();
    printSummary(result, product, Date.now() - startTime);
    return result.exit_code;
  } catch (err: unknown) {
    spinner?.stop();
    reportError(err);
    return exitCodeForError(err);
  }
}

export function registerDeployCommand(program: Command): void {
  program
    .command("deploy <product>")
    .description("Install, migrate or remove an Office product edition")
    .addOption(
      new Option("-t, --type <type>", "Deployment type")
        .choices(DEPLOYMENT_TYPES)
        .default("install"),
    )
    .addOption(
      new Option("-m, --mode <mode>", "Deploy mode")
        .choices(DEPLOY_MODES)
        .default("interactive"),
    )
    .addOption(
      new Option("--platform <platform>", "Target platform (default from settings)")
        .choices(PLATFORMS),
    )
    .addOption(
      new Option("--channel <channel>", "Update channel (default from settings)")
        .choices(CHANNELS),
    )
    .option("-c, --config <file>", "Deployment settings file (YAML)")
    .option("--dry-run", "Write the configuration document without running anything", false)
    .option("-y, --yes", "Skip the welcome prompt", false)
    .action(async (product: string, opts: DeployCommandOptions) => {
      process.exitCode = await runDeploy(product, opts);
    });
}
