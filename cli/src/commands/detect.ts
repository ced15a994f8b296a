/**
 * c2r-deploy CLI - Detect Command
 *
 * Shows what a deployment would start from: the Click-to-Run inventory and
 * any legacy MSI-based Office releases. Reads the registry only.
 *
 * Usage:
 *   c2r-deploy detect
 *   c2r-deploy detect --json
 */

import { Command } from "commander";
import {
  DeploymentEngine,
  DetectionReport,
  EngineCollaborators,
  exitCodeForError,
  getLegacyVersion,
  getProduct,
  loadSettings,
} from "@c2r-deploy/engine";
import { getEngineOptions, resolveSettingsPath } from "../config";
import {
  colors,
  isDebugMode,
  printBlank,
  printBullet,
  printDetail,
  printError,
  printInfo,
  printTable,
} from "../output";

export interface DetectCommandOptions {
  config?: string;
  json: boolean;
}

export function printDetectionReport(report: DetectionReport): void {
  const { inventory } = report;

  if (inventory.products.length === 0 && inventory.unrecognized.length === 0) {
    printInfo("No Click-to-Run installation found.");
  } else {
    printInfo(
      `${colors.bold(String(inventory.products.length))} Click-to-Run product(s) installed:\n`,
    );
    printTable({
      head: ["Product ID", "Name", "License"],
      rows: inventory.products.map((id) => {
        const product = getProduct(id);
        return [colors.product(id), product.name, product.tier];
      }),
    });
    printDetail("Platform", inventory.platform ?? "unknown");
    printDetail("Channel", inventory.channel ?? "unknown");
    if (inventory.cdn_base_url) {
      printDetail("CDN", inventory.cdn_base_url);
    }
    if (inventory.unrecognized.length > 0) {
      printDetail("Not managed", inventory.unrecognized.join(", "));
    }
  }

  printBlank();
  if (report.legacy_versions.length === 0) {
    printInfo("No legacy Office versions found.");
    return;
  }
  printInfo("Legacy Office versions (removed on the next install):");
  for (const tag of report.legacy_versions) {
    printBullet(getLegacyVersion(tag).label);
  }
}

export async function runDetect(
  opts: DetectCommandOptions,
  collaborators?: EngineCollaborators,
): Promise<number> {
  try {
    const settings = loadSettings(resolveSettingsPath(opts.config));
    const engine = new DeploymentEngine(
      // Detection only reads the registry; run as a dry run
      getEngineOptions(settings, isDebugMode(), true),
      collaborators,
    );
    const report = await engine.detect();

    if (opts.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printDetectionReport(report);
    }
    return 0;
  } catch (err: unknown) {
    printError(
      `Detection failed: ${err instanceof Error ? err.message : String(err)}`,
    );
    return exitCodeForError(err);
  }
}

export function registerDetectCommand(program: Command): void {
  program
    .command("detect")
    .description("Show installed Click-to-Run products and legacy Office versions")
    .option("-c, --config <file>", "Deployment settings file (YAML)")
    .option("--json", "Print the report as JSON", false)
    .action(async (opts: DetectCommandOptions) => {
      process.exitCode = await runDetect(opts);
    });
}
