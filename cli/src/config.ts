/**
 * c2r-deploy CLI — Configuration
 *
 * Central location for CLI paths and settings-file discovery.
 * Deployment files live under ~/.c2r-deploy unless C2R_DEPLOY_HOME says
 * otherwise (the same directory ${DEPLOY_HOME} resolves to in settings).
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DeploymentSettings, EngineOptions } from "@c2r-deploy/engine";

export function getDeployHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.C2R_DEPLOY_HOME || path.join(os.homedir(), ".c2r-deploy");
}

/** Settings file picked up when neither --config nor C2R_DEPLOY_CONFIG is set */
export function defaultSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getDeployHome(env), "deploy.yaml");
}

/**
 * Pick the settings file: --config, then C2R_DEPLOY_CONFIG, then
 * ~/.c2r-deploy/deploy.yaml if it exists. Undefined means built-in defaults.
 */
export function resolveSettingsPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (explicit) return path.resolve(explicit);
  if (env.C2R_DEPLOY_CONFIG) return path.resolve(env.C2R_DEPLOY_CONFIG);

  const fallback = defaultSettingsPath(env);
  return fs.existsSync(fallback) ? fallback : undefined;
}

/**
 * Build EngineOptions from CLI flags.
 */
export function getEngineOptions(
  settings: DeploymentSettings,
  verbose: boolean = false,
  dryRun: boolean = false,
): EngineOptions {
  return {
    settings,
    dry_run: dryRun,
    verbose,
    // Dry runs leave nothing behind apart from the configuration document
    log_to_file: !dryRun,
  };
}
