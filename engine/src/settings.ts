/**
 * c2r-deploy Engine — Deployment Settings
 *
 * Settings come from a YAML file validated with zod. Every field has a
 * default, so a missing file yields a usable configuration. Path fields may
 * use ${VARIABLE} references (see utils/variables).
 *
 * Variables and overrides are read from the `env` passed in:
 *   C2R_DEPLOY_HOME      value of ${DEPLOY_HOME}
 *   C2R_DEPLOY_LOG_DIR   replaces log_dir
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DeploymentError } from "./errors";
import { isProductId } from "./products";
import { Channel, Platform } from "./types";
import { resolveVariables } from "./utils/variables";

export const DeploymentSettingsSchema = z.object({
  /** Directory holding setup.exe (and the Office source, if local) */
  source_dir: z.string().min(1).default(path.join("${DEPLOY_HOME}", "Files")),
  setup_file: z.string().min(1).default("setup.exe"),
  /** Directory holding the removal scripts */
  support_files_dir: z
    .string()
    .min(1)
    .default(path.join("${DEPLOY_HOME}", "SupportFiles")),
  log_dir: z.string().min(1).default(path.join("${DEPLOY_HOME}", "Logs")),
  /** Where the generated configuration document is written */
  config_path: z
    .string()
    .min(1)
    .default(path.join("${TEMP}", "c2r-deploy", "configuration.xml")),
  platform: z.enum(["x86", "x64"]).default("x64"),
  channel: z
    .enum(["Current", "Deferred", "FirstReleaseCurrent", "FirstReleaseDeferred"])
    .default("Deferred"),
  language: z.string().min(1).default("MatchOS"),
  /** SourcePath attribute of <Add>; omitted to install from the CDN */
  source_path: z.string().min(1).optional(),
  product_keys: z
    .record(z.string().min(1))
    .default({})
    .superRefine((keys, ctx) => {
      for (const id of Object.keys(keys)) {
        if (!isProductId(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [id],
            message: `Unknown product id "${id}"`,
          });
        }
      }
    }),
  display: z
    .object({
      level: z.enum(["None", "Full"]).default("None"),
      accept_eula: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(["Off", "Standard"]).default("Standard"),
      /** Defaults to log_dir */
      path: z.string().min(1).optional(),
    })
    .default({}),
  force_app_shutdown: z.boolean().default(true),
});

export type RawDeploymentSettings = z.infer<typeof DeploymentSettingsSchema>;

export interface DeploymentSettings {
  source_dir: string;
  setup_path: string;
  support_files_dir: string;
  log_dir: string;
  config_path: string;
  platform: Platform;
  channel: Channel;
  language: string;
  source_path?: string;
  product_keys: Record<string, string>;
  display: { level: "None" | "Full"; accept_eula: boolean };
  logging: { level: "Off" | "Standard"; path: string };
  force_app_shutdown: boolean;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length > 0 ? i.path.join(".") : "/"}: ${i.message}`)
    .join("; ");
}

/**
 * Validate raw settings data and resolve path variables.
 *
 * @throws DeploymentError (BOOTSTRAP_ERROR) on invalid settings
 */
export function parseSettings(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): DeploymentSettings {
  const result = DeploymentSettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new DeploymentError(
      "BOOTSTRAP_ERROR",
      `Invalid deployment settings: ${formatIssues(result.error)}`,
      { issues: result.error.issues },
    );
  }

  const s = result.data;
  const resolvePath = (value: string): string => {
    try {
      return resolveVariables(value, env);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new DeploymentError("BOOTSTRAP_ERROR", msg, { value });
    }
  };

  const sourceDir = resolvePath(s.source_dir);
  const logDir = resolvePath(env.C2R_DEPLOY_LOG_DIR || s.log_dir);
  const setupFile = resolvePath(s.setup_file);

  return {
    source_dir: sourceDir,
    setup_path: path.isAbsolute(setupFile)
      ? setupFile
      : path.join(sourceDir, setupFile),
    support_files_dir: resolvePath(s.support_files_dir),
    log_dir: logDir,
    config_path: resolvePath(s.config_path),
    platform: s.platform,
    channel: s.channel,
    language: s.language,
    source_path: s.source_path ? resolvePath(s.source_path) : undefined,
    product_keys: { ...s.product_keys },
    display: { ...s.display },
    logging: {
      level: s.logging.level,
      path: s.logging.path ? resolvePath(s.logging.path) : logDir,
    },
    force_app_shutdown: s.force_app_shutdown,
  };
}

/**
 * Load settings from a YAML file. Without a file path, defaults are used.
 *
 * @throws DeploymentError (BOOTSTRAP_ERROR) if the file is missing,
 *   unparseable or invalid
 */
export function loadSettings(
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): DeploymentSettings {
  if (!filePath) return parseSettings({}, env);

  if (!fs.existsSync(filePath)) {
    throw new DeploymentError(
      "BOOTSTRAP_ERROR",
      `Settings file not found: ${filePath}`,
      { filePath },
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new DeploymentError(
      "BOOTSTRAP_ERROR",
      `Settings file is not valid YAML: ${filePath}: ${msg}`,
      { filePath },
    );
  }

  return parseSettings(raw, env);
}
