/**
 * c2r-deploy Engine — Path Variable Resolution
 *
 * Settings files use variables like ${TEMP} instead of hardcoded paths so the
 * same file can be shipped to every machine. This module resolves them.
 */

import * as path from "path";
import * as os from "os";

/**
 * Map of supported path variables to their resolved values for `env`.
 * Recomputed on every call so environment changes are picked up.
 */
function getVariableMap(env: NodeJS.ProcessEnv): Record<string, string> {
  const home = os.homedir();

  return {
    TEMP: env.TEMP || os.tmpdir(),
    PROGRAMDATA: env.PROGRAMDATA || "C:\\ProgramData",
    WINDIR: env.WINDIR || "C:\\Windows",
    USERPROFILE: env.USERPROFILE || home,
    DEPLOY_HOME: env.C2R_DEPLOY_HOME || path.join(home, ".c2r-deploy"),
  };
}

/**
 * Resolve all ${VARIABLE} references in a path string.
 *
 * @throws Error if an unknown variable is referenced
 *
 * @example
 * resolveVariables("${TEMP}\\c2r-deploy\\configuration.xml")
 * // → "C:\\Users\\Jane\\AppData\\Local\\Temp\\c2r-deploy\\configuration.xml"
 */
export function resolveVariables(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const variables = getVariableMap(env);

  return input.replace(/\$\{([A-Z_]+)\}/g, (_match, varName: string) => {
    const value = variables[varName];
    if (value === undefined) {
      throw new Error(
        `Unknown path variable: \${${varName}}. ` +
          `Supported variables: ${Object.keys(variables).join(", ")}`,
      );
    }
    return value;
  });
}

/**
 * Get all supported variable names and their values for `env`.
 */
export function getResolvedVariables(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  return { ...getVariableMap(env) };
}
