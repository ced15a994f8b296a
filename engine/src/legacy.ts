/**
 * c2r-deploy Engine — Legacy Office Detection & Removal
 *
 * MSI-based Office suites (2003 through 2016) must be removed before a
 * Click-to-Run install. Each release has its own removal script in the
 * support-files directory; they run one at a time, oldest first, and a
 * failure on one release never stops the next.
 */

import * as path from "path";
import { LegacyVersionInfo, LegacyVersionTag, MigrationFlags } from "./types";
import { Logger } from "./utils/logger";
import { ProcessRunner } from "./windows/process";
import { EXIT_LAUNCH_FAILURE } from "./windows/types";

/** Ascending by release year. */
export const LEGACY_VERSIONS: readonly LegacyVersionInfo[] = [
  {
    tag: "office2003",
    year: 2003,
    label: "Microsoft Office Professional Edition 2003",
    script: "OffScrub03.vbs",
  },
  {
    tag: "office2007",
    year: 2007,
    label: "Microsoft Office Professional Plus 2007",
    script: "OffScrub07.vbs",
  },
  {
    tag: "office2010",
    year: 2010,
    label: "Microsoft Office Professional Plus 2010",
    script: "OffScrub10.vbs",
  },
  {
    tag: "office2013",
    year: 2013,
    label: "Microsoft Office Professional Plus 2013",
    script: "OffScrub_O15msi.vbs",
  },
  {
    tag: "office2016",
    year: 2016,
    label: "Microsoft Office Professional Plus 2016",
    script: "OffScrub_O16msi.vbs",
  },
];

/** Removes any existing Click-to-Run installation. */
export const CLICK_TO_RUN_REMOVAL_SCRIPT = "OffScrubc2r.vbs";

export const SCRIPT_HOST = "cscript.exe";

export function getLegacyVersion(tag: LegacyVersionTag): LegacyVersionInfo {
  const info = LEGACY_VERSIONS.find((v) => v.tag === tag);
  if (!info) {
    throw new Error(`Unknown legacy Office version: ${tag}`);
  }
  return info;
}

/**
 * Match installed display names against the legacy labels.
 * Every release that matches is returned, oldest first.
 */
export function detectLegacy(displayNames: string[]): LegacyVersionTag[] {
  const lowered = displayNames.map((n) => n.toLowerCase());
  return LEGACY_VERSIONS.filter((v) =>
    lowered.some((name) => name.includes(v.label.toLowerCase())),
  ).map((v) => v.tag);
}

export interface RemovalOptions {
  /** Directory holding the removal scripts */
  supportFilesDir: string;
  /** Directory the scripts write their logs to */
  logDir: string;
  runner: ProcessRunner;
  logger: Logger;
}

/**
 * cscript.exe arguments for one removal script.
 */
export function buildRemovalArgs(
  script: string,
  supportFilesDir: string,
  logDir: string,
): string[] {
  return [
    "//NoLogo",
    path.join(supportFilesDir, script),
    "ALL",
    "/S",
    "/Q",
    "/NoCancel",
    "/L",
    logDir,
  ];
}

async function runRemovalScript(
  step: string,
  script: string,
  opts: RemovalOptions,
): Promise<number> {
  const args = buildRemovalArgs(script, opts.supportFilesDir, opts.logDir);
  try {
    return await opts.runner.execute(SCRIPT_HOST, args);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    opts.logger.error({ step, script, error: msg }, "Removal script could not run");
    return EXIT_LAUNCH_FAILURE;
  }
}

/**
 * Remove the given legacy releases in ascending release-year order.
 *
 * @returns Exit code per release, in the order they were attempted
 */
export async function removeLegacy(
  tags: LegacyVersionTag[],
  opts: RemovalOptions,
): Promise<Map<LegacyVersionTag, number>> {
  const results = new Map<LegacyVersionTag, number>();
  const ordered = LEGACY_VERSIONS.filter((v) => tags.includes(v.tag));

  for (const version of ordered) {
    opts.logger.info(
      { tag: version.tag, script: version.script },
      `Removing Office ${version.year}`,
    );
    const exitCode = await runRemovalScript(version.tag, version.script, opts);
    results.set(version.tag, exitCode);

    if (exitCode !== 0) {
      opts.logger.error(
        { tag: version.tag, exitCode },
        `Removal of Office ${version.year} failed; continuing`,
      );
    }
  }

  return results;
}

/**
 * An existing Click-to-Run installation is removed when legacy versions were
 * removed, or when the channel or platform changes.
 */
export function shouldRemoveClickToRun(
  legacyRemoved: boolean,
  flags: Pick<MigrationFlags, "channel_migration" | "platform_migration">,
): boolean {
  return legacyRemoved || flags.channel_migration || flags.platform_migration;
}

export async function removeClickToRun(opts: RemovalOptions): Promise<number> {
  opts.logger.info(
    { script: CLICK_TO_RUN_REMOVAL_SCRIPT },
    "Removing existing Click-to-Run installation",
  );
  const exitCode = await runRemovalScript(
    "click-to-run",
    CLICK_TO_RUN_REMOVAL_SCRIPT,
    opts,
  );
  if (exitCode !== 0) {
    opts.logger.error({ exitCode }, "Click-to-Run removal failed; continuing");
  }
  return exitCode;
}
