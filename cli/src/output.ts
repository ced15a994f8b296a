/**
 * c2r-deploy CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for tabular data.
 *
 * All user-visible output flows through this module so silent mode can
 * switch it off in one place.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { DeploymentPhase, ErrorCategory } from "@c2r-deploy/engine";

// ─── Output Modes ───────────────────────────────────────────

let _debugMode = false;
let _silentMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

/**
 * Silent deployments print nothing at all, errors included. The exit code
 * and the log file are the only record.
 */
export function setSilentMode(enabled: boolean): void {
  _silentMode = enabled;
}

function out(line: string = ""): void {
  if (!_silentMode) console.log(line);
}

function errOut(line: string): void {
  if (!_silentMode) console.error(line);
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  product: chalk.bold.white,
  phase: chalk.magenta,
  muted: chalk.gray,
};

// ─── Symbols (safe for Windows terminals) ───────────────────

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
  arrow: chalk.gray("\u2192"), // →
  bullet: chalk.gray("\u2022"), // •
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  out(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  errOut(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  out(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  out(`${symbols.info} ${msg}`);
}

export function printDryRun(msg: string): void {
  out(colors.warn("[DRY RUN] ") + msg);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    out(colors.muted(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  out();
}

/**
 * Print an indented detail line (for sub-items under a stage).
 */
export function printDetail(label: string, value: string): void {
  out(`  ${colors.dim(label + ":")} ${value}`);
}

export function printBullet(msg: string): void {
  out(`    ${symbols.bullet} ${msg}`);
}

// ─── Stage Output ───────────────────────────────────────────

/**
 * Print a completed stage line with ✔ prefix.
 *
 *   ✔ Read Click-to-Run inventory
 *   ✔ Removed legacy Office
 *   ✔ Ran setup.exe
 */
export function printStageSuccess(msg: string): void {
  out(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  out(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  out(`  ${symbols.warn}  ${msg}`);
}

// ─── Header / Banner ────────────────────────────────────────

/**
 * Print a bold header line, e.g.  "Installing Visio Professional"
 */
export function printHeader(msg: string): void {
  out();
  out(`  ${colors.bold(msg)}`);
  out();
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", isSilent: _silentMode });
}

// ─── Tables ─────────────────────────────────────────────────

/**
 * Detect whether to use ASCII-only box drawing characters.
 * On Windows cmd/PowerShell without TERM set, Unicode borders corrupt.
 */
export function shouldUseAsciiBorders(): boolean {
  return process.platform === "win32" && !process.env.TERM;
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

export interface TableOptions {
  head: string[];
  rows: string[][];
  colWidths?: number[];
}

export function printTable({ head, rows, colWidths }: TableOptions): void {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: head.map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(colWidths ? { colWidths } : {}),
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });
  for (const row of rows) {
    table.push(row);
  }
  out(table.toString());
}

// ─── Phase Badge ────────────────────────────────────────────

const PHASE_COLORS: Record<DeploymentPhase, chalk.Chalk> = {
  PENDING: chalk.gray,
  DETECTING: chalk.cyan,
  RECONCILING: chalk.cyan,
  REMOVING_LEGACY: chalk.yellow,
  REMOVING_CLICK_TO_RUN: chalk.yellow,
  CONFIGURING: chalk.blue,
  EXECUTING: chalk.yellow,
  COMPLETED: chalk.green,
  FAILED: chalk.red,
};

/** Human-friendly phase labels */
const PHASE_LABELS: Record<DeploymentPhase, string> = {
  PENDING: "Starting",
  DETECTING: "Detecting",
  RECONCILING: "Reconciling products",
  REMOVING_LEGACY: "Removing legacy Office",
  REMOVING_CLICK_TO_RUN: "Removing Click-to-Run",
  CONFIGURING: "Writing configuration",
  EXECUTING: "Running setup",
  COMPLETED: "Done",
  FAILED: "Failed",
};

export function phaseLabel(phase: DeploymentPhase): string {
  return PHASE_LABELS[phase];
}

export function formatPhase(phase: DeploymentPhase): string {
  return PHASE_COLORS[phase](PHASE_LABELS[phase]);
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<ErrorCategory, string> = {
  VALIDATION_ERROR: "Invalid arguments",
  BOOTSTRAP_ERROR: "Deployment files or settings unavailable",
  CONFIGURATION_ERROR: "Configuration document could not be built",
};

export function formatErrorCategory(category: ErrorCategory): string {
  return ERROR_LABELS[category];
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
