/**
 * c2r-deploy Engine — External Process Runner
 *
 * Every external program this tool starts (setup.exe, cscript.exe with a
 * removal script) goes through a ProcessRunner. Each call is awaited to
 * completion before the next step; there are no timeouts and no retries.
 */

import { spawn } from "child_process";
import { Logger } from "../utils/logger";
import { EXIT_LAUNCH_FAILURE } from "./types";

export interface ProcessRunner {
  /**
   * Run `file` with `args` and resolve with its exit code.
   * Resolves EXIT_LAUNCH_FAILURE (-1) when the process cannot be started.
   */
  execute(file: string, args: string[]): Promise<number>;
}

/**
 * Format a command line for logging. Arguments containing spaces are quoted.
 */
export function formatCommand(file: string, args: string[]): string {
  const quote = (a: string) => (/\s/.test(a) ? `"${a}"` : a);
  return [file, ...args].map(quote).join(" ");
}

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  execute(file: string, args: string[]): Promise<number> {
    const command = formatCommand(file, args);
    this.logger.info({ command }, "Executing process");
    const startMs = Date.now();

    return new Promise<number>((resolve) => {
      const stderrChunks: Buffer[] = [];

      const child = spawn(file, args, {
        stdio: ["ignore", "ignore", "pipe"],
        windowsHide: true,
      });

      // null when spawn fails before the pipes exist
      child.stderr?.on("data", (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      child.on("close", (code) => {
        const exitCode = code ?? 1;
        const stderr = Buffer.concat(stderrChunks).toString("utf-8").trim();
        if (stderr) {
          this.logger.debug({ command, stderr }, "Process stderr output");
        }
        this.logger.info(
          { command, exitCode, durationMs: Date.now() - startMs },
          "Process finished",
        );
        resolve(exitCode);
      });

      child.on("error", (err) => {
        this.logger.error(
          { command, error: err.message },
          "Failed to launch process",
        );
        resolve(EXIT_LAUNCH_FAILURE);
      });
    });
  }
}
