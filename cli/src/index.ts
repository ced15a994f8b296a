#!/usr/bin/env node

/**
 * c2r-deploy CLI — Entry Point
 *
 * Deploys Microsoft Office Click-to-Run product editions with the Office
 * Deployment Tool, removing legacy MSI-based Office first.
 *
 * Commands:
 *   c2r-deploy deploy <product>   Install, migrate or remove an edition
 *   c2r-deploy detect             Show installed Office products
 *   c2r-deploy products           List deployable editions and rules
 *
 * Exit codes:
 *   0 / 3010 / 1641   success (the latter two need a restart)
 *   1602              cancelled at the welcome prompt
 *   60001             unexpected failure
 *   60008             deployment files or settings unavailable
 *   anything else     setup.exe's own exit code
 */

import { exitCodeForError } from "@c2r-deploy/engine";
import { createProgram } from "./program";

// Parse command line
createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(exitCodeForError(err));
  });
