#!/usr/bin/env node
/**
 * check_swap — monitoring plugin reporting swap usage
 *
 * Prints one status line and exits 0 (OK), 1 (WARNING), 2 (CRITICAL) or 3 (UNKNOWN).
 */

import { runPlugin } from "./src/app.js";

const { exitCode, output } = await runPlugin(process.argv.slice(2));
process.stdout.write(output + "\n", () => process.exit(exitCode));
