#!/usr/bin/env tsx

/**
 * topicsearch CLI entry point
 */

import { run } from "./program.js";

const exitCode = await run(process.argv);
process.exit(exitCode);
