#!/usr/bin/env tsx
/**
 * Command-line entry point
 *
 * Usage: tsx scripts/rearrangement-index.ts <input_dir> [options]
 */

import { main } from "../src/cli";

process.exitCode = await main(process.argv.slice(2));
