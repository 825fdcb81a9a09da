#!/usr/bin/env node
/**
 * kg-ingest - CLI entry point
 */

import "dotenv/config";
import { createProgram } from "./cli/index.js";

await createProgram().parseAsync();
