#!/usr/bin/env node
/**
 * CLI entry point for the aop observation logger.
 */
process.title = "aop";

import { main } from "./main.js";

const exitCode = main(process.argv.slice(2), process.env);
process.exit(exitCode);
