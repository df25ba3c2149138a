#!/usr/bin/env tsx
/**
 * meshid: CLI entry point.
 */

import "dotenv/config";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { runCli } from "./cli.js";

const config = loadConfig();
const logger = pino({ level: config.logLevel }, pino.destination(2));

process.exitCode = runCli(process.argv.slice(2), { logger });
