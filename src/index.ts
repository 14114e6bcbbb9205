#!/usr/bin/env node
/**
 * gfx-prune — remove unused GFX support files from AMD ROCm installs.
 */
import process from "node:process";
import { buildProgram } from "./cli/program.js";
import { exitOnCrash } from "./cli/crash.js";

process.on("uncaughtException", exitOnCrash("Uncaught exception"));
process.on("unhandledRejection", exitOnCrash("Unhandled rejection"));

void buildProgram().parseAsync(process.argv).catch(exitOnCrash("CLI failed"));
