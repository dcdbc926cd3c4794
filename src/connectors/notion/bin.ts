#!/usr/bin/env node
import { CommanderError } from "commander";
import { config as loadDotenv } from "dotenv";
import { buildProgram } from "./cli.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    console.error(`✗ ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
