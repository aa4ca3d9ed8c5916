#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { buildProgram } from "./program";
import { runSnap } from "../commands/snap";
import { envDefaults } from "../config/env";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SCROLLSNAP_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = buildProgram({
  envPath,
  defaults: envDefaults(),
  run: async (options) => {
    const result = await runSnap(options);
    if (result.failures.length > 0) {
      process.exitCode = 1;
    }
  }
});

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
