#!/usr/bin/env node
/**
 * Conta os arquivos de uma pasta por tipo
 */

import "dotenv/config";
import { COUNT_USAGE, parseCountArgs } from "../src/cli-args.js";
import { runCountCommand } from "../src/count-command.js";
import { FileToolError } from "../src/errors.js";

async function main(): Promise<number> {
  const options = parseCountArgs(process.argv.slice(2));
  if (options.help) {
    console.log(COUNT_USAGE);
    return 0;
  }
  return runCountCommand(options);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof FileToolError) {
      console.error(`❌ ${error.message}\n`);
      console.error(COUNT_USAGE);
    } else {
      console.error(`❌ Erro inesperado: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
  });
