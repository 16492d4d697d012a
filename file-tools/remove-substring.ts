#!/usr/bin/env node
/**
 * Remove um texto dos nomes dos arquivos de uma pasta
 *
 * Exemplo:
 *   "Unreal Engine 5 C++- Advanced Action RPG - Activate Ability By Tag.mp4"
 *   removendo "Unreal Engine 5 C++- Advanced Action RPG - "
 *   → "Activate Ability By Tag.mp4"
 */

import "dotenv/config";
import { parseRenameArgs, RENAME_USAGE } from "../src/cli-args.js";
import { FileToolError } from "../src/errors.js";
import { runRenameCommand } from "../src/rename-command.js";

async function main(): Promise<number> {
  const options = parseRenameArgs(process.argv.slice(2));
  if (options.help) {
    console.log(RENAME_USAGE);
    return 0;
  }
  return runRenameCommand(options);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof FileToolError) {
      console.error(`❌ ${error.message}\n`);
      console.error(RENAME_USAGE);
    } else {
      console.error(`❌ Erro inesperado: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exitCode = 1;
  });
