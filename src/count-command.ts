import fs from "fs/promises";
import { COUNT_USAGE } from "./cli-args.js";
import { FileToolError } from "./errors.js";
import {
  countFiles,
  formatSize,
  formatTypeChart,
  formatTypeList,
} from "./file-counter.js";
import { DIVIDER } from "./rename-report.js";
import { resolveDirectory } from "./utils.js";
import type { CountOptions } from "./types.js";

/**
 * Executa o count-files e devolve o código de saída
 */
export async function runCountCommand(options: CountOptions): Promise<number> {
  if (!options.directory) {
    console.error("❌ Informe o diretório a contar\n");
    console.error(COUNT_USAGE);
    return 1;
  }

  const directory = resolveDirectory(options.directory);

  try {
    console.log(`📂 Contando arquivos em: ${directory}`);
    console.log(DIVIDER);

    const result = await countFiles(directory);

    console.log(`Total de arquivos: ${result.fileCount}`);
    console.log(`Total de pastas: ${result.dirCount}`);

    const distribution = options.chart
      ? formatTypeChart(result.fileTypes, result.fileCount)
      : formatTypeList(result.fileTypes, result.fileCount);
    if (distribution.length > 0) {
      console.log("");
      for (const line of distribution) {
        console.log(line);
      }
    }

    if (options.size) {
      console.log(`Tamanho total: ${formatSize(result.totalSize)}`);
    }

    if (options.verbose) {
      const stats = await fs.stat(directory);
      console.log("\nDetalhes:");
      console.log(`   Caminho absoluto: ${directory}`);
      console.log(`   Permissões: ${(stats.mode & 0o777).toString(8).padStart(3, "0")}`);
      console.log(`   Dono (uid): ${stats.uid}`);
    }

    console.log(DIVIDER);
    console.log("✅ Contagem concluída!");
    return 0;
  } catch (error) {
    if (error instanceof FileToolError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}
