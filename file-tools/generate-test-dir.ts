#!/usr/bin/env node
/**
 * Gera uma pasta de exemplo para testar o remove-substring e o count-files
 *
 * Uso: generate-test-dir [pasta] [texto]   (padrão: ./test_data REMOVE)
 */

import "dotenv/config";
import { generateTestDirectory } from "../src/test-directory.js";

async function main(): Promise<void> {
  const basePath = process.argv[2] || "test_data";
  const targetStr = process.argv[3] || "REMOVE";

  const created = await generateTestDirectory(basePath, targetStr);
  console.log(`✅ Pasta de teste gerada com ${created.length} arquivos em ${basePath}`);
}

main().catch((error: unknown) => {
  console.error(`❌ Erro ao gerar pasta de teste: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
