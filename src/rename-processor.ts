import fs from "fs/promises";
import fsSync from "fs";
import path from "path";
import { kindFromFsError } from "./errors.js";
import { log } from "./utils.js";
import type { RenameExecutionResult, RenamePlanEntry } from "./types.js";

/**
 * Executa as renomeações do plano, em ordem.
 *
 * Uma falha num arquivo é registrada e as demais entradas continuam; o que já
 * foi renomeado não é desfeito. Em modo simulação nada é tocado.
 */
export async function applyRenamePlan(
  dirPath: string,
  plan: readonly RenamePlanEntry[],
  options: { dryRun: boolean }
): Promise<RenameExecutionResult> {
  const result: RenameExecutionResult = { completed: [], failures: [] };

  if (options.dryRun) {
    log("debug", "Modo simulação: nenhuma renomeação executada");
    return result;
  }

  for (const entry of plan) {
    if (entry.outcome !== "Renamed") {
      continue;
    }

    const oldPath = path.join(dirPath, entry.originalName);
    const newPath = path.join(dirPath, entry.proposedName);

    // A pasta pode ter mudado desde a listagem
    if (fsSync.existsSync(newPath)) {
      result.failures.push({
        file: entry.originalName,
        target: entry.proposedName,
        kind: "NameConflict",
        message: `O destino já existe: ${entry.proposedName}`,
      });
      continue;
    }

    try {
      await fs.rename(oldPath, newPath);
      result.completed.push({ from: entry.originalName, to: entry.proposedName });
      log("debug", `Renomeado: ${entry.originalName} → ${entry.proposedName}`);
    } catch (error) {
      result.failures.push({
        file: entry.originalName,
        target: entry.proposedName,
        kind: kindFromFsError(error),
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return result;
}
