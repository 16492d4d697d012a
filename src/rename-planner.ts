import { FileToolError } from "./errors.js";
import { generateNewFileName, splitExtension } from "./rename-utils.js";
import type {
  ConflictReason,
  FileEntry,
  RenamePlanEntry,
  RenameSummary,
  SkipReason,
} from "./types.js";

const RESERVED_NAMES: ReadonlySet<string> = new Set([".", ".."]);

function proposeRename(fileName: string, removeString: string): RenamePlanEntry {
  const skip = (reason: SkipReason): RenamePlanEntry => ({
    outcome: "Skipped",
    originalName: fileName,
    proposedName: fileName,
    reason,
  });

  if (!fileName.includes(removeString)) {
    return skip("NO_MATCH");
  }

  // Texto só na extensão: a extensão nunca é alterada
  if (!splitExtension(fileName).stem.includes(removeString)) {
    return skip("UNCHANGED");
  }

  const newName = generateNewFileName(fileName, removeString);
  // ".REMOVE" vira "." e ".REMOVE." vira "..": nomes reservados da pasta
  if (!newName || RESERVED_NAMES.has(newName)) {
    return skip("EMPTY_RESULT");
  }
  if (newName === fileName) {
    return skip("UNCHANGED");
  }

  return { outcome: "Renamed", originalName: fileName, proposedName: newName };
}

function toConflict(
  entry: RenamePlanEntry,
  reason: ConflictReason
): RenamePlanEntry {
  return {
    outcome: "Conflict",
    originalName: entry.originalName,
    proposedName: entry.proposedName,
    reason,
  };
}

/**
 * Monta o plano de renomeação de uma listagem de pasta.
 *
 * Só arquivos são candidatos, mas todos os nomes da listagem (pastas inclusive)
 * contam como ocupados. Um destino é livre apenas se ninguém mais o propõe e,
 * caso exista na pasta, o dono dele é renomeado antes na ordem do plano.
 */
export function planRenames(
  entries: readonly FileEntry[],
  removeString: string
): RenamePlanEntry[] {
  if (!removeString) {
    throw new FileToolError(
      "InvalidArgument",
      "O texto a remover não pode ser vazio"
    );
  }

  let plan = entries
    .filter((entry) => entry.isFile)
    .map((entry) => proposeRename(entry.name, removeString));

  const targetCounts = new Map<string, number>();
  for (const entry of plan) {
    if (entry.outcome === "Renamed") {
      targetCounts.set(
        entry.proposedName,
        (targetCounts.get(entry.proposedName) ?? 0) + 1
      );
    }
  }
  plan = plan.map((entry) =>
    entry.outcome === "Renamed" && (targetCounts.get(entry.proposedName) ?? 0) > 1
      ? toConflict(entry, "DUPLICATE_TARGET")
      : entry
  );

  const occupied = new Set(entries.map((entry) => entry.name));
  let changed = true;

  // Cada conflito novo mantém um nome ocupado, então repete até estabilizar
  while (changed) {
    const vacatedAt = new Map<string, number>();
    plan.forEach((entry, index) => {
      if (entry.outcome === "Renamed") {
        vacatedAt.set(entry.originalName, index);
      }
    });

    const next = plan.map((entry, index) => {
      if (entry.outcome !== "Renamed" || !occupied.has(entry.proposedName)) {
        return entry;
      }
      const vacated = vacatedAt.get(entry.proposedName);
      if (vacated !== undefined && vacated < index) {
        return entry;
      }
      return toConflict(entry, "EXISTING_FILE");
    });

    changed = next.some((entry, index) => entry !== plan[index]);
    plan = next;
  }

  return plan;
}

/**
 * Conta os resultados do plano
 */
export function summarizePlan(
  plan: readonly RenamePlanEntry[],
  failed: number = 0
): RenameSummary {
  return {
    total: plan.length,
    renamed: plan.filter((entry) => entry.outcome === "Renamed").length - failed,
    skipped: plan.filter((entry) => entry.outcome === "Skipped").length,
    conflicts: plan.filter((entry) => entry.outcome === "Conflict").length,
    failed,
  };
}
