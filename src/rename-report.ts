import type {
  ConflictReason,
  RenameFailure,
  RenamePlanEntry,
  RenameSummary,
  SkipReason,
} from "./types.js";

export const DIVIDER = "═══════════════════════════════════════════";

const SKIP_LABELS: Record<SkipReason, string> = {
  NO_MATCH: "texto não encontrado",
  EMPTY_RESULT: "o nome ficaria vazio",
  UNCHANGED: "o nome não muda",
};

const CONFLICT_LABELS: Record<ConflictReason, string> = {
  DUPLICATE_TARGET: "outro arquivo teria o mesmo nome",
  EXISTING_FILE: "já existe um arquivo com esse nome",
};

export function formatHeader(title: string): string[] {
  return [DIVIDER, title, DIVIDER, ""];
}

export function formatRenameSettings(settings: {
  directory: string;
  removeString: string;
  dryRun: boolean;
}): string[] {
  return [
    "⚙️ Configurações:",
    `   - Diretório: ${settings.directory}`,
    `   - Texto a remover: '${settings.removeString}'`,
    `   - Modo simulação: ${settings.dryRun ? "Sim" : "Não"}`,
    "",
  ];
}

/**
 * Linha de uma entrada do plano. Arquivos sem alteração só aparecem no modo detalhado.
 */
function formatPlanEntry(
  entry: RenamePlanEntry,
  verbose: boolean
): string | null {
  switch (entry.outcome) {
    case "Renamed":
      return `   🔄 ${entry.originalName} → ${entry.proposedName}`;
    case "Conflict":
      return `   ⚠️ Conflito: ${entry.originalName} → ${entry.proposedName} (${
        CONFLICT_LABELS[entry.reason]
      })`;
    case "Skipped":
      return verbose
        ? `   ⏭️ Sem alteração: ${entry.originalName} (${SKIP_LABELS[entry.reason]})`
        : null;
  }
}

export function formatPlan(
  plan: readonly RenamePlanEntry[],
  verbose: boolean
): string[] {
  const lines: string[] = [];
  for (const entry of plan) {
    const line = formatPlanEntry(entry, verbose);
    if (line !== null) {
      lines.push(line);
    }
  }
  return lines;
}

export function formatFailure(failure: RenameFailure): string {
  return `   ❌ Erro ao renomear ${failure.file} → ${failure.target}: ${failure.message}`;
}

export function formatSummary(summary: RenameSummary, dryRun: boolean): string[] {
  return [
    "",
    DIVIDER,
    dryRun ? "🔍 SIMULAÇÃO CONCLUÍDA" : "✅ PROCESSAMENTO CONCLUÍDO",
    DIVIDER,
    "",
    `   Arquivos analisados: ${summary.total}`,
    `   ${dryRun ? "Arquivos a renomear" : "Arquivos renomeados"}: ${summary.renamed}`,
    `   Arquivos sem alteração: ${summary.skipped}`,
    `   Conflitos: ${summary.conflicts}`,
    `   Erros: ${summary.failed}`,
    "",
  ];
}
