import { FileToolError } from "./errors.js";
import {
  askConfirmation,
  askDirectory,
  askRemoveString,
  createPromptSession,
} from "./prompts.js";
import type { PromptSession } from "./prompts.js";
import { applyRenamePlan } from "./rename-processor.js";
import { planRenames, summarizePlan } from "./rename-planner.js";
import {
  formatFailure,
  formatHeader,
  formatPlan,
  formatRenameSettings,
  formatSummary,
} from "./rename-report.js";
import { listDirectoryEntries, resolveDirectory, validateDirectory } from "./utils.js";
import type { AskFn, RenameOptions } from "./types.js";

interface ResolvedInputs {
  directory: string;
  removeString: string;
  confirmed: boolean;
}

async function collectInteractiveInputs(
  options: RenameOptions,
  ask: AskFn
): Promise<ResolvedInputs> {
  console.log("=== Remover texto dos nomes - modo interativo ===\n");

  const directory = await askDirectory(ask, options.directory);
  const removeString = await askRemoveString(ask, options.removeString);

  console.log("");
  console.log("📋 Resumo da operação:");
  console.log(`   Diretório: ${directory}`);
  console.log(`   Texto a remover: '${removeString}'`);
  console.log(`   Modo simulação: ${options.dryRun ? "Sim" : "Não"}`);

  if (options.dryRun) {
    return { directory, removeString, confirmed: true };
  }

  console.log("");
  console.log("⚠️  Os arquivos serão renomeados de verdade!");
  console.log("   Use --dry-run para ver o resultado antes");
  const confirmed = await askConfirmation(ask, "Continuar? (s/N): ");
  return { directory, removeString, confirmed };
}

/**
 * Executa o remove-substring e devolve o código de saída. Sem `ask`, as perguntas
 * vão para o terminal por uma sessão fechada ao fim da execução.
 */
export async function runRenameCommand(
  options: RenameOptions,
  ask?: AskFn
): Promise<number> {
  let session: PromptSession | undefined;
  try {
    let inputs: ResolvedInputs;
    if (
      options.interactive ||
      options.directory === undefined ||
      options.removeString === undefined
    ) {
      if (!ask) {
        session = createPromptSession();
        ask = session.ask;
      }
      inputs = await collectInteractiveInputs(options, ask);
      if (!inputs.confirmed) {
        console.log("Operação cancelada");
        return 0;
      }
    } else {
      inputs = {
        directory: options.directory,
        removeString: options.removeString,
        confirmed: true,
      };
    }

    if (!inputs.removeString) {
      throw new FileToolError(
        "InvalidArgument",
        "O texto a remover não pode ser vazio"
      );
    }

    const directory = resolveDirectory(inputs.directory);
    await validateDirectory(directory);
    const entries = await listDirectoryEntries(directory);

    for (const line of formatHeader("✂️  REMOVENDO TEXTO DOS NOMES DE ARQUIVOS")) {
      console.log(line);
    }
    for (const line of formatRenameSettings({
      directory,
      removeString: inputs.removeString,
      dryRun: options.dryRun,
    })) {
      console.log(line);
    }

    const plan = planRenames(entries, inputs.removeString);
    if (plan.length === 0) {
      console.log(`Nenhum arquivo encontrado em ${directory}`);
      return 0;
    }

    console.log(`🔄 ${plan.length} arquivo(s) encontrado(s)\n`);
    for (const line of formatPlan(plan, options.verbose)) {
      console.log(line);
    }

    const result = await applyRenamePlan(directory, plan, {
      dryRun: options.dryRun,
    });
    for (const failure of result.failures) {
      console.error(formatFailure(failure));
    }

    const summary = summarizePlan(plan, result.failures.length);
    for (const line of formatSummary(summary, options.dryRun)) {
      console.log(line);
    }

    if (options.dryRun) {
      console.log(
        "🔍 MODO DE SIMULAÇÃO - Nenhum arquivo foi renomeado. Remova --dry-run para renomear.\n"
      );
    }

    return result.failures.length > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof FileToolError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    session?.close();
  }
}
