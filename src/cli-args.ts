import { parseArgs } from "util";
import { DRY_RUN } from "./config.js";
import { FileToolError } from "./errors.js";
import type { CountOptions, RenameOptions } from "./types.js";

export const RENAME_USAGE = `Uso: remove-substring [diretório] [texto_a_remover] [opções]

Remove um texto dos nomes dos arquivos de uma pasta (sem entrar em subpastas).
Sem diretório ou texto, os valores são pedidos no terminal.

Opções:
  --dry-run            Mostra o que seria renomeado, sem renomear
  -i, --interactive    Pede os valores no terminal
  -v, --verbose        Mostra também os arquivos sem alteração
  -h, --help           Mostra esta ajuda

Exemplos:
  remove-substring ./videos "Unreal Engine 5 C++- Advanced Action RPG - "
  remove-substring ./videos "prefixo " --dry-run
  remove-substring -i`;

export const COUNT_USAGE = `Uso: count-files <diretório> [opções]

Conta os arquivos de uma pasta (sem entrar em subpastas) por tipo.

Opções:
  --no-size            Não mostra o tamanho total
  --no-chart           Mostra a distribuição em lista, sem gráfico
  -v, --verbose        Mostra caminho absoluto, permissões e dono
  -h, --help           Mostra esta ajuda`;

function parseOrFail<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    // parseArgs lança TypeError para opções desconhecidas ou mal formadas
    throw new FileToolError("InvalidArgument", (error as Error).message);
  }
}

export function parseRenameArgs(argv: readonly string[]): RenameOptions {
  const { values, positionals } = parseOrFail(() =>
    parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        "dry-run": { type: "boolean" },
        interactive: { type: "boolean", short: "i" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    })
  );

  if (positionals.length > 2) {
    throw new FileToolError(
      "InvalidArgument",
      `Argumentos demais: ${positionals.slice(2).join(" ")}`
    );
  }

  return {
    directory: positionals[0],
    removeString: positionals[1],
    dryRun: values["dry-run"] ?? DRY_RUN,
    interactive: values.interactive ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

export function parseCountArgs(argv: readonly string[]): CountOptions {
  const { values, positionals } = parseOrFail(() =>
    parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        "no-size": { type: "boolean" },
        "no-chart": { type: "boolean" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    })
  );

  if (positionals.length > 1) {
    throw new FileToolError(
      "InvalidArgument",
      `Argumentos demais: ${positionals.slice(1).join(" ")}`
    );
  }

  return {
    directory: positionals[0],
    size: !values["no-size"],
    chart: !values["no-chart"],
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}
