import fsSync from "fs";
import * as readline from "readline";
import { CONFIRM_ANSWERS, MAX_PROMPT_ATTEMPTS } from "./config.js";
import { FileToolError } from "./errors.js";
import { resolveDirectory } from "./utils.js";
import type { AskFn } from "./types.js";

export interface PromptSession {
  ask: AskFn;
  close: () => void;
}

/**
 * Abre uma única interface de leitura para todas as perguntas da execução.
 * As linhas ficam guardadas até serem pedidas, então respostas redirecionadas
 * (printf '...' | remove-substring -i) chegam todas.
 */
export function createPromptSession(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): PromptSession {
  const rl = readline.createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();

  return {
    ask: async (question) => {
      output.write(question);
      const next = await lines.next();
      if (next.done) {
        throw new FileToolError(
          "InvalidArgument",
          "Entrada encerrada antes da resposta"
        );
      }
      return next.value;
    },
    close: () => rl.close(),
  };
}

function isDirectory(dirPath: string): boolean {
  return fsSync.existsSync(dirPath) && fsSync.statSync(dirPath).isDirectory();
}

/**
 * Pergunta o diretório de trabalho. Um valor já informado é usado se for válido.
 */
export async function askDirectory(
  ask: AskFn,
  initial?: string
): Promise<string> {
  if (initial) {
    const resolved = resolveDirectory(initial);
    if (isDirectory(resolved)) {
      console.log(`📂 Usando diretório informado: ${resolved}`);
      return resolved;
    }
    console.log(`❌ Diretório não existe ou não é válido: ${resolved}`);
  } else {
    console.log("💡 Dicas:");
    console.log("   - Cole o caminho completo da pasta");
    console.log("   - Caminhos relativos funcionam (. é a pasta atual)");
    console.log("   - ~ é a pasta do usuário (ex.: ~/Documentos)");
    console.log("");
  }

  for (let attempt = 1; attempt <= MAX_PROMPT_ATTEMPTS; attempt++) {
    const answer = (await ask("Diretório: ")).trim();
    if (!answer) {
      console.log("❌ O diretório não pode ser vazio");
      continue;
    }

    const resolved = resolveDirectory(answer);
    if (isDirectory(resolved)) {
      return resolved;
    }
    console.log(`❌ Diretório não existe ou não é válido: ${resolved}`);
  }

  throw new FileToolError(
    "DirectoryNotFound",
    `Nenhum diretório válido informado após ${MAX_PROMPT_ATTEMPTS} tentativas`
  );
}

/**
 * Pergunta o texto a remover. Espaços nas pontas fazem parte do texto.
 */
export async function askRemoveString(
  ask: AskFn,
  initial?: string
): Promise<string> {
  if (initial) {
    console.log(`✂️ Usando texto informado: '${initial}'`);
    return initial;
  }

  console.log("");
  console.log("💡 Digite o texto exato que deve sair dos nomes dos arquivos");
  console.log("   (maiúsculas e minúsculas são diferenciadas)");
  console.log("");

  for (let attempt = 1; attempt <= MAX_PROMPT_ATTEMPTS; attempt++) {
    const answer = await ask("Texto a remover: ");
    if (answer) {
      return answer;
    }
    console.log("❌ O texto a remover não pode ser vazio");
  }

  throw new FileToolError(
    "InvalidArgument",
    `Nenhum texto informado após ${MAX_PROMPT_ATTEMPTS} tentativas`
  );
}

export async function askConfirmation(
  ask: AskFn,
  question: string
): Promise<boolean> {
  const answer = (await ask(question)).trim().toLowerCase();
  return CONFIRM_ANSWERS.includes(answer);
}
