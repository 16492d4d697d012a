// Configurações dos scripts de arquivos
// Variáveis de ambiente são carregadas do .env pelos scripts (import "dotenv/config")
import type { LogLevel } from "./types.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  return level ?? "info";
}

export const LOG_LEVEL: LogLevel = parseLogLevel(
  process.env.FILE_TOOLS_LOG_LEVEL
);

// true para que o remove-substring simule por padrão, sem renomear
export const DRY_RUN: boolean =
  (process.env.FILE_TOOLS_DRY_RUN || "").trim().toLowerCase() === "true";

export const MAX_PROMPT_ATTEMPTS: number = 3; // tentativas por pergunta no modo interativo
export const CHART_BAR_WIDTH: number = 40; // tamanho máximo da barra do gráfico de tipos
export const CONFIRM_ANSWERS: readonly string[] = ["s", "sim", "y", "yes"];
export const NO_EXTENSION_LABEL: string = "sem extensão";

