import fs from "fs/promises";
import os from "os";
import path from "path";
import { LOG_LEVEL } from "./config.js";
import { FileToolError, fromFsError } from "./errors.js";
import type { FileEntry, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PREFIXES: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

/**
 * Função de log personalizada
 */
export function log(level: LogLevel, message: string): void {
  if (LEVELS[level] < LEVELS[LOG_LEVEL]) {
    return;
  }

  const timestamp = new Date().toLocaleTimeString();
  const line = `[${timestamp}] ${PREFIXES[level]} ${message}`;

  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Expande "~" para a pasta do usuário e devolve o caminho absoluto
 */
export function resolveDirectory(directory: string): string {
  let expanded = directory.trim();
  if (expanded === "~") {
    expanded = os.homedir();
  } else if (expanded.startsWith("~/") || expanded.startsWith("~\\")) {
    expanded = path.join(os.homedir(), expanded.slice(2));
  }
  return path.resolve(expanded);
}

/**
 * Verifica se o caminho existe e é um diretório
 */
export async function validateDirectory(dirPath: string): Promise<void> {
  const stats = await fs.stat(dirPath).catch((error: unknown) => {
    throw fromFsError(error, dirPath);
  });

  if (!stats.isDirectory()) {
    throw new FileToolError(
      "DirectoryNotFound",
      `O caminho não é um diretório: ${dirPath}`
    );
  }
}

/**
 * Lista as entradas do primeiro nível de uma pasta, ordenadas por nome
 */
export async function listDirectoryEntries(
  dirPath: string
): Promise<FileEntry[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .map((entry) => ({ name: entry.name, isFile: entry.isFile() }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw fromFsError(error, dirPath);
  }
}
