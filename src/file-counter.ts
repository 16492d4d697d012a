import fs from "fs/promises";
import path from "path";
import { CHART_BAR_WIDTH, NO_EXTENSION_LABEL } from "./config.js";
import { fromFsError } from "./errors.js";
import { log, validateDirectory } from "./utils.js";
import type { FileCountResult } from "./types.js";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Extensão em minúsculas com o ponto (".mp4"), ou o rótulo de arquivo sem extensão
 */
export function getFileExtension(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return ext || NO_EXTENSION_LABEL;
}

export function formatSize(sizeBytes: number): string {
  if (sizeBytes === 0) {
    return "0 B";
  }

  let size = sizeBytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * Conta arquivos e pastas do primeiro nível do diretório, agrupando os arquivos
 * por extensão e somando seus tamanhos
 */
export async function countFiles(dirPath: string): Promise<FileCountResult> {
  await validateDirectory(dirPath);
  const entries = await fs
    .readdir(dirPath, { withFileTypes: true })
    .catch((error: unknown) => {
      throw fromFsError(error, dirPath);
    });

  const result: FileCountResult = {
    fileCount: 0,
    dirCount: 0,
    fileTypes: {},
    totalSize: 0,
  };

  for (const entry of entries) {
    if (entry.isDirectory()) {
      result.dirCount++;
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }

    result.fileCount++;
    const ext = getFileExtension(entry.name);
    result.fileTypes[ext] = (result.fileTypes[ext] ?? 0) + 1;

    try {
      const stats = await fs.stat(path.join(dirPath, entry.name));
      result.totalSize += stats.size;
    } catch (error) {
      log(
        "warn",
        `Não foi possível ler o tamanho de ${entry.name}: ${
          (error as Error).message
        }`
      );
    }
  }

  return result;
}

function sortedTypes(fileTypes: Record<string, number>): Array<[string, number]> {
  return Object.entries(fileTypes).sort(
    ([extA, countA], [extB, countB]) =>
      countB - countA || (extA < extB ? -1 : extA > extB ? 1 : 0)
  );
}

function percentage(count: number, total: number): string {
  return ((count / total) * 100).toFixed(1);
}

/**
 * Gráfico de barras em texto da distribuição por tipo
 */
export function formatTypeChart(
  fileTypes: Record<string, number>,
  totalFiles: number
): string[] {
  const types = sortedTypes(fileTypes);
  if (types.length === 0) {
    return [];
  }

  const maxCount = types[0][1];
  const lines = ["📊 Distribuição por tipo:", "=".repeat(60)];

  for (const [fileType, count] of types) {
    const bar = "█".repeat(Math.floor((count / maxCount) * CHART_BAR_WIDTH));
    lines.push(
      `${fileType.padEnd(15)} | ${bar} ${String(count).padStart(4)} (${percentage(
        count,
        totalFiles
      ).padStart(5)}%)`
    );
  }

  lines.push("=".repeat(60));
  return lines;
}

export function formatTypeList(
  fileTypes: Record<string, number>,
  totalFiles: number
): string[] {
  const types = sortedTypes(fileTypes);
  if (types.length === 0) {
    return [];
  }

  return [
    "Distribuição por tipo:",
    ...types.map(
      ([fileType, count]) =>
        `  ${fileType}: ${count} arquivo(s) (${percentage(count, totalFiles)}%)`
    ),
  ];
}
