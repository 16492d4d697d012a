import path from "path";

/**
 * Separa o nome do arquivo em base e extensão (".env" não tem extensão)
 */
export function splitExtension(fileName: string): { stem: string; ext: string } {
  const ext = path.extname(fileName);
  return { stem: fileName.slice(0, fileName.length - ext.length), ext };
}

/**
 * Limpa os restos deixados pela remoção do texto:
 * "Foo  -  - Bar" → "Foo - Bar", " - Foo_" → "Foo"
 */
export function cleanupName(stem: string): string {
  return stem
    .replace(/\s+/g, " ")
    .replace(/-(?:\s*-)+/g, "-")
    .replace(/^[\s_-]+|[\s_-]+$/g, "");
}

/**
 * Remove todas as ocorrências do texto. Sublinhados só são juntados onde o texto
 * saiu ("file_REMOVE_1" → "file_1"); os que já estavam no nome ficam.
 */
function removeOccurrences(stem: string, removeString: string): string {
  return stem
    .split(removeString)
    .reduce((joined, part) =>
      joined.endsWith("_") ? joined + part.replace(/^_+/, "") : joined + part
    );
}

/**
 * Gera o novo nome do arquivo removendo todas as ocorrências do texto.
 * A extensão é mantida como está. Retorna "" quando não sobra nada do nome.
 */
export function generateNewFileName(
  fileName: string,
  removeString: string
): string {
  const { stem, ext } = splitExtension(fileName);
  const newStem = cleanupName(removeOccurrences(stem, removeString));

  if (!newStem) {
    return "";
  }

  return `${newStem}${ext}`;
}
