import type { ErrorKind } from "./types.js";

/**
 * Erro dos scripts de arquivos, com o tipo usado para decidir a mensagem e o
 * código de saída
 */
export class FileToolError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "FileToolError";
    this.kind = kind;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error) {
    const code = error.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Converte um erro do sistema de arquivos (ENOENT, EACCES...) no tipo correspondente
 */
export function kindFromFsError(error: unknown): ErrorKind {
  switch (errorCode(error)) {
    case "ENOENT":
    case "ENOTDIR":
      return "DirectoryNotFound";
    case "EACCES":
    case "EPERM":
      return "PermissionDenied";
    case "EEXIST":
    case "ENOTEMPTY":
      return "NameConflict";
    default:
      return "Unknown";
  }
}

export function fromFsError(error: unknown, filePath: string): FileToolError {
  if (error instanceof FileToolError) {
    return error;
  }

  const kind = kindFromFsError(error);
  const detail = error instanceof Error ? error.message : String(error);

  switch (kind) {
    case "DirectoryNotFound":
      return new FileToolError(kind, `Diretório não encontrado: ${filePath}`);
    case "PermissionDenied":
      return new FileToolError(kind, `Sem permissão para acessar: ${filePath}`);
    default:
      return new FileToolError(kind, `Erro ao acessar ${filePath}: ${detail}`);
  }
}
