// Tipos compartilhados pelos scripts de renomeação e contagem de arquivos

export interface FileEntry {
  name: string;
  isFile: boolean;
}

export type SkipReason = "NO_MATCH" | "EMPTY_RESULT" | "UNCHANGED";

export type ConflictReason = "DUPLICATE_TARGET" | "EXISTING_FILE";

export type RenamePlanEntry =
  | {
      outcome: "Renamed";
      originalName: string;
      proposedName: string;
    }
  | {
      outcome: "Skipped";
      originalName: string;
      proposedName: string;
      reason: SkipReason;
    }
  | {
      outcome: "Conflict";
      originalName: string;
      proposedName: string;
      reason: ConflictReason;
    };

export interface RenameSummary {
  total: number;
  renamed: number;
  skipped: number;
  conflicts: number;
  failed: number;
}

export type ErrorKind =
  | "InvalidArgument"
  | "DirectoryNotFound"
  | "PermissionDenied"
  | "NameConflict"
  | "Unknown";

export interface RenameFailure {
  file: string;
  target: string;
  kind: ErrorKind;
  message: string;
}

export interface RenameExecutionResult {
  completed: Array<{ from: string; to: string }>;
  failures: RenameFailure[];
}

export interface RenameOptions {
  directory?: string;
  removeString?: string;
  dryRun: boolean;
  interactive: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CountOptions {
  directory?: string;
  size: boolean;
  chart: boolean;
  verbose: boolean;
  help: boolean;
}

export interface FileCountResult {
  fileCount: number;
  dirCount: number;
  fileTypes: Record<string, number>;
  totalSize: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

// Função de pergunta usada pelo modo interativo
export type AskFn = (question: string) => Promise<string>;
