// Tipos para a marcação de estrelas em arquivos RAW

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface FileEntry {
  fileName: string;
  filePath: string;
  baseName: string; // nome sem a última extensão, caixa preservada
  extension: string;
}

export interface BasenameListing {
  fileNames: string[];
  baseNames: string[];
  entries: FileEntry[];
}

export interface RunResult {
  readonly succeeded: readonly string[];
  readonly failed: readonly string[];
}

export interface ReportData {
  timestamp: string;
  rating: number;
  summary: {
    total: number;
    succeeded: number;
    failed: number;
  };
  succeeded: string[];
  failed: string[];
}

// Resultado de um processo externo
export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  launchError?: Error;
}

export type CommandRunner = (
  command: string,
  args: string[]
) => Promise<CommandResult>;

export interface ToolStatus {
  available: boolean;
  version?: string;
  error?: string;
}

export type RatingFallback = "empty" | "invalid" | "out-of-range";

export interface RatingParseResult {
  rating: number;
  fallback: RatingFallback | null;
}

// Configurações
export interface RatingToolConfig {
  EXIFTOOL_PATH: string;
  RATING_TAG: string;
  JPEG_EXTENSIONS: string[];
  RAW_EXTENSIONS: string[];
  DEFAULT_RATING: number;
  MIN_RATING: number;
  MAX_RATING: number;
  LOG_FILE: string;
  REPORT_JSON: string;
  LOG_LEVEL: LogLevel;
  PREVIEW_LIMIT: number;
}

// Estados do fluxo principal, na ordem em que são percorridos
export type WorkflowState =
  | "toolCheck"
  | "sourceFolderInput"
  | "sourceScan"
  | "targetFolderInput"
  | "matchScan"
  | "ratingInput"
  | "confirm"
  | "apply";

export type AbortReason =
  | "tool-missing"
  | "invalid-folder"
  | "no-source-files"
  | "no-matches";

export type WorkflowOutcome =
  | { status: "completed"; rating: number; result: RunResult; logPath: string }
  | {
      status: "aborted";
      state: WorkflowState;
      reason: AbortReason;
      message: string;
    }
  | { status: "cancelled"; files: string[]; rating: number }
  | { status: "dry-run"; files: string[]; rating: number }
  | { status: "interrupted"; state: WorkflowState }
  | { status: "report-failed"; result: RunResult; error: Error };

export type Step<T> =
  | { ok: true; value: T }
  | { ok: false; outcome: WorkflowOutcome };
