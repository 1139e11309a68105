import type { WorkflowOutcome } from "../src/types.js";

export interface CLIArgs {
  help: boolean;
  yes: boolean;
  dryRun: boolean;
  noPause: boolean;
  jpegFolder?: string;
  rawFolder?: string;
  rating?: string;
  logFile?: string;
}

// Valor após o primeiro "=", preservando "=" dentro de caminhos
function valueOf(arg: string): string {
  return arg.slice(arg.indexOf("=") + 1);
}

export function parseArgs(argv: string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    yes: false,
    dryRun: false,
    noPause: false,
  };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--yes" || arg === "-y") {
      result.yes = true;
    } else if (arg === "--dry-run") {
      result.dryRun = true;
    } else if (arg === "--no-pause") {
      result.noPause = true;
    } else if (arg.startsWith("--jpeg-dir=")) {
      result.jpegFolder = valueOf(arg);
    } else if (arg.startsWith("--raw-dir=")) {
      result.rawFolder = valueOf(arg);
    } else if (arg.startsWith("--rating=")) {
      result.rating = valueOf(arg);
    } else if (arg.startsWith("--log-file=")) {
      result.logFile = valueOf(arg);
    } else {
      console.warn(`⚠️  Opção desconhecida ignorada: ${arg}`);
    }
  }

  return result;
}

export function displayHelp(): void {
  console.log(`
RATE RAW - Classificação por estrelas em arquivos RAW

Procura, na pasta RAW, os arquivos com o mesmo nome dos JPEGs de baixa
qualidade e grava a classificação (XMP:Rating) com o ExifTool.

REQUISITOS:
  - ExifTool instalado e no PATH (ou RAW_RATING_EXIFTOOL no .env)

USO:
  npm run rate-raw -- [OPÇÕES]

OPÇÕES:
  --help, -h            Mostra ajuda
  --yes, -y             Confirma automaticamente a aplicação
  --dry-run             Lista o que seria feito, sem alterar arquivos
  --no-pause            Não espera Enter antes de sair
  --jpeg-dir=PATH       Pasta de JPEGs de baixa qualidade
  --raw-dir=PATH        Pasta principal de arquivos RAW
  --rating=N            Classificação de 1 a 5 (padrão: 4)
  --log-file=PATH       Arquivo de log (padrão: rating_log.txt)

VARIÁVEIS DE AMBIENTE:
  RAW_RATING_EXIFTOOL         Executável do ExifTool
  RAW_RATING_LOG_FILE         Arquivo de log
  RAW_RATING_REPORT_JSON      Relatório JSON opcional
  RAW_RATING_RAW_EXTENSIONS   Extensões RAW (ex: .arw,.raw,.nef)
  RAW_RATING_LOG_LEVEL        debug | info | warn | error
`);
}

/**
 * Código de saída do processo para cada desfecho
 */
export function exitCodeFor(outcome: WorkflowOutcome): number {
  switch (outcome.status) {
    case "completed":
      return outcome.result.failed.length > 0 ? 1 : 0;
    case "report-failed":
      return 1;
    case "interrupted":
      return 130;
    case "aborted":
    case "cancelled":
    case "dry-run":
      return 0;
  }
}
