import { checkExiftool, runCommand } from "./exiftool.js";
import { listBasenames } from "./file-index.js";
import {
  isAffirmative,
  isDirectory,
  parseRating,
  previewList,
} from "./input-utils.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import type { Prompter } from "./prompt.js";
import { applyRating } from "./rating-applier.js";
import { findMatchingRawFiles } from "./raw-matcher.js";
import {
  createReport,
  ReportWriteError,
  saveJsonReport,
  writeReport,
} from "./report.js";
import type {
  AbortReason,
  CommandRunner,
  FileEntry,
  RatingToolConfig,
  Step,
  WorkflowOutcome,
  WorkflowState,
} from "./types.js";

export const EXIFTOOL_INSTALL_URL = "https://exiftool.org/install.html";

// Respostas vindas da linha de comando; passam pela mesma validação das digitadas
export interface WorkflowPresets {
  jpegFolder?: string;
  rawFolder?: string;
  rating?: string;
}

export interface WorkflowDeps {
  config: RatingToolConfig;
  prompter: Prompter;
  logger?: Logger;
  runner?: CommandRunner;
  signal?: AbortSignal;
  presets?: WorkflowPresets;
  assumeYes?: boolean;
  dryRun?: boolean;
}

interface Context extends WorkflowDeps {
  logger: Logger;
  runner: CommandRunner;
}

function ok<T>(value: T): Step<T> {
  return { ok: true, value };
}

function stop<T>(outcome: WorkflowOutcome): Step<T> {
  return { ok: false, outcome };
}

function abort<T>(
  ctx: Context,
  state: WorkflowState,
  reason: AbortReason,
  message: string
): Step<T> {
  ctx.logger.log("error", message);
  return stop({ status: "aborted", state, reason, message });
}

function interruptedOutcome(ctx: Context, state: WorkflowState): WorkflowOutcome {
  ctx.logger.print("\n⛔ Operação interrompida pelo usuário");
  return { status: "interrupted", state };
}

function interrupted<T>(ctx: Context, state: WorkflowState): Step<T> {
  return stop(interruptedOutcome(ctx, state));
}

/**
 * Usa a resposta predefinida, se houver, ou pergunta ao usuário
 */
async function answer(
  ctx: Context,
  state: WorkflowState,
  question: string,
  preset?: string
): Promise<Step<string>> {
  if (ctx.signal?.aborted) return interrupted(ctx, state);

  if (preset !== undefined) {
    ctx.logger.print(`${question}${preset}`);
    return ok(preset);
  }

  const reply = await ctx.prompter.ask(question);
  return reply === null ? interrupted(ctx, state) : ok(reply);
}

async function checkTool(ctx: Context): Promise<Step<void>> {
  const status = await checkExiftool(ctx.config.EXIFTOOL_PATH, ctx.runner);

  if (!status.available) {
    ctx.logger.print(`💡 Instruções de instalação: ${EXIFTOOL_INSTALL_URL}`);
    return abort(
      ctx,
      "toolCheck",
      "tool-missing",
      "ExifTool não encontrado. Instale o ExifTool antes de executar este script."
    );
  }

  ctx.logger.log("debug", `ExifTool ${status.version ?? "(versão desconhecida)"}`);
  return ok(undefined);
}

async function askFolder(
  ctx: Context,
  state: "sourceFolderInput" | "targetFolderInput",
  question: string,
  preset?: string
): Promise<Step<string>> {
  const reply = await answer(ctx, state, question, preset);
  if (!reply.ok) return reply;

  const folder = reply.value.trim();
  if (!(await isDirectory(folder))) {
    return abort(
      ctx,
      state,
      "invalid-folder",
      `A pasta '${folder}' não existe ou não é um diretório válido`
    );
  }
  return ok(folder);
}

async function scanSource(ctx: Context, jpegFolder: string): Promise<Step<string[]>> {
  const { fileNames, baseNames } = await listBasenames(
    jpegFolder,
    ctx.config.JPEG_EXTENSIONS,
    ctx.logger
  );

  if (fileNames.length === 0) {
    return abort(
      ctx,
      "sourceScan",
      "no-source-files",
      `Nenhum arquivo JPEG encontrado em '${jpegFolder}'`
    );
  }

  ctx.logger.print(`\n📷 ${fileNames.length} arquivos JPEG encontrados em '${jpegFolder}':`);
  previewList(fileNames, ctx.config.PREVIEW_LIMIT).forEach((line) => ctx.logger.print(line));
  return ok(baseNames);
}

async function scanMatches(
  ctx: Context,
  rawFolder: string,
  baseNames: string[]
): Promise<Step<FileEntry[]>> {
  ctx.logger.print(`\n🔍 Procurando arquivos RAW correspondentes em '${rawFolder}'...`);
  const matches = await findMatchingRawFiles(
    rawFolder,
    baseNames,
    ctx.config.RAW_EXTENSIONS,
    ctx.logger
  );

  if (matches.length === 0) {
    return abort(ctx, "matchScan", "no-matches", "Nenhum arquivo RAW correspondente encontrado");
  }

  ctx.logger.print(`\n📷 ${matches.length} arquivos RAW correspondentes:`);
  previewList(
    matches.map((match) => match.filePath),
    ctx.config.PREVIEW_LIMIT
  ).forEach((line) => ctx.logger.print(line));
  return ok(matches);
}

async function askRating(ctx: Context): Promise<Step<number>> {
  const { DEFAULT_RATING, MIN_RATING, MAX_RATING } = ctx.config;
  const reply = await answer(
    ctx,
    "ratingInput",
    `\n⭐ Classificação a aplicar (${MIN_RATING}-${MAX_RATING}, padrão ${DEFAULT_RATING}): `,
    ctx.presets?.rating
  );
  if (!reply.ok) return reply;

  const { rating, fallback } = parseRating(reply.value, DEFAULT_RATING, MIN_RATING, MAX_RATING);
  if (fallback === "out-of-range") {
    ctx.logger.log(
      "warn",
      `A classificação deve estar entre ${MIN_RATING} e ${MAX_RATING}, usando o padrão ${DEFAULT_RATING}`
    );
  } else if (fallback === "invalid") {
    ctx.logger.log("warn", `Entrada inválida, usando o padrão ${DEFAULT_RATING}`);
  }
  return ok(rating);
}

async function confirm(ctx: Context, files: string[], rating: number): Promise<Step<void>> {
  const reply = await answer(
    ctx,
    "confirm",
    `\nConfirmar a classificação ${rating} em ${files.length} arquivos RAW? (y/n): `,
    ctx.assumeYes ? "y" : undefined
  );
  if (!reply.ok) return reply;

  if (!isAffirmative(reply.value)) {
    ctx.logger.print("Operação cancelada");
    return stop({ status: "cancelled", files, rating });
  }
  return ok(undefined);
}

async function apply(ctx: Context, files: string[], rating: number): Promise<WorkflowOutcome> {
  if (ctx.signal?.aborted) return interruptedOutcome(ctx, "apply");

  if (ctx.dryRun) {
    ctx.logger.print(`\n[DRY RUN] Aplicaria ${rating} estrelas em ${files.length} arquivos:`);
    files.forEach((file) => ctx.logger.print(`- ${file}`));
    return { status: "dry-run", files, rating };
  }

  ctx.logger.print("\n⚙️  Aplicando classificação...");
  const result = await applyRating(files, rating, {
    exiftoolPath: ctx.config.EXIFTOOL_PATH,
    ratingTag: ctx.config.RATING_TAG,
    runner: ctx.runner,
    logger: ctx.logger,
    signal: ctx.signal,
  });

  // Interrompido no meio do lote: nada de log
  if (ctx.signal?.aborted) return interruptedOutcome(ctx, "apply");

  ctx.logger.print("\n📊 Processamento concluído:");
  ctx.logger.print(`   - Sucesso: ${result.succeeded.length} arquivos`);
  ctx.logger.print(`   - Falha: ${result.failed.length} arquivos`);

  try {
    await writeReport(result, ctx.config.LOG_FILE, ctx.logger);
    if (ctx.config.REPORT_JSON) {
      await saveJsonReport(createReport(result, rating), ctx.config.REPORT_JSON, ctx.logger);
    }
  } catch (error) {
    if (!(error instanceof ReportWriteError)) throw error;
    ctx.logger.log("error", errorMessage(error));
    return { status: "report-failed", result, error };
  }

  return { status: "completed", rating, result, logPath: ctx.config.LOG_FILE };
}

/**
 * Fluxo completo: verificar ExifTool → pasta de JPEGs → pasta RAW →
 * correspondências → classificação → confirmação → aplicação e log.
 * Cada etapa devolve o valor seguinte ou o desfecho final.
 */
export async function runRatingWorkflow(deps: WorkflowDeps): Promise<WorkflowOutcome> {
  const ctx: Context = {
    ...deps,
    logger: deps.logger ?? createLogger(deps.config.LOG_LEVEL),
    runner: deps.runner ?? runCommand,
  };

  ctx.logger.print("=".repeat(50));
  ctx.logger.print("🌟 MARCAÇÃO DE ESTRELAS EM ARQUIVOS RAW");
  ctx.logger.print("=".repeat(50));

  const tool = await checkTool(ctx);
  if (!tool.ok) return tool.outcome;

  const jpegFolder = await askFolder(
    ctx,
    "sourceFolderInput",
    "📁 Caminho da pasta de JPEGs de baixa qualidade: ",
    deps.presets?.jpegFolder
  );
  if (!jpegFolder.ok) return jpegFolder.outcome;

  const baseNames = await scanSource(ctx, jpegFolder.value);
  if (!baseNames.ok) return baseNames.outcome;

  const rawFolder = await askFolder(
    ctx,
    "targetFolderInput",
    "\n📁 Caminho da pasta principal de arquivos RAW: ",
    deps.presets?.rawFolder
  );
  if (!rawFolder.ok) return rawFolder.outcome;

  const matches = await scanMatches(ctx, rawFolder.value, baseNames.value);
  if (!matches.ok) return matches.outcome;

  const rating = await askRating(ctx);
  if (!rating.ok) return rating.outcome;

  const files = matches.value.map((match) => match.filePath);
  const confirmed = await confirm(ctx, files, rating.value);
  if (!confirmed.ok) return confirmed.outcome;

  return apply(ctx, files, rating.value);
}
