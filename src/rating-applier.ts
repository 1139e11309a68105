import { buildRatingArgs, runCommand } from "./exiftool.js";
import { silentLogger, type Logger } from "./logger.js";
import type { CommandRunner, RunResult } from "./types.js";

export interface ApplyRatingOptions {
  exiftoolPath: string;
  ratingTag?: string;
  runner?: CommandRunner;
  logger?: Logger;
  // Depois de abortado, nenhum arquivo novo é iniciado
  signal?: AbortSignal;
}

export function createRunResult(
  succeeded: readonly string[],
  failed: readonly string[]
): RunResult {
  return Object.freeze({
    succeeded: Object.freeze([...succeeded]),
    failed: Object.freeze([...failed]),
  });
}

/**
 * Usa o ExifTool para gravar a classificação em cada arquivo, um de cada vez.
 * A falha de um arquivo não interrompe os demais.
 */
export async function applyRating(
  files: readonly string[],
  rating: number,
  options: ApplyRatingOptions
): Promise<RunResult> {
  const {
    exiftoolPath,
    ratingTag,
    runner = runCommand,
    logger = silentLogger,
    signal,
  } = options;

  const succeeded: string[] = [];
  const failed: string[] = [];

  for (const file of files) {
    if (signal?.aborted) {
      logger.log("warn", `Interrompido antes de: ${file}`);
      break;
    }

    const result = await runner(exiftoolPath, buildRatingArgs(file, rating, ratingTag));

    if (result.launchError) {
      failed.push(file);
      logger.log(
        "error",
        `Erro ao processar arquivo: ${file} - ${result.launchError.message}`
      );
    } else if (result.exitCode === 0) {
      succeeded.push(file);
      logger.log("info", `Sucesso: ${file}`);
    } else {
      failed.push(file);
      logger.log("error", `Falha: ${file} - ${result.stderr}`);
    }
  }

  return createRunResult(succeeded, failed);
}
