import fs from "fs/promises";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import type { ReportData, RunResult } from "./types.js";

export const SUCCEEDED_HEADER = "=== Arquivos processados com sucesso ===";
export const FAILED_HEADER = "=== Arquivos com falha ===";

export class ReportWriteError extends Error {
  constructor(
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(
      `Não foi possível salvar ${filePath}: ${errorMessage(options?.cause)}`,
      options
    );
    this.name = "ReportWriteError";
  }
}

/**
 * Texto do log: seção de sucessos, linha em branco, seção de falhas
 */
export function formatReport(result: RunResult): string {
  const lines = [SUCCEEDED_HEADER, ...result.succeeded, "", FAILED_HEADER, ...result.failed];
  return lines.join("\n") + "\n";
}

// Grava num arquivo temporário e renomeia, para nunca deixar um arquivo pela metade
async function replaceFile(filePath: string, content: string): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tmpPath, content, "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true }).catch(() => undefined);
    throw new ReportWriteError(filePath, { cause: error });
  }
}

/**
 * Salva o resultado no arquivo de log, sobrescrevendo o conteúdo anterior
 */
export async function writeReport(
  result: RunResult,
  logPath: string,
  logger: Logger = silentLogger
): Promise<void> {
  await replaceFile(logPath, formatReport(result));
  logger.log("info", `Log salvo em: ${logPath}`);
}

/**
 * Cria um relatório das operações realizadas
 */
export function createReport(result: RunResult, rating: number): ReportData {
  return {
    timestamp: new Date().toISOString(),
    rating,
    summary: {
      total: result.succeeded.length + result.failed.length,
      succeeded: result.succeeded.length,
      failed: result.failed.length,
    },
    succeeded: [...result.succeeded],
    failed: [...result.failed],
  };
}

/**
 * Salva o relatório em um arquivo JSON
 */
export async function saveJsonReport(
  report: ReportData,
  outputPath: string,
  logger: Logger = silentLogger
): Promise<void> {
  await replaceFile(outputPath, JSON.stringify(report, null, 2));
  logger.log("info", `Relatório salvo em: ${outputPath}`);
}
