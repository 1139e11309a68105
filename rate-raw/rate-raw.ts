#!/usr/bin/env node
/**
 * Script para marcar estrelas em arquivos RAW
 * - Lê os nomes dos JPEGs de baixa qualidade
 * - Encontra os RAW com o mesmo nome base
 * - Grava XMP:Rating com o ExifTool (sobrescreve o original, sem backup)
 * - Salva o log com os arquivos processados e com falha
 */

import "dotenv/config";
import { loadConfig } from "../src/config.js";
import { createLogger, errorMessage } from "../src/logger.js";
import { createPrompter } from "../src/prompt.js";
import { runRatingWorkflow } from "../src/workflow.js";
import { displayHelp, exitCodeFor, parseArgs } from "./cli-args.js";

async function main(): Promise<void> {
  const args = parseArgs();

  if (args.help) {
    displayHelp();
    return;
  }

  const baseConfig = loadConfig();
  const config = args.logFile ? { ...baseConfig, LOG_FILE: args.logFile } : baseConfig;
  const logger = createLogger(config.LOG_LEVEL);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  const prompter = createPrompter({ signal: controller.signal, onInterrupt });

  try {
    const outcome = await runRatingWorkflow({
      config,
      prompter,
      logger,
      signal: controller.signal,
      presets: {
        jpegFolder: args.jpegFolder,
        rawFolder: args.rawFolder,
        rating: args.rating,
      },
      assumeYes: args.yes,
      dryRun: args.dryRun,
    });
    process.exitCode = exitCodeFor(outcome);
  } catch (error) {
    console.error("\n═══════════════════════════════════════════");
    console.error("❌ ERRO DURANTE O PROCESSAMENTO");
    console.error("═══════════════════════════════════════════");
    console.error(`Mensagem: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  } finally {
    if (!args.noPause && !controller.signal.aborted) {
      await prompter.ask("\nPressione Enter para sair...");
    }
    prompter.close();
    process.removeListener("SIGINT", onInterrupt);
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
