import { LOG_LEVEL } from "./config.js";
import type { LogLevel } from "./types.js";

export interface Logger {
  log(level: LogLevel, message: string): void;
  print(message?: string): void;
}

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const PREFIXES: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

/**
 * Cria a função de log personalizada
 * - log(): linha com horário e ícone, filtrada pelo nível configurado
 * - print(): linha crua (títulos, listas, resumos)
 */
export function createLogger(
  level: LogLevel = LOG_LEVEL,
  write: (line: string) => void = console.log
): Logger {
  return {
    log(messageLevel: LogLevel, message: string): void {
      if (LEVELS[messageLevel] < LEVELS[level]) return;

      const timestamp = new Date().toLocaleTimeString();
      write(`[${timestamp}] ${PREFIXES[messageLevel]} ${message}`);
    },
    print(message: string = ""): void {
      write(message);
    },
  };
}

// Logger que descarta tudo (usado quando o chamador não informa um)
export const silentLogger: Logger = createLogger("error", () => {});

/**
 * Extrai a mensagem de um erro desconhecido
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
