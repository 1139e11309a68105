// Configurações do aplicativo
import type { LogLevel, RatingToolConfig } from "./types.js";

export const EXIFTOOL_PATH: string = "exiftool";
export const RATING_TAG: string = "XMP:Rating";

export const JPEG_EXTENSIONS: string[] = [".jpg", ".jpeg"]; // comparadas sem diferenciar maiúsculas
export const RAW_EXTENSIONS: string[] = [".arw", ".raw"];

export const DEFAULT_RATING: number = 4;
export const MIN_RATING: number = 1;
export const MAX_RATING: number = 5;

export const LOG_FILE: string = "rating_log.txt"; // sobrescrito a cada execução
export const REPORT_JSON: string = ""; // vazio = sem relatório JSON
export const LOG_LEVEL: LogLevel = "info";
export const PREVIEW_LIMIT: number = 10; // quantos arquivos listar antes de resumir

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Converte "arw, .RAW,nef" em [".arw", ".raw", ".nef"]
 */
export function parseExtensionList(value: string): string[] {
  return value
    .split(",")
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith(".") ? ext : `.${ext}`));
}

/**
 * Monta a configuração a partir dos padrões e das variáveis de ambiente
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): RatingToolConfig {
  const rawExtensions = parseExtensionList(env.RAW_RATING_RAW_EXTENSIONS || "");
  const logLevel = (env.RAW_RATING_LOG_LEVEL || "").trim().toLowerCase();

  return {
    EXIFTOOL_PATH: env.RAW_RATING_EXIFTOOL?.trim() || EXIFTOOL_PATH,
    RATING_TAG,
    JPEG_EXTENSIONS: [...JPEG_EXTENSIONS],
    RAW_EXTENSIONS: rawExtensions.length > 0 ? rawExtensions : [...RAW_EXTENSIONS],
    DEFAULT_RATING,
    MIN_RATING,
    MAX_RATING,
    LOG_FILE: env.RAW_RATING_LOG_FILE?.trim() || LOG_FILE,
    REPORT_JSON: env.RAW_RATING_REPORT_JSON?.trim() || REPORT_JSON,
    LOG_LEVEL: isLogLevel(logLevel) ? logLevel : LOG_LEVEL,
    PREVIEW_LIMIT,
  };
}

