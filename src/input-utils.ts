import fs from "fs/promises";
import { DEFAULT_RATING, MAX_RATING, MIN_RATING } from "./config.js";
import type { RatingParseResult } from "./types.js";

/**
 * Converte a resposta do usuário em classificação.
 * Vazio, texto não numérico ou fora da faixa viram o valor padrão.
 */
export function parseRating(
  input: string,
  defaultRating: number = DEFAULT_RATING,
  min: number = MIN_RATING,
  max: number = MAX_RATING
): RatingParseResult {
  const value = input.trim();

  if (value === "") {
    return { rating: defaultRating, fallback: "empty" };
  }
  if (!/^[+-]?\d+$/.test(value)) {
    return { rating: defaultRating, fallback: "invalid" };
  }

  const rating = Number.parseInt(value, 10);
  if (rating < min || rating > max) {
    return { rating: defaultRating, fallback: "out-of-range" };
  }

  return { rating, fallback: null };
}

// Só "y" confirma; qualquer outra resposta, inclusive vazia, cancela
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  if (!dirPath) return false;
  const stats = await fs.stat(dirPath).catch(() => null);
  return stats?.isDirectory() ?? false;
}

/**
 * Linhas de prévia: os primeiros `limit` itens e um resumo do restante
 */
export function previewList(items: readonly string[], limit: number): string[] {
  const lines = items.slice(0, limit).map((item) => `- ${item}`);
  if (items.length > limit) {
    lines.push(`... e mais ${items.length - limit} arquivos`);
  }
  return lines;
}
