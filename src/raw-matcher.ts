import path from "path";
import { scanFolder } from "./file-index.js";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import type { FileEntry } from "./types.js";

/**
 * Procura na pasta RAW os arquivos cujo nome base coincide (sem diferenciar
 * maiúsculas) com algum dos nomes informados.
 *
 * Cada nome base casa no máximo uma vez: vale o primeiro arquivo da listagem.
 * Com "a.ARW" e "a.RAW" na mesma pasta, só um deles é marcado.
 */
export async function findMatchingRawFiles(
  rawFolder: string,
  baseNames: string[],
  rawExtensions: string[],
  logger: Logger = silentLogger
): Promise<FileEntry[]> {
  const allowed = rawExtensions.map((ext) => ext.toLowerCase());

  let candidates: FileEntry[];
  try {
    candidates = await scanFolder(rawFolder, (fileName) =>
      allowed.includes(path.extname(fileName).toLowerCase())
    );
  } catch (error) {
    logger.log("error", `Erro ao ler pasta ${rawFolder}: ${errorMessage(error)}`);
    return [];
  }

  // Primeiro candidato de cada nome base, na ordem da listagem
  const firstByBaseName = new Map<string, FileEntry>();
  for (const candidate of candidates) {
    const key = candidate.baseName.toLowerCase();
    if (!firstByBaseName.has(key)) {
      firstByBaseName.set(key, candidate);
    } else {
      logger.log(
        "debug",
        `Ignorado (nome base repetido): ${candidate.fileName}`
      );
    }
  }

  const matches: FileEntry[] = [];
  const seen = new Set<string>();

  for (const baseName of baseNames) {
    const match = firstByBaseName.get(baseName.toLowerCase());
    if (!match || seen.has(match.filePath)) continue;

    seen.add(match.filePath);
    matches.push(match);
  }

  return matches;
}
