import fs from "fs/promises";
import path from "path";
import { errorMessage, silentLogger, type Logger } from "./logger.js";
import type { BasenameListing, FileEntry } from "./types.js";

export function toFileEntry(dirPath: string, fileName: string): FileEntry {
  const parsed = path.parse(fileName);
  return {
    fileName,
    filePath: path.join(dirPath, fileName),
    baseName: parsed.name,
    extension: parsed.ext,
  };
}

/**
 * Lista os arquivos regulares de uma pasta (sem subpastas) que passam no filtro.
 * A ordem é a da listagem do sistema de arquivos. Lança erro se a pasta não puder ser lida.
 */
export async function scanFolder(
  dirPath: string,
  accept: (fileName: string) => boolean
): Promise<FileEntry[]> {
  const entries: FileEntry[] = [];
  const items = await fs.readdir(dirPath);

  for (const item of items) {
    if (!accept(item)) continue;

    const stats = await fs.stat(path.join(dirPath, item)).catch(() => null);
    if (stats?.isFile()) {
      entries.push(toFileEntry(dirPath, item));
    }
  }

  return entries;
}

export function hasExtension(fileName: string, extensions: string[]): boolean {
  const lowerName = fileName.toLowerCase();
  return extensions.some((ext) => lowerName.endsWith(ext.toLowerCase()));
}

/**
 * Obtém os nomes dos arquivos de uma pasta e seus nomes base (sem extensão).
 * Em caso de erro de leitura, registra o erro e devolve listas vazias.
 */
export async function listBasenames(
  dirPath: string,
  extensions?: string[],
  logger: Logger = silentLogger
): Promise<BasenameListing> {
  try {
    const entries = await scanFolder(dirPath, (fileName) =>
      extensions?.length ? hasExtension(fileName, extensions) : true
    );

    return {
      fileNames: entries.map((entry) => entry.fileName),
      baseNames: entries.map((entry) => entry.baseName),
      entries,
    };
  } catch (error) {
    logger.log("error", `Erro ao ler pasta ${dirPath}: ${errorMessage(error)}`);
    return { fileNames: [], baseNames: [], entries: [] };
  }
}
