import { spawn, type ChildProcessByStdio } from "child_process";
import type { Readable } from "stream";
import type { CommandResult, CommandRunner, ToolStatus } from "./types.js";

/**
 * Executa um comando externo e espera o término.
 * Nunca rejeita: falhas ao iniciar o processo voltam em `launchError`.
 */
export const runCommand: CommandRunner = (command, args) => {
  return new Promise<CommandResult>((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;

    const finish = (result: CommandResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    } catch (error) {
      finish({
        exitCode: null,
        stdout,
        stderr,
        launchError: error instanceof Error ? error : new Error(String(error)),
      });
      return;
    }

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => (stdout += chunk));
    child.stderr.on("data", (chunk: string) => (stderr += chunk));

    // Sem o evento "spawn" o processo nunca chegou a iniciar
    let spawned = false;
    let launchError: Error | undefined;

    child.on("spawn", () => {
      spawned = true;
    });
    child.on("error", (error) => {
      if (spawned) return;
      launchError = error;
      finish({ exitCode: null, stdout, stderr, launchError });
    });
    child.on("close", (code) => {
      if (!spawned) {
        finish({
          exitCode: null,
          stdout,
          stderr,
          launchError: launchError ?? new Error(`Falha ao iniciar ${command}`),
        });
        return;
      }
      finish({ exitCode: code, stdout, stderr });
    });
  });
};

/**
 * Argumentos do ExifTool para gravar a classificação no próprio arquivo (sem backup)
 */
export function buildRatingArgs(
  filePath: string,
  rating: number,
  tag: string = "XMP:Rating"
): string[] {
  return [`-${tag}=${rating}`, "-overwrite_original", filePath];
}

/**
 * Verifica se o ExifTool pode ser executado.
 * Basta o processo iniciar; o código de saída de "-ver" não importa.
 */
export async function checkExiftool(
  exiftoolPath: string,
  runner: CommandRunner = runCommand
): Promise<ToolStatus> {
  const result = await runner(exiftoolPath, ["-ver"]);

  if (result.launchError) {
    return { available: false, error: result.launchError.message };
  }

  const version = result.stdout.trim();
  return version ? { available: true, version } : { available: true };
}
