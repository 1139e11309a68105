import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Prompter } from "./prompt.js";
import { FAILED_HEADER, SUCCEEDED_HEADER } from "./report.js";
import type { CommandResult, CommandRunner, RatingToolConfig } from "./types.js";
import { runRatingWorkflow, type WorkflowDeps } from "./workflow.js";

const OK: CommandResult = { exitCode: 0, stdout: "", stderr: "" };
const VERSION: CommandResult = { exitCode: 0, stdout: "12.76\n", stderr: "" };

function scriptedPrompter(answers: Array<string | null>) {
  const questions: string[] = [];
  const prompter: Prompter = {
    async ask(question) {
      questions.push(question);
      return answers.length > 0 ? answers.shift() ?? null : null;
    },
    close() {},
  };
  return { prompter, questions };
}

// ExifTool falso: responde a "-ver" e a cada gravação de classificação
function fakeExiftool(onRating: (args: string[]) => CommandResult = () => OK) {
  return vi.fn<CommandRunner>(async (_command, args) =>
    args[0] === "-ver" ? VERSION : onRating(args)
  );
}

function ratingCalls(runner: ReturnType<typeof fakeExiftool>): string[][] {
  return runner.mock.calls.map(([, args]) => args).filter((args) => args[0] !== "-ver");
}

async function touch(dir: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), "");
  }
}

async function exists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

describe("runRatingWorkflow", () => {
  let tmpDir: string;
  let jpegDir: string;
  let rawDir: string;
  let config: RatingToolConfig;

  const silent = createLogger("error", () => {});

  function run(deps: Omit<WorkflowDeps, "config">) {
    return runRatingWorkflow({ config, logger: silent, ...deps });
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "rate-raw-flow-"));
    jpegDir = path.join(tmpDir, "rejeitadas");
    rawDir = path.join(tmpDir, "raw");
    await fs.mkdir(jpegDir);
    await fs.mkdir(rawDir);
    config = { ...loadConfig({}), LOG_FILE: path.join(tmpDir, "rating_log.txt") };
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("marca os RAW correspondentes e grava o log", async () => {
    await touch(jpegDir, "photo1.jpg", "photo2.jpg");
    await touch(rawDir, "photo1.arw", "photo3.arw", "photo2.ARW");
    const runner = fakeExiftool();
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "5", "y"]);

    const outcome = await run({ prompter, runner });

    const expected = [path.join(rawDir, "photo1.arw"), path.join(rawDir, "photo2.ARW")];
    expect(outcome.status).toBe("completed");
    if (outcome.status !== "completed") return;
    expect(outcome.rating).toBe(5);
    expect([...outcome.result.succeeded].sort()).toEqual(expected);
    expect(outcome.result.failed).toEqual([]);
    expect(ratingCalls(runner).map((args) => args[0])).toEqual(["-XMP:Rating=5", "-XMP:Rating=5"]);

    const lines = (await fs.readFile(config.LOG_FILE, "utf8")).split("\n");
    expect(lines[0]).toBe(SUCCEEDED_HEADER);
    expect(lines.slice(1, 3).sort()).toEqual(expected);
    expect(lines.slice(3)).toEqual(["", FAILED_HEADER, ""]);
  });

  it("encerra sem perguntar nada quando o ExifTool não existe", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: null,
      stdout: "",
      stderr: "",
      launchError: new Error("spawn exiftool ENOENT"),
    }));
    const { prompter, questions } = scriptedPrompter([]);

    const outcome = await run({ prompter, runner });

    expect(outcome).toMatchObject({ status: "aborted", state: "toolCheck", reason: "tool-missing" });
    expect(questions).toEqual([]);
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it("rejeita pasta de JPEGs inexistente", async () => {
    const missing = path.join(tmpDir, "nao-existe");
    const { prompter, questions } = scriptedPrompter([`  ${missing}  `]);

    const outcome = await run({ prompter, runner: fakeExiftool() });

    expect(outcome).toEqual({
      status: "aborted",
      state: "sourceFolderInput",
      reason: "invalid-folder",
      message: `A pasta '${missing}' não existe ou não é um diretório válido`,
    });
    expect(questions).toHaveLength(1);
  });

  it("rejeita um arquivo no lugar da pasta RAW", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(tmpDir, "arquivo.arw");
    const { prompter } = scriptedPrompter([jpegDir, path.join(tmpDir, "arquivo.arw")]);

    const outcome = await run({ prompter, runner: fakeExiftool() });

    expect(outcome).toMatchObject({ status: "aborted", state: "targetFolderInput", reason: "invalid-folder" });
  });

  it("encerra quando não há JPEGs", async () => {
    await touch(jpegDir, "capa.png", "notas.txt");
    const { prompter, questions } = scriptedPrompter([jpegDir, rawDir]);

    const outcome = await run({ prompter, runner: fakeExiftool() });

    expect(outcome).toMatchObject({ status: "aborted", state: "sourceScan", reason: "no-source-files" });
    expect(questions).toHaveLength(1);
  });

  it("encerra quando nenhum RAW corresponde", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "b.arw", "a.jpg");
    const { prompter } = scriptedPrompter([jpegDir, rawDir]);

    const outcome = await run({ prompter, runner: fakeExiftool() });

    expect(outcome).toMatchObject({ status: "aborted", state: "matchScan", reason: "no-matches" });
  });

  it.each(["abc", "0", "6", ""])("usa a classificação 4 para a resposta %j", async (reply) => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    const runner = fakeExiftool();
    const { prompter } = scriptedPrompter([jpegDir, rawDir, reply, "y"]);

    const outcome = await run({ prompter, runner });

    expect(outcome).toMatchObject({ status: "completed", rating: 4 });
    expect(ratingCalls(runner)).toEqual([
      ["-XMP:Rating=4", "-overwrite_original", path.join(rawDir, "a.arw")],
    ]);
  });

  it.each(["n", "", "yes", "sim"])("cancela sem tocar em arquivos com a resposta %j", async (reply) => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    const runner = fakeExiftool();
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "3", reply]);

    const outcome = await run({ prompter, runner });

    expect(outcome).toEqual({
      status: "cancelled",
      files: [path.join(rawDir, "a.arw")],
      rating: 3,
    });
    expect(ratingCalls(runner)).toEqual([]);
    expect(await exists(config.LOG_FILE)).toBe(false);
  });

  it("registra falhas sem interromper o lote", async () => {
    await touch(jpegDir, "a.jpg", "b.jpg");
    await touch(rawDir, "a.arw", "b.arw");
    const runner = fakeExiftool((args) =>
      args[2].endsWith("a.arw") ? { exitCode: 1, stdout: "", stderr: "Error: corrupted" } : OK
    );
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "2", "y"]);

    const outcome = await run({ prompter, runner });

    expect(outcome).toMatchObject({
      status: "completed",
      result: { succeeded: [path.join(rawDir, "b.arw")], failed: [path.join(rawDir, "a.arw")] },
    });
    expect(await fs.readFile(config.LOG_FILE, "utf8")).toBe(
      `${SUCCEEDED_HEADER}\n${path.join(rawDir, "b.arw")}\n\n${FAILED_HEADER}\n${path.join(rawDir, "a.arw")}\n`
    );
  });

  it("termina como interrompido quando a entrada acaba num prompt", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    const runner = fakeExiftool();
    const { prompter } = scriptedPrompter([jpegDir, rawDir, null]);

    const outcome = await run({ prompter, runner });

    expect(outcome).toEqual({ status: "interrupted", state: "ratingInput" });
    expect(ratingCalls(runner)).toEqual([]);
    expect(await exists(config.LOG_FILE)).toBe(false);
  });

  it("não grava log quando interrompido durante a aplicação", async () => {
    await touch(jpegDir, "a.jpg", "b.jpg");
    await touch(rawDir, "a.arw", "b.arw");
    const controller = new AbortController();
    const runner = fakeExiftool(() => {
      controller.abort();
      return OK;
    });
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "5", "y"]);

    const outcome = await run({ prompter, runner, signal: controller.signal });

    expect(outcome).toEqual({ status: "interrupted", state: "apply" });
    expect(ratingCalls(runner)).toHaveLength(1);
    expect(await exists(config.LOG_FILE)).toBe(false);
  });

  it("usa respostas predefinidas sem perguntar", async () => {
    await touch(jpegDir, "a.JPEG");
    await touch(rawDir, "A.RAW");
    const runner = fakeExiftool();
    const { prompter, questions } = scriptedPrompter([]);

    const outcome = await run({
      prompter,
      runner,
      presets: { jpegFolder: jpegDir, rawFolder: rawDir, rating: "1" },
      assumeYes: true,
    });

    expect(outcome).toMatchObject({ status: "completed", rating: 1 });
    expect(questions).toEqual([]);
    expect(ratingCalls(runner)).toEqual([
      ["-XMP:Rating=1", "-overwrite_original", path.join(rawDir, "A.RAW")],
    ]);
  });

  it("em dry-run lista os arquivos sem alterá-los", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    const runner = fakeExiftool();
    const lines: string[] = [];
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "5", "y"]);

    const outcome = await run({
      prompter,
      runner,
      dryRun: true,
      logger: createLogger("error", (line) => lines.push(line)),
    });

    expect(outcome).toEqual({ status: "dry-run", files: [path.join(rawDir, "a.arw")], rating: 5 });
    expect(ratingCalls(runner)).toEqual([]);
    expect(lines).toContain("\n[DRY RUN] Aplicaria 5 estrelas em 1 arquivos:");
    expect(await exists(config.LOG_FILE)).toBe(false);
  });

  it("devolve report-failed quando o log não pode ser gravado", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    config = { ...config, LOG_FILE: path.join(tmpDir, "sem-pasta", "rating_log.txt") };
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "5", "y"]);

    const outcome = await run({ prompter, runner: fakeExiftool() });

    expect(outcome.status).toBe("report-failed");
    if (outcome.status !== "report-failed") return;
    expect(outcome.result.succeeded).toEqual([path.join(rawDir, "a.arw")]);
    expect(outcome.error.message).toContain(config.LOG_FILE);
  });

  it("salva o relatório JSON quando configurado", async () => {
    await touch(jpegDir, "a.jpg");
    await touch(rawDir, "a.arw");
    const jsonPath = path.join(tmpDir, "rating.json");
    config = { ...config, REPORT_JSON: jsonPath };
    const { prompter } = scriptedPrompter([jpegDir, rawDir, "4", "y"]);

    await run({ prompter, runner: fakeExiftool() });

    const report = JSON.parse(await fs.readFile(jsonPath, "utf8"));
    expect(report.rating).toBe(4);
    expect(report.summary).toEqual({ total: 1, succeeded: 1, failed: 0 });
  });
});
