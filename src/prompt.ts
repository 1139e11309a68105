import * as readline from "readline";

export interface Prompter {
  /** Resolve com a resposta, ou null se o usuário interromper (Ctrl+C, fim da entrada) */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export interface PrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  signal?: AbortSignal;
  onInterrupt?: () => void;
}

/**
 * Pergunta no terminal usando uma única interface readline
 */
export function createPrompter(options: PrompterOptions = {}): Prompter {
  const {
    input = process.stdin,
    output = process.stdout,
    signal,
    onInterrupt,
  } = options;

  const rl = readline.createInterface({ input, output });
  let closed = false;

  // Linhas lidas antes de alguma pergunta (entrada redirecionada chega em blocos)
  const pendingLines: string[] = [];
  let waiting: ((answer: string | null) => void) | null = null;

  const settle = (answer: string | null): void => {
    const resolve = waiting;
    waiting = null;
    resolve?.(answer);
  };
  const cancel = (): void => settle(null);

  rl.on("line", (line) => {
    if (waiting) {
      settle(line);
    } else {
      pendingLines.push(line);
    }
  });
  // Com o terminal em modo raw, Ctrl+C chega aqui e não como sinal do processo
  rl.on("SIGINT", () => {
    onInterrupt?.();
    cancel();
  });
  rl.on("close", () => {
    closed = true;
    cancel();
  });
  signal?.addEventListener("abort", cancel);

  return {
    ask(question: string): Promise<string | null> {
      if (signal?.aborted) return Promise.resolve(null);

      const queued = pendingLines.shift();
      if (queued !== undefined) {
        output.write(`${question}${queued}\n`);
        return Promise.resolve(queued);
      }
      if (closed) return Promise.resolve(null);

      return new Promise((resolve) => {
        waiting = resolve;
        rl.setPrompt(question);
        rl.prompt();
      });
    },
    close(): void {
      signal?.removeEventListener("abort", cancel);
      if (!closed) rl.close();
    },
  };
}
