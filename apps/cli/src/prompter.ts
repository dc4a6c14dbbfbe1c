import { createInterface } from "node:readline";

export interface Prompter {
  ask(prompt: string): Promise<string>;
  /** True once input has ended (e.g. Ctrl-D or a closed pipe) */
  readonly closed: boolean;
  close(): void;
}

export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  let closed = false;
  // the question waiting for an answer, if any
  let pending: ((answer: string) => void) | null = null;

  rl.once("close", () => {
    closed = true;
    const resolve = pending;
    pending = null;
    resolve?.("");
  });

  return {
    ask(prompt: string): Promise<string> {
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => {
        pending = resolve;
        rl.question(prompt, (answer) => {
          pending = null;
          resolve(answer);
        });
      });
    },
    get closed() {
      return closed;
    },
    close() {
      if (!closed) rl.close();
    },
  };
}
