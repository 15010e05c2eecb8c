import { createInterface, type Interface } from "node:readline";
import type { Confirm } from "../core/ports.js";

export function parseAnswer(answer: string, defaultAnswer: boolean): boolean | null {
  const a = answer.trim().toLowerCase();
  if (a === "") return defaultAnswer;
  if (a === "y" || a === "yes") return true;
  if (a === "n" || a === "no") return false;
  return null;
}

/** A run's confirmation prompt; `close` releases the input stream. */
export type Prompter = { confirm: Confirm; close(): void };

/**
 * Terminal prompt in the `Question [Y/n]: ` style; an empty answer takes the
 * default and anything unrecognised asks again. One reader serves the whole
 * run, so answers piped in ahead of the questions are kept in order. Once
 * input ends every question takes its default. With `assumeYes` every
 * question is answered yes without prompting.
 */
export function createConfirm(opts: {
  assumeYes: boolean;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}): Prompter {
  if (opts.assumeYes) return { confirm: async () => true, close: () => undefined };
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stdout;

  let rl: Interface | undefined;
  let ended = false;
  const buffered: string[] = [];
  const waiting: Array<(line: string | null) => void> = [];

  const open = (): void => {
    if (rl) return;
    rl = createInterface({ input, terminal: false });
    rl.on("line", (line: string) => {
      const next = waiting.shift();
      if (next) next(line);
      else buffered.push(line);
    });
    rl.on("close", () => {
      ended = true;
      for (const next of waiting.splice(0)) next(null);
    });
  };

  const nextLine = (): Promise<string | null> => {
    open();
    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (ended) return Promise.resolve(null);
    return new Promise((resolve) => waiting.push(resolve));
  };

  const confirm: Confirm = async (question, defaultAnswer) => {
    const hint = defaultAnswer ? "[Y/n]" : "[y/N]";
    for (;;) {
      output.write(`${question} ${hint}: `);
      const line = await nextLine();
      if (line === null) {
        output.write("\n");
        return defaultAnswer;
      }
      const answer = parseAnswer(line, defaultAnswer);
      if (answer !== null) return answer;
      output.write("Please answer y or n.\n");
    }
  };

  return { confirm, close: () => rl?.close() };
}
