import { createInterface, type Interface } from "node:readline/promises";
import type { Prompter } from "../types/providers";

/** stdin/stdout question channel; the readline interface is opened lazily. */
export class ConsolePrompter implements Prompter {
  private rl?: Interface;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(question: string): Promise<string> {
    this.rl ??= createInterface({ input: this.input, output: this.output });
    return this.rl.question(question);
  }

  close(): void {
    this.rl?.close();
    this.rl = undefined;
  }
}
