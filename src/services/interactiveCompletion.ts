// src/services/interactiveCompletion.ts
import type { Logger } from "pino";
import type { LanguageModel, Prompter } from "../types/providers";
import { PROMPTABLE_FIELDS, SENTINEL, isSentinel, type PromptableField, type TaskRecord } from "../types/task";
import { errorMessage } from "../lib/errors";
import { splitNames } from "./fieldNormalizer";

export type CompleterOptions = {
  prompter: Prompter;
  logger: Logger;
  /** When set, answers are rewritten by the model before being stored */
  enhancer?: LanguageModel;
};

/**
 * Asks the user for every optional field still at the sentinel, in a fixed
 * order, once each. "skip" or an empty answer keeps the sentinel.
 */
export class InteractiveCompleter {
  private readonly prompter: Prompter;
  private readonly logger: Logger;
  private readonly enhancer?: LanguageModel;

  constructor(options: CompleterOptions) {
    this.prompter = options.prompter;
    this.logger = options.logger;
    this.enhancer = options.enhancer;
  }

  async complete(record: TaskRecord): Promise<TaskRecord> {
    const out: TaskRecord = { ...record, participants: [...record.participants] };

    for (const field of PROMPTABLE_FIELDS) {
      if (!isSentinel(out[field])) continue;

      const answer = (
        await this.prompter.ask(
          `Please provide the ${field} for the task '${out.task}' (or type 'skip' to leave as '${SENTINEL}'): `
        )
      ).trim();

      if (!answer || answer.toLowerCase() === "skip") {
        this.logger.info({ field }, `Leaving ${field} as '${SENTINEL}'.`);
        continue;
      }

      const value = await this.enhance(field, answer);
      if (field === "participants") {
        const names = splitNames(value);
        out.participants = names.length ? names : [SENTINEL];
      } else {
        out[field] = value;
      }
    }

    return out;
  }

  private async enhance(field: PromptableField, input: string): Promise<string> {
    if (!this.enhancer) return input;

    try {
      this.logger.info({ field }, `Enhancing the ${field} with LLM...`);
      const { text } = await this.enhancer.complete(buildEnhancementPrompt(field, input));
      const enhanced = text.trim();
      if (!enhanced) return input;
      this.logger.info({ field, enhanced }, `Enhanced ${field}`);
      return enhanced;
    } catch (e) {
      this.logger.warn({ field, err: errorMessage(e) }, `Failed to enhance ${field} with LLM; keeping the original`);
      return input;
    }
  }
}

export function buildEnhancementPrompt(field: string, input: string): string {
  return (
    `Improve the following ${field} information for a calendar event:\n\n` +
    `Original ${field}: ${input}\n\n` +
    "Enhanced:"
  );
}
