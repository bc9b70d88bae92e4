/**
 * voice-calendar CLI
 *
 * process <audio...>: transcribe each file/URL, extract, ask for gaps, show/write the event
 * extract <text...>: same pipeline, starting from text you already have
 */
import "dotenv/config";
import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig, type AppConfig } from "./config";
import { createLogger } from "./lib/logger";
import { ConsolePrompter } from "./lib/consolePrompter";
import { errorMessage } from "./lib/errors";
import { createPipelineDeps } from "./services/factory";
import { processTranscript, runBatch, type PipelineResult } from "./services/pipeline";

type SharedOptions = {
  interactive: boolean;
  enhance: boolean;
  sink?: AppConfig["calendar"]["sink"];
  timeFormat?: AppConfig["extraction"]["timeFormat"];
  listUpcoming?: number;
};

function withOverrides(config: AppConfig, opts: SharedOptions): AppConfig {
  return {
    ...config,
    extraction: {
      ...config.extraction,
      timeFormat: opts.timeFormat ?? config.extraction.timeFormat,
      enhanceInput: config.extraction.enhanceInput && opts.enhance,
    },
    calendar: {
      ...config.calendar,
      sink: opts.sink ?? config.calendar.sink,
      upcomingLimit: opts.listUpcoming ?? config.calendar.upcomingLimit,
    },
  };
}

function parseCount(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Not a non-negative integer.");
  return n;
}

function addSharedOptions(cmd: Command): Command {
  return cmd
    .option("--no-interactive", "do not ask for missing fields")
    .option("--no-enhance", "store answers as typed, without the LLM rewrite")
    .addOption(new Option("--sink <kind>", "calendar to write to").choices(["none", "ics", "google"]))
    .addOption(new Option("--time-format <format>", "how times are extracted").choices(["clock", "iso"]))
    .option("--list-upcoming <n>", "list up to n upcoming events after writing (0 = off)", parseCount);
}

async function run(opts: SharedOptions, work: (config: AppConfig, prompter?: ConsolePrompter) => Promise<PipelineResult[]>) {
  const config = withOverrides(loadConfig(), opts);
  const prompter = opts.interactive ? new ConsolePrompter() : undefined;
  try {
    const results = await work(config, prompter);
    if (results.some((r) => !r.ok)) process.exitCode = 1;
  } finally {
    prompter?.close();
  }
}

const program = new Command();

program
  .name("voice-calendar")
  .description("Turn spoken scheduling requests into calendar events");

addSharedOptions(
  program
    .command("process")
    .description("Transcribe audio files or URLs and turn each into an event")
    .argument("<audio...>", "audio file paths or http(s) URLs")
).action(async (audio: string[], opts: SharedOptions) => {
  await run(opts, async (config, prompter) => {
    const logger = createLogger("voice-calendar", config.logLevel);
    const deps = createPipelineDeps(config, logger, {
      withTranscriber: true,
      prompter,
      out: (line) => console.log(line),
    });
    return runBatch(audio, deps);
  });
});

addSharedOptions(
  program
    .command("extract")
    .description("Skip transcription and extract an event from text")
    .argument("<text...>", "what was said")
).action(async (words: string[], opts: SharedOptions) => {
  await run(opts, async (config, prompter) => {
    const logger = createLogger("voice-calendar", config.logLevel);
    const deps = createPipelineDeps(config, logger, { prompter, out: (line) => console.log(line) });
    return [await processTranscript(words.join(" "), deps)];
  });
});

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
