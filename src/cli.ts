#!/usr/bin/env node
import fs from "node:fs/promises";
import dotenv from "dotenv";
import { type CliOptions, DEFAULT_USER_STORY, USAGE, parseCliArgs } from "./cliArgs";
import { loadAppConfig, loadLlmConfig } from "./config";
import type { ChatLlmLike } from "./agents/stageAgent";
import { MalformedOutput } from "./errors";
import { UnavailableChatClient } from "./llm/offlineResponses";
import { OpenAiClient } from "./llm/openaiClient";
import { buildPipeline } from "./orchestrator/buildPipeline";
import { RunEventLog } from "./services/runEventLog";
import type { RunEvent } from "./types";
import { prettyJson } from "./utils/json";

const readUserStory = async (options: CliOptions): Promise<string> => {
  if (options.storyFile !== undefined) {
    return fs.readFile(options.storyFile, "utf8");
  }
  return options.story ?? DEFAULT_USER_STORY;
};

const printEvent = (event: RunEvent): void => {
  const line = `[${event.timestamp}] [${event.role}] ${event.type}: ${event.message}`;
  if (event.level === "info") {
    console.log(line);
  } else {
    console.error(line);
  }
};

const main = async (): Promise<void> => {
  const options = parseCliArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  dotenv.config();

  const { out, offline } = options;
  const appConfig = loadAppConfig(out === undefined ? process.env : { ...process.env, PROJECT_ROOT: out });
  const llm: ChatLlmLike = offline ? new UnavailableChatClient() : new OpenAiClient(loadLlmConfig());
  const userStory = await readUserStory(options);

  const events = new RunEventLog();
  const pipeline = buildPipeline({ llm, events, config: appConfig, logPrompts: options.logPrompts });

  const unsubscribe = events.subscribeAll(printEvent);
  try {
    const result = await pipeline.run(userStory);

    console.log("\nSpecification:");
    console.log(prettyJson(result.specification));
    console.log(`\nCode files written to ${appConfig.projectRoot}:`);
    for (const filePath of result.codeFiles) console.log(`  ${filePath}`);
    console.log("\nTest files:");
    for (const filePath of result.testFiles) console.log(`  ${filePath}`);
    if (result.degradedStages.length > 0) {
      console.error(`\nWarning: offline responses used for: ${result.degradedStages.join(", ")}`);
    }
  } finally {
    unsubscribe();
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  console.error(message);
  if (error instanceof MalformedOutput) {
    console.error(`Model output preview:\n${error.preview}`);
  }
  process.exit(1);
});
