import dotenv from "dotenv";
import { loadAppConfig, loadLlmConfig } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { buildPipeline } from "./orchestrator/buildPipeline";
import { RunEventLog } from "./services/runEventLog";
import { buildApp, logRunEvent } from "./serverApp";

const start = async (): Promise<void> => {
  dotenv.config();

  const appConfig = loadAppConfig();
  const llmConfig = loadLlmConfig();
  const events = new RunEventLog();
  const llm = new OpenAiClient(llmConfig);

  const app = buildApp({
    events,
    pipeline: buildPipeline({ llm, events, config: appConfig, logPrompts: true }),
    overview: {
      model: llm.model,
      baseUrl: llm.baseUrl,
      projectRoot: appConfig.projectRoot
    }
  });

  events.subscribeAll((event) => logRunEvent(app.log, event));

  await app.listen({ port: appConfig.port, host: "0.0.0.0" });
};

start().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  console.error(message);
  process.exit(1);
});
