import { CodeAgent } from "../agents/codeAgent";
import { RequirementsAgent } from "../agents/requirementsAgent";
import type { ChatLlmLike, StageAgentDeps } from "../agents/stageAgent";
import { TestAgent } from "../agents/testAgent";
import type { AppConfig } from "../config";
import { FixtureResponseSource, type OfflineResponseSource } from "../llm/offlineResponses";
import { ProjectLock } from "../services/projectLock";
import type { RunEventLog } from "../services/runEventLog";
import { WorkspaceService } from "../services/workspace";
import { Pipeline } from "./pipeline";

export interface BuildPipelineOptions {
  llm: ChatLlmLike;
  events: RunEventLog;
  config: Pick<AppConfig, "projectRoot" | "temperature">;
  offline?: OfflineResponseSource;
  logPrompts?: boolean;
}

export const buildPipeline = (options: BuildPipelineOptions): Pipeline => {
  const { events, config } = options;

  const agentDeps: StageAgentDeps = {
    llm: options.llm,
    offline: options.offline ?? new FixtureResponseSource(),
    temperature: config.temperature,
    onPrompt: options.logPrompts
      ? (trace) =>
          events.pushEvent(trace.runId, trace.stage, "prompt_logged", `${trace.stage} prompt captured.`, {
            stage: trace.stage,
            data: { system: trace.system, user: trace.user }
          })
      : undefined
  };

  const lock = new ProjectLock(config.projectRoot);
  return new Pipeline({
    events,
    workspace: new WorkspaceService(config.projectRoot, [lock.lockPath]),
    lock,
    requirementsAgent: new RequirementsAgent(agentDeps),
    codeAgent: new CodeAgent(agentDeps),
    testAgent: new TestAgent(agentDeps)
  });
};
