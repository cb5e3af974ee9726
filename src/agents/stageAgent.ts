import path from "node:path";
import type { z } from "zod";
import { CompletionFailure, MalformedOutput } from "../errors";
import type { OfflineResponseSource } from "../llm/offlineResponses";
import { generatedFilesSchema } from "../schemas/specification";
import type { AgentIdentity, ChatMessage, GeneratedFileSet, PromptTrace, StageName, StageResult } from "../types";
import { extractJson } from "../utils/json";

export interface ChatLlmLike {
  complete(conversation: ChatMessage[], temperature?: number): Promise<string>;
}

export interface StageAgentDeps {
  llm: ChatLlmLike;
  offline: OfflineResponseSource;
  temperature?: number;
  onPrompt?: (trace: PromptTrace) => void;
}

export const JSON_ONLY_INSTRUCTION = "Respond with a single bare JSON object. No markdown, no code fences, no commentary.";

const MAX_LISTED_ISSUES = 5;

const describeIssues = (issues: z.ZodIssue[]): string =>
  issues
    .slice(0, MAX_LISTED_ISSUES)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

export const renderSystemPrompt = (identity: AgentIdentity): string =>
  [`You are the ${identity.role}.`, `Goal: ${identity.goal}`, identity.backstory, "You only ever answer with JSON."].join("\n");

// `./app/main.py` and `app/main.py` name the same file.
export const toFileSet = (payload: z.output<typeof generatedFilesSchema>): GeneratedFileSet => {
  const files = new Map<string, string>();
  for (const file of payload.files) {
    files.set(path.posix.normalize(file.path), file.content);
  }
  return files;
};

/**
 * One pipeline step around one model call. A CompletionFailure switches the
 * stage to its offline response (degraded mode); malformed output is never
 * absorbed.
 */
export abstract class StageAgent {
  abstract readonly stage: StageName;
  abstract readonly identity: AgentIdentity;

  constructor(protected readonly deps: StageAgentDeps) {}

  protected async askStructured<S extends z.ZodTypeAny>(
    runId: string,
    prompt: string,
    schema: S
  ): Promise<StageResult<z.output<S>>> {
    const system = renderSystemPrompt(this.identity);
    const user = `${prompt.trim()}\n\n${JSON_ONLY_INSTRUCTION}`;
    this.deps.onPrompt?.({ runId, stage: this.stage, system, user });

    let raw: string;
    let failure: string | undefined;
    try {
      raw = await this.deps.llm.complete(
        [
          { role: "system", content: system },
          { role: "user", content: user }
        ],
        this.deps.temperature
      );
    } catch (error: unknown) {
      if (!(error instanceof CompletionFailure)) {
        throw error;
      }
      failure = error.message;
      raw = await this.deps.offline.respond(this.stage);
    }

    const parsed = schema.safeParse(extractJson(raw));
    if (!parsed.success) {
      throw new MalformedOutput(
        `${this.identity.name} output does not match the expected structure: ${describeIssues(parsed.error.issues)}`,
        raw,
        parsed.error.issues
      );
    }

    return failure === undefined
      ? { output: parsed.data, degraded: false }
      : { output: parsed.data, degraded: true, failure };
  }
}
