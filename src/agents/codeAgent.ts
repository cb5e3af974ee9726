import { generatedFilesSchema, type Specification } from "../schemas/specification";
import type { AgentIdentity, GeneratedFileSet, StageResult } from "../types";
import { prettyJson } from "../utils/json";
import { StageAgent, toFileSet } from "./stageAgent";

export interface CodeInput {
  runId: string;
  specification: Specification;
}

export const buildCodePrompt = (specification: Specification): string => {
  const { language, framework } = specification.techChoice;
  return [
    "You are generating a small but clean codebase for the given spec.",
    `SPEC JSON:\n${prettyJson(specification)}`,
    [
      `Generate a minimal ${framework} project in ${language} with:`,
      "- an application entry point",
      "- data model definitions for every entity",
      "- storage (in-memory, or SQLite if very simple)",
      "- route handlers for every endpoint",
      "- a dependency manifest",
      "- a README_generated.md explaining how to run it"
    ].join("\n"),
    [
      "Constraints:",
      "- Keep it simple and runnable.",
      "- Provide CRUD for the main entity.",
      "- Code must be complete: no placeholders, no TODO comments, no elided sections.",
      "- Use relative paths only.",
      '- Return JSON object: { "files": [{ "path": "...", "content": "..." }] }'
    ].join("\n")
  ].join("\n\n");
};

export class CodeAgent extends StageAgent {
  readonly stage = "code" as const;
  readonly identity: AgentIdentity = {
    name: "Code agent",
    role: "backend developer",
    goal: "Produce a complete, runnable backend project that implements the specification.",
    backstory: "You write small, idiomatic services and never leave unfinished code behind."
  };

  async generateCode(input: CodeInput): Promise<StageResult<GeneratedFileSet>> {
    const result = await this.askStructured(input.runId, buildCodePrompt(input.specification), generatedFilesSchema);
    return { ...result, output: toFileSet(result.output) };
  }
}
