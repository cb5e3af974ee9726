import path from "node:path";
import { generatedFilesSchema, type Specification } from "../schemas/specification";
import type { AgentIdentity, GeneratedFileSet, StageResult } from "../types";
import { prettyJson } from "../utils/json";
import { StageAgent, toFileSet } from "./stageAgent";

export interface TestInput {
  runId: string;
  specification: Specification;
  codeFiles: GeneratedFileSet;
}

// Entry point, routes and models only; the rest would only grow the prompt.
const KEY_FILE_PATTERN = /^(main|index|app|server|routes?|models?)\.[^.]+$/i;

export const isKeyCodeFile = (filePath: string): boolean => KEY_FILE_PATTERN.test(path.posix.basename(filePath));

export const selectKeyFiles = (codeFiles: GeneratedFileSet): Record<string, string> =>
  Object.fromEntries([...codeFiles.entries()].filter(([filePath]) => isKeyCodeFile(filePath)));

export const buildTestPrompt = (specification: Specification, codeFiles: GeneratedFileSet): string => {
  const { framework, testFramework } = specification.techChoice;
  return [
    `Generate ${testFramework} tests for a ${framework} app following this spec.`,
    `SPEC:\n${prettyJson(specification)}`,
    `KEY CODE FILES (for context):\n${prettyJson(selectKeyFiles(codeFiles))}`,
    [
      "Requirements:",
      `- Use the ${framework} test client or an equivalent in-process client.`,
      "- Create tests for: create, read list, read by id, update, delete.",
      "- Include at least 2 edge cases (invalid payload, missing id).",
      "- Put every test file under tests/.",
      '- Return JSON object: { "files": [{ "path": "tests/...", "content": "..." }] }'
    ].join("\n")
  ].join("\n\n");
};

export class TestAgent extends StageAgent {
  readonly stage = "test" as const;
  readonly identity: AgentIdentity = {
    name: "Test agent",
    role: "test engineer",
    goal: "Write API tests that prove the generated project meets its acceptance criteria.",
    backstory: "You cover the happy path first, then the inputs people forget about."
  };

  async generateTests(input: TestInput): Promise<StageResult<GeneratedFileSet>> {
    const result = await this.askStructured(
      input.runId,
      buildTestPrompt(input.specification, input.codeFiles),
      generatedFilesSchema
    );
    return { ...result, output: toFileSet(result.output) };
  }
}
