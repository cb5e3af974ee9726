import { type Specification, specificationSchema } from "../schemas/specification";
import type { AgentIdentity, StageResult } from "../types";
import { StageAgent } from "./stageAgent";

export interface RequirementsInput {
  runId: string;
  userStory: string;
}

const SPECIFICATION_SHAPE = `{
  "title": "short title",
  "summary": "1-3 sentences",
  "scope": { "in": ["..."], "out": ["..."] },
  "functionalRequirements": ["..."],
  "nonFunctionalRequirements": ["..."],
  "entities": [
    { "name": "EntityName", "fields": [{ "name": "id", "type": "int", "required": true }] }
  ],
  "apiEndpoints": [
    {
      "method": "GET | POST | PUT | PATCH | DELETE",
      "path": "/...",
      "description": "...",
      "requestBodyExample": {},
      "responseExample": {}
    }
  ],
  "acceptanceCriteria": [
    { "feature": "...", "scenario": "...", "given": ["..."], "when": ["..."], "then": ["..."] }
  ],
  "techChoice": { "language": "python", "framework": "fastapi", "testFramework": "pytest" }
}`;

export const buildRequirementsPrompt = (userStory: string): string =>
  [
    "Transform this user story into a clear, structured software specification.",
    `USER STORY:\n${userStory}`,
    `Return JSON with this shape:\n${SPECIFICATION_SHAPE}`,
    [
      "Rules:",
      "- Keep it implementable in a small demo.",
      "- Prefer in-memory storage or an embedded database such as SQLite.",
      "- Provide at least 3 CRUD endpoints.",
      "- Write acceptance criteria as Gherkin given/when/then steps."
    ].join("\n")
  ].join("\n\n");

export class RequirementsAgent extends StageAgent {
  readonly stage = "requirements" as const;
  readonly identity: AgentIdentity = {
    name: "Requirements agent",
    role: "requirements analyst",
    goal: "Turn a vague user story into a precise, implementable specification with acceptance criteria.",
    backstory: "You have years of experience writing API specifications that small teams can build in a day."
  };

  async createSpecification(input: RequirementsInput): Promise<StageResult<Specification>> {
    const userStory = input.userStory.trim();
    if (!userStory) {
      throw new RangeError("userStory must not be empty");
    }
    return this.askStructured(input.runId, buildRequirementsPrompt(userStory), specificationSchema);
  }
}
