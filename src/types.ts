import type { Specification } from "./schemas/specification";

export type StageName = "requirements" | "code" | "test";

export type EventRole = "orchestrator" | StageName | "workspace";

export type EventLevel = "info" | "warn" | "error";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export type GeneratedFileSet = ReadonlyMap<string, string>;

export interface StageResult<T> {
  output: T;
  degraded: boolean;
  /** Completion failure message when `degraded` is true. */
  failure?: string;
}

export interface AgentIdentity {
  name: string;
  role: string;
  goal: string;
  backstory: string;
}

export interface PromptTrace {
  runId: string;
  stage: StageName;
  system: string;
  user: string;
}

export interface RunResult {
  runId: string;
  specification: Specification;
  codeFiles: string[];
  testFiles: string[];
  degradedStages: StageName[];
}

export interface RunEvent {
  id: string;
  runId: string;
  timestamp: string;
  level: EventLevel;
  role: EventRole;
  type: string;
  message: string;
  stage?: StageName;
  data?: Record<string, unknown>;
}
