import { randomUUID } from "node:crypto";
import type { CodeInput } from "../agents/codeAgent";
import type { RequirementsInput } from "../agents/requirementsAgent";
import type { TestInput } from "../agents/testAgent";
import { errorMessage } from "../errors";
import type { Specification } from "../schemas/specification";
import type { ProjectLockHandle } from "../services/projectLock";
import type { RunEventLog } from "../services/runEventLog";
import type { GeneratedFileSet, RunResult, StageName, StageResult } from "../types";

export interface RequirementsAgentLike {
  createSpecification(input: RequirementsInput): Promise<StageResult<Specification>>;
}

export interface CodeAgentLike {
  generateCode(input: CodeInput): Promise<StageResult<GeneratedFileSet>>;
}

export interface TestAgentLike {
  generateTests(input: TestInput): Promise<StageResult<GeneratedFileSet>>;
}

export interface WorkspaceLike {
  readonly root: string;
  writeFiles(files: GeneratedFileSet): Promise<string[]>;
}

export interface ProjectLockLike {
  acquire(runId: string): Promise<ProjectLockHandle>;
}

export interface PipelineDeps {
  events: RunEventLog;
  workspace: WorkspaceLike;
  lock: ProjectLockLike;
  requirementsAgent: RequirementsAgentLike;
  codeAgent: CodeAgentLike;
  testAgent: TestAgentLike;
  idFactory?: () => string;
}

/**
 * Requirements -> Code -> Test, one stage at a time, writing the code and
 * test file sets under the project root as soon as each is produced.
 * Files already written stay on disk when a later stage fails.
 */
export class Pipeline {
  private readonly idFactory: () => string;

  constructor(private readonly deps: PipelineDeps) {
    this.idFactory = deps.idFactory ?? (() => randomUUID());
  }

  async run(userStory: string, runId = this.idFactory()): Promise<RunResult> {
    const { events } = this.deps;
    const degradedStages: StageName[] = [];

    const track = async <T>(stage: StageName, step: () => Promise<StageResult<T>>): Promise<T> => {
      events.pushEvent(runId, stage, "stage_started", `Stage '${stage}' started.`, { stage });
      const result = await step();
      if (result.degraded) {
        degradedStages.push(stage);
        events.pushEvent(
          runId,
          stage,
          "degraded_mode",
          `Stage '${stage}' used its offline response; no real generation happened.`,
          { level: "warn", stage, data: { failure: result.failure } }
        );
      }
      events.pushEvent(runId, stage, "stage_completed", `Stage '${stage}' completed.`, { stage });
      return result.output;
    };

    const write = async (stage: StageName, files: GeneratedFileSet): Promise<string[]> => {
      const written = await this.deps.workspace.writeFiles(files);
      events.pushEvent(runId, "workspace", "files_written", `Wrote ${written.length} ${stage} file(s).`, {
        stage,
        data: { paths: written }
      });
      return written;
    };

    events.pushEvent(runId, "orchestrator", "run_started", "Pipeline started.", {
      data: { projectRoot: this.deps.workspace.root }
    });

    let lockHandle: ProjectLockHandle | undefined;
    try {
      lockHandle = await this.deps.lock.acquire(runId);

      const specification = await track("requirements", () =>
        this.deps.requirementsAgent.createSpecification({ runId, userStory })
      );
      const codeFileSet = await track("code", () => this.deps.codeAgent.generateCode({ runId, specification }));
      const codeFiles = await write("code", codeFileSet);
      const testFileSet = await track("test", () =>
        this.deps.testAgent.generateTests({ runId, specification, codeFiles: codeFileSet })
      );
      const testFiles = await write("test", testFileSet);

      events.pushEvent(runId, "orchestrator", "run_completed", "Pipeline completed.", {
        level: degradedStages.length > 0 ? "warn" : "info",
        data: { degradedStages }
      });

      return { runId, specification, codeFiles, testFiles, degradedStages };
    } catch (error: unknown) {
      events.pushEvent(runId, "orchestrator", "run_failed", errorMessage(error), {
        level: "error",
        data: { errorName: error instanceof Error ? error.name : "Error" }
      });
      throw error;
    } finally {
      await lockHandle?.release();
    }
  }
}
