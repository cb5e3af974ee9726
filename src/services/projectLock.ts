import fs from "node:fs/promises";
import path from "node:path";
import { ProjectLockedError } from "../errors";

export const LOCK_FILE_NAME = ".storyforge.lock";

export interface ProjectLockHandle {
  readonly lockPath: string;
  release(): Promise<void>;
}

const errorCode = (error: unknown): string | undefined =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;

/**
 * Advisory lock on a project root. Only runs going through this class honour
 * it; a lock left behind by a killed process has to be removed by hand.
 */
export class ProjectLock {
  readonly lockPath: string;

  constructor(root: string) {
    this.lockPath = path.join(path.resolve(root), LOCK_FILE_NAME);
  }

  async acquire(runId: string): Promise<ProjectLockHandle> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });

    const payload = JSON.stringify({ pid: process.pid, runId, acquiredAt: new Date().toISOString() });
    try {
      await fs.writeFile(this.lockPath, payload, { encoding: "utf8", flag: "wx" });
    } catch (error: unknown) {
      if (errorCode(error) === "EEXIST") {
        throw new ProjectLockedError(this.lockPath);
      }
      throw error;
    }

    const lockPath = this.lockPath;
    let released = false;
    return {
      lockPath,
      release: async () => {
        if (released) return;
        released = true;
        await fs.rm(lockPath, { force: true });
      }
    };
  }
}
