import fs from "node:fs/promises";
import path from "node:path";
import { UnsafePathError } from "../errors";
import type { GeneratedFileSet } from "../types";

const isInside = (candidate: string, root: string): boolean => {
  const relative = path.relative(root, candidate);
  return (
    relative.length > 0 &&
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
};

export class WorkspaceService {
  readonly root: string;
  private readonly reserved: ReadonlySet<string>;

  /** `reservedPaths` may never be written as generated files (the run lock, for one). */
  constructor(root: string, reservedPaths: readonly string[] = []) {
    this.root = path.resolve(root);
    this.reserved = new Set(reservedPaths.map((reservedPath) => path.resolve(this.root, reservedPath)));
  }

  resolveSafePath(relativePath: string): string {
    if (!relativePath.trim() || path.isAbsolute(relativePath) || /^[a-zA-Z]:[\\/]/.test(relativePath)) {
      throw new UnsafePathError(relativePath);
    }
    const absolute = path.resolve(this.root, relativePath);
    if (!isInside(absolute, this.root) || this.reserved.has(absolute)) {
      throw new UnsafePathError(relativePath);
    }
    return absolute;
  }

  /**
   * Writes every file of the set, overwriting existing content. All paths are
   * checked before the first write, so a rejected path leaves the set unwritten.
   * Returns the relative paths in set order.
   */
  async writeFiles(files: GeneratedFileSet): Promise<string[]> {
    const targets = [...files.entries()].map(([relativePath, content]) => ({
      relativePath,
      absolute: this.resolveSafePath(relativePath),
      content
    }));

    const written: string[] = [];
    for (const target of targets) {
      await fs.mkdir(path.dirname(target.absolute), { recursive: true });
      await fs.writeFile(target.absolute, target.content, "utf8");
      written.push(target.relativePath);
    }
    return written;
  }
}
