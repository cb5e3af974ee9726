import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UnsafePathError } from "../../src/errors";
import { WorkspaceService } from "../../src/services/workspace";

describe("WorkspaceService", () => {
  let root = "";

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "storyforge-ws-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes every file under the root, creating parent directories", async () => {
    const workspace = new WorkspaceService(root);

    const written = await workspace.writeFiles(
      new Map([
        ["app/main.py", "print('hi')"],
        ["app/api/routes.py", "router = None"],
        ["README_generated.md", "# Run"]
      ])
    );

    expect(written).toEqual(["app/main.py", "app/api/routes.py", "README_generated.md"]);
    await expect(fs.readFile(path.join(root, "app/api/routes.py"), "utf8")).resolves.toBe("router = None");
    await expect(fs.readFile(path.join(root, "README_generated.md"), "utf8")).resolves.toBe("# Run");
  });

  it("overwrites existing files", async () => {
    const workspace = new WorkspaceService(root);

    await workspace.writeFiles(new Map([["a.txt", "first"]]));
    await workspace.writeFiles(new Map([["a.txt", "second"]]));

    await expect(fs.readFile(path.join(root, "a.txt"), "utf8")).resolves.toBe("second");
  });

  it("refuses an escaping path and writes nothing from the set", async () => {
    const workspace = new WorkspaceService(root);

    await expect(
      workspace.writeFiles(
        new Map([
          ["ok.txt", "fine"],
          ["../../etc/passwd", "nope"]
        ])
      )
    ).rejects.toThrowError("Unsafe path rejected: ../../etc/passwd");

    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it.each(["/etc/passwd", "C:\\temp\\x.txt", "", "   ", ".", "app/../..", "../sibling.txt"])(
    "rejects %j",
    (candidate) => {
      expect(() => new WorkspaceService(root).resolveSafePath(candidate)).toThrowError(UnsafePathError);
    }
  );

  it("refuses reserved paths however they are spelled", async () => {
    const workspace = new WorkspaceService(root, [path.join(root, ".storyforge.lock")]);

    for (const candidate of [".storyforge.lock", "./.storyforge.lock", "app/../.storyforge.lock"]) {
      expect(() => workspace.resolveSafePath(candidate)).toThrowError(UnsafePathError);
    }
    await expect(
      workspace.writeFiles(
        new Map([
          [".storyforge.lock", "{}"],
          ["app/main.py", "app = 1"]
        ])
      )
    ).rejects.toThrowError("Unsafe path rejected: .storyforge.lock");
    await expect(fs.readdir(root)).resolves.toEqual([]);
    expect(workspace.resolveSafePath("app/.storyforge.lock")).toBe(path.join(root, "app", ".storyforge.lock"));
  });

  it("accepts paths that only look like parent references", () => {
    const workspace = new WorkspaceService(root);

    expect(workspace.resolveSafePath("..notes.txt")).toBe(path.join(root, "..notes.txt"));
    expect(workspace.resolveSafePath("app/../app/main.py")).toBe(path.join(root, "app", "main.py"));
  });
});
