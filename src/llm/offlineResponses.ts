import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { CompletionFailure } from "../errors";
import type { ChatMessage, StageName } from "../types";

/** Supplies the text a stage uses when the completion endpoint is unreachable. */
export interface OfflineResponseSource {
  respond(stage: StageName): Promise<string>;
}

// src/llm when run from sources, dist/src/llm after a build.
const fixtureDirCandidates = [
  path.resolve(__dirname, "..", "..", "fixtures", "offline"),
  path.resolve(__dirname, "..", "..", "..", "fixtures", "offline")
];

export const DEFAULT_FIXTURE_DIR = fixtureDirCandidates.find((candidate) => existsSync(candidate)) ?? fixtureDirCandidates[0];

export class FixtureResponseSource implements OfflineResponseSource {
  private readonly cache = new Map<StageName, string>();

  constructor(private readonly fixtureDir = DEFAULT_FIXTURE_DIR) {}

  async respond(stage: StageName): Promise<string> {
    const cached = this.cache.get(stage);
    if (cached !== undefined) {
      return cached;
    }

    const text = await fs.readFile(path.join(this.fixtureDir, `${stage}.json`), "utf8");
    this.cache.set(stage, text);
    return text;
  }
}

export class StaticResponseSource implements OfflineResponseSource {
  constructor(private readonly responses: Partial<Record<StageName, string>>) {}

  async respond(stage: StageName): Promise<string> {
    const text = this.responses[stage];
    if (text === undefined) {
      throw new Error(`No offline response configured for stage "${stage}".`);
    }
    return text;
  }
}

/** Chat client used with --offline: every call fails, so each stage answers from its offline source. */
export class UnavailableChatClient {
  async complete(_conversation: ChatMessage[], _temperature?: number): Promise<string> {
    throw new CompletionFailure("Completion endpoint disabled (offline mode).", 0);
  }
}
