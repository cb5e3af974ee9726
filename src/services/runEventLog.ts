import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import type { EventLevel, RunEvent, StageName } from "../types";

interface EventOptions {
  level?: EventLevel;
  stage?: StageName;
  data?: Record<string, unknown>;
}

const ALL_CHANNEL = "run:*";

export class RunEventLog {
  private readonly events = new Map<string, RunEvent[]>();
  private readonly emitter = new EventEmitter();

  pushEvent(runId: string, role: RunEvent["role"], type: string, message: string, options: EventOptions = {}): RunEvent {
    const event: RunEvent = {
      id: randomUUID(),
      runId,
      timestamp: new Date().toISOString(),
      level: options.level ?? "info",
      role,
      type,
      message,
      stage: options.stage,
      data: options.data
    };
    const list = this.events.get(runId) ?? [];
    list.push(event);
    this.events.set(runId, list);
    this.emitter.emit(`run:${runId}`, event);
    this.emitter.emit(ALL_CHANNEL, event);
    return event;
  }

  has(runId: string): boolean {
    return this.events.has(runId);
  }

  getEvents(runId: string): RunEvent[] {
    return [...(this.events.get(runId) ?? [])];
  }

  subscribe(runId: string, handler: (event: RunEvent) => void): () => void {
    const channel = `run:${runId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  subscribeAll(handler: (event: RunEvent) => void): () => void {
    this.emitter.on(ALL_CHANNEL, handler);
    return () => this.emitter.off(ALL_CHANNEL, handler);
  }
}
