/**
 * Minimal typed Event Bus with append-only history
 * - emits events in-process (sync)
 * - keeps a bounded in-memory history
 */

import { ulid } from "ulid";

export type EventType =
  | "RemoteCallEvent"
  | "RemoteErrorEvent"
  | "ModelFitEvent"
  | "ModelPredictEvent"
  | "ModelSummaryEvent"
  | "ModelSaveEvent"
  | "ModelReadEvent"
  | "ModelCloseEvent"
  | "ListenerErrorEvent";

export interface EventEnvelope<T = unknown> {
  id: string;
  type: EventType;
  timestamp: number;
  payload: T;
  meta?: Record<string, unknown>;
}

export type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number;
  historyRetentionPolicy?: "truncate" | "circular";
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener): void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  emit<T>(type: EventType, payload: T, meta?: Record<string, unknown>): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    this.notify(this.listeners.get(type), envelope);
    this.notify(this.listeners.get("any"), envelope);

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  private notify(listeners: Set<Listener> | undefined, envelope: EventEnvelope): void {
    if (!listeners) return;
    for (const l of listeners) {
      try {
        l(envelope);
      } catch (e) {
        // A throwing listener must not break the binding call that emitted.
        if (envelope.type !== "ListenerErrorEvent") {
          this.emit("ListenerErrorEvent", {
            type: envelope.type,
            error: e instanceof Error ? e.message : String(e),
            listener: l.name || "anonymous",
          });
        }
      }
    }
  }
}
