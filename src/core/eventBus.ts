/**
 * Minimal typed Event Bus with bounded in-memory history
 * - emits events in-process (sync)
 * - listeners never break the emitter
 */

import { ulid } from "ulid";
import type { ErrorPayload } from "./errors";
import type { ArgumentValue, ToolArguments } from "./types";

export interface EventPayloads {
  ToolRegisteredEvent: { toolName: string; version: string; cacheable: boolean };
  ToolInvocationEvent: { toolName: string; requestId: string; args: ToolArguments };
  ToolRetryEvent: { toolName: string; requestId: string; attempt: number; error: string };
  ToolCacheHitEvent: { toolName: string; requestId: string };
  ToolResultEvent: { toolName: string; requestId: string; durationMs: number; value: ArgumentValue };
  ToolErrorEvent: { toolName: string; requestId: string; durationMs: number; error: ErrorPayload };
  OutputContractEvent: { toolName: string; requestId: string; violations: string[] };
  ConnectionEvent: { type: "open" | "close"; connectionId: string; activeConnections: number };
  ListenerErrorEvent: { type: EventType; error: string; listener: string };
}

export type EventType = keyof EventPayloads;

export const EVENT_TYPES: readonly EventType[] = [
  "ToolRegisteredEvent",
  "ToolInvocationEvent",
  "ToolRetryEvent",
  "ToolCacheHitEvent",
  "ToolResultEvent",
  "ToolErrorEvent",
  "OutputContractEvent",
  "ConnectionEvent",
  "ListenerErrorEvent",
];

export function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some(t => t === value);
}

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: EventPayloads[K];
  meta?: Record<string, unknown>;
}

type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

interface Registration {
  name: string;
  invoke: AnyListener;
}

function isEnvelopeOf<K extends EventType>(evt: EventEnvelope, type: K): evt is EventEnvelope<K> {
  return evt.type === type;
}

export interface EventBusConfig {
  maxHistorySize?: number;
}

export class EventBus {
  // keyed by the caller's listener so off() can find the registration
  private listeners = new Map<EventType, Map<object, Registration>>();
  private anyListeners: Set<AnyListener> = new Set();
  private history: EventEnvelope[] = [];
  private readonly maxHistorySize: number;

  constructor(config: EventBusConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? 1000;
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    let registrations = this.listeners.get(type);
    if (!registrations) {
      registrations = new Map<object, Registration>();
      this.listeners.set(type, registrations);
    }
    if (registrations.has(listener)) return;
    registrations.set(listener, {
      name: listener.name || "anonymous",
      invoke: (evt) => {
        if (isEnvelopeOf(evt, type)) listener(evt);
      },
    });
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listeners.get(type)?.delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  offAny(listener: AnyListener): void {
    this.anyListeners.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: EventPayloads[K], meta?: Record<string, unknown>): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };
    this.history.push(envelope);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }

    const registrations = this.listeners.get(type);
    if (registrations) {
      for (const { name, invoke } of [...registrations.values()]) {
        try {
          invoke(envelope);
        } catch (e) {
          if (type !== "ListenerErrorEvent") {
            this.emit("ListenerErrorEvent", {
              type,
              error: e instanceof Error ? e.message : String(e),
              listener: name,
            });
          }
        }
      }
    }

    for (const l of this.anyListeners) {
      try {
        l(envelope);
      } catch (e) {
        console.error(`[EventBus] Listener error (any):`, e);
      }
    }

    return envelope;
  }

  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter(e => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter(e => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }
}
