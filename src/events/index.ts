// Event bus: sync job and notifier emit, the SSE endpoint subscribes

import { EventEmitter } from "node:events";
import type { SourceKind } from "../types/contentRecord.js";


/** Payload of content:new */
export interface NewContentEvent {
  kind: SourceKind;
  count: number;
}


/** Payload of sync:done */
export interface SyncDoneEvent {
  kind: SourceKind;
  status: "success" | "failure";
  /** Where a failed sync stopped */
  stage?: "fetch" | "store" | "cancelled";
  inserted: number;
  updated: number;
}


interface BusEvents {
  "content:new": [NewContentEvent];
  "sync:done": [SyncDoneEvent];
}


/** One bus per process; setMaxListeners avoids the warning with many SSE clients */
export class EventBus {
  private readonly emitter = new EventEmitter();

  constructor(maxListeners = 200) {
    this.emitter.setMaxListeners(maxListeners);
  }

  emit<K extends keyof BusEvents>(event: K, ...args: BusEvents[K]): void {
    this.emitter.emit(event, ...args);
  }

  /** Subscribe; returns the unsubscribe function */
  on<K extends keyof BusEvents>(event: K, fn: (...args: BusEvents[K]) => void): () => void {
    this.emitter.on(event, fn);
    return () => {
      this.emitter.off(event, fn);
    };
  }
}
