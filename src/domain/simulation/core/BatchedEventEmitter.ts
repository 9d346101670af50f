import { EventEmitter } from "node:events";
import { injectable } from "inversify";
import type { SchedulerEventType } from "../../../shared/constants/EventEnums";
import type { SchedulerEventPayloads } from "../../../shared/types/simulation/events";

/**
 * EventEmitter con buffer de eventos para procesamiento por lotes.
 * Los sistemas publican durante el tick; los listeners corren en flushEvents().
 */
@injectable()
export class BatchedEventEmitter extends EventEmitter {
  private eventQueue: Array<{ name: string; payload: unknown }> = [];
  private batchingEnabled = true;

  constructor() {
    super();
    this.setMaxListeners(50);
  }

  /**
   * Sobrescribe emit() para encolar cuando batching está habilitado.
   */
  public emit(event: string | symbol, ...args: unknown[]): boolean {
    if (this.batchingEnabled) {
      this.queueEvent(String(event), args[0]);
      return true;
    }
    return super.emit(event, ...args);
  }

  /**
   * Typed publish.
   */
  public publish<K extends SchedulerEventType>(
    type: K,
    payload: SchedulerEventPayloads[K],
  ): void {
    this.emit(type, payload);
  }

  /**
   * Typed subscribe. Returns the unsubscribe function.
   */
  public subscribe<K extends SchedulerEventType>(
    type: K,
    handler: (payload: SchedulerEventPayloads[K]) => void,
  ): () => void {
    this.on(type, handler);
    return () => {
      this.off(type, handler);
    };
  }

  public queueEvent(name: string, payload: unknown): void {
    if (!this.batchingEnabled) {
      super.emit(name, payload);
      return;
    }

    this.eventQueue.push({ name, payload });
  }

  public flushEvents(): void {
    if (this.eventQueue.length === 0) return;

    const batch = this.eventQueue.splice(0);
    const wasBatchingEnabled = this.batchingEnabled;

    this.batchingEnabled = false;

    try {
      for (const event of batch) {
        super.emit(event.name, event.payload);
      }
    } finally {
      this.batchingEnabled = wasBatchingEnabled;
    }
  }

  public setBatchingEnabled(enabled: boolean): void {
    this.batchingEnabled = enabled;
    if (!enabled) {
      this.flushEvents();
    }
  }

  public clearQueue(): void {
    this.eventQueue = [];
  }

  public getQueueSize(): number {
    return this.eventQueue.length;
  }

  /** Names of queued events, oldest first. */
  public peekQueue(): string[] {
    return this.eventQueue.map((event) => event.name);
  }
}
