import { describe, it, expect, beforeEach, vi } from "vitest";
import { BatchedEventEmitter } from "../../src/domain/simulation/core/BatchedEventEmitter";
import { SchedulerEventType } from "../../src/shared/constants/EventEnums";
import { JobType } from "../../src/shared/constants/JobEnums";

describe("BatchedEventEmitter", () => {
  let emitter: BatchedEventEmitter;

  beforeEach(() => {
    emitter = new BatchedEventEmitter();
  });

  describe("emit", () => {
    it("debe encolar evento cuando batching habilitado", () => {
      const listener = vi.fn();
      emitter.on("test-event", listener);

      emitter.emit("test-event", { data: "test" });

      expect(listener).not.toHaveBeenCalled();
      emitter.flushEvents();
      expect(listener).toHaveBeenCalledWith({ data: "test" });
    });

    it("debe emitir inmediatamente cuando batching deshabilitado", () => {
      const listener = vi.fn();
      emitter.setBatchingEnabled(false);
      emitter.on("test-event", listener);

      emitter.emit("test-event", { data: "test" });

      expect(listener).toHaveBeenCalledWith({ data: "test" });
    });
  });

  describe("flushEvents", () => {
    it("debe entregar los eventos en orden de publicación", () => {
      const seen: string[] = [];
      emitter.on("a", () => seen.push("a"));
      emitter.on("b", () => seen.push("b"));

      emitter.emit("b");
      emitter.emit("a");
      emitter.emit("b");
      emitter.flushEvents();

      expect(seen).toEqual(["b", "a", "b"]);
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("debe entregar de inmediato lo que publica un listener durante el flush", () => {
      const nested = vi.fn();
      emitter.on("outer", () => emitter.emit("inner", 1));
      emitter.on("inner", nested);

      emitter.emit("outer");
      emitter.flushEvents();

      expect(nested).toHaveBeenCalledWith(1);
      expect(emitter.getQueueSize()).toBe(0);
    });

    it("debe restaurar el batching aunque un listener falle", () => {
      emitter.on("boom", () => {
        throw new Error("listener failed");
      });
      emitter.emit("boom");

      expect(() => emitter.flushEvents()).toThrow("listener failed");

      emitter.emit("later");
      expect(emitter.getQueueSize()).toBe(1);
    });
  });

  describe("publish y subscribe", () => {
    it("debe entregar el payload tipado y permitir desuscribirse", () => {
      const handler = vi.fn();
      const unsubscribe = emitter.subscribe(SchedulerEventType.JOB_INSERTED, handler);
      const payload = { jobId: "job_1", jobType: JobType.HAUL, tick: 4, priority: 2 };

      emitter.publish(SchedulerEventType.JOB_INSERTED, payload);
      expect(emitter.peekQueue()).toEqual([SchedulerEventType.JOB_INSERTED]);
      emitter.flushEvents();
      expect(handler).toHaveBeenCalledWith(payload);

      unsubscribe();
      emitter.publish(SchedulerEventType.JOB_INSERTED, payload);
      emitter.flushEvents();
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  it("debe vaciar la cola sin entregar con clearQueue", () => {
    const listener = vi.fn();
    emitter.on("test-event", listener);
    emitter.queueEvent("test-event", 1);
    emitter.queueEvent("test-event", 2);

    emitter.clearQueue();
    emitter.flushEvents();

    expect(listener).not.toHaveBeenCalled();
    expect(emitter.getQueueSize()).toBe(0);
  });
});
