import { describe, it, expect, beforeEach } from "vitest";
import { NotFoundError, ValidationError } from "@netpulse/shared/errors";
import { TargetRegistry } from "./registry.js";

const DEFAULTS = { timeoutMs: 5000, successThreshold: 2, failureThreshold: 3 };

describe("TargetRegistry", () => {
  let registry: TargetRegistry;
  let counter: number;
  let clock: Date;

  beforeEach(() => {
    counter = 0;
    clock = new Date("2026-01-01T00:00:00.000Z");
    registry = new TargetRegistry({
      defaults: DEFAULTS,
      idFactory: () => `target-${++counter}`,
      now: () => clock,
    });
  });

  describe("add()", () => {
    it("returns the generated id and stores the normalized target", () => {
      const id = registry.add({ host: "db.internal", port: 5432, protocol: "tcp", intervalMs: 1000 });

      expect(id).toBe("target-1");
      expect(registry.get(id)).toEqual({
        id: "target-1",
        name: "db.internal:5432",
        address: { host: "db.internal", port: 5432, protocol: "TCP" },
        path: "/",
        tls: false,
        intervalMs: 1000,
        timeoutMs: 5000,
        successThreshold: 2,
        failureThreshold: 3,
        degradedLatencyMs: null,
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
      });
    });

    it("throws a ValidationError listing every problem and stores nothing", () => {
      let caught: unknown;
      try {
        registry.add({ host: "", protocol: "TCP", intervalMs: -1 });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught instanceof ValidationError && caught.details).toEqual([
        "host is required",
        "port must be an integer between 1 and 65535",
        "intervalMs must be a positive integer",
      ]);
      expect(registry.size).toBe(0);
      expect(counter).toBe(0);
    });

    it("freezes stored targets", () => {
      const id = registry.add({ host: "a.example", port: 22, protocol: "TCP", intervalMs: 1000 });
      expect(Object.isFrozen(registry.get(id))).toBe(true);
      expect(Object.isFrozen(registry.get(id).address)).toBe(true);
    });
  });

  describe("remove()", () => {
    it("removes a target and fails on the second call", () => {
      const id = registry.add({ host: "a.example", port: 22, protocol: "TCP", intervalMs: 1000 });

      const removed = registry.remove(id);
      expect(removed.id).toBe(id);
      expect(registry.has(id)).toBe(false);
      expect(() => registry.remove(id)).toThrow(NotFoundError);
      expect(() => registry.remove(id)).toThrow(`Target not found: ${id}`);
    });

    it("leaves other targets untouched on failure", () => {
      registry.add({ host: "a.example", port: 22, protocol: "TCP", intervalMs: 1000 });
      expect(() => registry.remove("missing")).toThrow(NotFoundError);
      expect(registry.size).toBe(1);
    });
  });

  describe("update()", () => {
    it("merges mutable fields and bumps updatedAt", () => {
      const id = registry.add({ host: "a.example", port: 22, protocol: "TCP", intervalMs: 1000 });
      clock = new Date("2026-01-01T00:05:00.000Z");

      const updated = registry.update(id, { intervalMs: 2000, failureThreshold: 5 });

      expect(updated.intervalMs).toBe(2000);
      expect(updated.failureThreshold).toBe(5);
      expect(updated.createdAt).toBe("2026-01-01T00:00:00.000Z");
      expect(updated.updatedAt).toBe("2026-01-01T00:05:00.000Z");
      expect(registry.get(id)).toBe(updated);
    });

    it("rejects address changes without modifying the target", () => {
      const id = registry.add({ host: "a.example", port: 22, protocol: "TCP", intervalMs: 1000 });
      const before = registry.get(id);

      expect(() => registry.update(id, { port: 23 })).toThrow("port cannot be changed after creation");
      expect(registry.get(id)).toBe(before);
    });

    it("throws NotFoundError for unknown ids before validating", () => {
      expect(() => registry.update("missing", { port: 23 })).toThrow(NotFoundError);
    });
  });

  describe("list()", () => {
    it("returns targets in insertion order", () => {
      registry.add({ host: "c.example", port: 1, protocol: "TCP", intervalMs: 1000 });
      registry.add({ host: "a.example", protocol: "ICMP", intervalMs: 1000 });
      registry.add({ host: "b.example", protocol: "HTTP", intervalMs: 1000 });

      expect(registry.list().map((t) => t.name)).toEqual(["c.example:1", "a.example", "b.example:80"]);
    });
  });
});
