import { randomUUID } from "node:crypto";
import { NotFoundError, ValidationError } from "@netpulse/shared/errors";
import type { Target, TargetDefaults } from "../types.js";
import { validateTargetSpec, validateTargetUpdate } from "./validation.js";

export interface TargetRegistryOptions {
  defaults: TargetDefaults;
  idFactory?: () => string;
  now?: () => Date;
}

/**
 * The set of monitored targets, in insertion order.
 *
 * Every mutation validates first and changes state only when it succeeds, so a
 * rejected call leaves the registry as it was. Stored targets are frozen; an
 * update replaces the stored object.
 */
export class TargetRegistry {
  private readonly targets = new Map<string, Target>();
  private readonly defaults: TargetDefaults;
  private readonly idFactory: () => string;
  private readonly now: () => Date;

  constructor(options: TargetRegistryOptions) {
    this.defaults = options.defaults;
    this.idFactory = options.idFactory ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  /** Register a target. Returns its generated id. */
  add(spec: unknown): string {
    const result = validateTargetSpec(spec, this.defaults);
    if (!result.valid) throw new ValidationError(result.errors);

    const { host, port, protocol, ...rest } = result.value;
    const id = this.idFactory();
    const timestamp = this.now().toISOString();

    this.targets.set(
      id,
      Object.freeze({
        id,
        ...rest,
        address: Object.freeze({ host, port, protocol }),
        createdAt: timestamp,
        updatedAt: timestamp,
      }),
    );
    return id;
  }

  /** Remove a target. Fails for unknown ids, including already removed ones. */
  remove(id: string): Target {
    const target = this.get(id);
    this.targets.delete(id);
    return target;
  }

  /** Merge changed fields into a target and return the new version. */
  update(id: string, partial: unknown): Target {
    const current = this.get(id);
    const result = validateTargetUpdate(partial);
    if (!result.valid) throw new ValidationError(result.errors);

    const next: Target = Object.freeze({
      ...current,
      ...result.value,
      updatedAt: this.now().toISOString(),
    });
    this.targets.set(id, next);
    return next;
  }

  get(id: string): Target {
    const target = this.targets.get(id);
    if (!target) throw new NotFoundError("Target", id);
    return target;
  }

  has(id: string): boolean {
    return this.targets.has(id);
  }

  list(): Target[] {
    return Array.from(this.targets.values());
  }

  get size(): number {
    return this.targets.size;
  }
}
