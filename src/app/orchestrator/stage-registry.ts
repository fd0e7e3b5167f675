/**
 * StageRegistry holds the ordered stage list for a run.
 * Purpose: reject bad registrations early and expose a stable invocation order.
 * Assumptions: registration happens before the first run; the orchestrator freezes it.
 * Usage: registry.register(def); registry.validateDependencies(initialKeys); registry.orderedStages().
 */

import { ConfigurationError } from "../../core/errors.js";
import { NAME_PATTERN } from "../../core/utils.js";

import type { StageContext } from "./run-context.js";
import type { Stage, StageDefinition, StageRunInfo } from "./stage.js";

export class StageRegistry {
  private readonly stages: Stage[] = [];
  private frozen = false;

  get size(): number {
    return this.stages.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  register(definition: StageDefinition): Stage {
    if (this.frozen) {
      throw new ConfigurationError(
        `Cannot register stage '${definition.name}': the registry is frozen once a run starts`,
      );
    }
    if (!NAME_PATTERN.test(definition.name)) {
      throw new ConfigurationError(`Invalid stage name '${definition.name}'`);
    }
    if (this.stages.some((stage) => stage.name === definition.name)) {
      throw new ConfigurationError(`Stage '${definition.name}' is already registered`);
    }

    const position = definition.position ?? this.nextPosition();
    if (!Number.isInteger(position) || position < 0) {
      throw new ConfigurationError(
        `Stage '${definition.name}' has invalid position ${position}; expected a non-negative integer`,
      );
    }

    const clash = this.stages.find((stage) => stage.position === position);
    if (clash) {
      throw new ConfigurationError(
        `Stage '${definition.name}' reuses position ${position} already taken by '${clash.name}'`,
      );
    }

    const stage: Stage = Object.freeze({
      name: definition.name,
      position,
      description: definition.description,
      requires: Object.freeze([...(definition.requires ?? [])]),
      produces: Object.freeze([...(definition.produces ?? [])]),
      execute: (context: StageContext, info: StageRunInfo) => definition.execute(context, info),
    });

    this.stages.push(stage);
    return stage;
  }

  freeze(): void {
    this.frozen = true;
  }

  get(name: string): Stage | undefined {
    return this.stages.find((stage) => stage.name === name);
  }

  orderedStages(): Stage[] {
    return [...this.stages].sort((a, b) => a.position - b.position);
  }

  /**
   * Checks that every `requires` key is either seeded in the initial context or
   * produced by an earlier stage.
   */
  validateDependencies(initialKeys: Iterable<string> = []): void {
    const available = new Set(initialKeys);
    const problems: string[] = [];

    for (const stage of this.orderedStages()) {
      const missing = stage.requires.filter((key) => !available.has(key));
      if (missing.length > 0) {
        problems.push(`${stage.name} requires ${missing.join(", ")}`);
      }
      for (const key of stage.produces) {
        available.add(key);
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(
        `Stage inputs are not produced by any earlier stage: ${problems.join("; ")}`,
      );
    }
  }

  private nextPosition(): number {
    if (this.stages.length === 0) return 1;
    return Math.max(...this.stages.map((stage) => stage.position)) + 1;
  }
}
