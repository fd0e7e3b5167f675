import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../../core/errors.js";
import { success } from "../../core/run-report.js";

import { defineStage, type StageDefinition } from "./stage.js";
import { StageRegistry } from "./stage-registry.js";

function stage(name: string, extra: Partial<StageDefinition> = {}): StageDefinition {
  return defineStage({ name, execute: async () => success(), ...extra });
}

describe("StageRegistry", () => {
  it("assigns positions in registration order", () => {
    const registry = new StageRegistry();
    registry.register(stage("analyst"));
    registry.register(stage("writer"));

    expect(registry.orderedStages().map((s) => [s.name, s.position])).toEqual([
      ["analyst", 1],
      ["writer", 2],
    ]);
  });

  it("orders by explicit position", () => {
    const registry = new StageRegistry();
    registry.register(stage("publisher", { position: 30 }));
    registry.register(stage("analyst", { position: 10 }));
    registry.register(stage("writer", { position: 20 }));
    registry.register(stage("notifier"));

    expect(registry.orderedStages().map((s) => s.name)).toEqual([
      "analyst",
      "writer",
      "publisher",
      "notifier",
    ]);
    expect(registry.get("notifier")?.position).toBe(31);
  });

  it("rejects duplicate names and positions", () => {
    const registry = new StageRegistry();
    registry.register(stage("analyst", { position: 1 }));

    expect(() => registry.register(stage("analyst"))).toThrow(
      "Stage 'analyst' is already registered",
    );
    expect(() => registry.register(stage("writer", { position: 1 }))).toThrow(
      "Stage 'writer' reuses position 1 already taken by 'analyst'",
    );
  });

  it("rejects invalid names and positions", () => {
    const registry = new StageRegistry();

    expect(() => registry.register(stage("bad name"))).toThrow(ConfigurationError);
    expect(() => registry.register(stage("writer", { position: -1 }))).toThrow(ConfigurationError);
    expect(() => registry.register(stage("writer", { position: 1.5 }))).toThrow(ConfigurationError);
  });

  it("refuses registrations after freeze", () => {
    const registry = new StageRegistry();
    registry.freeze();

    expect(registry.isFrozen).toBe(true);
    expect(() => registry.register(stage("late"))).toThrow(
      "Cannot register stage 'late': the registry is frozen once a run starts",
    );
  });

  it("freezes registered stages", () => {
    const registry = new StageRegistry();
    const registered = registry.register(stage("writer", { requires: ["selected_keyword"] }));

    expect(Object.isFrozen(registered)).toBe(true);
    expect(Object.isFrozen(registered.requires)).toBe(true);
    expect(registered.produces).toEqual([]);
  });

  it("validates that every required key is produced earlier or seeded", () => {
    const registry = new StageRegistry();
    registry.register(stage("analyst", { produces: ["selected_keyword"] }));
    registry.register(stage("writer", { requires: ["selected_keyword", "site"], produces: ["article_path"] }));
    registry.register(stage("publisher", { requires: ["article_path"] }));

    expect(() => registry.validateDependencies(["site"])).not.toThrow();
    expect(() => registry.validateDependencies()).toThrow(
      "Stage inputs are not produced by any earlier stage: writer requires site",
    );
  });

  it("does not accept keys produced by later stages", () => {
    const registry = new StageRegistry();
    registry.register(stage("publisher", { requires: ["article_path"] }));
    registry.register(stage("writer", { produces: ["article_path"] }));

    expect(() => registry.validateDependencies()).toThrow(
      "Stage inputs are not produced by any earlier stage: publisher requires article_path",
    );
  });
});
