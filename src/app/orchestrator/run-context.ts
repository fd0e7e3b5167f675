/**
 * RunContext is the artifact bag shared by the stages of one run.
 * Purpose: carry stage outputs (article_path, selected_keyword, ...) to later stages.
 * Assumptions: values are opaque; every key remembers the stage that wrote it.
 * Usage: const view = context.forStage("writer"); view.set("article_path", p).
 */

import { StageContractError } from "../../core/errors.js";

export const INITIAL_CONTEXT_WRITER = "<initial>";

/** What a stage sees: read everything, add keys, rewrite only its own keys. */
export interface StageContext {
  readonly stage: string;
  get(key: string): unknown;
  getString(key: string): string | undefined;
  has(key: string): boolean;
  keys(): string[];
  set(key: string, value: unknown): void;
  toJSON(): Record<string, unknown>;
}

export class RunContext {
  private readonly values = new Map<string, unknown>();
  private readonly writers = new Map<string, string>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
      this.writers.set(key, INITIAL_CONTEXT_WRITER);
    }
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  writerOf(key: string): string | undefined {
    return this.writers.get(key);
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  forStage(stage: string): StageContext {
    const write = (key: string, value: unknown): void => this.write(stage, key, value);

    return {
      stage,
      get: (key) => this.get(key),
      getString: (key) => {
        const value = this.get(key);
        return typeof value === "string" ? value : undefined;
      },
      has: (key) => this.has(key),
      keys: () => this.keys(),
      set: write,
      toJSON: () => this.toJSON(),
    };
  }

  private write(stage: string, key: string, value: unknown): void {
    if (!key) {
      throw new StageContractError(`Stage '${stage}' tried to write an empty context key`, stage);
    }

    const owner = this.writers.get(key);
    if (owner !== undefined && owner !== stage) {
      throw new StageContractError(
        `Stage '${stage}' cannot overwrite context key '${key}' written by '${owner}'`,
        stage,
      );
    }

    this.values.set(key, value);
    this.writers.set(key, stage);
  }
}
