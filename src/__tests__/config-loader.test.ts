import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadProjectConfig, resolveConfigPath } from "../core/config-loader.js";
import { UserFacingError } from "../core/errors.js";

const tempDirs: string[] = [];

function writeConfig(contents: string, extraFiles: Record<string, string> = {}): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);

  for (const [name, body] of Object.entries(extraFiles)) {
    fs.writeFileSync(path.join(dir, name), body, "utf8");
  }

  const configPath = path.join(dir, "trendloop.yaml");
  fs.writeFileSync(configPath, contents, "utf8");
  return configPath;
}

function captureError(fn: () => unknown): UserFacingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof UserFacingError) return error;
    throw error;
  }
  throw new Error("Expected a UserFacingError");
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

describe("loadProjectConfig", () => {
  it("applies defaults and resolves paths against the config directory", () => {
    const configPath = writeConfig(`
stages:
  - name: scout
    command: ./bin/scout
    produces: [keywords]
`);
    const dir = path.dirname(configPath);

    const config = loadProjectConfig(configPath, { env: {} });

    expect(config.output_dir).toBe(path.join(dir, "docs"));
    expect(config.home).toBe(path.join(dir, ".trendloop"));
    expect(config.env_file).toBe(path.join(dir, ".env"));
    expect(config.config_dir).toBe(dir);
    expect(config.safety).toEqual({ max_consecutive_failures: 3, max_runtime_seconds: 600 });
    expect(config.snapshots).toEqual({ retention_days: 30, exclude: [] });
    expect(config.initial_context).toEqual({});
    expect(config.stages).toEqual([
      {
        name: "scout",
        command: "./bin/scout",
        cwd: dir,
        env: {},
        requires: [],
        produces: ["keywords"],
      },
    ]);
  });

  it("expands ${VAR} references from the environment and the env file", () => {
    const configPath = writeConfig(
      `
output_dir: \${SITE_DIR}
initial_context:
  site: \${SITE_NAME}
stages:
  - name: publisher
    command: publish
    env:
      API_TOKEN: \${API_TOKEN}
`,
      { ".env": "SITE_NAME=from-file\nAPI_TOKEN=test-secret\nSITE_DIR=ignored\n" },
    );
    const env: NodeJS.ProcessEnv = { SITE_DIR: "/srv/site" };

    const config = loadProjectConfig(configPath, { env });

    expect(config.output_dir).toBe("/srv/site");
    expect(config.initial_context).toEqual({ site: "from-file" });
    expect(config.stages[0]?.env).toEqual({ API_TOKEN: "test-secret" });
    expect(env.SITE_DIR).toBe("/srv/site");
    expect(env.API_TOKEN).toBe("test-secret");
  });

  it("reads a custom env_file", () => {
    const configPath = writeConfig(
      `
env_file: pipeline.env
initial_context:
  site: \${SITE_NAME}
`,
      { "pipeline.env": "SITE_NAME=custom\n" },
    );

    const config = loadProjectConfig(configPath, { env: {} });

    expect(config.initial_context).toEqual({ site: "custom" });
    expect(config.env_file).toBe(path.join(path.dirname(configPath), "pipeline.env"));
  });

  it("reports an unset variable with its location", () => {
    const configPath = writeConfig(`
stages:
  - name: publisher
    command: publish
    env:
      API_TOKEN: \${MISSING_TOKEN}
`);

    const error = captureError(() => loadProjectConfig(configPath, { env: {} }));

    expect(error.title).toBe("Pipeline config invalid.");
    expect(error.message).toBe(
      `Environment variable MISSING_TOKEN is not set but is referenced in ${configPath} (stages.0.env.API_TOKEN).`,
    );
  });

  it("formats schema violations per field", () => {
    const configPath = writeConfig(`
safety:
  max_consecutive_failures: "three"
colour: blue
`);

    const error = captureError(() => loadProjectConfig(configPath, { env: {} }));

    expect(error.message).toBe(
      [
        `Invalid pipeline config at ${configPath}:`,
        "safety.max_consecutive_failures: Expected number, received string",
        "<root>: Unrecognized keys: colour",
      ].join("\n"),
    );
    expect(error.hint).toBe("Fix the config file and rerun.");
  });

  it("reports YAML syntax errors with a location", () => {
    const configPath = writeConfig("stages: [\n");

    const error = captureError(() => loadProjectConfig(configPath, { env: {} }));

    expect(error.message).toMatch(
      new RegExp(`^Failed to parse YAML config at .*trendloop\\.yaml \\(line \\d+, column \\d+\\): `),
    );
  });

  it("rejects a home directory inside the output tree", () => {
    const configPath = writeConfig(`
output_dir: site
home: site/.state
`);
    const dir = path.dirname(configPath);

    const error = captureError(() => loadProjectConfig(configPath, { env: {} }));

    expect(error.message).toBe(
      `output_dir (${path.join(dir, "site")}) and home (${path.join(dir, "site", ".state")}) must not contain one another`,
    );
  });

  it("lets TRENDLOOP_HOME override the configured home", () => {
    const configPath = writeConfig("home: state\n");

    const config = loadProjectConfig(configPath, { env: { TRENDLOOP_HOME: "/var/lib/trendloop" } });

    expect(config.home).toBe("/var/lib/trendloop");
  });

  it("explains how to create a missing config", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
    tempDirs.push(dir);
    const configPath = path.join(dir, "trendloop.yaml");

    const error = captureError(() => loadProjectConfig(configPath, { env: {} }));

    expect(error.title).toBe("Pipeline config missing.");
    expect(error.message).toBe(`Pipeline config not found at ${configPath}.`);
    expect(error.hint).toBe(
      "Create trendloop.yaml in the working directory or pass --config <path>.",
    );
  });
});

describe("resolveConfigPath", () => {
  it("defaults to trendloop.yaml in the working directory", () => {
    expect(resolveConfigPath({ cwd: "/srv/pipeline" })).toBe("/srv/pipeline/trendloop.yaml");
    expect(resolveConfigPath({ cwd: "/srv/pipeline", explicitPath: "conf/daily.yaml" })).toBe(
      "/srv/pipeline/conf/daily.yaml",
    );
  });
});
