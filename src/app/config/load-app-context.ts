/**
 * loadAppContext resolves the pipeline config and builds the app services.
 * Purpose: one entrypoint for CLI commands that need config + paths.
 * Usage: const appContext = loadAppContext({ explicitConfigPath: opts.config }).
 */

import { loadProjectConfig, resolveConfigPath } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAppContext(args: LoadAppContextArgs = {}): AppContext {
  const configPath = resolveConfigPath({ explicitPath: args.explicitConfigPath, cwd: args.cwd });
  const config = loadProjectConfig(configPath, { env: args.env });
  return createAppContext({ configPath, config, now: args.now });
}
