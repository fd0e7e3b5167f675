import { loadAppContext } from "../app/config/load-app-context.js";
import type { AppContext } from "../app/context.js";
import { ConfigurationError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

// =============================================================================
// CONFIG RESOLUTION (CLI)
//
// The config is `trendloop.yaml` in the working directory unless --config names
// another file. Stage wiring problems surface here, before any command runs.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): AppContext {
  try {
    return loadAppContext({
      explicitConfigPath: args.explicitConfigPath,
      cwd: args.cwd,
      env: args.env,
    });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Pipeline config invalid.",
        message: error.message,
        hint: "Check the stages list in trendloop.yaml: names, positions and requires/produces keys.",
        cause: error,
      });
    }
    throw error;
  }
}
