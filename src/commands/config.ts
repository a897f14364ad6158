import { defaultConfig, traceConfig } from "../config.ts";
import { CliError, errorMessage } from "../errors.ts";
import type { CommandResult, RuntimeOptions } from "../types.ts";

export async function runShowConfig(options: RuntimeOptions = {}): Promise<CommandResult> {
  try {
    const values = await traceConfig(options);
    return {
      exitCode: 0,
      stdout: values.map((entry) => `${entry.name}: ${entry.value} (source: ${entry.source})`),
      stderr: [],
    };
  } catch (error) {
    return configFailure(error);
  }
}

/** No configuration is available yet, so the default config-error status applies. */
export function configFailure(error: unknown): CommandResult {
  const exitCode = error instanceof CliError ? error.exitCode : defaultConfig().statusConfigError;
  return {
    exitCode,
    stdout: [],
    stderr: [`failed to load config: ${errorMessage(error)}`],
  };
}
