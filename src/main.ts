import { pathToFileURL } from "node:url";
import { parseGlobalOptions, parseModeOptions } from "./cli/global-options.ts";
import { renderHelp } from "./cli/help.ts";
import { formatVersion, resolveVersion } from "./cli/version.ts";
import { runBackup } from "./commands/backup.ts";
import { runShowConfig } from "./commands/config.ts";
import { runList } from "./commands/list.ts";
import { createDebugLogger } from "./debug/logger.ts";
import type { CommandResult, RuntimeOptions } from "./types.ts";

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export async function runCli(args: string[], options: RuntimeOptions = {}): Promise<CliResult> {
  const env = options.env ?? { ...process.env };
  const parsedGlobals = parseGlobalOptions(args);
  const debugEnabled = parsedGlobals.debugEnabled || parsedGlobals.logFilePath !== undefined;
  const debug = createDebugLogger({
    enabled: debugEnabled,
    logFilePath: parsedGlobals.logFilePath,
  });
  const color = useColor(env, options.isTTY ?? false);
  const runtime: RuntimeOptions = { ...options, env, logger: debug };
  await debug.debug(`argv=${JSON.stringify(parsedGlobals.commandArgs)}`);

  const mode = parseModeOptions(parsedGlobals.commandArgs);
  const [first] = mode.positionals;

  if (mode.help || (first === "help" && mode.positionals.length === 1)) {
    const version = options.version ?? await resolveVersion();
    return { exitCode: 0, stdout: renderHelp({ color, version }), stderr: "" };
  }
  if (mode.version || (first === "version" && mode.positionals.length === 1)) {
    const version = options.version ?? await resolveVersion();
    return { exitCode: 0, stdout: formatVersion(version), stderr: "" };
  }
  if (mode.unknown.length > 0) {
    return usageError(`Unknown option: ${mode.unknown[0]}`, color);
  }

  let result: CommandResult;
  if (mode.config) {
    await debug.debug("mode=config");
    result = await runShowConfig(runtime);
  } else if (first === undefined) {
    return usageError("file path is required", color);
  } else if (mode.positionals.length > 2) {
    return usageError(`Too many arguments: ${mode.positionals.slice(2).join(" ")}`, color);
  } else if (mode.list) {
    await debug.debug("mode=list");
    result = await runList(first, { ...runtime, color });
  } else {
    await debug.debug(`mode=backup dryRun=${mode.dryRun}`);
    result = await runBackup(first, mode.positionals[1] ?? "", { ...runtime, color, dryRun: mode.dryRun });
  }

  await debug.debug(`exitCode=${result.exitCode}`);
  return {
    exitCode: result.exitCode,
    stdout: result.stdout.join("\n"),
    stderr: result.stderr.join("\n"),
  };
}

export async function runMain(args: string[]): Promise<void> {
  const result = await runCli(args, { isTTY: process.stdout.isTTY === true });
  if (result.stdout.trim().length > 0) {
    console.log(result.stdout);
  }
  if (result.stderr.trim().length > 0) {
    console.error(result.stderr);
  }
  process.exitCode = result.exitCode;
}

function usageError(message: string, color: boolean): CliResult {
  return {
    exitCode: 1,
    stdout: "",
    stderr: `${message}\n\n${renderHelp({ color })}`,
  };
}

function useColor(env: Record<string, string | undefined>, isTTY: boolean): boolean {
  if (env.CLICOLOR_FORCE === "1") return true;
  return env.NO_COLOR !== "1" && isTTY;
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await runMain(process.argv.slice(2));
}
