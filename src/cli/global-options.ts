export interface ParsedGlobalOptions {
  commandArgs: string[];
  debugEnabled: boolean;
  logFilePath?: string;
}

export interface ParsedModeOptions {
  positionals: string[];
  dryRun: boolean;
  list: boolean;
  config: boolean;
  help: boolean;
  version: boolean;
  unknown: string[];
}

const defaultDebugLogFile = "bkpfile-debug.log";
const knownModeFlags = new Set(["--dry-run", "--list", "--config", "-h", "--help", "-v", "--version"]);

export function parseGlobalOptions(args: string[]): ParsedGlobalOptions {
  const commandArgs: string[] = [];
  let debugEnabled = false;
  let logFilePath: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === "--debug") {
      debugEnabled = true;
      continue;
    }

    if (arg.startsWith("--log-file=")) {
      const value = arg.slice("--log-file=".length);
      logFilePath = value.length > 0 ? value : defaultDebugLogFile;
      continue;
    }

    // Only a `.log` argument is taken as the path: anything else may be the file to back up.
    if (arg === "--log-file") {
      const next = args[i + 1];
      if (next && next.endsWith(".log") && !next.startsWith("-")) {
        logFilePath = next;
        i += 1;
      } else {
        logFilePath = defaultDebugLogFile;
      }
      continue;
    }

    commandArgs.push(arg);
  }

  return {
    commandArgs,
    debugEnabled,
    logFilePath,
  };
}

/**
 * Splits the remaining arguments into mode flags and positionals. Everything
 * after `--` is positional, so a file named `--list` can still be backed up.
 */
export function parseModeOptions(args: string[]): ParsedModeOptions {
  const parsed: ParsedModeOptions = {
    positionals: [],
    dryRun: false,
    list: false,
    config: false,
    help: false,
    version: false,
    unknown: [],
  };

  let flagsDone = false;
  for (const arg of args) {
    if (flagsDone || !arg.startsWith("-") || arg === "-") {
      parsed.positionals.push(arg);
      continue;
    }
    if (arg === "--") {
      flagsDone = true;
      continue;
    }
    if (!knownModeFlags.has(arg)) {
      parsed.unknown.push(arg);
      continue;
    }

    if (arg === "--dry-run") parsed.dryRun = true;
    else if (arg === "--list") parsed.list = true;
    else if (arg === "--config") parsed.config = true;
    else if (arg === "-h" || arg === "--help") parsed.help = true;
    else parsed.version = true;
  }

  return parsed;
}
