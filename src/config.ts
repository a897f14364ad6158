import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import {
  configKeys,
  configProperties,
  DEFAULT_STATUS_CONFIG_ERROR,
  type PartialConfig,
  parsePartialConfig,
} from "./core/config-fields.ts";
import { expandHome } from "./core/path-utils.ts";
import { CliError, errorCode, errorMessage } from "./errors.ts";
import type { BackupConfig, ConfigValue, RuntimeOptions } from "./types.ts";

export const CONFIG_ENV_VAR = "BKPFILE_CONFIG";
export const DEFAULT_SEARCH_PATH = "./.bkpfile.yml:~/.bkpfile.yml";
const LEGACY_CONFIG_NAME = ".bkpfile.yml";

export interface ConfigLoadOptions extends RuntimeOptions {
  readTextFile?: (path: string) => Promise<string>;
}

export function defaultConfig(): BackupConfig {
  return {
    backupDirPath: "../.bkpfile",
    useCurrentDirName: true,
    configSearchOverride: DEFAULT_SEARCH_PATH,
    statusCreatedBackup: 0,
    statusFileIdentical: 0,
    statusFileNotFound: 20,
    statusInvalidFileType: 21,
    statusPermissionDenied: 22,
    statusDiskFull: 30,
    statusFailedCreateDir: 31,
    statusConfigError: DEFAULT_STATUS_CONFIG_ERROR,
  };
}

export function getConfigSearchPath(options: RuntimeOptions = {}): string[] {
  const env = normalizeEnv(options.env);
  const override = env[CONFIG_ENV_VAR];
  const paths = override && override.length > 0 ? override.split(":") : DEFAULT_SEARCH_PATH.split(":");
  return paths.map((path) => expandHome(path, env));
}

/**
 * Resolves the effective configuration. The first search-path file that
 * exists supplies every key it mentions; later files are not consulted.
 * When none exists, `.bkpfile.yml` directly under `root` is tried.
 */
export async function loadConfig(root = ".", options: ConfigLoadOptions = {}): Promise<BackupConfig> {
  const env = normalizeEnv(options.env);
  const cwd = options.cwd ?? process.cwd();
  const base = resolve(cwd, root);
  const readTextFile = options.readTextFile ?? readUtf8;
  const logger = options.logger;

  for (const candidate of getConfigSearchPath({ env })) {
    const path = isAbsolute(candidate) ? candidate : join(base, candidate);
    const partial = await readConfigFile(path, readTextFile, env);
    if (partial === null) continue;
    await logger?.debug(`config: using ${path}`);
    return { ...defaultConfig(), ...partial };
  }

  const legacyPath = join(base, LEGACY_CONFIG_NAME);
  const legacy = await readConfigFile(legacyPath, readTextFile, env);
  if (legacy !== null) {
    await logger?.debug(`config: using ${legacyPath}`);
    return { ...defaultConfig(), ...legacy };
  }

  await logger?.debug("config: no config file found, using defaults");
  return defaultConfig();
}

/**
 * Source-attributed view of the configuration, sorted by key. Unlike
 * {@link loadConfig}, every search-path file is read and each key is taken
 * from the first file that mentions it.
 */
export async function traceConfig(options: ConfigLoadOptions = {}): Promise<ConfigValue[]> {
  const env = normalizeEnv(options.env);
  const cwd = options.cwd ?? process.cwd();
  const readTextFile = options.readTextFile ?? readUtf8;

  const defaults = defaultConfig();
  const values = new Map<keyof BackupConfig, ConfigValue>();
  for (const property of configProperties) {
    values.set(property, {
      name: configKeys[property],
      value: String(defaults[property]),
      source: "default",
    });
  }

  for (const candidate of getConfigSearchPath({ env })) {
    const source = isAbsolute(candidate) || candidate.startsWith("./") ? candidate : `./${candidate}`;
    const partial = await readConfigFile(resolve(cwd, candidate), readTextFile, env);
    if (partial === null) continue;

    for (const property of configProperties) {
      const value = partial[property];
      const current = values.get(property);
      if (value === undefined || current === undefined || current.source !== "default") continue;
      values.set(property, { name: current.name, value: String(value), source });
    }
  }

  return [...values.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

async function readConfigFile(
  path: string,
  readTextFile: (path: string) => Promise<string>,
  env: Record<string, string | undefined>,
): Promise<PartialConfig | null> {
  let raw: string;
  try {
    raw = await readTextFile(path);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw new CliError(
      `failed to read config file ${path}: ${errorMessage(error)}`,
      "ERR_CONFIG_READ",
      DEFAULT_STATUS_CONFIG_ERROR,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new CliError(
      `failed to parse config file ${path}: ${errorMessage(error)}`,
      "ERR_CONFIG_PARSE",
      DEFAULT_STATUS_CONFIG_ERROR,
      { cause: error },
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new CliError(
      `failed to parse config file ${path}: top level must be a mapping`,
      "ERR_CONFIG_PARSE",
      DEFAULT_STATUS_CONFIG_ERROR,
    );
  }

  return parsePartialConfig(parsed, env, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readUtf8(path: string): Promise<string> {
  return readFile(path, "utf8");
}

function normalizeEnv(env?: Record<string, string | undefined>): Record<string, string | undefined> {
  if (env) {
    return { ...env };
  }

  return { ...process.env };
}
