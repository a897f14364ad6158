import { isAbsolute, join, relative, resolve } from "node:path";

export function resolveHomeDir(env: Record<string, string | undefined>): string | undefined {
  const home = env.HOME ?? env.USERPROFILE;
  return home && home.length > 0 ? home : undefined;
}

/**
 * Expands a leading `~/` to the home directory. Without a discoverable home
 * directory the input is returned unchanged.
 */
export function expandHome(input: string, env: Record<string, string | undefined>): string {
  if (!input.startsWith("~/")) return input;
  const home = resolveHomeDir(env);
  return home === undefined ? input : join(home, input.slice(2));
}

/**
 * Canonical form of a source path used to mirror it under the backup root:
 * absolute paths are kept, relative ones are re-expressed relative to `cwd`.
 */
export function toWorkingRelative(filePath: string, cwd: string): string {
  if (isAbsolute(filePath)) return filePath;
  return relative(cwd, resolve(cwd, filePath));
}
