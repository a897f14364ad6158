import { createStyle } from "../cli/help.ts";
import { loadConfig } from "../config.ts";
import { listBackups } from "../core/backup-inventory.ts";
import { formatListTimestamp } from "../core/backup-naming.ts";
import { errorMessage } from "../errors.ts";
import { configFailure } from "./config.ts";
import type { BackupConfig, CommandResult, RuntimeOptions } from "../types.ts";

export async function runList(
  filePath: string,
  options: RuntimeOptions & { color?: boolean } = {},
): Promise<CommandResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const style = createStyle(options.color ?? false);

  let config: BackupConfig;
  try {
    config = await loadConfig(".", options);
  } catch (error) {
    return configFailure(error);
  }

  try {
    const backups = await listBackups(config.backupDirPath, filePath, { cwd: options.cwd });
    if (backups.length === 0) {
      stdout.push(`No backups found for ${filePath}`);
      return { exitCode: 0, stdout, stderr };
    }

    for (const backup of backups) {
      stdout.push(`${style.path(backup.path)} (${formatListTimestamp(backup.creationTime)})`);
    }
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    stderr.push(style.error(`failed to list backups: ${errorMessage(error)}`));
    return { exitCode: config.statusConfigError, stdout, stderr };
  }
}
