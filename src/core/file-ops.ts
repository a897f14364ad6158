import { chmod, mkdir, readFile, stat, utimes, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorCode } from "../errors.ts";

const diskSpacePhrases = [
  "no space left",
  "disk full",
  "not enough space",
  "insufficient disk space",
  "device full",
  "quota exceeded",
  "file too large",
];

export async function compareFiles(left: string, right: string): Promise<boolean> {
  const [leftBytes, rightBytes] = await Promise.all([readFile(left), readFile(right)]);
  if (leftBytes.length !== rightBytes.length) return false;
  return leftBytes.equals(rightBytes);
}

/**
 * Copies content, permission bits and modification time. Not atomic: a
 * failure after the write leaves the content in place.
 */
export async function copyFile(src: string, dst: string): Promise<void> {
  const data = await readFile(src);
  await mkdir(dirname(dst), { recursive: true, mode: 0o755 });
  await writeFile(dst, data);

  const info = await stat(src);
  await chmod(dst, info.mode & 0o7777);
  await utimes(dst, new Date(), info.mtime);
}

export function isDiskSpaceError(error: unknown): boolean {
  if (error === null || error === undefined) return false;
  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return diskSpacePhrases.some((phrase) => message.includes(phrase));
}

export function isNotFoundError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

export function isPermissionError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
}
