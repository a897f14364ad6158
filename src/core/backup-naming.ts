import { basename } from "node:path";

export function formatBackupTimestamp(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, "0");
  return `${year}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getHours())}-${
    pad(date.getMinutes())
  }`;
}

export function formatListTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${
    pad(date.getHours())
  }:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** `BASENAME-YYYY-MM-DD-hh-mm[=NOTE]` */
export function generateBackupName(sourcePath: string, timestamp: string, note: string): string {
  const name = `${basename(sourcePath)}-${timestamp}`;
  return note === "" ? name : `${name}=${note}`;
}

export function isBackupOf(entryName: string, sourceBaseName: string): boolean {
  return entryName.startsWith(`${sourceBaseName}-`);
}

export function noteFromBackupName(name: string): string {
  const index = name.lastIndexOf("=");
  return index > 0 ? name.slice(index + 1) : "";
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
