import { readFile } from "node:fs/promises";

const packageJsonUrl = new URL("../../package.json", import.meta.url);

export async function resolveVersion(readTextFile: (url: URL) => Promise<string> = readUtf8): Promise<string> {
  try {
    const manifest: unknown = JSON.parse(await readTextFile(packageJsonUrl));
    if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
      return typeof manifest.version === "string" ? manifest.version : "dev";
    }
    return "dev";
  } catch {
    // Running from a copy without its manifest.
    return "dev";
  }
}

export function formatVersion(version: string, platform = `${process.platform}-${process.arch}`): string {
  return `bkpfile ${version.replace(/^v/, "")} [${platform}]`;
}

function readUtf8(url: URL): Promise<string> {
  return readFile(url, "utf8");
}
