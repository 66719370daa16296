import { readFile } from "node:fs/promises";

/** One host per line; blank lines and `#` comments are skipped. */
export function parseTargetList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line.length > 0);
}

export async function readTargetFile(path: string): Promise<string[]> {
  return parseTargetList(await readFile(path, "utf8"));
}
