import { readFile } from "node:fs/promises";

/**
 * Prefix `https://` when the entry names no scheme.
 */
export function normalizeUrl(entry: string): string {
  if (entry.startsWith("http://") || entry.startsWith("https://")) {
    return entry;
  }
  return `https://${entry}`;
}

/**
 * One URL per line. Blank lines and lines starting with `#` are skipped.
 */
export function parseUrlList(text: string): string[] {
  const urls: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    urls.push(normalizeUrl(line));
  }
  return urls;
}

export async function loadUrls(path: string): Promise<string[]> {
  return parseUrlList(await readFile(path, "utf8"));
}
