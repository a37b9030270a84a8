import { readFile } from "fs/promises";

/**
 * Parse a newline-delimited hashtag list. Blank lines, `//` lines and
 * `# ` comment lines are skipped; a leading `#` on a tag is stripped.
 * Duplicates are dropped, first occurrence wins.
 */
export function parseHashtagList(text: string): string[] {
  const tags: string[] = [];
  const seen = new Set<string>();

  for (const line of text.split(/\r?\n/)) {
    const raw = line.trim();
    if (!raw || raw.startsWith("//") || raw.startsWith("# ")) continue;

    const tag = raw.replace(/^#+/, "").trim();
    if (tag && !seen.has(tag)) {
      seen.add(tag);
      tags.push(tag);
    }
  }

  return tags;
}

export async function loadHashtagList(path: string): Promise<string[]> {
  const text = await readFile(path, "utf-8");
  return parseHashtagList(text.replace(/^\uFEFF/, ""));
}
