export interface SshdOptions {
  /** Value of the first occurrence of the keyword, keywords matched case-insensitively. */
  get(keyword: string): string | undefined;
}

const MATCH_BLOCK = /^match\s/i;

/**
 * Parse the global section of an sshd_config. sshd keeps the first value it
 * sees for a keyword, and everything after the first `Match` line is
 * conditional, so neither later duplicates nor Match blocks are read.
 */
export function parseSshdConfig(content: string): SshdOptions {
  const values = new Map<string, string>();
  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) {
      continue;
    }
    if (MATCH_BLOCK.test(line)) {
      break;
    }
    const parsed = splitOption(line);
    if (!parsed) {
      continue;
    }
    const key = parsed.keyword.toLowerCase();
    if (!values.has(key)) {
      values.set(key, parsed.value);
    }
  }

  return {
    get(keyword: string): string | undefined {
      return values.get(keyword.toLowerCase());
    },
  };
}

/**
 * Comment out every active line for `keyword` in the global section and add
 * `keyword value` ahead of the first Match block (or at the end).
 */
export function setSshdOption(
  content: string,
  keyword: string,
  value: string,
): string {
  const lines = content.split("\n");
  const result: string[] = [];
  let inserted = false;
  const target = keyword.toLowerCase();

  for (const line of lines) {
    const trimmed = line.trim();
    if (!inserted && MATCH_BLOCK.test(trimmed)) {
      result.push(`${keyword} ${value}`);
      inserted = true;
    }
    const parsed =
      !inserted && trimmed && !trimmed.startsWith("#")
        ? splitOption(trimmed)
        : null;
    if (parsed && parsed.keyword.toLowerCase() === target) {
      result.push(`#${line}`);
      continue;
    }
    result.push(line);
  }

  if (!inserted) {
    if (result.length > 0 && result[result.length - 1] === "") {
      result.splice(result.length - 1, 0, `${keyword} ${value}`);
    } else {
      result.push(`${keyword} ${value}`);
    }
  }

  return result.join("\n");
}

function splitOption(line: string): { keyword: string; value: string } | null {
  const match = /^([A-Za-z][A-Za-z0-9]*)(?:\s*=\s*|\s+)(.*)$/.exec(line);
  if (!match) {
    return null;
  }
  const keyword = match[1] ?? "";
  const value = (match[2] ?? "").trim();
  if (!keyword || !value) {
    return null;
  }
  return { keyword, value };
}
