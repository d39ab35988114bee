export interface PasswdEntry {
  readonly name: string;
  readonly uid: number;
  readonly gid: number;
}

export interface ShadowEntry {
  readonly name: string;
  readonly password: string;
}

export interface GroupEntry {
  readonly name: string;
  readonly gid: number;
}

/** Records whose uid or gid is not a number are skipped. */
export function parsePasswd(content: string): PasswdEntry[] {
  const entries: PasswdEntry[] = [];
  for (const fields of splitRecords(content)) {
    const uid = parseId(fields[2]);
    const gid = parseId(fields[3]);
    if (uid !== undefined && gid !== undefined) {
      entries.push({ name: fields[0] ?? "", uid, gid });
    }
  }
  return entries;
}

export function parseShadow(content: string): ShadowEntry[] {
  return splitRecords(content)
    .filter((fields) => fields.length >= 2)
    .map((fields) => ({ name: fields[0] ?? "", password: fields[1] ?? "" }));
}

export function parseGroup(content: string): GroupEntry[] {
  const entries: GroupEntry[] = [];
  for (const fields of splitRecords(content)) {
    const gid = parseId(fields[2]);
    if (gid !== undefined) {
      entries.push({ name: fields[0] ?? "", gid });
    }
  }
  return entries;
}

export function findDuplicates(values: readonly number[]): number[] {
  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const value of values) {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  }
  return [...duplicates].sort((a, b) => a - b);
}

function splitRecords(content: string): string[][] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"))
    .map((line) => line.split(":"));
}

function parseId(field: string | undefined): number | undefined {
  return field !== undefined && /^\d+$/.test(field) ? Number(field) : undefined;
}
