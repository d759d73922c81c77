import type { ZodType, ZodTypeDef } from "zod";

export type ParsedJsonLines<T> = {
  items: T[];
  /** Non-empty lines seen, including the ones that were skipped. */
  lineCount: number;
  skipped: number;
};

function parseJsonLine(line: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(line) };
  } catch {
    return { ok: false };
  }
}

export function parseZodJsonLines<T>(
  text: string,
  itemSchema: ZodType<T, ZodTypeDef, unknown>,
): ParsedJsonLines<T> {
  const items: T[] = [];
  let lineCount = 0;
  let skipped = 0;

  for (const raw of text.split("\n")) {
    const line = raw.trim();
    if (line.length === 0) continue;
    lineCount += 1;

    const json = parseJsonLine(line);
    const parsed = json.ok ? itemSchema.safeParse(json.value) : undefined;
    if (parsed?.success) {
      items.push(parsed.data);
    } else {
      skipped += 1;
    }
  }

  return { items, lineCount, skipped };
}

export function boundedTail<T>(items: ReadonlyArray<T>, limit: number): T[] {
  if (limit <= 0) return [];
  return items.slice(-limit);
}
