/**
 * Values found for each prefix in an argument string, in the order they
 * appeared. Text before the first prefix is the preamble.
 */
export class ArgumentMultimap {
  readonly #values: Map<string, string[]> = new Map();
  #preamble = "";

  public put(prefix: string, value: string): void {
    const existing: string[] | undefined = this.#values.get(prefix);
    if (existing) {
      existing.push(value);
    } else {
      this.#values.set(prefix, [value]);
    }
  }

  public setPreamble(preamble: string): void {
    this.#preamble = preamble;
  }

  /** The last value given for `prefix`. */
  public getValue(prefix: string): string | undefined {
    const values: string[] | undefined = this.#values.get(prefix);
    return values?.[values.length - 1];
  }

  public getAllValues(prefix: string): readonly string[] {
    return [...(this.#values.get(prefix) ?? [])];
  }

  public hasPrefix(prefix: string): boolean {
    return this.#values.has(prefix);
  }

  public getPreamble(): string {
    return this.#preamble;
  }
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Splits `argsString` on the given prefixes. A prefix only counts at the
 * start of the string or right after whitespace, so `n/a/b` is one name.
 * Values are trimmed.
 */
export function tokenize(
  argsString: string,
  ...prefixes: string[]
): ArgumentMultimap {
  const multimap = new ArgumentMultimap();
  if (prefixes.length === 0) {
    multimap.setPreamble(argsString.trim());
    return multimap;
  }

  const pattern = new RegExp(
    `(^|\\s)(${prefixes.map(escapeRegex).join("|")})`,
    "g"
  );
  const found: Array<{ prefix: string; start: number }> = [];
  for (const match of argsString.matchAll(pattern)) {
    const start: number = (match.index ?? 0) + match[1].length;
    found.push({ prefix: match[2], start });
  }

  multimap.setPreamble(
    argsString.slice(0, found.length ? found[0].start : undefined).trim()
  );
  found.forEach(({ prefix, start }, i) => {
    const end: number | undefined =
      i + 1 < found.length ? found[i + 1].start : undefined;
    multimap.put(prefix, argsString.slice(start + prefix.length, end).trim());
  });
  return multimap;
}
