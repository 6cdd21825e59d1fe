// A reference is the key wrapped as `##key` (backticks included).
const SCOPE_REFERENCE = /`##(.*?)`/;

/**
 * Per-scenario variables used to carry values between steps.
 *
 * Only the first reference in a string is replaced, and a reference to an
 * unset key becomes an empty string.
 */
export class ScopeStore {
  private readonly values = new Map<string, string>();

  public store(key: string, value: string): void {
    this.values.set(key, value);
  }

  public get(key: string): string {
    return this.values.get(key) ?? '';
  }

  public has(key: string): boolean {
    return this.values.has(key);
  }

  public clear(): void {
    this.values.clear();
  }

  public get size(): number {
    return this.values.size;
  }

  public entries(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  public resolve(text: string): string {
    const match = SCOPE_REFERENCE.exec(text);
    if (!match || match[1].length === 0) {
      return text;
    }

    const [reference, key] = match;
    const index = match.index;
    return `${text.slice(0, index)}${this.get(key)}${text.slice(index + reference.length)}`;
  }
}
