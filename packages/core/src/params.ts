/**
 * Key-value parameter access. The persisted store lives outside this package;
 * the sidebar only ever reads booleans from it.
 */

export const PRIME_REDIRECTED = "PrimeRedirected";

export interface ParamsReader {
  getBool(key: string): boolean;
}

/**
 * In-process params store. Booleans are stored as "1" / "0", matching the
 * persisted format, and anything other than "1" reads as false.
 */
export class MemoryParams implements ParamsReader {
  private values: Map<string, string>;

  constructor(initial: Record<string, string> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  put(key: string, value: string): void {
    this.values.set(key, value);
  }

  getBool(key: string): boolean {
    return this.values.get(key) === "1";
  }

  putBool(key: string, value: boolean): void {
    this.values.set(key, value ? "1" : "0");
  }

  remove(key: string): void {
    this.values.delete(key);
  }
}
