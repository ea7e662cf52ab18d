import { appendLineDurable, readLines } from "./save";

/** Ledger files hold one name per line, so names are kept on a single line. */
export function ledgerKey(name: string): string {
  return name.replace(/\s+/g, " ").trim();
}

/** Names whose search has been fully recorded. Append-only. */
export interface ProcessedLedger {
  has(name: string): boolean;
  /** Records `name` durably; a name already present is left alone. */
  add(name: string): Promise<void>;
  readonly size: number;
}

export class MemoryLedger implements ProcessedLedger {
  private readonly names: Set<string>;

  constructor(names: Iterable<string> = []) {
    this.names = new Set(Array.from(names, ledgerKey));
  }

  has(name: string): boolean {
    return this.names.has(ledgerKey(name));
  }

  async add(name: string): Promise<void> {
    this.names.add(ledgerKey(name));
  }

  get size(): number {
    return this.names.size;
  }

  list(): string[] {
    return Array.from(this.names);
  }
}

export class FileLedger implements ProcessedLedger {
  private constructor(
    readonly path: string,
    private readonly names: Set<string>
  ) {}

  /** Loads the whole ledger once; a missing file is an empty ledger. */
  static async open(path: string): Promise<FileLedger> {
    return new FileLedger(path, new Set((await readLines(path)).map(ledgerKey)));
  }

  has(name: string): boolean {
    return this.names.has(ledgerKey(name));
  }

  async add(name: string): Promise<void> {
    const key = ledgerKey(name);
    if (this.names.has(key)) return;
    await appendLineDurable(this.path, key);
    this.names.add(key);
  }

  get size(): number {
    return this.names.size;
  }
}
