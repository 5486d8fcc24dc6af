import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';

/**
 * Turns a symbolic reference (an emoji or symbol character) into SVG
 * markup. `undefined` means the symbol is not supported.
 */
export interface SymbolResolver {
  resolve(symbol: string): Promise<string | undefined>;
}

const DEFAULT_SYMBOL_TABLE = path.join(__dirname, '../../data/symbols.json');

/**
 * Resolves from a small table of monochrome symbols shipped with the service
 */
export class BuiltinSymbolResolver implements SymbolResolver {
  private readonly table: Map<string, string>;

  constructor(tablePath: string = DEFAULT_SYMBOL_TABLE) {
    const parsed: unknown = JSON.parse(readFileSync(tablePath, 'utf8'));
    this.table = new Map();

    if (parsed && typeof parsed === 'object') {
      for (const [symbol, markup] of Object.entries(parsed)) {
        if (typeof markup === 'string') {
          this.table.set(symbol, markup);
        }
      }
    }
  }

  symbols(): string[] {
    return [...this.table.keys()];
  }

  async resolve(symbol: string): Promise<string | undefined> {
    return this.table.get(symbol);
  }
}

/**
 * File name an emoji artwork set uses for a symbol: lowercase hex code
 * points joined by '-'. U+FE0F is dropped unless the sequence has a ZWJ.
 */
export function symbolFileName(symbol: string): string {
  const codePoints = Array.from(symbol, ch => ch.codePointAt(0) ?? 0);
  const keep = codePoints.includes(0x200d) ? codePoints : codePoints.filter(cp => cp !== 0xfe0f);
  return `${keep.map(cp => cp.toString(16)).join('-')}.svg`;
}

/**
 * Resolves from a directory of `<codepoints>.svg` files
 */
export class DirectorySymbolResolver implements SymbolResolver {
  constructor(private readonly directory: string) {}

  async resolve(symbol: string): Promise<string | undefined> {
    if (symbol.length === 0) return undefined;

    const file = path.join(this.directory, symbolFileName(symbol));
    try {
      return await readFile(file, 'utf8');
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * First resolver that knows the symbol wins
 */
export class ChainSymbolResolver implements SymbolResolver {
  constructor(private readonly resolvers: SymbolResolver[]) {}

  async resolve(symbol: string): Promise<string | undefined> {
    for (const resolver of this.resolvers) {
      const markup = await resolver.resolve(symbol);
      if (markup !== undefined) return markup;
    }
    return undefined;
  }
}
