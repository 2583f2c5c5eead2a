import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

/** One name per line; trimmed, blank lines dropped, first occurrence kept. */
export function parseNameList(text: string): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const line of text.split(/\r?\n/)) {
    const name = line.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    names.push(name);
  }
  return names;
}

export function loadNameList(path: string): string[] {
  if (!existsSync(path)) throw new Error(`Player list not found: ${path}`);
  return parseNameList(readFileSync(path, 'utf-8'));
}

const aliasFileSchema = z.record(z.array(z.string().trim().min(1)));

/**
 * Multi-account families: a canonical in-game name and the ordered aliases
 * its accounts are recorded under.
 */
export class AliasBook {
  private readonly families = new Map<string, readonly string[]>();
  private readonly lookup = new Map<string, string>();

  constructor(families: Record<string, readonly string[]> = {}) {
    for (const [canonical, aliases] of Object.entries(families)) {
      this.families.set(canonical, [...aliases]);
      this.lookup.set(canonical.toLowerCase(), canonical);
      for (const alias of aliases) this.lookup.set(alias.toLowerCase(), canonical);
    }
  }

  static parse(raw: unknown): AliasBook {
    return new AliasBook(aliasFileSchema.parse(raw));
  }

  /** Canonical family name for a name or alias, case-insensitively. */
  canonicalOf(name: string): string | undefined {
    return this.lookup.get(name.trim().toLowerCase());
  }

  aliasesOf(canonical: string): readonly string[] {
    return this.families.get(canonical) ?? [];
  }

  toJSON(): Record<string, string[]> {
    return Object.fromEntries([...this.families].map(([k, v]) => [k, [...v]]));
  }
}

export function loadAliasBook(path: string): AliasBook {
  if (!existsSync(path)) return new AliasBook();
  return AliasBook.parse(JSON.parse(readFileSync(path, 'utf-8')));
}
