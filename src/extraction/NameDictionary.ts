import type { NameMatcher } from './recognizers.js';

/**
 * Ordered, de-duplicated list of known names. Reads that match no known name
 * confidently are accepted as they are and learned for the rest of the session.
 */
export class NameDictionary {
  private readonly names: string[] = [];
  private readonly index = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const name of initial) this.add(name);
  }

  add(name: string): boolean {
    if (!name || this.index.has(name)) return false;
    this.index.add(name);
    this.names.push(name);
    return true;
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  list(): readonly string[] {
    return this.names;
  }

  get size(): number {
    return this.names.length;
  }

  correct(raw: string, matcher: NameMatcher, threshold: number): string {
    const clean = raw.replace(/\s+/g, ' ').trim();
    if (!clean) return '';
    const best = matcher.bestMatch(clean, this.names);
    if (best && best.confidence >= threshold) return best.name;
    this.add(clean);
    return clean;
  }
}
