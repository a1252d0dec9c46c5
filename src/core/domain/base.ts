import type { Logger } from 'pino';
import { AmbiguousError, type EntityKind, NotFoundError, ValidationError } from '../errors.js';
import type { Candidate } from '../types.js';

/**
 * Base interface for domain components that talk to a data source.
 */
export interface BaseComponent {
  readonly log: Logger;
}

/**
 * One directory entry. `aliases` are extra keys for the exact pass only
 * (a project's identifier, for instance).
 */
export interface DirectoryEntry {
  id: number;
  name: string;
  aliases?: string[];
}

const NUMERIC_ID = /^-?\d+$/;

/**
 * Utility: interpret a numeric string as an already-resolved identifier.
 * Returns undefined for anything else, including the empty string.
 *
 * @throws ValidationError for a digit string too large to be an exact id
 */
export function parseNumericId(input: string): number | undefined {
  if (!NUMERIC_ID.test(input)) return undefined;
  const id = Number(input);
  if (!Number.isSafeInteger(id)) throw new ValidationError(`id out of range: ${input}`);
  return id;
}

/**
 * Case-insensitive exact match on name or alias; when nothing matches
 * exactly, case-insensitive substring match on name. Duplicate ids collapse
 * to their first occurrence.
 */
export function matchCandidates(entries: readonly DirectoryEntry[], query: string): Candidate[] {
  const q = query.toLowerCase();

  const exact = entries.filter(
    (e) => e.name.toLowerCase() === q || (e.aliases ?? []).some((a) => a.toLowerCase() === q)
  );
  if (exact.length > 0) return uniqueById(exact);

  return uniqueById(entries.filter((e) => e.name.toLowerCase().includes(q)));
}

/**
 * Utility: exactly one candidate or a typed error.
 */
export function expectSingle(entity: EntityKind, query: string, candidates: readonly Candidate[]): number {
  if (candidates.length === 0) throw new NotFoundError(entity, query);
  if (candidates.length > 1) throw new AmbiguousError(entity, query, candidates);
  return candidates[0].id;
}

function uniqueById(entries: readonly DirectoryEntry[]): Candidate[] {
  const seen = new Set<number>();
  const out: Candidate[] = [];
  for (const e of entries) {
    if (seen.has(e.id)) continue;
    seen.add(e.id);
    out.push({ id: e.id, name: e.name });
  }
  return out;
}
