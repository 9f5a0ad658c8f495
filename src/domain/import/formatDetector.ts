import { normalizeHeader, type BankProfile } from '../entities/BankProfile.js';
import type { Cell, TabularFile } from '../../infra/TabularFileReader.js';

// Exports from some banks carry account metadata above the header row
const HEADER_SEARCH_ROWS = 10;

export type DetectionResult =
  | { kind: 'detected'; profile: BankProfile; headerIndex: number; headers: string[] }
  | { kind: 'unrecognized'; headers: string[] };

/**
 * Classifies a file by matching each profile's header signature
 * The profile with the longest matching signature wins; equal lengths keep
 * registration order. Unknown layouts are a normal result, never an exception.
 */
export function detectFormat(file: TabularFile, profiles: readonly BankProfile[]): DetectionResult {
  const searchLimit = Math.min(file.records.length, HEADER_SEARCH_ROWS);

  for (let index = 0; index < searchLimit; index++) {
    const headers = file.records[index].map(cellToHeader);
    const present = new Set(headers.map(normalizeHeader));

    let best: BankProfile | null = null;
    for (const profile of profiles) {
      if (!matchesSignature(profile, present)) continue;
      if (!best || profile.headerSignature.length > best.headerSignature.length) {
        best = profile;
      }
    }

    if (best) {
      return { kind: 'detected', profile: best, headerIndex: index, headers };
    }
  }

  return { kind: 'unrecognized', headers: (file.records[0] ?? []).map(cellToHeader) };
}

export function matchesSignature(profile: BankProfile, presentHeaders: Set<string>): boolean {
  return profile.headerSignature.every((column) => presentHeaders.has(normalizeHeader(column)));
}

function cellToHeader(cell: Cell): string {
  return String(cell).trim();
}
