// RawItem interface shared by every source adapter
export const SOURCE_NAMES = ['federal_register', 'grants_gov', 'congress_gov', 'usaspending'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface RawItem {
  source: SourceName;             // Adapter that produced the item
  external_id: string;            // Stable ID from the source (document number, opportunity ID, ...)
  title: string;                  // Headline/title as published
  published_date: string;         // Date string as reported by the source (may be empty)
  payload: Record<string, unknown>; // Normalized source-specific fields
}

/** Identity key of an item, stable across runs. */
export type IdentityKey = `${SourceName}:${string}`;

export function identityKey(item: Pick<RawItem, 'source' | 'external_id'>): IdentityKey {
  return `${item.source}:${item.external_id}`;
}

export interface ScanQuery {
  terms: string[];                      // Keyword search terms shared by all sources
  windowStart: Date;                    // Earliest publication/update date of interest
  programs: Record<string, string>;     // CFDA (Assistance Listing) number -> program id
}

/** Result count of one completed program (CFDA) search. */
export interface ProgramResult {
  program: string;
  results: number;
}

export interface SourceAdapter {
  readonly name: SourceName;
  /** False when a required credential is absent; the adapter then yields nothing. */
  isConfigured(): boolean;
  fetchPages(query: ScanQuery, signal?: AbortSignal): AsyncGenerator<RawItem[], void, undefined>;
  fetchAll(query: ScanQuery, signal?: AbortSignal): Promise<RawItem[]>;
  /** Program searches that completed during the last fetch; failed ones are left out. */
  programResults?(): ProgramResult[];
}
