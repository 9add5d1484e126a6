import type { CanonicalToken, ObservationFields, RawTokenObservation } from '../../types/index.js';

// What the shared cache holds per enrichment key
export interface EnrichmentResult {
  fields: ObservationFields;
  fetchedAt: number;
}

/**
 * Fetches data the discovery sources do not carry. The result is merged like
 * any other observation.
 */
export interface Enricher {
  readonly name: string;
  appliesTo(token: CanonicalToken): boolean;
  enrich(token: CanonicalToken): Promise<RawTokenObservation | null>;
}
