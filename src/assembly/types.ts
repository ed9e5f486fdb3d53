/**
 * @fileoverview Book types
 */

import type { Page } from '../search/types.js';

export const ASSEMBLY_METHODS = ['address_adjacency', 'coherence_threshold', 'phrase_relevance', 'custom'] as const;
export type AssemblyMethod = (typeof ASSEMBLY_METHODS)[number];

export type ProvenanceValue = string | number | boolean | null;

export interface BookProvenance {
  readonly query: string | null;
  readonly method: AssemblyMethod;
  readonly parameters: Readonly<Record<string, ProvenanceValue>>;
  /** ISO-8601 */
  readonly createdAt: string;
}

export interface BookMetadata {
  readonly firstAddress: string;
  readonly lastAddress: string;
  /** Numeric span between the smallest and largest address, in decimal */
  readonly addressRange: string;
  readonly pageCount: number;
  readonly totalLength: number;
  /** Below-threshold pages added under the `pad` policy */
  readonly paddedPages: number;
}

export interface Book {
  readonly id: string;
  readonly title: string;
  readonly method: AssemblyMethod;
  readonly pages: readonly Page[];
  /** Mean of the member pages' scores */
  readonly coherenceScore: number;
  readonly integrityHash: string;
  readonly provenance: BookProvenance;
  readonly metadata: BookMetadata;
}

export interface AssemblyRequest {
  pages: readonly Page[];
  method: string;
  bookSize: number;
  /** Phrase for `phrase_relevance`; falls back to `query` */
  targetPhrase?: string;
  /** Threshold for `coherence_threshold`; defaults to `search.defaultMinCoherence` */
  coherenceThreshold?: number;
  query?: string;
  /** Title for `custom` books */
  title?: string;
  /** Extra provenance parameters recorded verbatim */
  parameters?: Readonly<Record<string, ProvenanceValue>>;
}
