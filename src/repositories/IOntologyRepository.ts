/**
 * Ontology persistence interface.
 * Any structured store works as long as a saved document loads back unchanged.
 */

import type { OntologyDocument } from '../types/models.js';

export interface IOntologyRepository {
  /** Human-readable location, used in error messages (a path, a table prefix). */
  readonly source: string;

  /** Load the full ontology. Throws GraphIntegrityError if it is missing or corrupt. */
  load(): Promise<OntologyDocument>;

  /** Persist the document. Entities are never deleted, so stores may upsert. */
  save(document: OntologyDocument): Promise<void>;
}
