/**
 * JSON file implementation of IOntologyRepository.
 * The default store; the engine ships its base ontology as data/ontology.json.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { IOntologyRepository } from './IOntologyRepository.js';
import type { OntologyDocument } from '../types/models.js';
import { parseOntologyDocument, serializeOntologyDocument } from '../ontology/schema.js';
import { GraphIntegrityError } from '../errors.js';

export class JsonFileOntologyRepository implements IOntologyRepository {
  constructor(private readonly path: string) {}

  get source(): string {
    return this.path;
  }

  async load(): Promise<OntologyDocument> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new GraphIntegrityError(`Ontology file ${this.path} could not be read`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new GraphIntegrityError(`Ontology file ${this.path} is not valid JSON`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    return parseOntologyDocument(raw, this.path);
  }

  /** Writes to a sibling temp file first, then renames over the target. */
  async save(document: OntologyDocument): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    await writeFile(tmpPath, serializeOntologyDocument(document), 'utf8');
    await rename(tmpPath, this.path);
  }
}
