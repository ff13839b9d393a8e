/**
 * Supabase implementation of IOntologyRepository.
 * One table per entity kind; rows are validated through the document schema on load.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IOntologyRepository } from './IOntologyRepository.js';
import type { OntologyDocument } from '../types/models.js';
import type {
  DomainRow,
  ExpertiseLevelRow,
  ImpactDimensionRow,
  ProjectTypeRow,
} from '../types/database.js';
import { parseOntologyDocument } from '../ontology/schema.js';
import { GraphIntegrityError } from '../errors.js';

const TABLES = {
  domains: 'domains',
  dimensions: 'impact_dimensions',
  expertiseLevels: 'expertise_levels',
  projectTypes: 'project_types',
} as const;

export class SupabaseOntologyRepository implements IOntologyRepository {
  readonly source = 'supabase:ontology';

  constructor(private readonly db: SupabaseClient) {}

  async load(): Promise<OntologyDocument> {
    const [domains, dimensions, levels, types] = await Promise.all([
      this.selectAll<DomainRow>(TABLES.domains),
      this.selectAll<ImpactDimensionRow>(TABLES.dimensions),
      this.selectAll<ExpertiseLevelRow>(TABLES.expertiseLevels),
      this.selectAll<ProjectTypeRow>(TABLES.projectTypes),
    ]);

    return parseOntologyDocument(
      {
        domains: domains.map((row) => ({
          id: row.id,
          name: row.name,
          description: row.description,
          keywords: row.keywords,
          subdomains: row.subdomains,
          relevantDimensions: row.relevant_dimensions,
        })),
        impactDimensions: dimensions.map((row) => ({
          id: row.id,
          name: row.name,
          description: row.description,
          scale: row.scale,
        })),
        expertiseLevels: levels.map((row) => ({
          id: row.id,
          name: row.name,
          description: row.description,
          confidenceRange: [row.confidence_min, row.confidence_max],
        })),
        projectTypes: types.map((row) => ({
          id: row.id,
          name: row.name,
          description: row.description,
          keywords: row.keywords,
        })),
      },
      this.source
    );
  }

  async save(document: OntologyDocument): Promise<void> {
    // Dimensions first so domain rows never reference a missing dimension.
    await this.upsert<ImpactDimensionRow>(
      TABLES.dimensions,
      document.impactDimensions.map((d) => ({
        id: d.id,
        name: d.name,
        description: d.description,
        scale: Object.fromEntries(Object.entries(d.scale)),
      }))
    );
    await this.upsert<DomainRow>(
      TABLES.domains,
      document.domains.map((d) => ({
        id: d.id,
        name: d.name,
        description: d.description,
        keywords: d.keywords,
        subdomains: d.subdomains,
        relevant_dimensions: d.relevantDimensions,
      }))
    );
    await this.upsert<ExpertiseLevelRow>(
      TABLES.expertiseLevels,
      document.expertiseLevels.map((l) => ({
        id: l.id,
        name: l.name,
        description: l.description,
        confidence_min: l.confidenceRange[0],
        confidence_max: l.confidenceRange[1],
      }))
    );
    await this.upsert<ProjectTypeRow>(
      TABLES.projectTypes,
      document.projectTypes.map((t) => ({
        id: t.id,
        name: t.name,
        description: t.description,
        keywords: t.keywords,
      }))
    );
  }

  // ── Private ──

  private async selectAll<T>(table: string): Promise<T[]> {
    const { data, error } = await this.db.from(table).select('*').order('id');
    if (error) {
      throw new GraphIntegrityError(`Failed to load ${table}: ${error.message}`);
    }
    return data ?? [];
  }

  private async upsert<T extends { id: string }>(table: string, rows: T[]): Promise<void> {
    if (rows.length === 0) return;
    const { error } = await this.db.from(table).upsert(rows, { onConflict: 'id' });
    if (error) throw new GraphIntegrityError(`Failed to save ${table}: ${error.message}`);
  }
}
