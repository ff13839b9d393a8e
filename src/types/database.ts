/**
 * Database row types mirroring the Supabase ontology tables.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface DomainRow {
  id: string;
  name: string;
  description: string | null;
  keywords: string[];
  /** jsonb: [{ id, name, keywords }] */
  subdomains: Array<{ id: string; name: string; keywords: string[] }>;
  relevant_dimensions: string[];
}

export interface ImpactDimensionRow {
  id: string;
  name: string;
  description: string | null;
  /** jsonb: { "1": "…", …, "5": "…" } */
  scale: Record<string, string>;
}

export interface ExpertiseLevelRow {
  id: string;
  name: string;
  description: string | null;
  confidence_min: number;
  confidence_max: number;
}

export interface ProjectTypeRow {
  id: string;
  name: string;
  description: string | null;
  keywords: string[];
}
