/**
 * Schema of the persisted ontology document.
 * Validates structure only; referential integrity is checked by KnowledgeGraph.
 */

import { z } from 'zod';
import type { DimensionScale, OntologyDocument, ScaleValue } from '../types/models.js';
import { GraphIntegrityError } from '../errors.js';

const idSchema = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'ids are lowercase slugs');

const SCALE_KEYS: Record<string, ScaleValue> = { '1': 1, '2': 2, '3': 3, '4': 4, '5': 5 };

const keywordsSchema = z.array(z.string().min(1)).default([]);

/** Missing or NULL (database rows) both read as an empty description. */
const descriptionSchema = z
  .string()
  .nullish()
  .transform((description) => description ?? '');

export const SubdomainSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  keywords: keywordsSchema,
});

export const DomainSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  description: descriptionSchema,
  keywords: keywordsSchema,
  subdomains: z.array(SubdomainSchema).default([]),
  relevantDimensions: z.array(idSchema).default([]),
});

export const ScaleSchema = z
  .record(z.string(), z.string())
  .superRefine((scale, ctx) => {
    for (const key of Object.keys(scale)) {
      if (!Object.hasOwn(SCALE_KEYS, key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `scale keys must be 1–5, got "${key}"`,
        });
      }
    }
  })
  .transform((scale): DimensionScale => {
    const result: DimensionScale = {};
    for (const [key, description] of Object.entries(scale)) {
      result[SCALE_KEYS[key]] = description;
    }
    return result;
  });

export const ImpactDimensionSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  description: descriptionSchema,
  scale: ScaleSchema.default({}),
});

export const ExpertiseLevelSchema = z
  .object({
    id: idSchema,
    name: z.string().min(1),
    description: descriptionSchema,
    confidenceRange: z.tuple([
      z.number().int().min(0).max(100),
      z.number().int().min(0).max(100),
    ]),
  })
  .refine((level) => level.confidenceRange[0] <= level.confidenceRange[1], {
    message: 'confidenceRange min must not exceed max',
  });

export const ProjectTypeSchema = z.object({
  id: idSchema,
  name: z.string().min(1),
  description: descriptionSchema,
  keywords: keywordsSchema,
});

export const OntologyDocumentSchema = z.object({
  domains: z.array(DomainSchema),
  impactDimensions: z.array(ImpactDimensionSchema),
  expertiseLevels: z.array(ExpertiseLevelSchema),
  projectTypes: z.array(ProjectTypeSchema).default([]),
});

/**
 * Parse an untrusted value into an ontology document.
 * Throws GraphIntegrityError listing every schema issue.
 */
export function parseOntologyDocument(raw: unknown, source: string): OntologyDocument {
  const result = OntologyDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new GraphIntegrityError(`Ontology document from ${source} is invalid`, {
      issues,
    });
  }
  return result.data;
}

/** Plain-JSON form of a document (scale keys become strings). */
export function serializeOntologyDocument(document: OntologyDocument): string {
  return JSON.stringify(document, null, 2) + '\n';
}
