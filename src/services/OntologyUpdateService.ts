/**
 * Ontology evolution service.
 * Asks the model which domains, dimensions and project types are missing
 * for a given context and adds the ones that fit. Never removes anything.
 */

import { z } from 'zod';
import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { PromptSynthesizer } from './PromptSynthesizer.js';
import { SubdomainSchema } from '../ontology/schema.js';
import {
  ConflictError,
  GraphIntegrityError,
  ParseError,
  ValidationError,
  describeError,
} from '../errors.js';
import { isPlainObject, parseJsonObject, stripReasoningTags } from '../text/completion-text.js';

export type SuggestionKind = 'domain' | 'dimension' | 'project_type';

export interface SkippedSuggestion {
  kind: SuggestionKind;
  id: string | null;
  reason: string;
}

export interface OntologyUpdateSummary {
  domainsAdded: string[];
  dimensionsAdded: string[];
  projectTypesAdded: string[];
  skipped: SkippedSuggestion[];
}

const DomainSuggestionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  subdomains: z.array(SubdomainSchema).optional(),
  relevant_dimensions: z.array(z.string()).optional(),
});

const DimensionSuggestionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  scale: z.record(z.string(), z.string()).optional(),
});

const ProjectTypeSuggestionSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string().optional(),
  keywords: z.array(z.string()).optional(),
});

const SuggestionsSchema = z.object({
  domains_to_add: z.array(z.unknown()).default([]),
  dimensions_to_add: z.array(z.unknown()).default([]),
  project_types_to_add: z.array(z.unknown()).default([]),
});

export type OntologySuggestions = z.infer<typeof SuggestionsSchema>;

export class OntologyUpdateService {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly prompts: PromptSynthesizer,
    private readonly completionProvider: ICompletionProvider,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Throws ConflictError while analyses hold read leases.
   * Completion failures propagate; unusable output yields an empty summary.
   */
  async suggestAndApply(context: string): Promise<OntologyUpdateSummary> {
    const summary: OntologyUpdateSummary = {
      domainsAdded: [],
      dimensionsAdded: [],
      projectTypesAdded: [],
      skipped: [],
    };

    if (!context.trim()) {
      this.logProvider.info('Ontology update skipped: empty context');
      return summary;
    }

    this.assertNoActiveAnalyses();
    const response = await this.completionProvider.complete(
      this.prompts.ontologyUpdatePrompt(context)
    );

    let suggestions: OntologySuggestions;
    try {
      suggestions = parseOntologySuggestions(response);
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      this.logProvider.warn('Ontology update response unusable, nothing applied', {
        error: err.message,
      });
      return summary;
    }

    // Leases may have been taken while the model was answering.
    this.assertNoActiveAnalyses();

    for (const item of suggestions.dimensions_to_add) {
      this.apply(summary, 'dimension', item, () => {
        const parsed = DimensionSuggestionSchema.parse(item);
        summary.dimensionsAdded.push(this.graph.addImpactDimension(parsed).id);
      });
    }

    for (const item of suggestions.domains_to_add) {
      this.apply(summary, 'domain', item, () => {
        const { relevant_dimensions: links = [], ...rest } = DomainSuggestionSchema.parse(item);
        const known = new Set(this.graph.getDimensionIds());
        const dropped = links.filter((id) => !known.has(id));
        if (dropped.length > 0) {
          this.logProvider.warn('Dropping unknown dimension links from suggested domain', {
            domain: rest.id,
            dropped,
          });
        }
        const domain = this.graph.addDomain({
          ...rest,
          relevantDimensions: links.filter((id) => known.has(id)),
        });
        summary.domainsAdded.push(domain.id);
      });
    }

    for (const item of suggestions.project_types_to_add) {
      this.apply(summary, 'project_type', item, () => {
        const parsed = ProjectTypeSuggestionSchema.parse(item);
        summary.projectTypesAdded.push(this.graph.addProjectType(parsed).id);
      });
    }

    const added =
      summary.domainsAdded.length + summary.dimensionsAdded.length + summary.projectTypesAdded.length;
    if (added > 0 && this.graph.hasRepository) {
      await this.graph.save();
    }

    this.logProvider.info('Ontology update applied', {
      domainsAdded: summary.domainsAdded.length,
      dimensionsAdded: summary.dimensionsAdded.length,
      projectTypesAdded: summary.projectTypesAdded.length,
      skipped: summary.skipped.length,
    });
    return summary;
  }

  // ── Private ──

  private assertNoActiveAnalyses(): void {
    if (this.graph.leaseCount > 0) {
      throw new ConflictError('Ontology cannot be updated while analyses are running', {
        activeLeases: this.graph.leaseCount,
      });
    }
  }

  /** Run one addition; rejected suggestions are recorded, anything else propagates. */
  private apply(
    summary: OntologyUpdateSummary,
    kind: SuggestionKind,
    item: unknown,
    add: () => void
  ): void {
    try {
      add();
    } catch (err) {
      if (
        !(err instanceof z.ZodError) &&
        !(err instanceof ValidationError) &&
        !(err instanceof ConflictError) &&
        !(err instanceof GraphIntegrityError)
      ) {
        throw err;
      }
      const reason =
        err instanceof z.ZodError ? 'malformed suggestion' : describeError(err);
      const id = isPlainObject(item) && typeof item.id === 'string' ? item.id : null;
      summary.skipped.push({ kind, id, reason });
      this.logProvider.warn('Ontology suggestion skipped', { kind, id, reason });
    }
  }
}

/** Throws ParseError when the response holds no usable suggestion object. */
export function parseOntologySuggestions(response: string): OntologySuggestions {
  const raw = parseJsonObject(stripReasoningTags(response));
  if (raw === null) {
    throw new ParseError('Ontology update response contained no JSON object');
  }
  const result = SuggestionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ParseError('Ontology update response has the wrong shape', {
      issues: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    });
  }
  return result.data;
}
