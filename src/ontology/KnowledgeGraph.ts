/**
 * In-memory ontology store: domains, impact dimensions, expertise levels
 * and project types, with the queries the analysis pipeline runs against them.
 *
 * Reads never lock and never mutate. Mutations are refused while any
 * analysis holds a read lease (see acquireReadLease).
 */

import type {
  Domain,
  ExpertiseLevel,
  ImpactDimension,
  OntologyDocument,
  ProjectType,
  Subdomain,
} from '../types/models.js';
import type { IOntologyRepository } from '../repositories/IOntologyRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import {
  DomainSchema,
  ImpactDimensionSchema,
  ProjectTypeSchema,
  SubdomainSchema,
} from './schema.js';
import {
  ConflictError,
  GraphIntegrityError,
  NotFoundError,
  ValidationError,
} from '../errors.js';
import type { z } from 'zod';

export const DEFAULT_EXPERTISE_LEVEL = 'beginner';
export const DEFAULT_PROJECT_TYPE = 'software';

const SUBDOMAIN_KEYWORD_WEIGHT = 0.5;
const RELEVANCE_DENOMINATOR_FACTOR = 0.3;

export type AddDomainInput = z.input<typeof DomainSchema>;
export type AddImpactDimensionInput = z.input<typeof ImpactDimensionSchema>;
export type AddProjectTypeInput = z.input<typeof ProjectTypeSchema>;
export type AddSubdomainInput = z.input<typeof SubdomainSchema>;

export interface KnowledgeGraphOptions {
  repository?: IOntologyRepository;
  logProvider?: ILogProvider;
}

/** Releases a read lease. Calling it more than once has no further effect. */
export type ReleaseLease = () => void;

export class KnowledgeGraph {
  private domains = new Map<string, Domain>();
  private dimensions = new Map<string, ImpactDimension>();
  private expertiseLevels = new Map<string, ExpertiseLevel>();
  private projectTypes = new Map<string, ProjectType>();

  private activeLeases = 0;
  private revision = 0;

  private readonly repository?: IOntologyRepository;
  private readonly logProvider?: ILogProvider;

  constructor(options: KnowledgeGraphOptions = {}) {
    this.repository = options.repository;
    this.logProvider = options.logProvider;
  }

  /**
   * Build a graph from a document. The document must satisfy
   * referential integrity or GraphIntegrityError is thrown.
   */
  static fromDocument(
    document: OntologyDocument,
    options: KnowledgeGraphOptions = {}
  ): KnowledgeGraph {
    const graph = new KnowledgeGraph(options);
    graph.replaceContents(document);
    return graph;
  }

  /** Create a graph backed by a repository and load it. */
  static async open(
    repository: IOntologyRepository,
    logProvider?: ILogProvider
  ): Promise<KnowledgeGraph> {
    const graph = new KnowledgeGraph({ repository, logProvider });
    await graph.load();
    return graph;
  }

  /** Incremented on every successful mutation or load. */
  get version(): number {
    return this.revision;
  }

  get hasRepository(): boolean {
    return this.repository !== undefined;
  }

  /** Number of analyses currently reading the graph. */
  get leaseCount(): number {
    return this.activeLeases;
  }

  // ── Persistence ──

  async load(): Promise<void> {
    const repository = this.requireRepository();
    this.assertWritable('load');

    let document: OntologyDocument;
    try {
      document = await repository.load();
    } catch (err) {
      if (err instanceof GraphIntegrityError) throw err;
      throw new GraphIntegrityError(`Failed to load ontology from ${repository.source}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    // A lease may have been taken while the repository was reading.
    this.assertWritable('load');
    this.replaceContents(document);
    this.logProvider?.info('Ontology loaded', {
      source: repository.source,
      domains: this.domains.size,
      dimensions: this.dimensions.size,
    });
  }

  async save(): Promise<void> {
    const repository = this.requireRepository();
    await repository.save(this.toDocument());
    this.logProvider?.info('Ontology saved', {
      source: repository.source,
      version: this.revision,
    });
  }

  /** Deep copy of the current contents, in iteration order. */
  toDocument(): OntologyDocument {
    return structuredClone({
      domains: this.sortedDomains(),
      impactDimensions: this.sortedDimensions(),
      expertiseLevels: this.sortedExpertiseLevels(),
      projectTypes: this.sortedProjectTypes(),
    });
  }

  /**
   * Check referential integrity of the whole graph.
   * Throws GraphIntegrityError listing every dangling reference.
   */
  validate(): void {
    const problems = this.integrityProblems(this.domains, this.dimensions);
    if (problems.length > 0) {
      throw new GraphIntegrityError('Ontology failed integrity check', { problems });
    }
  }

  // ── Read leases ──

  /**
   * Mark the graph as being read by an analysis. While any lease is held,
   * every mutation throws ConflictError.
   */
  acquireReadLease(): ReleaseLease {
    this.activeLeases += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.activeLeases -= 1;
    };
  }

  // ── Domains ──

  getDomains(): Domain[] {
    return structuredClone(this.sortedDomains());
  }

  getDomainIds(): string[] {
    return [...this.domains.keys()].sort(compareIds);
  }

  getDomainById(id: string): Domain | null {
    const domain = this.domains.get(id);
    return domain ? structuredClone(domain) : null;
  }

  /** Empty when the domain is unknown. */
  getRelevantDimensionsForDomain(domainId: string): string[] {
    return [...(this.domains.get(domainId)?.relevantDimensions ?? [])];
  }

  /**
   * Keyword relevance of a text to a domain, in [0, 1].
   * Primary keyword hits weigh 1, subdomain keyword hits 0.5.
   */
  calculateDomainRelevance(text: string, domainId: string): number {
    const domain = this.domains.get(domainId);
    if (!domain || domain.keywords.length === 0) return 0;

    const haystack = text.toLowerCase();
    let matched = 0;
    let total = domain.keywords.length;

    for (const keyword of domain.keywords) {
      if (haystack.includes(keyword.toLowerCase())) matched += 1;
    }
    for (const subdomain of domain.subdomains) {
      total += subdomain.keywords.length;
      for (const keyword of subdomain.keywords) {
        if (haystack.includes(keyword.toLowerCase())) matched += SUBDOMAIN_KEYWORD_WEIGHT;
      }
    }

    const denominator = Math.max(1, total * RELEVANCE_DENOMINATOR_FACTOR);
    return Math.min(1, matched / denominator);
  }

  addDomain(input: AddDomainInput): Domain {
    this.assertWritable('addDomain');
    const domain = parseInput(DomainSchema, input, 'domain');

    if (this.domains.has(domain.id)) {
      throw new ConflictError(`Domain "${domain.id}" already exists`, { id: domain.id });
    }
    assertUniqueIds(domain.subdomains, `subdomains of "${domain.id}"`);
    domain.relevantDimensions = dedupe(domain.relevantDimensions);
    this.assertDimensionsExist(domain.relevantDimensions, domain.id);

    this.domains.set(domain.id, domain);
    this.touch('Domain added', { domainId: domain.id });
    return structuredClone(domain);
  }

  addSubdomain(domainId: string, input: AddSubdomainInput): Subdomain {
    this.assertWritable('addSubdomain');
    const domain = this.domains.get(domainId);
    if (!domain) throw new NotFoundError(`Domain "${domainId}" not found`);

    const subdomain = parseInput(SubdomainSchema, input, 'subdomain');
    if (domain.subdomains.some((s) => s.id === subdomain.id)) {
      throw new ConflictError(`Subdomain "${subdomain.id}" already exists in "${domainId}"`, {
        domainId,
        id: subdomain.id,
      });
    }

    domain.subdomains.push(subdomain);
    this.touch('Subdomain added', { domainId, subdomainId: subdomain.id });
    return structuredClone(subdomain);
  }

  /** Append dimension links to a domain; links it already has are ignored. */
  linkDomainToDimensions(domainId: string, dimensionIds: string[]): Domain {
    this.assertWritable('linkDomainToDimensions');
    const domain = this.domains.get(domainId);
    if (!domain) throw new NotFoundError(`Domain "${domainId}" not found`);
    this.assertDimensionsExist(dimensionIds, domainId);

    domain.relevantDimensions = dedupe([...domain.relevantDimensions, ...dimensionIds]);
    this.touch('Domain linked to dimensions', { domainId, dimensionIds });
    return structuredClone(domain);
  }

  // ── Impact dimensions ──

  getImpactDimensions(): ImpactDimension[] {
    return structuredClone(this.sortedDimensions());
  }

  getDimensionIds(): string[] {
    return [...this.dimensions.keys()].sort(compareIds);
  }

  getDimensionById(id: string): ImpactDimension | null {
    const dimension = this.dimensions.get(id);
    return dimension ? structuredClone(dimension) : null;
  }

  addImpactDimension(input: AddImpactDimensionInput): ImpactDimension {
    this.assertWritable('addImpactDimension');
    const dimension = parseInput(ImpactDimensionSchema, input, 'impact dimension');

    if (this.dimensions.has(dimension.id)) {
      throw new ConflictError(`Impact dimension "${dimension.id}" already exists`, {
        id: dimension.id,
      });
    }

    this.dimensions.set(dimension.id, dimension);
    this.touch('Impact dimension added', { dimensionId: dimension.id });
    return structuredClone(dimension);
  }

  // ── Expertise levels ──

  /** Ordered by ascending range minimum. */
  getExpertiseLevels(): ExpertiseLevel[] {
    return structuredClone(this.sortedExpertiseLevels());
  }

  getExpertiseLevelById(id: string): ExpertiseLevel | null {
    const level = this.expertiseLevels.get(id);
    return level ? structuredClone(level) : null;
  }

  /**
   * First level whose inclusive range contains the score, else "beginner".
   * Ranges are integral, so a fractional score is floored before the lookup.
   */
  getExpertiseLevelByConfidence(score: number): string {
    const whole = Math.floor(score);
    for (const level of this.sortedExpertiseLevels()) {
      const [min, max] = level.confidenceRange;
      if (whole >= min && whole <= max) return level.id;
    }
    return DEFAULT_EXPERTISE_LEVEL;
  }

  // ── Project types ──

  getProjectTypes(): ProjectType[] {
    return structuredClone(this.sortedProjectTypes());
  }

  getProjectTypeById(id: string): ProjectType | null {
    const type = this.projectTypes.get(id);
    return type ? structuredClone(type) : null;
  }

  /** Type with the most keyword hits; the first in order wins ties. */
  classifyProjectType(text: string): string {
    const haystack = text.toLowerCase();
    let bestType = DEFAULT_PROJECT_TYPE;
    let bestScore = 0;

    for (const type of this.sortedProjectTypes()) {
      const score = type.keywords.filter((k) => haystack.includes(k.toLowerCase())).length;
      if (score > bestScore) {
        bestScore = score;
        bestType = type.id;
      }
    }

    return bestType;
  }

  addProjectType(input: AddProjectTypeInput): ProjectType {
    this.assertWritable('addProjectType');
    const type = parseInput(ProjectTypeSchema, input, 'project type');

    if (this.projectTypes.has(type.id)) {
      throw new ConflictError(`Project type "${type.id}" already exists`, { id: type.id });
    }

    this.projectTypes.set(type.id, type);
    this.touch('Project type added', { projectTypeId: type.id });
    return structuredClone(type);
  }

  // ── Private ──

  private replaceContents(document: OntologyDocument): void {
    const domains = indexById(document.domains, 'domain');
    const dimensions = indexById(document.impactDimensions, 'impact dimension');
    const expertiseLevels = indexById(document.expertiseLevels, 'expertise level');
    const projectTypes = indexById(document.projectTypes, 'project type');

    const problems = this.integrityProblems(domains, dimensions);
    if (problems.length > 0) {
      throw new GraphIntegrityError('Ontology failed integrity check', { problems });
    }

    this.domains = domains;
    this.dimensions = dimensions;
    this.expertiseLevels = expertiseLevels;
    this.projectTypes = projectTypes;
    this.revision += 1;
  }

  private integrityProblems(
    domains: Map<string, Domain>,
    dimensions: Map<string, ImpactDimension>
  ): string[] {
    const problems: string[] = [];
    for (const domain of domains.values()) {
      for (const dimensionId of domain.relevantDimensions) {
        if (!dimensions.has(dimensionId)) {
          problems.push(`domain "${domain.id}" references unknown dimension "${dimensionId}"`);
        }
      }
      const seen = new Set<string>();
      for (const subdomain of domain.subdomains) {
        if (seen.has(subdomain.id)) {
          problems.push(`domain "${domain.id}" has duplicate subdomain "${subdomain.id}"`);
        }
        seen.add(subdomain.id);
      }
    }
    return problems;
  }

  private assertDimensionsExist(dimensionIds: string[], domainId: string): void {
    const missing = dimensionIds.filter((id) => !this.dimensions.has(id));
    if (missing.length > 0) {
      throw new GraphIntegrityError(
        `Domain "${domainId}" cannot link unknown dimensions: ${missing.join(', ')}`,
        { domainId, missing }
      );
    }
  }

  private assertWritable(operation: string): void {
    if (this.activeLeases > 0) {
      throw new ConflictError(
        `Cannot ${operation} while ${this.activeLeases} analysis read lease(s) are held`,
        { operation, activeLeases: this.activeLeases }
      );
    }
  }

  private requireRepository(): IOntologyRepository {
    if (!this.repository) {
      throw new GraphIntegrityError('Knowledge graph has no repository to load from or save to');
    }
    return this.repository;
  }

  private touch(message: string, fields: Record<string, unknown>): void {
    this.revision += 1;
    this.logProvider?.info(message, { ...fields, version: this.revision });
  }

  private sortedDomains(): Domain[] {
    return [...this.domains.values()].sort(byId);
  }

  private sortedDimensions(): ImpactDimension[] {
    return [...this.dimensions.values()].sort(byId);
  }

  private sortedProjectTypes(): ProjectType[] {
    return [...this.projectTypes.values()].sort(byId);
  }

  private sortedExpertiseLevels(): ExpertiseLevel[] {
    return [...this.expertiseLevels.values()].sort(
      (a, b) => a.confidenceRange[0] - b.confidenceRange[0] || compareIds(a.id, b.id)
    );
  }
}

/** Plain code-unit ordering, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function byId(a: { id: string }, b: { id: string }): number {
  return compareIds(a.id, b.id);
}

function dedupe(ids: string[]): string[] {
  return [...new Set(ids)];
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.') || label}: ${issue.message}`
    );
    throw new ValidationError(`Invalid ${label}: ${problems.join('; ')}`, { problems });
  }
  return structuredClone(result.data);
}

function assertUniqueIds(items: { id: string }[], label: string): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.id)) {
      throw new ConflictError(`Duplicate id "${item.id}" in ${label}`, { id: item.id });
    }
    seen.add(item.id);
  }
}

function indexById<T extends { id: string }>(items: T[], label: string): Map<string, T> {
  const map = new Map<string, T>();
  for (const item of items) {
    if (map.has(item.id)) {
      throw new GraphIntegrityError(`Duplicate ${label} id "${item.id}"`, { id: item.id });
    }
    map.set(item.id, structuredClone(item));
  }
  return map;
}
