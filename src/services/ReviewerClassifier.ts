/**
 * Reviewer classification service.
 * Assigns each reviewer an expertise level (from confidence) and a domain
 * (from the model's reading of the review, optionally corrected by profile titles).
 *
 * One instance per analysis run: results are cached by reviewer name.
 */

import type { KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ICompletionProvider } from '../providers/ICompletionProvider.js';
import type { IProfileProvider } from '../providers/IProfileProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Domain, ExternalLinks } from '../types/models.js';
import type { PromptSynthesizer } from './PromptSynthesizer.js';
import { GraphIntegrityError, describeError } from '../errors.js';
import { snippet, stripReasoningTags } from '../text/completion-text.js';

/** How the domain was decided. */
export type DomainSource = 'id' | 'name' | 'substring' | 'keyword' | 'fallback' | 'profile';

export interface ReviewerClassification {
  domain: string;
  expertiseLevel: string;
  domainSource: DomainSource;
  /** Profile titles consulted, in link order. Empty when profiles were not used. */
  profileTitles: string[];
}

/** Title patterns that point at a domain. Checked in order; first hit wins. */
export const PROFILE_TITLE_RULES: ReadonlyArray<{ pattern: RegExp; domain: string }> = [
  { pattern: /engineer|developer|programmer/i, domain: 'technical' },
  { pattern: /physician|doctor|nurse|clinician/i, domain: 'clinical' },
  { pattern: /manager|administrator|director/i, domain: 'administrative' },
  { pattern: /founder|ceo|investor|analyst/i, domain: 'business' },
  { pattern: /designer/i, domain: 'design' },
];

/** Reverse substring matches ("tech" → "technical") need at least this many characters. */
const MIN_PARTIAL_ANSWER_LENGTH = 3;

export class ReviewerClassifier {
  private readonly cache = new Map<string, ReviewerClassification>();

  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly prompts: PromptSynthesizer,
    private readonly completionProvider: ICompletionProvider,
    private readonly logProvider: ILogProvider,
    private readonly profileProvider: IProfileProvider | null = null
  ) {}

  /**
   * Classify a reviewer. Completion failures propagate; an unrecognised
   * answer falls back to the first domain in id order.
   */
  async classify(
    reviewerName: string,
    reviewText: string,
    confidenceScore: number,
    links: ExternalLinks = {},
    signal?: AbortSignal
  ): Promise<ReviewerClassification> {
    const cached = this.cache.get(reviewerName);
    if (cached) return cached;

    const domains = this.graph.getDomains();
    if (domains.length === 0) {
      throw new GraphIntegrityError('Cannot classify reviewers: the ontology defines no domains');
    }

    const expertiseLevel = this.graph.getExpertiseLevelByConfidence(confidenceScore);

    const response = await this.completionProvider.complete(
      this.prompts.reviewerClassificationPrompt(reviewerName, reviewText),
      { signal }
    );
    const answer = stripReasoningTags(response);

    let classification: ReviewerClassification;
    const resolved = resolveDomain(answer, domains);
    if (resolved) {
      classification = {
        domain: resolved.domain.id,
        expertiseLevel,
        domainSource: resolved.source,
        profileTitles: [],
      };
    } else {
      this.logProvider.warn('Reviewer domain not recognised, using fallback domain', {
        reviewer: reviewerName,
        response: snippet(answer, 100),
        fallback: domains[0].id,
      });
      classification = {
        domain: domains[0].id,
        expertiseLevel,
        domainSource: 'fallback',
        profileTitles: [],
      };
    }

    if (this.profileProvider && Object.values(links).some(Boolean)) {
      classification = await this.applyProfileSignals(reviewerName, links, classification);
    }

    this.cache.set(reviewerName, classification);
    return classification;
  }

  /** Number of reviewers classified so far in this run. */
  get cachedCount(): number {
    return this.cache.size;
  }

  // ── Private ──

  /** Best-effort: lookup failures are logged and ignored. */
  private async applyProfileSignals(
    reviewerName: string,
    links: ExternalLinks,
    classification: ReviewerClassification
  ): Promise<ReviewerClassification> {
    const titles: string[] = [];
    for (const [source, url] of Object.entries(links)) {
      if (!url || !this.profileProvider) continue;
      try {
        const profile = await this.profileProvider.fetchProfile(source, url);
        if (profile?.title) titles.push(profile.title);
      } catch (err) {
        this.logProvider.warn('Profile lookup failed', {
          reviewer: reviewerName,
          source,
          error: describeError(err),
        });
      }
    }

    const domain = this.domainFromTitles(titles);
    if (!domain || domain === classification.domain) {
      return { ...classification, profileTitles: titles };
    }

    this.logProvider.info('Reviewer domain overridden by profile', {
      reviewer: reviewerName,
      from: classification.domain,
      to: domain,
    });
    return { ...classification, domain, domainSource: 'profile', profileTitles: titles };
  }

  private domainFromTitles(titles: string[]): string | null {
    for (const title of titles) {
      for (const rule of PROFILE_TITLE_RULES) {
        if (rule.pattern.test(title) && this.graph.getDomainById(rule.domain)) {
          return rule.domain;
        }
      }
    }
    return null;
  }
}

/**
 * Match a model answer against the domains, in order of precision:
 * exact id, exact name, id or name contained in the answer (or the answer
 * contained in an id), then any keyword contained in the answer.
 */
export function resolveDomain(
  answer: string,
  domains: Domain[]
): { domain: Domain; source: DomainSource } | null {
  const normalized = answer
    .trim()
    .toLowerCase()
    .replace(/^["'`*\s]+|["'`*.\s]+$/g, '');
  if (!normalized) return null;

  const byId = domains.find((d) => d.id === normalized);
  if (byId) return { domain: byId, source: 'id' };

  const byName = domains.find((d) => d.name.toLowerCase() === normalized);
  if (byName) return { domain: byName, source: 'name' };

  const bySubstring = domains.find(
    (d) =>
      normalized.includes(d.id) ||
      normalized.includes(d.name.toLowerCase()) ||
      (normalized.length >= MIN_PARTIAL_ANSWER_LENGTH && d.id.includes(normalized))
  );
  if (bySubstring) return { domain: bySubstring, source: 'substring' };

  const byKeyword = domains.find((d) =>
    d.keywords.some((k) => normalized.includes(k.toLowerCase()))
  );
  if (byKeyword) return { domain: byKeyword, source: 'keyword' };

  return null;
}
