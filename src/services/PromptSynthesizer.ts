/**
 * Prompt builder.
 * Every prompt is derived from the graph's current contents, so a dimension or
 * domain added to the graph shows up in the next prompt without code changes.
 */

import { compareIds, type KnowledgeGraph } from '../ontology/KnowledgeGraph.js';
import type { ImpactDimension, ProjectInfo, Review } from '../types/models.js';
import { OVERALL_SENTIMENT, SCALE_VALUES } from '../types/models.js';
import { NotFoundError } from '../errors.js';
import { snippet, titleCase } from '../text/completion-text.js';

export const UNKNOWN_DOMAIN = 'unknown';

export class PromptSynthesizer {
  constructor(
    private readonly graph: KnowledgeGraph,
    private readonly snippetLength: number = 150
  ) {}

  /** Ask for a review from one domain's perspective, ending in a CONFIDENCE line. */
  artificialReviewPrompt(projectDescription: string, domainId: string): string {
    const domain = this.graph.getDomainById(domainId);
    if (!domain) throw new NotFoundError(`Domain "${domainId}" not found`);

    const focus = this.graph
      .getRelevantDimensionsForDomain(domainId)
      .map((id) => this.graph.getDimensionById(id))
      .filter((d): d is ImpactDimension => d !== null)
      .map((d) => `- ${d.name}: ${d.description}`);

    return [
      `You are a reviewer with deep expertise in ${domain.name}.`,
      '',
      `Domain context: ${domain.description}`,
      `Your expertise covers: ${domain.keywords.join(', ')}`,
      '',
      'You are reviewing a hackathon project:',
      '',
      projectDescription,
      '',
      `Write a detailed review of this project from the perspective of ${domain.name}.`,
      ...(focus.length > 0
        ? ['', 'Pay particular attention to these evaluation dimensions:', ...focus]
        : []),
      '',
      'Your review should:',
      '1. Assess the project from your domain perspective',
      `2. Consider practical implications for ${domain.name} stakeholders`,
      '3. Judge feasibility and potential impact within your field',
      '4. Offer constructive criticism and concrete suggestions',
      '5. Stay focused (around 300-400 words)',
      '',
      'Also give a confidence score from 0 to 100 for your assessment.',
      `As a ${domain.name} expert reviewing a project relevant to your field, it should typically fall between 85 and 95.`,
      '',
      'Format your answer exactly as:',
      'REVIEW: <your review>',
      'CONFIDENCE: <0-100>',
    ].join('\n');
  }

  /** Ask for a JSON object with one 1.0–5.0 score per current dimension plus overall_sentiment. */
  sentimentAnalysisPrompt(reviewText: string): string {
    const dimensions = this.graph.getImpactDimensions();

    const blocks = dimensions.map((d) => {
      const scale = SCALE_VALUES.filter((v) => d.scale[v] !== undefined).map(
        (v) => `  ${v}: ${d.scale[v]}`
      );
      return [`${d.name} (${d.id}):`, d.description, 'Scale:', ...scale].join('\n');
    });

    const example = [
      '{',
      ...dimensions.map((d) => `  "${d.id}": 3.0,`),
      `  "${OVERALL_SENTIMENT}": 3.0`,
      '}',
    ];

    return [
      'Rate the following project review on each evaluation dimension.',
      '',
      'Review:',
      reviewText,
      '',
      'Evaluation dimensions:',
      blocks.join('\n\n'),
      '',
      'Score each dimension from 1.0 to 5.0 according to what the review says about the project.',
      'When the review does not address a dimension, infer a score from its overall tone.',
      `Also give "${OVERALL_SENTIMENT}" (1.0 to 5.0): how positive the review is overall.`,
      '',
      'Respond with ONLY a JSON object of this shape:',
      ...example,
      '',
      'Replace the example values with your ratings, using numbers between 1.0 and 5.0.',
      'Do not add any other text.',
    ].join('\n');
  }

  /** Ask for exactly one domain id, nothing else. */
  reviewerClassificationPrompt(reviewerName: string, reviewText: string): string {
    const options = this.graph
      .getDomains()
      .map((d) => `- ${d.name} (${d.id}): ${d.description}\n  Keywords: ${d.keywords.join(', ')}`);
    const exampleIds = this.graph.getDomainIds().slice(0, 3).map((id) => `"${id}"`);

    return [
      'Classify the author of the following review into the domain that best matches their expertise.',
      '',
      `Reviewer: ${reviewerName}`,
      'Review:',
      reviewText,
      '',
      'Domains:',
      ...options,
      '',
      'Look at the terminology used, the aspects of the project the reviewer focuses on,',
      'the kind of concerns or suggestions raised, and the professional perspective they show.',
      '',
      `Return ONLY the domain ID${exampleIds.length > 0 ? ` (e.g. ${exampleIds.join(', ')})` : ''}.`,
      'Do not include any explanation.',
    ].join('\n');
  }

  /** Ask for a 400–500 word synthesis of all accepted reviews. */
  finalReviewSynthesisPrompt(
    projectInfo: ProjectInfo,
    reviewsByDomain: Map<string, Review[]>,
    dimensionScores: Record<string, number>
  ): string {
    const scoreLines: string[] = [];
    for (const [dimensionId, score] of Object.entries(dimensionScores)) {
      if (dimensionId === OVERALL_SENTIMENT) continue;
      const name = this.graph.getDimensionById(dimensionId)?.name ?? titleCase(dimensionId);
      scoreLines.push(`- ${name}: ${score}/5.0`);
    }

    let reviewCount = 0;
    const perspectives: string[] = [];
    for (const [domainId, reviews] of reviewsByDomain) {
      reviewCount += reviews.length;
      perspectives.push('', `${this.domainName(domainId)} perspective:`);
      for (const review of reviews) {
        perspectives.push(`- ${this.reviewLabel(review)}: ${snippet(review.text, this.snippetLength)}...`);
      }
    }

    return [
      'You are synthesizing several expert perspectives on a hackathon project into one final review.',
      '',
      `Project: ${projectInfo.name}`,
      `Description: ${projectInfo.description}`,
      `Work done: ${projectInfo.workDone}`,
      '',
      `Across ${reviewCount} review(s), the project received these scores:`,
      ...scoreLines,
      '',
      'Insights by domain:',
      ...perspectives,
      '',
      'Write a final review that:',
      '1. Integrates every domain perspective',
      '2. Highlights the key strengths across the evaluation dimensions',
      '3. Names the critical weaknesses or challenges reviewers raised',
      '4. Stays balanced and constructive',
      '5. Suggests concrete next steps',
      "6. Ends with an overall assessment of the project's potential",
      '',
      'Keep it professional and actionable, 400-500 words.',
    ].join('\n');
  }

  /** Ask the model which domains, dimensions and project types the graph is missing. */
  ontologyUpdatePrompt(context: string): string {
    const list = (items: { name: string; description: string }[]) =>
      items.map((i) => `- ${i.name}: ${i.description}`);

    return [
      'You maintain the knowledge model used to evaluate hackathon projects.',
      '',
      'Current domains:',
      ...list(this.graph.getDomains()),
      '',
      'Current impact dimensions:',
      ...list(this.graph.getImpactDimensions()),
      '',
      'Current project types:',
      ...list(this.graph.getProjectTypes()),
      '',
      'Given the following context, suggest additions that would let the model categorize',
      'reviewer expertise and evaluate projects like this one more precisely.',
      '',
      'Context:',
      context,
      '',
      'Ids are lowercase slugs (letters, digits, "_" or "-").',
      `Known dimension ids: ${this.graph.getDimensionIds().join(', ')}`,
      '',
      'Respond with ONLY a JSON object in this format (use empty arrays when nothing is needed):',
      '{',
      '  "domains_to_add": [',
      '    { "id": "domain_id", "name": "Domain Name", "description": "...", "keywords": ["..."], "relevant_dimensions": ["dimension_id"] }',
      '  ],',
      '  "dimensions_to_add": [',
      '    { "id": "dimension_id", "name": "Dimension Name", "description": "...", "scale": { "1": "...", "2": "...", "3": "...", "4": "...", "5": "..." } }',
      '  ],',
      '  "project_types_to_add": [',
      '    { "id": "type_id", "name": "Type Name", "description": "...", "keywords": ["..."] }',
      '  ]',
      '}',
    ].join('\n');
  }

  // ── Private ──

  private domainName(domainId: string): string {
    return this.graph.getDomainById(domainId)?.name ?? titleCase(domainId);
  }

  private reviewLabel(review: Review): string {
    const origin = review.isArtificial ? 'AI-generated' : 'Human';
    if (!review.expertiseLevel) return `${origin} review`;
    const level =
      this.graph.getExpertiseLevelById(review.expertiseLevel)?.name ??
      titleCase(review.expertiseLevel);
    return `${origin} ${level} review`;
  }
}

/** Group reviews by domain id, keys in lexicographic order; unclassified reviews go under "unknown". */
export function groupReviewsByDomain(reviews: Review[]): Map<string, Review[]> {
  const groups = new Map<string, Review[]>();
  for (const review of reviews) {
    const key = review.domain ?? UNKNOWN_DOMAIN;
    const group = groups.get(key);
    if (group) group.push(review);
    else groups.set(key, [review]);
  }
  return new Map([...groups.entries()].sort(([a], [b]) => compareIds(a, b)));
}
