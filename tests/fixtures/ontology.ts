/**
 * Small two-domain ontology shared by the service tests.
 *
 * Against PROJECT_TEXT, technical relevance is 2 / 3.3 and business relevance
 * is exactly 0.25 (one primary hit plus one subdomain hit over 20 keywords).
 */

import type { OntologyDocument, ProjectInfo, Review } from '../../src/types/models.js';
import { formatProjectText } from '../../src/text/project-text.js';

export function testOntology(): OntologyDocument {
  return {
    domains: [
      {
        id: 'business',
        name: 'Business',
        description: 'Commercial viability and market fit',
        keywords: [
          'market',
          'revenue',
          'pricing',
          'customers',
          'sales',
          'profit',
          'investment',
          'funding',
          'growth',
          'strategy',
        ],
        subdomains: [
          {
            id: 'finance',
            name: 'Finance',
            keywords: ['budget', 'cost', 'forecast', 'accounting', 'capital'],
          },
          {
            id: 'marketing',
            name: 'Marketing',
            keywords: ['brand', 'campaign', 'advertising', 'audience', 'promotion'],
          },
        ],
        relevantDimensions: ['roi'],
      },
      {
        id: 'technical',
        name: 'Technical',
        description: 'Software engineering and system design',
        keywords: ['software', 'api', 'database', 'algorithm', 'cloud'],
        subdomains: [
          { id: 'frontend', name: 'Frontend', keywords: ['react', 'css', 'interface'] },
          { id: 'backend', name: 'Backend', keywords: ['server', 'microservice', 'backend'] },
        ],
        relevantDimensions: ['feasibility'],
      },
    ],
    impactDimensions: [
      {
        id: 'feasibility',
        name: 'Feasibility',
        description: 'Can it be built with the available technology',
        scale: { 1: 'Not feasible', 3: 'Feasible with effort', 5: 'Straightforward' },
      },
      {
        id: 'roi',
        name: 'Return on Investment',
        description: 'Value delivered relative to cost',
        scale: { 1: 'Negative return', 5: 'Exceptional return' },
      },
    ],
    expertiseLevels: [
      { id: 'beginner', name: 'Beginner', description: '', confidenceRange: [0, 40] },
      { id: 'skilled', name: 'Skilled', description: '', confidenceRange: [41, 70] },
      { id: 'talented', name: 'Talented', description: '', confidenceRange: [71, 85] },
      { id: 'seasoned', name: 'Seasoned', description: '', confidenceRange: [86, 95] },
      { id: 'expert', name: 'Expert', description: '', confidenceRange: [96, 100] },
    ],
    projectTypes: [
      { id: 'data', name: 'Data', description: '', keywords: ['dataset', 'analytics'] },
      { id: 'hardware', name: 'Hardware', description: '', keywords: ['device', 'sensor'] },
      { id: 'software', name: 'Software', description: '', keywords: ['software', 'api', 'app'] },
    ],
  };
}

export const PROJECT_INFO: ProjectInfo = {
  id: 'project-1',
  name: 'Triage Assistant',
  description: 'A software tool with an API that helps clinics prioritise patients.',
  workDone: 'Built a prototype on a small budget and validated demand in one market interview.',
};

export const PROJECT_TEXT = formatProjectText(PROJECT_INFO);

/** A human review with every computed field unset. */
export function humanReview(overrides: Partial<Review> = {}): Review {
  return {
    reviewerName: 'Dana',
    text: 'The API design is clean and the prototype works.',
    confidenceScore: 90,
    links: {},
    isArtificial: false,
    domain: null,
    expertiseLevel: null,
    relevanceScore: null,
    sentimentScores: null,
    isAccepted: null,
    ...overrides,
  };
}
