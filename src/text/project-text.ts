import type { ProjectInfo } from '../types/models.js';

/** The text every relevance and project-type computation runs against. */
export function formatProjectText(project: Pick<ProjectInfo, 'name' | 'description' | 'workDone'>): string {
  return [
    `Project Name: ${project.name}`,
    `Project Description: ${project.description}`,
    `Work Done So Far: ${project.workDone}`,
  ].join('\n\n');
}
