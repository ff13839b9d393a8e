/**
 * Offline profile provider.
 * Returns fixed profile data per supported source without any network access.
 */

import type { ExternalProfile, IProfileProvider } from './IProfileProvider.js';

const SIMULATED: Record<string, Pick<ExternalProfile, 'title' | 'details'>> = {
  linkedin: {
    title: null,
    details: { industry: 'Unknown', experienceYears: 5 },
  },
  google_scholar: {
    title: 'Academic Researcher',
    details: { publications: 10, citations: 100, hIndex: 5 },
  },
  github: {
    title: 'Software Engineer',
    details: { repositories: 15, stars: 50, contributions: 500 },
  },
};

export class SimulatedProfileProvider implements IProfileProvider {
  async fetchProfile(source: string, url: string): Promise<ExternalProfile | null> {
    if (!url || !Object.hasOwn(SIMULATED, source)) return null;
    const profile = SIMULATED[source];
    return { source, url, title: profile.title, details: { ...profile.details } };
  }
}
