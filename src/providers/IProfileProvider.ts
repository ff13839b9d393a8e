/**
 * External reviewer-profile lookup (LinkedIn, Google Scholar, GitHub, ...).
 * Used only as a best-effort hint for domain classification.
 */

export interface ExternalProfile {
  /** Link key the profile came from, e.g. "github". */
  source: string;
  url: string;
  /** Professional title, when the source exposes one. */
  title: string | null;
  details: Record<string, unknown>;
}

export interface IProfileProvider {
  /** Null when the source is unsupported or the profile cannot be read. */
  fetchProfile(source: string, url: string): Promise<ExternalProfile | null>;
}
