import type { Excerpt } from '../../extractors/types';

/**
 * The model's proposal for a file, reduced to a bare base name.
 */
export type RenameSuggestion = {
  /** Sanitized name without extension or path; '' when not valid */
  baseName: string;
  /** Whether the model response could be turned into a usable name */
  valid: boolean;
  /** The model's reply as received */
  raw: string;
};

/**
 * Capability the pipeline needs from the naming step. Swap in a stub for tests.
 */
export interface NameSuggester {
  suggestName(excerpt: Excerpt): Promise<RenameSuggestion>;
}
