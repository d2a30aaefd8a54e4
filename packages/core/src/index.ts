// Errors
export * from './errors';

// Configuration
export * from './config/env-config';
export * from './constants';

// Indexer
export * from './indexer/crawler';

// Extractors
export * from './extractors/types';
export * from './extractors/pdf-extractor';
export { normalizeWhitespace, truncateToCharLimit } from './extractors/extractor-utils';

// Agents
export * from './agents/llm-client';
export * from './agents/naming-agent';

// Renamer
export * from './renamer/sanitize';
export * from './renamer/renamer';

// Pipeline
export * from './pipeline/file-state';
export * from './pipeline/rename-pipeline';
