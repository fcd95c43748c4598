// M3-Sections module exports

export { extractSections, isReferencesTitle } from './section-extractor.js';
export {
  IllustrationClient,
  buildIllustrationPrompt,
  MAX_ILLUSTRATED_SECTIONS,
  DEFAULT_ILLUSTRATION_CONFIG
} from './illustration-client.js';
export type {
  Section,
  SectionImageMap,
  IllustrationClientConfig,
  IllustrationProgress,
  FetchLike
} from './types.js';
