/**
 * Schema Module
 */

export {
  discoverTags,
  findCandidateTags,
  buildSchema,
  DEFAULT_DISCOVERY_CONFIG,
  type DiscoveryConfig,
} from './discover.js';
