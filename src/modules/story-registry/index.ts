/**
 * story-registry module — public API exports.
 */

export type { StoryRegistry, Story, CreateStoryInput } from './story-registry.js'
export { StoryRegistryImpl, createStoryRegistry } from './story-registry-impl.js'
export type { StoryRegistryOptions } from './story-registry-impl.js'
export {
  parseStoryFile,
  renderStoryFile,
  renderStoryBody,
  StoryFrontMatterSchema,
  StoryRepositorySchema,
} from './story-format.js'
export type { StoryFrontMatter, StoryRepository, ParsedStoryFile } from './story-format.js'
