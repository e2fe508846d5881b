/**
 * Template lookup infrastructure.
 *
 * - `TemplateSource`: a lookup with a name and a priority
 * - `TemplateLookupChain`: combines sources in priority order
 * - `InMemoryTemplateLookup`: virtual paths held in memory (priority 10)
 * - `FileSystemTemplateLookup`: view directories on disk (priority 100)
 */

export type { TemplateSource } from './base-source.js';
export { TemplateLookupChain } from './lookup-chain.js';
export {
  FileSystemTemplateLookup,
  type FileSystemTemplateLookupOptions,
  InMemoryTemplateLookup,
} from './sources/index.js';
