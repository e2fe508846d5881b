/**
 * Built-in template sources.
 */

export { FileSystemTemplateLookup, type FileSystemTemplateLookupOptions } from './file-system.js';
export { InMemoryTemplateLookup } from './in-memory.js';
