export * from './types.js';
export * from './registry.js';
export * from './document.js';
export * from './java.js';

// Set up default registry with all extractors
import { defaultRegistry } from './registry.js';
import { JavaStructureExtractor } from './java.js';

defaultRegistry.register(new JavaStructureExtractor());
