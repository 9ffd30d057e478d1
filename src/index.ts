/**
 * pgmutate - compiles declarative entity actions into PL/pgSQL mutation functions.
 * Main library exports barrel file.
 */

// Entity/action AST and YAML front end
export * from './core/ast/types.js';
export { parseEntities, loadEntityFile, loadEntityFiles } from './core/ast/loader.js';

// Configuration
export * from './core/config/index.js';

// Registry
export * from './core/registry/index.js';

// Compiler
export * from './core/compiler/index.js';

// Foundation SQL
export * from './core/foundation/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
