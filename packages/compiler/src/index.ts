export { Lexer, LexError, tokenize } from './lexer.js'
export type { Token, TokenKind } from './lexer.js'
export { ParseError, parseSpecFile, specFileKind } from './parser.js'
export { PRIMITIVE_TYPES, SECTION_ROLES } from './ast.js'
export type * from './ast.js'
export { buildImportGraph, resolveImportPath } from './import-graph.js'
export type { ImportEdge, ImportGraph } from './import-graph.js'
export { cloneField, describeFieldType, pathParameters } from './model.js'
export type * from './model.js'
export { Composer, compose } from './composer.js'
export type { Composition } from './composer.js'
export { DEFAULT_CONSTRAINT_RULES, constraintRules } from './constraints.js'
export { ConstraintValidator, validateGraph } from './validator.js'
export { emitIR, serializeIR, validateIRDocument } from './emitter.js'
export { discoverSpecFiles, loadSources, readSources } from './sources.js'
export type { SourceText } from './sources.js'
export { compileProject, compileSources } from './pipeline.js'
export type { CompileFailure, CompileOptions, CompileOutput, CompilePhase } from './pipeline.js'
export { SpecWatcher } from './watcher.js'
export type { WatcherOptions } from './watcher.js'
export { formatDiagnostic, hasErrors, countBySeverity } from './diagnostics.js'
