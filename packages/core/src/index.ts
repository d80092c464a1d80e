/**
 * scopeconf core
 * Scope composition, import resolution and canonical value conversion
 */

export {
  compile,
  compileComposition,
  type CompileResult,
} from './compiler.js';
export {
  composeApplication,
  ENVIRONMENT_BINDING,
  ENVIRONMENT_NAME_FIELD,
  type Composition,
} from './composer.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadProjectConfig,
  resolveCompileOptions,
  type CompileOptions,
  type ProjectConfig,
  type ResolvedCompileOptions,
} from './config.js';
export {
  convertValue,
  isEmittedKey,
  MAX_ARRAY_INDEX,
  type ConvertOptions,
} from './converter.js';
export {
  DOCUMENT_EXTENSIONS,
  DOCUMENT_FORMATS,
  documentPath,
  ensureOutputDir,
  serializeDocument,
  writeDocument,
  type DocumentFormat,
} from './document.js';
export {
  ConfError,
  ConversionError,
  describeCause,
  IOError,
  LoadError,
  RuntimeError,
  type ConfErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export {
  createLoadContext,
  FRAGMENT_EXTENSION,
  fragmentPath,
  IMPORT_ARGUMENT_ERROR,
  MAX_IMPORT_DEPTH,
} from './importer.js';
export {
  environmentFile,
  listApplications,
  listEnvironments,
  overlayFile,
  resolveLayout,
  SCRIPT_EXTENSION,
  type InputLayout,
} from './layout.js';
export {
  IMPORT_FUNCTION_NAME,
  loadScope,
  openScope,
  readScript,
  runInScope,
  type LoadContext,
} from './loader.js';
export { LuaRuntime } from './runtime/lua-runtime.js';
export type {
  CallStatus,
  HostFunction,
  ScriptStack,
  ScriptType,
} from './runtime/types.js';
export { BindingTable, Scope } from './scope.js';
export type {
  CompileCallbacks,
  CompositionEvent,
  CompositionSkipEvent,
  DocumentEvent,
  ImportEvent,
} from './types.js';
export {
  array,
  bool,
  nil,
  num,
  object,
  str,
  toPlain,
  type ConfArray,
  type ConfBoolean,
  type ConfNil,
  type ConfNumber,
  type ConfObject,
  type ConfString,
  type ConfValue,
  type ConfValueKind,
  type PlainValue,
} from './values.js';
export { VERSION } from './version.js';
