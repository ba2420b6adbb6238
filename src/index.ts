/**
 * Fill-in templates: text with `[[` … `]]` spans resolved through hooks
 * keyed by a single tag character.
 */
export {
  defaultDelimiters,
  LEFT_DELIM,
  parseDelimiters,
  parseSearchPath,
  RIGHT_DELIM,
  TEMPLATE_PATH,
} from './config.js';
export { collect, interpretText, stream } from './engine.js';
export { FillInError, isFillInError } from './errors.js';
export type { FillInErrorCode } from './errors.js';
export { ESCAPE_MARKER, unescapeDelimiters } from './escape.js';
export {
  createDefaultHooks,
  defaultHooks,
  findValue,
  HookRegistry,
  runFunction,
  splitArguments,
  templateFunctions,
  templateVariables,
} from './hooks.js';
export type { Hook, TemplateFunction } from './hooks.js';
export { findTemplateFile, loadTemplate, NULL_TEMPLATE } from './loader.js';
export { logger } from './logger.js';
export { findDelimiter } from './scanner.js';
export type { FindDelimiterOptions } from './scanner.js';
export { dispatchSpan, parseSpan, resolveSpan } from './span.js';
export type { ParsedSpan } from './span.js';
export { Template } from './template.js';
export type { TemplateOptions } from './template.js';
export type { DelimiterPair, EngineConfig, OutputSink } from './types.js';
