/**
 * Span parsing and hook dispatch.
 */
import { escapeRegex } from './escape.js';
import { FillInError } from './errors.js';
import { TAG_CHAR_CLASS } from './schemas.js';
import type { DelimiterPair, EngineConfig } from './types.js';

export interface ParsedSpan {
  tag: string;
  payload: string;
}

function spanPattern(delimiters: DelimiterPair): RegExp {
  return new RegExp(
    `^${escapeRegex(delimiters.left)}\\s*(${TAG_CHAR_CLASS})\\s*([\\s\\S]*?)\\s*${escapeRegex(delimiters.right)}$`,
    'u',
  );
}

/**
 * Split the full text of one span (delimiters included) into its tag
 * character and trimmed payload. Escape markers inside the payload are
 * kept as-is.
 *
 * @throws FillInError `MALFORMED_SPAN` if the text is not a single well-formed span
 */
export function parseSpan(
  spanText: string,
  delimiters: DelimiterPair,
): ParsedSpan {
  const match = spanPattern(delimiters).exec(spanText);
  if (!match) {
    throw new FillInError(
      `Can't interpret template chunk '${spanText}'`,
      'MALFORMED_SPAN',
      spanText,
    );
  }
  return { tag: match[1], payload: match[2] };
}

/**
 * Resolve one span to its replacement text through the hook registry.
 *
 * Errors thrown by the hook itself propagate unchanged.
 *
 * @throws FillInError `MALFORMED_SPAN` for unparseable span text
 * @throws FillInError `UNREGISTERED_TAG` when no hook exists for the tag
 */
export function resolveSpan(spanText: string, config: EngineConfig): string {
  return dispatchSpan(parseSpan(spanText, config.delimiters), config);
}

export function dispatchSpan(span: ParsedSpan, config: EngineConfig): string {
  const { tag, payload } = span;
  const hook = config.hooks.lookup(tag);
  if (!hook) {
    throw new FillInError(
      `No interpret hook defined for type '${tag}'`,
      'UNREGISTERED_TAG',
      tag,
    );
  }
  config.logger.debug({ tag, payload }, 'Dispatching span to hook');
  return hook(payload);
}
