/**
 * The interpretation loop.
 *
 * Works on a private copy of the template text. Each step either emits a
 * plain-text prefix that can no longer take part in a span, or resolves the
 * innermost complete span (the first structural right delimiter paired with
 * the nearest structural left delimiter before it) and splices the hook's
 * result back into the buffer. Spliced text is scanned again, so hook
 * output may itself contain delimiters.
 */
import { unescapeDelimiters } from './escape.js';
import { isFillInError } from './errors.js';
import { findDelimiter } from './scanner.js';
import { dispatchSpan, parseSpan } from './span.js';
import type { ParsedSpan } from './span.js';
import type { EngineConfig, OutputSink } from './types.js';

export function interpretText(
  text: string,
  config: EngineConfig,
  emit: (chunk: string) => void,
): void {
  const { delimiters, logger } = config;
  const { left, right } = delimiters;
  const out = (chunk: string) => {
    if (chunk) emit(chunk);
  };
  let buffer = text;

  for (;;) {
    const firstLeft = findDelimiter(buffer, left);
    if (firstLeft === -1) {
      out(unescapeDelimiters(buffer, delimiters));
      return;
    }
    if (firstLeft > 0) {
      out(unescapeDelimiters(buffer.slice(0, firstLeft), delimiters));
      buffer = buffer.slice(firstLeft);
      continue;
    }

    const firstRight = findDelimiter(buffer, right, { from: left.length });
    if (firstRight === -1) {
      logger.warn(
        { text: buffer },
        'Unterminated span, emitting remaining text uninterpreted',
      );
      out(buffer);
      return;
    }

    // Always >= 0: the buffer starts with a structural left delimiter.
    const lastLeft = findDelimiter(buffer, left, {
      last: true,
      before: firstRight,
    });
    const end = firstRight + right.length;
    const replacement = resolveOrDrop(buffer.slice(lastLeft, end), config);
    buffer = buffer.slice(0, lastLeft) + replacement + buffer.slice(end);
  }
}

// A malformed span is dropped; anything the hook throws aborts the call.
function resolveOrDrop(spanText: string, config: EngineConfig): string {
  let span: ParsedSpan;
  try {
    span = parseSpan(spanText, config.delimiters);
  } catch (err) {
    if (!isFillInError(err, 'MALFORMED_SPAN')) throw err;
    config.logger.warn({ span: spanText }, err.message);
    return '';
  }
  return dispatchSpan(span, config);
}

/** Collecting mode: interpret `text` and return the whole result. */
export function collect(text: string, config: EngineConfig): string {
  const chunks: string[] = [];
  interpretText(text, config, (chunk) => chunks.push(chunk));
  return chunks.join('');
}

/** Streaming mode: write each plain-text chunk to `sink` as it becomes final. */
export function stream(
  text: string,
  config: EngineConfig,
  sink: OutputSink,
): void {
  interpretText(text, config, (chunk) => {
    sink.write(chunk);
  });
}
