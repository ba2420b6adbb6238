import type { HookRegistry } from './hooks.js';
import type { Logger } from './logger.js';
import type { DelimiterPair } from './schemas.js';

export type { DelimiterPair };

/** Everything one interpretation reads. Fixed for the duration of a call. */
export interface EngineConfig {
  delimiters: DelimiterPair;
  hooks: HookRegistry;
  logger: Logger;
}

/** Destination for streamed output; `process.stdout` qualifies. */
export interface OutputSink {
  write(chunk: string): unknown;
}
