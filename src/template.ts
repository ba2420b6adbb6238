/**
 * Fill-in templates.
 *
 * A Template holds its text and a property bag. Interpreting never changes
 * the stored text. Options left unset fall back to the process-wide
 * defaults (`defaultDelimiters`, `defaultHooks`, `TEMPLATE_PATH`) at the
 * time of each call, so changing a default affects every template that has
 * not overridden it.
 *
 * ```ts
 * templateVariables.set('you', 'Sam');
 * new Template('hey, [[$you]]!').interpret(); // 'hey, Sam!'
 * ```
 */
import { defaultDelimiters, parseDelimiters, TEMPLATE_PATH } from './config.js';
import { collect, stream } from './engine.js';
import { isFillInError } from './errors.js';
import { defaultHooks } from './hooks.js';
import type { HookRegistry } from './hooks.js';
import { loadTemplate } from './loader.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { DelimiterPair, EngineConfig, OutputSink } from './types.js';

export interface TemplateOptions {
  delimiters?: DelimiterPair;
  hooks?: HookRegistry;
  logger?: Logger;
  /** Directories searched by `loadFile`, in order. */
  templatePath?: string[];
}

export class Template {
  private text: string;
  private properties = new Map<string, unknown>();
  private readonly delimiters: DelimiterPair | undefined;

  constructor(
    text = '',
    private readonly options: TemplateOptions = {},
  ) {
    this.text = text;
    this.delimiters =
      options.delimiters && parseDelimiters(options.delimiters);
  }

  setText(text: string): void {
    this.text = text;
  }

  getText(): string {
    return this.text;
  }

  /**
   * Replace the text with the contents of the named template file.
   *
   * A file that cannot be found leaves the current text in place; a file
   * that exists but cannot be read clears it. Both rethrow.
   */
  loadFile(name: string): void {
    const searchPath = this.options.templatePath ?? TEMPLATE_PATH;
    try {
      this.text = loadTemplate(name, searchPath);
    } catch (err) {
      if (isFillInError(err, 'TEMPLATE_UNREADABLE')) this.text = '';
      this.logger().warn({ err, name }, 'Template load failed');
      throw err;
    }
  }

  /** Interpret the template and return the filled-in text. */
  interpret(): string {
    return collect(this.text, this.config());
  }

  /**
   * Interpret the template, writing each finished piece of output to
   * `sink` as soon as it is known. Nested spans are resolved before
   * anything depending on them is written.
   */
  interpretAndPrint(sink: OutputSink = process.stdout): void {
    stream(this.text, this.config(), sink);
  }

  getProperty(name: string): unknown {
    return this.properties.get(name);
  }

  setProperty(name: string, value: unknown): void {
    this.properties.set(name, value);
  }

  private logger(): Logger {
    return this.options.logger ?? defaultLogger;
  }

  private config(): EngineConfig {
    return {
      // The shared pair is mutable, so it is checked on every call.
      delimiters:
        this.delimiters ?? parseDelimiters({ ...defaultDelimiters }),
      hooks: this.options.hooks ?? defaultHooks,
      logger: this.logger(),
    };
  }
}
