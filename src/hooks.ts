/**
 * Hook registry and the two default hooks.
 *
 * A hook turns the trimmed payload of a span into replacement text. Hooks
 * are keyed by the span's tag character: `[[$name]]` dispatches `name` to
 * the `$` hook, `[[&fn(a,b)]]` dispatches `fn(a,b)` to the `&` hook.
 */
import { FillInError } from './errors.js';
import { TagCharSchema } from './schemas.js';

export type Hook = (payload: string) => string;

/** A function callable from templates through the `&` hook. */
export type TemplateFunction = (...args: string[]) => string;

export class HookRegistry {
  private hooks = new Map<string, Hook>();

  constructor(entries: Iterable<readonly [string, Hook]> = []) {
    for (const [tag, hook] of entries) this.register(tag, hook);
  }

  /**
   * Install `hook` for `tag`, replacing any existing entry.
   *
   * @throws FillInError `INVALID_TAG` if `tag` is not a single non-word character
   */
  register(tag: string, hook: Hook): this {
    const parsed = TagCharSchema.safeParse(tag);
    if (!parsed.success) {
      throw new FillInError(
        `Invalid hook tag '${tag}': ${parsed.error.issues[0].message}`,
        'INVALID_TAG',
        tag,
      );
    }
    this.hooks.set(tag, hook);
    return this;
  }

  lookup(tag: string): Hook | undefined {
    return this.hooks.get(tag);
  }

  has(tag: string): boolean {
    return this.hooks.has(tag);
  }

  unregister(tag: string): boolean {
    return this.hooks.delete(tag);
  }

  tags(): string[] {
    return [...this.hooks.keys()];
  }

  /** Independent copy; later registrations on either side do not leak. */
  clone(): HookRegistry {
    return new HookRegistry(this.hooks);
  }
}

/**
 * Build a `$` hook that looks the payload up in `variables`.
 * Unknown names resolve to the empty string.
 */
export function findValue(variables: Map<string, string>): Hook {
  return (name) => variables.get(name) ?? '';
}

/**
 * Build a `&` hook that calls a function from `functions`.
 *
 * The payload has the form `name(arg1,arg2,...)`. Arguments are split on
 * commas with no quoting; trailing empty arguments are dropped, so
 * `name()` calls the function with no arguments.
 */
export function runFunction(functions: Map<string, TemplateFunction>): Hook {
  return (call) => {
    const match = /(\w+)\((.*)\)/.exec(call);
    if (!match) {
      throw new FillInError(
        `Can't understand function call '${call}'`,
        'BAD_FUNCTION_CALL',
        call,
      );
    }
    const [, name, argText] = match;
    const fn = functions.get(name);
    if (!fn) {
      throw new FillInError(
        `Undefined template function '${name}'`,
        'UNKNOWN_FUNCTION',
        name,
      );
    }
    return fn(...splitArguments(argText));
  };
}

export function splitArguments(argText: string): string[] {
  const args = argText.split(',');
  while (args.length > 0 && args[args.length - 1] === '') args.pop();
  return args;
}

export function createDefaultHooks(
  variables: Map<string, string>,
  functions: Map<string, TemplateFunction>,
): HookRegistry {
  return new HookRegistry([
    ['$', findValue(variables)],
    ['&', runFunction(functions)],
  ]);
}

// Process-wide defaults shared by every template that does not bring its own
// registry. Mutate them before interpreting, never during.
export const templateVariables = new Map<string, string>();
export const templateFunctions = new Map<string, TemplateFunction>();
export const defaultHooks = createDefaultHooks(
  templateVariables,
  templateFunctions,
);
