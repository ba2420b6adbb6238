import { describe, it, expect } from 'vitest';

import { FillInError } from './errors.js';
import {
  createDefaultHooks,
  findValue,
  HookRegistry,
  runFunction,
  splitArguments,
} from './hooks.js';
import type { TemplateFunction } from './hooks.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function functions(): Map<string, TemplateFunction> {
  return new Map<string, TemplateFunction>([
    ['func1', () => 'snails'],
    ['func2', (...args) => args.map((a) => a.toUpperCase()).join('*')],
    ['count', (...args) => String(args.length)],
  ]);
}

// --- HookRegistry ---

describe('HookRegistry', () => {
  it('looks up a registered hook', () => {
    const hook = (p: string) => p.toUpperCase();
    const registry = new HookRegistry().register('!', hook);
    expect(registry.lookup('!')).toBe(hook);
    expect(registry.has('!')).toBe(true);
  });

  it('returns undefined for an unregistered tag', () => {
    expect(new HookRegistry().lookup('%')).toBeUndefined();
  });

  it('lets the last registration win', () => {
    const registry = new HookRegistry()
      .register('!', () => 'first')
      .register('!', () => 'second');
    expect(registry.lookup('!')?.('x')).toBe('second');
  });

  it('accepts a non-ASCII symbol as a tag', () => {
    const registry = new HookRegistry().register('☃', () => 'snow');
    expect(registry.tags()).toEqual(['☃']);
  });

  it.each(['a', 'Z', '9', '_', 'é', '', ' ', '$$'])(
    'rejects %j as a tag',
    (tag) => {
      const err = thrown(() => new HookRegistry().register(tag, () => ''));
      expect(err).toBeInstanceOf(FillInError);
      expect(err).toMatchObject({ code: 'INVALID_TAG', detail: tag });
    },
  );

  it('unregisters a hook', () => {
    const registry = new HookRegistry().register('!', () => '');
    expect(registry.unregister('!')).toBe(true);
    expect(registry.has('!')).toBe(false);
  });

  it('clones into an independent registry', () => {
    const original = new HookRegistry().register('!', () => 'a');
    const copy = original.clone();
    copy.register('!', () => 'b').register('%', () => 'c');

    expect(original.lookup('!')?.('')).toBe('a');
    expect(original.has('%')).toBe(false);
    expect(copy.lookup('!')?.('')).toBe('b');
  });
});

// --- Default hooks ---

describe('findValue', () => {
  const hook = findValue(new Map([['var', 'text']]));

  it('returns the stored value', () => {
    expect(hook('var')).toBe('text');
  });

  it('returns an empty string for an unknown name', () => {
    expect(hook('missing')).toBe('');
  });
});

describe('runFunction', () => {
  const hook = runFunction(functions());

  it('calls a function with no arguments', () => {
    expect(hook('func1()')).toBe('snails');
  });

  it('passes comma-separated arguments', () => {
    expect(hook('func2(star,studded)')).toBe('STAR*STUDDED');
  });

  it('does not trim arguments', () => {
    expect(hook('func2(a, b)')).toBe('A* B');
  });

  it('rejects a payload that is not a call', () => {
    expect(thrown(() => hook('func1'))).toMatchObject({
      code: 'BAD_FUNCTION_CALL',
      message: "Can't understand function call 'func1'",
    });
  });

  it('rejects an unknown function', () => {
    const err = thrown(() => hook('nope(1)'));
    expect(err).toBeInstanceOf(FillInError);
    expect(err).toMatchObject({ code: 'UNKNOWN_FUNCTION', detail: 'nope' });
  });
});

describe('splitArguments', () => {
  it('returns no arguments for an empty list', () => {
    expect(splitArguments('')).toEqual([]);
  });

  it('keeps inner empty fields and drops trailing ones', () => {
    expect(splitArguments('a,,b,,')).toEqual(['a', '', 'b']);
  });
});

describe('createDefaultHooks', () => {
  it('registers $ and &', () => {
    const hooks = createDefaultHooks(new Map(), functions());
    expect(hooks.tags()).toEqual(['$', '&']);
    expect(hooks.lookup('&')?.('count(x,y,z)')).toBe('3');
  });
});
