import { afterEach, describe, it, expect } from 'vitest';

import { Template, templateFunctions, templateVariables } from './index.js';

describe('package entry point', () => {
  afterEach(() => {
    templateVariables.clear();
    templateFunctions.clear();
  });

  it('fills in a template through the shared defaults', () => {
    templateVariables.set('you', 'Sam');
    templateFunctions.set('greet', (word) => `${word},`);
    const template = new Template('[[&greet(hey)]] [[$you]]!');
    expect(template.interpret()).toBe('hey, Sam!');
  });
});
