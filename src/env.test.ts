import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { readEnvFile } from './env.js';

describe('readEnvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fillin-env-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns only the requested keys', () => {
    const file = path.join(dir, '.env');
    fs.writeFileSync(
      file,
      [
        '# delimiters',
        'FILLIN_LEFT_DELIM="<%"',
        "FILLIN_RIGHT_DELIM='%>'",
        'OTHER_SECRET=test-secret',
        'not a pair',
        '',
      ].join('\n'),
    );
    expect(
      readEnvFile(['FILLIN_LEFT_DELIM', 'FILLIN_RIGHT_DELIM', 'LOG_LEVEL'], file),
    ).toEqual({ FILLIN_LEFT_DELIM: '<%', FILLIN_RIGHT_DELIM: '%>' });
  });

  it('returns an empty record when the file is missing', () => {
    expect(readEnvFile(['LOG_LEVEL'], path.join(dir, 'missing'))).toEqual({});
  });
});
