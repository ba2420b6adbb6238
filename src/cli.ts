#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 *   fillin <template> [--dir <path>]... [--var name=value]...
 *          [--left <delim>] [--right <delim>]
 *
 * Loads the template from the search path (`--dir` entries first, then
 * FILLIN_TEMPLATE_PATH), sets the given variables for the `$` hook and
 * streams the interpreted result to stdout.
 */
import fs from 'fs';
import { fileURLToPath } from 'url';

import { Command, CommanderError, InvalidArgumentError } from 'commander';

import { LEFT_DELIM, RIGHT_DELIM, TEMPLATE_PATH } from './config.js';
import { templateVariables } from './hooks.js';
import { logger } from './logger.js';
import { VariableAssignmentSchema } from './schemas.js';
import { Template } from './template.js';
import type { OutputSink } from './types.js';

export interface VariableAssignment {
  name: string;
  value: string;
}

export interface CliOptions {
  name: string;
  searchPath: string[];
  variables: VariableAssignment[];
  left?: string;
  right?: string;
}

type ProgramOptions = {
  dir: string[];
  var: VariableAssignment[];
  left?: string;
  right?: string;
};

function collectDir(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectVariable(
  value: string,
  previous: VariableAssignment[],
): VariableAssignment[] {
  const parsed = VariableAssignmentSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues[0].message);
  }
  return [...previous, parsed.data];
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * Usage errors and `--help` surface as a thrown CommanderError rather than
 * exiting the process.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const noDirs: string[] = [];
  const noVariables: VariableAssignment[] = [];
  const program = new Command()
    .name('fillin')
    .description('Interpret a fill-in template and print the result')
    .argument('<template>', 'template name, searched for on the template path')
    .option(
      '-d, --dir <path>',
      'directory searched before FILLIN_TEMPLATE_PATH (repeatable)',
      collectDir,
      noDirs,
    )
    .option(
      '--var <name=value>',
      'variable for the $ hook (repeatable)',
      collectVariable,
      noVariables,
    )
    .option('--left <delim>', 'left delimiter')
    .option('--right <delim>', 'right delimiter')
    .exitOverride();

  program.parse(argv, { from: 'user' });
  const opts = program.opts<ProgramOptions>();
  return {
    name: program.args[0],
    searchPath: [...opts.dir, ...TEMPLATE_PATH],
    variables: opts.var,
    left: opts.left,
    right: opts.right,
  };
}

export function run(options: CliOptions, sink: OutputSink): void {
  for (const { name, value } of options.variables) {
    templateVariables.set(name, value);
  }
  const delimiters =
    options.left !== undefined || options.right !== undefined
      ? {
          left: options.left ?? LEFT_DELIM,
          right: options.right ?? RIGHT_DELIM,
        }
      : undefined;
  const template = new Template('', {
    templatePath: options.searchPath,
    delimiters,
  });
  template.loadFile(options.name);
  template.interpretAndPrint(sink);
}

/**
 * True when `moduleUrl` is the script node was started with. Both sides are
 * resolved through symlinks, since npm installs `bin` entries as links.
 */
export function isEntryPoint(
  moduleUrl: string,
  scriptPath: string | undefined,
): boolean {
  if (!scriptPath) return false;
  try {
    return (
      fs.realpathSync(fileURLToPath(moduleUrl)) === fs.realpathSync(scriptPath)
    );
  } catch {
    return false;
  }
}

function main(): void {
  try {
    run(parseCliArgs(process.argv.slice(2)), process.stdout);
  } catch (err) {
    // Commander has already printed usage errors and help.
    if (err instanceof CommanderError) {
      process.exitCode = err.exitCode;
      return;
    }
    logger.fatal({ err }, 'Template interpretation failed');
    process.exitCode = 1;
  }
}

// Guard against running when imported by tests
if (isEntryPoint(import.meta.url, process.argv[1])) {
  main();
}
