#!/usr/bin/env node

import { NosjInputError } from './errors';
import { renderLines } from './emitter';
import { load } from './parser';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 66;

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: text => {
    process.stdout.write(text);
  },
  stderr: text => {
    process.stderr.write(text);
  },
};

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Decodes the single file named in `args` and returns the exit status.
 * Either stdout gets the whole trace or stderr gets one `ERROR --` line.
 */
export function run(args: readonly string[], io: CliIO = processIO): number {
  try {
    const [filePath] = args;
    if (args.length !== 1 || filePath === undefined) {
      throw new NosjInputError('MissingInputFile', 'missing input file');
    }
    const lines = load(filePath);
    io.stdout(renderLines(lines));
    return EXIT_SUCCESS;
  } catch (error) {
    const message = describeFailure(error).replace(/\r?\n/g, ' ');
    io.stderr(`ERROR -- ${message}\n`);
    return EXIT_FAILURE;
  }
}

if (require.main === module) {
  process.exitCode = run(process.argv.slice(2));
}
