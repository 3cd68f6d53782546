import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CliIO, EXIT_FAILURE, EXIT_SUCCESS, run } from '../src/cli';

interface CapturedIO extends CliIO {
  out: string;
  err: string;
}

function captureIO(): CapturedIO {
  const io: CapturedIO = {
    out: '',
    err: '',
    stdout: text => {
      io.out += text;
    },
    stderr: text => {
      io.err += text;
    },
  };
  return io;
}

describe('nosj CLI', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nosj-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeInput(content: string): string {
    const filePath = path.join(dir, 'input.nosj');
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  }

  test('should print the decoded trace', () => {
    const io = captureIO();

    expect(run([writeInput('(<a:1010>)\n')], io)).toBe(EXIT_SUCCESS);
    expect(io.out).toBe('begin-map\na -- num -- -6\nend-map\n');
    expect(io.err).toBe('');
  });

  test('should report a missing argument', () => {
    const io = captureIO();

    expect(run([], io)).toBe(EXIT_FAILURE);
    expect(io.err).toBe('ERROR -- missing input file\n');
    expect(io.out).toBe('');
  });

  test('should report extra arguments the same way', () => {
    const io = captureIO();

    expect(run(['a.nosj', 'b.nosj'], io)).toBe(EXIT_FAILURE);
    expect(io.err).toBe('ERROR -- missing input file\n');
  });

  test('should report a file that does not exist', () => {
    const io = captureIO();

    expect(run([path.join(dir, 'absent.nosj')], io)).toBe(66);
    expect(io.err).toBe('ERROR -- file not found\n');
  });

  test('should treat a directory as not found', () => {
    const io = captureIO();

    expect(run([dir], io)).toBe(EXIT_FAILURE);
    expect(io.err).toBe('ERROR -- file not found\n');
  });

  test('should print one diagnostic and no output for a grammar error', () => {
    const filePath = writeInput('(<a:0,b:(<c:1>),c:12>)');
    const io = captureIO();

    expect(run([filePath], io)).toBe(EXIT_FAILURE);
    expect(io.out).toBe('');
    expect(io.err).toBe(`ERROR -- ${filePath}:1:19 - Unrecognized value token\n`);
  });
});
