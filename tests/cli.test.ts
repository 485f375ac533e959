/**
 * Tests for cli.ts
 * Tests argument parsing, exit codes and batch behavior
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseArgs, run, EXIT_FAILED, EXIT_OK, EXIT_UNSORTED } from '../src/cli';
import { CONFIG_ENV_VAR } from '../src/config';
import { UsageError } from '../src/types';

const FIXTURES_DIR = path.resolve(__dirname, 'fixtures');
const UNSORTED = fs.readFileSync(path.join(FIXTURES_DIR, 'unsorted.pbxproj'), 'utf8');
const SORTED = fs.readFileSync(path.join(FIXTURES_DIR, 'sorted.pbxproj'), 'utf8');
const BROKEN = UNSORTED.replace('/* End PBXGroup section */', '');

describe('parseArgs', () => {
  it('should parse paths and flags', () => {
    expect(parseArgs(['--check', '-r', '-w', '--fail-fast', 'a.xcodeproj', 'b'])).toEqual({
      mode: 'files',
      paths: ['a.xcodeproj', 'b'],
      checkOnly: true,
      warnings: false,
      recursive: true,
      failFast: true,
    });
  });

  it('should record the case mode only when a case flag is given', () => {
    expect(parseArgs(['x']).caseInsensitive).toBeUndefined();
    expect(parseArgs(['--case-insensitive', 'x']).caseInsensitive).toBe(true);
    expect(parseArgs(['--case-sensitive', 'x']).caseInsensitive).toBe(false);
  });

  it('should reject both case flags together', () => {
    expect(() => parseArgs(['--case-insensitive', '--case-sensitive', 'x'])).toThrow(
      '--case-insensitive and --case-sensitive are mutually exclusive'
    );
  });

  it('should read the configuration path', () => {
    expect(parseArgs(['-c', 'custom.json', 'x']).configPath).toBe('custom.json');
    expect(() => parseArgs(['x', '--config'])).toThrow('--config requires a path argument');
  });

  it('should select stdin mode for a lone dash', () => {
    expect(parseArgs(['-']).mode).toBe('stdin');
    expect(() => parseArgs(['-', 'x'])).toThrow('- (stdin) cannot be combined with file arguments');
  });

  it('should give help and version precedence', () => {
    expect(parseArgs(['--bogus', '-h']).mode).toBe('help');
    expect(parseArgs(['-v']).mode).toBe('version');
  });

  it('should reject unknown options and missing inputs', () => {
    expect(() => parseArgs(['--bogus', 'x'])).toThrow(UsageError);
    expect(() => parseArgs(['--bogus', 'x'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs([])).toThrow(
      'No Xcode project files (project.pbxproj) listed on the command line'
    );
  });
});

describe('run', () => {
  let tmpDir: string;
  let errorSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;
  const savedEnv = process.env[CONFIG_ENV_VAR];

  function writeProject(relative: string, content: string): string {
    const filePath = path.join(tmpDir, relative, 'project.pbxproj');
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  function stderrLines(): string[] {
    return errorSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbxsort-cli-'));
    delete process.env[CONFIG_ENV_VAR];
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    stdoutSpy.mockRestore();
    fs.rmSync(tmpDir, { recursive: true, force: true });
    if (savedEnv !== undefined) {
      process.env[CONFIG_ENV_VAR] = savedEnv;
    }
  });

  it('should print usage and exit 0 for --help', async () => {
    expect(await run(['--help'])).toBe(EXIT_OK);
    expect(stderrLines()[0]).toContain('Usage: pbxsort [options]');
  });

  it('should print the version', async () => {
    expect(await run(['--version'])).toBe(EXIT_OK);
    expect(stdoutSpy).toHaveBeenCalledWith('pbxsort 0.1.0\n');
  });

  it('should exit 1 on a usage error', async () => {
    expect(await run([])).toBe(EXIT_UNSORTED);
    expect(stderrLines()[0]).toBe(
      'Error: No Xcode project files (project.pbxproj) listed on the command line'
    );
  });

  it('should sort a bundle in place', async () => {
    const filePath = writeProject('App.xcodeproj', UNSORTED);

    expect(await run([path.join(tmpDir, 'App.xcodeproj')])).toBe(EXIT_OK);
    expect(fs.readFileSync(filePath, 'utf8')).toBe(SORTED);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should exit 1 in check mode when a file is unsorted and leave it alone', async () => {
    const filePath = writeProject('App.xcodeproj', UNSORTED);

    expect(await run(['--check', filePath])).toBe(EXIT_UNSORTED);
    expect(fs.readFileSync(filePath, 'utf8')).toBe(UNSORTED);
    expect(stderrLines()[0].split('\n')[0]).toBe(`✗ ${filePath}: not sorted`);
  });

  it('should exit 0 in check mode when every file is sorted', async () => {
    const filePath = writeProject('App.xcodeproj', SORTED);

    expect(await run(['--check', filePath])).toBe(EXIT_OK);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should warn about and skip paths that are not project files', async () => {
    const notes = path.join(tmpDir, 'notes.txt');
    fs.writeFileSync(notes, 'hello');

    expect(await run([notes])).toBe(EXIT_OK);
    expect(stderrLines()).toEqual([`WARNING: Not an Xcode project file: ${notes}`]);
  });

  it('should suppress warnings with -w', async () => {
    const notes = path.join(tmpDir, 'notes.txt');
    fs.writeFileSync(notes, 'hello');

    expect(await run(['-w', notes])).toBe(EXIT_OK);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should report a missing project file as a failure', async () => {
    const bundle = path.join(tmpDir, 'Missing.xcodeproj');

    expect(await run([bundle])).toBe(EXIT_FAILED);
    expect(stderrLines()).toEqual([
      `ERROR: File not found: ${path.join(bundle, 'project.pbxproj')}`,
    ]);
  });

  it('should continue past a broken file and exit 2', async () => {
    const broken = writeProject('A.xcodeproj', BROKEN);
    const good = writeProject('B.xcodeproj', UNSORTED);

    expect(await run([broken, good])).toBe(EXIT_FAILED);
    expect(fs.readFileSync(broken, 'utf8')).toBe(BROKEN);
    expect(fs.readFileSync(good, 'utf8')).toBe(SORTED);
    expect(stderrLines()).toEqual([
      `ERROR: ${broken}: Unexpected end of file while parsing PBXGroup section opened at line 52`,
    ]);
  });

  it('should stop at the first broken file with --fail-fast', async () => {
    const broken = writeProject('A.xcodeproj', BROKEN);
    const good = writeProject('B.xcodeproj', UNSORTED);

    expect(await run(['--fail-fast', broken, good])).toBe(EXIT_FAILED);
    expect(fs.readFileSync(good, 'utf8')).toBe(UNSORTED);
  });

  it('should search directories with -r', async () => {
    const first = writeProject('A.xcodeproj', UNSORTED);
    const second = writeProject(path.join('nested', 'B.xcodeproj'), UNSORTED);

    expect(await run(['-r', tmpDir])).toBe(EXIT_OK);
    expect(fs.readFileSync(first, 'utf8')).toBe(SORTED);
    expect(fs.readFileSync(second, 'utf8')).toBe(SORTED);
  });

  it('should treat a bundle path with a trailing slash as a project under -r', async () => {
    const filePath = writeProject('App.xcodeproj', UNSORTED);
    const bundle = path.join(tmpDir, 'App.xcodeproj') + path.sep;

    expect(await run(['--check', '-r', bundle])).toBe(EXIT_UNSORTED);
    expect(stderrLines()[0].split('\n')[0]).toBe(`✗ ${filePath}: not sorted`);
  });

  it('should warn when a recursive search finds nothing', async () => {
    expect(await run(['-r', tmpDir])).toBe(EXIT_OK);
    expect(stderrLines()).toEqual([`WARNING: No Xcode projects found under ${tmpDir}`]);
  });

  it('should apply the configuration file', async () => {
    const configPath = path.join(tmpDir, 'pbxsort.json');
    fs.writeFileSync(configPath, '{"caseInsensitive": true}');
    const content = [
      '\tchildren = (',
      '\t\t111111111111111111111111 /* alpha.m */,',
      '\t\t222222222222222222222222 /* Beta.m */,',
      '\t);',
      '',
    ].join('\n');
    const filePath = writeProject('App.xcodeproj', content);

    expect(await run(['--check', '-c', configPath, filePath])).toBe(EXIT_OK);
    expect(await run(['--check', '-c', configPath, '--case-sensitive', filePath])).toBe(
      EXIT_UNSORTED
    );
  });

  it('should exit 1 when the configuration file is missing', async () => {
    const configPath = path.join(tmpDir, 'missing.json');

    expect(await run(['-c', configPath, 'x.xcodeproj'])).toBe(EXIT_UNSORTED);
    expect(stderrLines()).toEqual([`ERROR: Configuration file not found: ${configPath}`]);
  });
});
