/**
 * Integration tests for MCP server
 * Tests all tool handlers end-to-end with real file fixtures
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  handleCheckProject,
  handleListRules,
  handleSortProject,
  handleSortText,
} from '../src/handlers';
import { DEFAULT_KNOWN_FILES, DEFAULT_SORTABLE_SECTIONS, SorterConfig } from '../src/config';

const FIXTURES_DIR = path.join(__dirname, 'fixtures');
const UNSORTED = fs.readFileSync(path.join(FIXTURES_DIR, 'unsorted.pbxproj'), 'utf8');
const SORTED = fs.readFileSync(path.join(FIXTURES_DIR, 'sorted.pbxproj'), 'utf8');

const TEST_CONFIG: SorterConfig = {
  caseInsensitive: false,
  knownFiles: [...DEFAULT_KNOWN_FILES],
  sortableSections: [...DEFAULT_SORTABLE_SECTIONS],
  source: null,
};

const ID1 = '111111111111111111111111';
const ID2 = '222222222222222222222222';

describe('MCP Server Integration', () => {
  let tmpDir: string;
  let bundleDir: string;
  let projectFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pbxsort-server-'));
    bundleDir = path.join(tmpDir, 'App.xcodeproj');
    projectFile = path.join(bundleDir, 'project.pbxproj');
    fs.mkdirSync(bundleDir);
    fs.writeFileSync(projectFile, UNSORTED);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('Tool Handlers', () => {
    describe('handleSortProject', () => {
      test('sorts the file in place and lists changed regions', () => {
        const response = handleSortProject({ file_path: bundleDir }, TEST_CONFIG);

        expect(response.content).toHaveLength(1);
        expect(JSON.parse(response.content[0].text)).toEqual({
          file: projectFile,
          alreadySorted: false,
          written: true,
          changedRegions: [
            { kind: 'section', name: 'PBXBuildFile', line: 9, duplicatesRemoved: 0, reordered: true },
            { kind: 'section', name: 'PBXFileReference', line: 31, duplicatesRemoved: 0, reordered: true },
            { kind: 'array', name: 'children', line: 63, duplicatesRemoved: 0, reordered: true },
            { kind: 'array', name: 'children', line: 72, duplicatesRemoved: 1, reordered: true },
            { kind: 'section', name: 'PBXGroup', line: 52, duplicatesRemoved: 0, reordered: true },
            { kind: 'array', name: 'files', line: 96, duplicatesRemoved: 0, reordered: true },
          ],
        });
        expect(fs.readFileSync(projectFile, 'utf8')).toBe(SORTED);
      });

      test('reports an already sorted file without writing', () => {
        handleSortProject({ file_path: projectFile }, TEST_CONFIG);
        const response = handleSortProject({ file_path: projectFile }, TEST_CONFIG);

        expect(JSON.parse(response.content[0].text)).toEqual({
          file: projectFile,
          alreadySorted: true,
          written: false,
          changedRegions: [],
        });
      });

      test('rejects invalid arguments', () => {
        const message = 'Invalid arguments: expected { file_path: string, case_insensitive?: boolean }';
        expect(() => handleSortProject({}, TEST_CONFIG)).toThrow(message);
        expect(() => handleSortProject(null, TEST_CONFIG)).toThrow(message);
        expect(() =>
          handleSortProject({ file_path: projectFile, case_insensitive: 'yes' }, TEST_CONFIG)
        ).toThrow(message);
      });

      test('wraps sorting failures', () => {
        expect(() => handleSortProject({ file_path: 'notes.txt' }, TEST_CONFIG)).toThrow(
          'Failed to sort project: Not an Xcode project file: notes.txt'
        );
      });
    });

    describe('handleCheckProject', () => {
      test('reports unsorted regions without writing', () => {
        const response = handleCheckProject({ file_path: projectFile }, TEST_CONFIG);

        expect(response.content[0].text).toBe(
          [
            `✗ ${projectFile}: not sorted`,
            '  ✗ Line 9: [UNSORTED_SECTION] PBXBuildFile section is not sorted',
            '  ✗ Line 31: [UNSORTED_SECTION] PBXFileReference section is not sorted',
            '  ✗ Line 52: [UNSORTED_SECTION] PBXGroup section is not sorted',
            '  ✗ Line 63: [UNSORTED_ARRAY] children array is not sorted',
            '  ✗ Line 72: [UNSORTED_ARRAY] children array is not sorted',
            '  ✗ Line 72: [DUPLICATE_ENTRIES] children array contains 1 duplicate entry',
            '  ✗ Line 96: [UNSORTED_ARRAY] files array is not sorted',
            '',
            '  6 unsorted region(s), 7 error(s), 0 warning(s)',
          ].join('\n')
        );
        expect(fs.readFileSync(projectFile, 'utf8')).toBe(UNSORTED);
      });

      test('reports a sorted file as OK', () => {
        fs.writeFileSync(projectFile, SORTED);
        const response = handleCheckProject({ file_path: bundleDir }, TEST_CONFIG);

        expect(response.content[0].text).toBe(`✓ ${projectFile}: OK`);
      });

      test('wraps read failures', () => {
        const missing = path.join(tmpDir, 'Missing.xcodeproj');
        expect(() => handleCheckProject({ file_path: missing }, TEST_CONFIG)).toThrow(
          /^Failed to check project: /
        );
      });
    });

    describe('handleSortText', () => {
      test('returns the sorted text', () => {
        const response = handleSortText({ text: UNSORTED }, TEST_CONFIG);
        expect(response.content[0].text).toBe(SORTED);
      });

      test('applies the case_insensitive override', () => {
        const text = [
          '\tchildren = (',
          `\t\t${ID1} /* alpha.m */,`,
          `\t\t${ID2} /* Beta.m */,`,
          '\t);',
        ].join('\n');

        expect(handleSortText({ text, case_insensitive: true }, TEST_CONFIG).content[0].text).toBe(
          text
        );
        expect(handleSortText({ text }, TEST_CONFIG).content[0].text).not.toBe(text);
      });

      test('rejects invalid arguments', () => {
        expect(() => handleSortText({ text: 42 }, TEST_CONFIG)).toThrow(
          'Invalid arguments: expected { text: string, case_insensitive?: boolean }'
        );
      });

      test('wraps format errors', () => {
        expect(() => handleSortText({ text: '\tchildren = (\n' }, TEST_CONFIG)).toThrow(
          'Failed to sort text: Unexpected end of file while parsing children array opened at line 1'
        );
      });
    });

    describe('handleListRules', () => {
      test('lists arrays, sections and known files', () => {
        const text = handleListRules({}, TEST_CONFIG).content[0].text;

        expect(text).toContain('- children (directory-like names first)\n- files (by name only)\n');
        expect(text).toContain('## Sorted Sections\n\n- PBXBuildFile\n- PBXContainerItemProxy\n');
        expect(text).toContain('- PBXFrameworksBuildPhase (link order)\n');
        expect(text).toContain('## Known Extension-less Files\n\n- create_hash_table\n');
        expect(text).toContain('- Case-insensitive: no\n- Configuration: built-in defaults\n');
      });
    });
  });
});
