import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { checkDrift, hasDrift } from '../src/emit/drift.js';
import {
  ENUM_CATALOG_FILE,
  renderDocuments,
  serializeDocument,
  type EmittedFile,
} from '../src/emit/serialize.js';
import { writeDocuments } from '../src/emit/writer.js';
import { EmissionError } from '../src/errors.js';
import { compile } from '../src/compiler.js';

const realFs = jest.requireActual<typeof import('fs')>('fs');

// Lets a test fail one rename while every other call stays real.
jest.mock('fs', () => {
  const actual = jest.requireActual<typeof import('fs')>('fs');
  return { ...actual, renameSync: jest.fn(actual.renameSync) };
});

const FILES: EmittedFile[] = [
  { name: '_enums.schema.json', contents: '{}\n' },
  { name: 'lease.schema.json', contents: '{\n  "entity": "lease"\n}\n' },
];

describe('serializeDocument', () => {
  it('should write two-space JSON with a trailing newline', () => {
    expect(serializeDocument('x', { b: 1, a: [true] })).toBe(
      '{\n  "b": 1,\n  "a": [\n    true\n  ]\n}\n'
    );
  });

  it('should omit unset optional keys', () => {
    expect(serializeDocument('x', { a: 1, b: undefined })).toBe(
      '{\n  "a": 1\n}\n'
    );
  });

  it('should raise an emission error for unserializable documents', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(() => serializeDocument('cyclic.schema.json', cyclic)).toThrow(
      EmissionError
    );
  });
});

describe('renderDocuments', () => {
  it('should put the enum catalog first and name files by entity', () => {
    const files = renderDocuments(
      compile(
        JSON.stringify({
          entities: {
            Space: { fields: [{ name: 'name', value: { kind: 'string' } }] },
            Building: { fields: [{ name: 'name', value: { kind: 'string' } }] },
          },
        }),
        'json'
      )
    );

    expect(files.map((file) => file.name)).toEqual([
      ENUM_CATALOG_FILE,
      'building.schema.json',
      'space.schema.json',
    ]);
    expect(files[0].contents).toBe('{}\n');
  });
});

describe('writeDocuments', () => {
  let tempDir: string;
  let outDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ontoform-emit-test-'));
    outDir = path.join(tempDir, 'gen', 'ui', 'schema');
  });

  afterEach(() => {
    jest.mocked(fs.renameSync).mockImplementation(realFs.renameSync);
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the directory and write every file', () => {
    const lines: string[] = [];

    const written = writeDocuments(outDir, FILES, {
      log: (line) => lines.push(line),
      displayDir: 'gen/ui/schema',
    });

    expect(written).toEqual([
      path.join(outDir, '_enums.schema.json'),
      path.join(outDir, 'lease.schema.json'),
    ]);
    expect(fs.readdirSync(outDir).sort()).toEqual([
      '_enums.schema.json',
      'lease.schema.json',
    ]);
    expect(fs.readFileSync(path.join(outDir, 'lease.schema.json'), 'utf-8')).toBe(
      FILES[1].contents
    );
    expect(lines).toEqual([
      'Generated gen/ui/schema/_enums.schema.json',
      'Generated gen/ui/schema/lease.schema.json',
    ]);
  });

  it('should leave existing files untouched when staging fails', () => {
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, 'a.schema.json'), 'old');

    let caught: unknown;
    try {
      writeDocuments(
        outDir,
        [
          { name: 'a.schema.json', contents: 'new' },
          { name: 'missing/b.schema.json', contents: 'x' },
        ],
        { log: () => {} }
      );
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EmissionError);
    expect(caught).toMatchObject({
      code: 'EMISSION_ERROR',
      file: 'missing/b.schema.json',
    });
    expect(fs.readFileSync(path.join(outDir, 'a.schema.json'), 'utf-8')).toBe(
      'old'
    );
    expect(fs.readdirSync(outDir)).toEqual(['a.schema.json']);
  });

  it('should refuse to replace a target that is not a file', () => {
    fs.mkdirSync(path.join(outDir, 'lease.schema.json'), { recursive: true });
    fs.writeFileSync(path.join(outDir, '_enums.schema.json'), 'old');

    expect(() =>
      writeDocuments(
        outDir,
        [
          { name: '_enums.schema.json', contents: 'new' },
          { name: 'lease.schema.json', contents: 'lease' },
        ],
        { log: () => {} }
      )
    ).toThrow('Failed to write lease.schema.json: target exists and is not a file');
    expect(
      fs.readFileSync(path.join(outDir, '_enums.schema.json'), 'utf-8')
    ).toBe('old');
    expect(fs.readdirSync(outDir).sort()).toEqual([
      '_enums.schema.json',
      'lease.schema.json',
    ]);
  });

  it('should restore the previous generation when a rename fails', () => {
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, '_enums.schema.json'), 'old enums');
    fs.writeFileSync(path.join(outDir, 'lease.schema.json'), 'old lease');
    jest.mocked(fs.renameSync).mockImplementation((from, to) => {
      if (String(from).endsWith('.tmp') && String(to).endsWith('lease.schema.json')) {
        throw new Error('disk full');
      }
      realFs.renameSync(from, to);
    });
    const lines: string[] = [];

    expect(() =>
      writeDocuments(
        outDir,
        [
          { name: '_enums.schema.json', contents: 'new enums' },
          { name: 'lease.schema.json', contents: 'new lease' },
        ],
        { log: (line) => lines.push(line) }
      )
    ).toThrow('Failed to write lease.schema.json: disk full');
    expect(
      fs.readFileSync(path.join(outDir, '_enums.schema.json'), 'utf-8')
    ).toBe('old enums');
    expect(
      fs.readFileSync(path.join(outDir, 'lease.schema.json'), 'utf-8')
    ).toBe('old lease');
    expect(fs.readdirSync(outDir).sort()).toEqual([
      '_enums.schema.json',
      'lease.schema.json',
    ]);
    expect(lines).toEqual([]);
  });

  it('should replace existing documents and drop their backups', () => {
    fs.mkdirSync(outDir, { recursive: true });
    fs.writeFileSync(path.join(outDir, 'lease.schema.json'), 'old lease');

    writeDocuments(outDir, FILES, { log: () => {} });

    expect(fs.readFileSync(path.join(outDir, 'lease.schema.json'), 'utf-8')).toBe(
      FILES[1].contents
    );
    expect(fs.readdirSync(outDir).sort()).toEqual([
      '_enums.schema.json',
      'lease.schema.json',
    ]);
  });
});

describe('checkDrift', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ontoform-drift-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should report every file missing when the directory does not exist', () => {
    const report = checkDrift(path.join(tempDir, 'absent'), FILES);

    expect(report).toEqual({
      missing: ['_enums.schema.json', 'lease.schema.json'],
      changed: [],
      extra: [],
    });
    expect(hasDrift(report)).toBe(true);
  });

  it('should report nothing for a fresh generation', () => {
    writeDocuments(tempDir, FILES, { log: () => {} });

    expect(hasDrift(checkDrift(tempDir, FILES))).toBe(false);
  });

  it('should report changed and stale schema files', () => {
    writeDocuments(tempDir, FILES, { log: () => {} });
    fs.writeFileSync(path.join(tempDir, 'lease.schema.json'), '{}\n');
    fs.writeFileSync(path.join(tempDir, 'tenant.schema.json'), '{}\n');
    fs.writeFileSync(path.join(tempDir, 'README.md'), 'notes');

    expect(checkDrift(tempDir, FILES)).toEqual({
      missing: [],
      changed: ['lease.schema.json'],
      extra: ['tenant.schema.json'],
    });
  });
});
