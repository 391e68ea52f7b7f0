import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect } from 'vitest';
import { loadProgramsFile, parsePrograms } from './programLoader';
import { buildQuery } from './queryBuilder';

describe('parsePrograms', () => {
  it('should parse programs and fill in defaults', () => {
    const programs = parsePrograms(`
tagesschau:
  queries:
    - fields: ["title", "topic"]
      query: "tagesschau"
    - fields: ["channel"]
      query: "ard"
  minDuration: 300
`);

    expect(programs).toEqual({
      tagesschau: {
        queries: [
          { fields: ['title', 'topic'], query: 'tagesschau' },
          { fields: ['channel'], query: 'ard' },
        ],
        sortBy: 'timestamp',
        sortOrder: 'desc',
        future: false,
        offset: 0,
        size: 8000,
        minDuration: 300,
      },
    });
  });

  it('should accept numeric future flags', () => {
    const programs = parsePrograms(`
lanz:
  queries:
    - fields: ["topic"]
      query: "Markus Lanz"
  future: 1
  sortOrder: asc
  size: 10
`);

    expect(programs['lanz']?.future).toBe(true);
    expect(programs['lanz']?.sortOrder).toBe('asc');
    expect(programs['lanz']?.size).toBe(10);
  });

  it('should name the offending key of an invalid program', () => {
    expect(() =>
      parsePrograms(`
tagesschau:
  queries:
    - fields: ["subtitle"]
      query: "tagesschau"
`)
    ).toThrow(/tagesschau\.queries\.0\.fields\.0/);
  });

  it('should reject program names containing path separators', () => {
    expect(() =>
      parsePrograms(`
"../escape":
  queries:
    - fields: ["topic"]
      query: "x"
`)
    ).toThrow('Invalid programs configuration');
  });

  it('should read snake_case duration bounds', () => {
    const programs = parsePrograms(`
tagesschau:
  queries:
    - fields: ["title", "topic"]
      query: "tagesschau"
    - fields: ["channel"]
      query: "ard"
  sortBy: "timestamp"
  sortOrder: "desc"
  min_duration: 300
  max_duration: 3600
  future: false
  offset: 0
  size: 8000
`);
    const tagesschau = programs['tagesschau'];
    if (!tagesschau) throw new Error('tagesschau missing');

    expect(tagesschau.minDuration).toBe(300);
    expect(tagesschau.maxDuration).toBe(3600);
    expect(tagesschau).not.toHaveProperty('min_duration');
    expect(buildQuery(tagesschau)).toMatchObject({ duration_min: 300, duration_max: 3600 });
  });

  it('should reject unknown keys', () => {
    expect(() =>
      parsePrograms(`
tagesschau:
  queries:
    - fields: ["topic"]
      query: "tagesschau"
  minimumDuration: 300
`)
    ).toThrow("tagesschau: Unrecognized key(s) in object: 'minimumDuration'");
  });

  it('should reject program names that only consist of dots', () => {
    for (const name of ['.', '..']) {
      expect(() =>
        parsePrograms(`
"${name}":
  queries:
    - fields: ["topic"]
      query: "x"
`)
      ).toThrow('Program names must be a plain folder name');
    }
  });

  it('should reject an empty document', () => {
    expect(() => parsePrograms('')).toThrow('Invalid programs configuration');
    expect(() => parsePrograms('{}')).toThrow('No programs configured');
  });
});

describe('loadProgramsFile', () => {
  it('should read a YAML file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'programs-'));
    const filePath = path.join(dir, 'programs.yaml');
    fs.writeFileSync(filePath, 'miosga:\n  queries:\n    - fields: [topic]\n      query: Caren Miosga\n');

    expect(Object.keys(loadProgramsFile(filePath))).toEqual(['miosga']);
  });

  it('should fail for a missing file', () => {
    expect(() => loadProgramsFile('/nonexistent/programs.yaml')).toThrow('Programs file not found');
  });
});
