import { describe, it, expect } from 'vitest';
import { buildQuery, createProgramQuery, defaultPrograms } from './queryBuilder';
import { DEFAULT_PROGRAMS } from './defaults';
import { ProgramQuery } from './types';

describe('createProgramQuery', () => {
  it('should query topic and channel of a built-in program', () => {
    const query = createProgramQuery({ name: 'heute-journal', topic: 'heute journal', channel: 'ZDF' });

    expect(query).toEqual({
      queries: [
        { fields: ['topic'], query: 'heute journal' },
        { fields: ['channel'], query: 'ZDF' },
      ],
      sortBy: 'timestamp',
      sortOrder: 'desc',
      future: false,
      offset: 0,
      size: 8000,
      minDuration: 300,
    });
  });
});

describe('defaultPrograms', () => {
  it('should key every built-in program by name', () => {
    const programs = defaultPrograms();

    expect(Object.keys(programs)).toEqual(DEFAULT_PROGRAMS.map((program) => program.name));
    expect(programs['tagesschau']?.queries[0]).toEqual({ fields: ['topic'], query: 'tagesschau' });
  });

  it('should accept a custom program list', () => {
    const programs = defaultPrograms([{ name: 'lanz', topic: 'Markus Lanz', channel: 'ZDF' }]);
    expect(Object.keys(programs)).toEqual(['lanz']);
  });
});

describe('buildQuery', () => {
  const base: ProgramQuery = {
    queries: [{ fields: ['title', 'topic'], query: 'tagesschau' }],
    sortBy: 'timestamp',
    sortOrder: 'desc',
    future: false,
    offset: 0,
    size: 50,
  };

  it('should map duration bounds to the API field names', () => {
    const query = buildQuery({ ...base, minDuration: 300, maxDuration: 3600 });

    expect(query.duration_min).toBe(300);
    expect(query.duration_max).toBe(3600);
    expect(query).not.toHaveProperty('minDuration');
  });

  it('should omit unset duration bounds', () => {
    expect(buildQuery(base)).toEqual({
      queries: [{ fields: ['title', 'topic'], query: 'tagesschau' }],
      sortBy: 'timestamp',
      sortOrder: 'desc',
      future: false,
      offset: 0,
      size: 50,
    });
  });

  it('should not share arrays with the program query', () => {
    const query = buildQuery(base);
    query.queries[0]?.fields.push('channel');

    expect(base.queries[0]?.fields).toEqual(['title', 'topic']);
  });
});
