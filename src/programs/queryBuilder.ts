import {
  DEFAULT_MIN_DURATION,
  DEFAULT_PROGRAMS,
  DEFAULT_SIZE,
  DEFAULT_SORT_BY,
  DEFAULT_SORT_ORDER,
} from './defaults';
import { MediathekQuery, ProgramDefinition, ProgramMap, ProgramQuery } from './types';

/**
 * Creates the query for one of the built-in programs.
 * Matches the topic and restricts the results to the broadcasting channel.
 */
export function createProgramQuery(definition: ProgramDefinition): ProgramQuery {
  return {
    queries: [
      { fields: ['topic'], query: definition.topic },
      { fields: ['channel'], query: definition.channel },
    ],
    sortBy: DEFAULT_SORT_BY,
    sortOrder: DEFAULT_SORT_ORDER,
    future: false,
    offset: 0,
    size: DEFAULT_SIZE,
    minDuration: DEFAULT_MIN_DURATION,
  };
}

/**
 * Builds the program map for the built-in program list
 */
export function defaultPrograms(
  definitions: readonly ProgramDefinition[] = DEFAULT_PROGRAMS
): ProgramMap {
  const programs: ProgramMap = {};
  for (const definition of definitions) {
    programs[definition.name] = createProgramQuery(definition);
  }
  return programs;
}

/**
 * Converts a program query into the request body of the API
 * @param programQuery - The program to query
 * @returns JSON-serialisable request body
 */
export function buildQuery(programQuery: ProgramQuery): MediathekQuery {
  const query: MediathekQuery = {
    queries: programQuery.queries.map((spec) => ({
      fields: [...spec.fields],
      query: spec.query,
    })),
    sortBy: programQuery.sortBy,
    sortOrder: programQuery.sortOrder,
    future: programQuery.future,
    offset: programQuery.offset,
    size: programQuery.size,
  };

  if (programQuery.minDuration !== undefined) {
    query.duration_min = programQuery.minDuration;
  }
  if (programQuery.maxDuration !== undefined) {
    query.duration_max = programQuery.maxDuration;
  }

  return query;
}
