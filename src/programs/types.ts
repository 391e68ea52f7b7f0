/**
 * Fields MediathekViewWeb can match a query string against
 */
export type QueryField = 'title' | 'topic' | 'channel' | 'description';

/**
 * A single query sent to the API. All queries of a program must match.
 */
export interface QuerySpec {
  fields: QueryField[];
  query: string;
}

export type SortField = 'timestamp' | 'duration' | 'channel';
export type SortOrder = 'asc' | 'desc';

/**
 * Specifies a program to be scraped
 */
export interface ProgramQuery {
  queries: QuerySpec[];
  sortBy: SortField;
  sortOrder: SortOrder;
  /** Include broadcasts announced for the future */
  future: boolean;
  offset: number;
  /** Maximum number of results returned by one request */
  size: number;
  /** Minimum duration in seconds */
  minDuration?: number;
  /** Maximum duration in seconds */
  maxDuration?: number;
}

/**
 * Request body expected by the MediathekViewWeb query endpoint
 */
export interface MediathekQuery {
  queries: QuerySpec[];
  sortBy: SortField;
  sortOrder: SortOrder;
  future: boolean;
  offset: number;
  size: number;
  duration_min?: number;
  duration_max?: number;
}

/**
 * A show from the built-in program list
 */
export interface ProgramDefinition {
  /** Name used for output folders and file names */
  name: string;
  topic: string;
  channel: string;
}

export type ProgramMap = Record<string, ProgramQuery>;
