import { ProgramDefinition } from './types';

export const DEFAULT_SORT_BY = 'timestamp';
export const DEFAULT_SORT_ORDER = 'desc';
export const DEFAULT_SIZE = 8000;
export const DEFAULT_MIN_DURATION = 300;

/**
 * News and talkshow programs scraped when no programs file is given
 */
export const DEFAULT_PROGRAMS: readonly ProgramDefinition[] = [
  { name: 'tagesschau', topic: 'tagesschau', channel: 'ARD' },
  { name: 'tagesthemen', topic: 'tagesthemen', channel: 'ARD' },
  { name: 'heute-journal', topic: 'heute journal', channel: 'ZDF' },
  { name: 'bericht-aus-berlin', topic: 'Bericht aus Berlin', channel: 'ARD' },
  { name: 'berlin-direkt', topic: 'Berlin direkt', channel: 'ZDF' },
  { name: 'markus-lanz', topic: 'Markus Lanz', channel: 'ZDF' },
  { name: 'maybrit-illner', topic: 'maybrit illner', channel: 'ZDF' },
  { name: 'maischberger', topic: 'maischberger', channel: 'ARD' },
  { name: 'hart-aber-fair', topic: 'hart aber fair', channel: 'ARD' },
  { name: 'caren-miosga', topic: 'Caren Miosga', channel: 'ARD' },
];
