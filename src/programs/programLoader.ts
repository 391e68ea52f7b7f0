import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_SIZE, DEFAULT_SORT_BY, DEFAULT_SORT_ORDER } from './defaults';
import { ProgramMap, ProgramQuery } from './types';

const querySpecSchema = z.object({
  fields: z.array(z.enum(['title', 'topic', 'channel', 'description'])).min(1),
  query: z.string().min(1),
});

const durationSchema = z.number().int().nonnegative().optional();

const programQuerySchema = z
  .object({
    queries: z.array(querySpecSchema).min(1),
    sortBy: z.enum(['timestamp', 'duration', 'channel']).default(DEFAULT_SORT_BY),
    sortOrder: z.enum(['asc', 'desc']).default(DEFAULT_SORT_ORDER),
    future: z.union([z.boolean(), z.number().int()]).transform(Boolean).default(false),
    offset: z.number().int().nonnegative().default(0),
    size: z.number().int().positive().default(DEFAULT_SIZE),
    minDuration: durationSchema,
    maxDuration: durationSchema,
    // snake_case spellings of older programs files
    min_duration: durationSchema,
    max_duration: durationSchema,
  })
  .strict()
  .transform(({ min_duration, max_duration, ...query }): ProgramQuery => {
    const programQuery: ProgramQuery = { ...query };
    const minDuration = query.minDuration ?? min_duration;
    const maxDuration = query.maxDuration ?? max_duration;
    if (minDuration !== undefined) programQuery.minDuration = minDuration;
    if (maxDuration !== undefined) programQuery.maxDuration = maxDuration;
    return programQuery;
  });

const programsSchema = z
  .record(
    z.string().regex(/^(?!\.+$)[^/\\]+$/, 'Program names must be a plain folder name'),
    programQuerySchema
  )
  .refine((programs) => Object.keys(programs).length > 0, 'No programs configured');

/**
 * Parses a YAML programs document
 *
 * ```yaml
 * tagesschau:
 *   queries:
 *     - fields: ["title", "topic"]
 *       query: "tagesschau"
 *   sortBy: "timestamp"
 *   sortOrder: "desc"
 *   minDuration: 300
 *   size: 8000
 * ```
 */
export function parsePrograms(content: string): ProgramMap {
  const document: unknown = parseYaml(content);
  const result = programsSchema.safeParse(document);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid programs configuration: ${issues}`);
  }

  return result.data;
}

export function loadProgramsFile(filePath: string): ProgramMap {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Programs file not found: ${filePath}`);
  }
  return parsePrograms(fs.readFileSync(filePath, 'utf-8'));
}
