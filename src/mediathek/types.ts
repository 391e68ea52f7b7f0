import { z } from 'zod';

const optionalString = z.string().nullish().transform((value) => value ?? '');

/**
 * One entry of `result.results` as returned by MediathekViewWeb
 */
export const apiResultSchema = z.object({
  id: z.string(),
  channel: optionalString,
  topic: optionalString,
  title: optionalString,
  description: optionalString,
  timestamp: z.number(),
  duration: z.union([z.number(), z.string()]).nullish(),
  url_website: optionalString,
  url_subtitle: optionalString,
  url_video: optionalString,
  url_video_low: optionalString,
  url_video_hd: optionalString,
});

export const apiResponseSchema = z.object({
  result: z
    .object({
      results: z.array(apiResultSchema),
    })
    .nullable(),
  err: z.unknown().optional(),
});

export type ApiResult = z.infer<typeof apiResultSchema>;
export type ApiResponse = z.infer<typeof apiResponseSchema>;

/**
 * One broadcast episode returned for a program
 */
export interface EpisodeRecord {
  /** `<program>_<unix timestamp>`, the file stem of every per-episode output */
  readonly permanentId: string;
  readonly program: string;
  readonly id: string;
  readonly channel: string;
  readonly topic: string;
  readonly title: string;
  readonly description: string;
  readonly timestamp: Date;
  /** Duration in seconds */
  readonly duration: number | null;
  readonly websiteUrl: string;
  readonly subtitleUrl?: string;
  readonly videoUrl?: string;
  readonly videoUrlLow?: string;
  readonly videoUrlHd?: string;
}
