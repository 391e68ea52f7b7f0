import fs from 'fs';
import path from 'path';

export const XML_FOLDER = 'xml-subtitles';
export const SUBTITLES_FOLDER = 'subtitles';
export const VIDEO_FOLDER = 'videos';

export function ensureDirectory(dir: string): string {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return dir;
}

/**
 * Creates (if needed) and returns `<outputDir>/<program>/<date>`
 * @param outputDir - Root output folder
 * @param program - Program name
 * @param date - Run date as YYYY-MM-DD
 */
export function getProgramPath(outputDir: string, program: string, date: string): string {
  return ensureDirectory(path.join(outputDir, program, date));
}

export function xmlFileName(permanentId: string): string {
  return `${permanentId}.xml`;
}
