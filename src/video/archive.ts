import fs from 'fs';
import path from 'path';
import archiver from 'archiver';

/**
 * Compresses a single file into a ZIP archive
 * @param sourcePath - File to compress
 * @param zipPath - Archive to create; overwritten if it exists
 */
export function zipFile(sourcePath: string, zipPath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(zipPath);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve());
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);
    archive.file(sourcePath, { name: path.basename(sourcePath) });
    archive.finalize().catch(reject);
  });
}
