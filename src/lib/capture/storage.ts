/**
 * Artifact Persistence
 *
 * Writes captured images into the storage directory and names them.
 */

import { mkdir, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { PersistenceError, errorMessage } from './errors.js';

export type FilenameGenerator = () => string;

/**
 * `<epoch-millis>_<uuid without dashes>.png`
 */
export const generateFilename: FilenameGenerator = () =>
  `${Date.now()}_${randomUUID().replace(/-/g, '')}.png`;

/**
 * Path reported to callers for a stored file. Trailing separators on the
 * directory are dropped so the result only depends on the inputs.
 */
export function storagePathFor(baseDirectory: string, filename: string): string {
  const dir = baseDirectory.replace(/[\\/]+$/, '');
  return `${dir}/${filename}`;
}

export class ArtifactPersistence {
  /**
   * Write bytes to `baseDirectory/filename`, creating the directory first.
   */
  async persist(bytes: Buffer, filename: string, baseDirectory: string): Promise<string> {
    const storagePath = storagePathFor(baseDirectory, filename);

    try {
      await mkdir(baseDirectory, { recursive: true });
      await writeFile(storagePath, bytes);
    } catch (error) {
      throw new PersistenceError(
        `Could not write ${storagePath}: ${errorMessage(error)}`,
        { storagePath },
        error
      );
    }

    console.log(`[Storage] Saved ${bytes.length} bytes to ${storagePath}`);
    return storagePath;
  }
}

export function createArtifactPersistence(): ArtifactPersistence {
  return new ArtifactPersistence();
}
