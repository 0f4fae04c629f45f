/**
 * Local Storage Service - writes uploads under UPLOAD_DIR, served from /uploads
 */

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

/**
 * Unique, filesystem-safe name that keeps the original extension.
 */
export const generateFileName = (originalName: string, prefix?: string): string => {
  const ext = path.extname(originalName).toLowerCase();
  const baseName = (prefix ?? path.basename(originalName, ext)).replace(/[^a-zA-Z0-9_-]/g, '_');
  const uuid = uuidv4().substring(0, 8);
  return `${baseName}-${Date.now()}-${uuid}${ext}`;
};

export class LocalFileStorage {
  constructor(
    private readonly uploadDir: string,
    private readonly baseUrl: string
  ) {}

  /**
   * Save a file under `<uploadDir>/<subDir>` and return its public URL.
   */
  async save(fileBuffer: Buffer, fileName: string, subDir: string, prefix?: string): Promise<string> {
    const targetDir = path.join(this.uploadDir, subDir);
    await fs.mkdir(targetDir, { recursive: true });

    const uniqueFileName = generateFileName(fileName, prefix);
    await fs.writeFile(path.join(targetDir, uniqueFileName), fileBuffer);

    return `${this.baseUrl.replace(/\/+$/, '')}/uploads/${subDir}/${uniqueFileName}`;
  }
}
