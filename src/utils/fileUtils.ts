import fs from 'fs-extra';
import crypto from 'crypto';
import { logger } from './logger';

const MAX_TITLE_LENGTH = 100;

export class FileUtils {
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      logger.error(`Failed to create directory: ${dirPath}`, error);
      throw error;
    }
  }

  static async writeJSON(filePath: string, data: unknown): Promise<void> {
    try {
      await fs.writeJson(filePath, data, { spaces: 2 });
    } catch (error) {
      logger.error(`Failed to write JSON file: ${filePath}`, error);
      throw error;
    }
  }

  static async readJSON<T>(filePath: string): Promise<T | null> {
    try {
      if (await fs.pathExists(filePath)) {
        return await fs.readJson(filePath);
      }
      return null;
    } catch (error) {
      logger.error(`Failed to read JSON file: ${filePath}`, error);
      return null;
    }
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.remove(filePath);
    } catch (error) {
      logger.error(`Failed to delete file: ${filePath}`, error);
      throw error;
    }
  }

  /**
   * Size in bytes of a regular file, or null when nothing usable exists at the path.
   */
  static async getFileSize(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : null;
    } catch {
      return null;
    }
  }

  static async getFileHash(filePath: string, algorithm = 'md5'): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash(algorithm);
      const stream = fs.createReadStream(filePath);

      stream.on('data', data => hash.update(data));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', reject);
    });
  }

  /**
   * Keeps letters, digits, spaces, '-' and '_' so a record title can name a directory.
   */
  static sanitizeTitle(title: string): string {
    const kept = Array.from(title)
      .filter(char => /[\p{L}\p{N} _-]/u.test(char))
      .join('')
      .trimEnd();
    return Array.from(kept).slice(0, MAX_TITLE_LENGTH).join('').trimEnd();
  }
}
