import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import crypto from 'crypto';
import { pipeline } from 'stream/promises';
import { logger } from './logger';

export class FileUtils {
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      logger.error(`Failed to create directory: ${dirPath}`, error);
      throw error;
    }
  }

  static async fileExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  static async isDirectory(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isDirectory();
    } catch {
      return false;
    }
  }

  static async getFileSize(filePath: string): Promise<number> {
    const stats = await fs.stat(filePath);
    return stats.size;
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
      }
    } catch (error) {
      logger.error(`Failed to delete file: ${filePath}`, error);
      throw error;
    }
  }

  static async getFileMd5(filePath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const hash = crypto.createHash('md5');
      const stream = fs.createReadStream(filePath);

      stream.on('data', data => hash.update(data));
      stream.on('end', () => resolve(hash.digest('hex')));
      stream.on('error', reject);
    });
  }

  static md5(data: Buffer): string {
    return crypto.createHash('md5').update(data).digest('hex');
  }

  /**
   * Every regular file below `dirPath`, as paths relative to it with forward
   * slashes, sorted.
   */
  static async listFilesRecursive(dirPath: string): Promise<string[]> {
    const results: string[] = [];

    const walk = async (current: string): Promise<void> => {
      const entries = await fs.readdir(current, { withFileTypes: true });
      for (const entry of entries) {
        const full = path.join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          results.push(path.relative(dirPath, full).split(path.sep).join('/'));
        }
      }
    };

    await walk(dirPath);
    return results.sort();
  }

  static async readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks);
  }

  static async writeStream(stream: NodeJS.ReadableStream, filePath: string): Promise<void> {
    await FileUtils.ensureDir(path.dirname(filePath));
    await pipeline(stream, fs.createWriteStream(filePath));
  }

  /**
   * Copy `stream` into a file under a new temporary directory and return the
   * file's path. Remove it with `deleteFile(path.dirname(spooled))`.
   */
  static async spoolToTempFile(stream: NodeJS.ReadableStream): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'archive-spool-'));
    const filePath = path.join(dir, 'data');
    try {
      await FileUtils.writeStream(stream, filePath);
    } catch (error) {
      await fs.remove(dir);
      throw error;
    }
    return filePath;
  }
}
