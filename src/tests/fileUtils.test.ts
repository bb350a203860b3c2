import { FileUtils } from '../utils/fileUtils';
import fs from 'fs-extra';
import path from 'path';
import { Readable } from 'stream';
import { TestPaths } from './test-config';

describe('FileUtils', () => {
  const testDir = TestPaths.unit.fileUtils;

  beforeEach(async () => {
    await fs.ensureDir(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  describe('ensureDir', () => {
    it('should create directory if it does not exist', async () => {
      const dirPath = path.join(testDir, 'new-dir');
      await FileUtils.ensureDir(dirPath);

      const exists = await fs.pathExists(dirPath);
      expect(exists).toBe(true);
    });

    it('should not throw error if directory already exists', async () => {
      const dirPath = path.join(testDir, 'existing-dir');
      await fs.ensureDir(dirPath);

      await expect(FileUtils.ensureDir(dirPath)).resolves.toBeUndefined();
    });
  });

  describe('checksums', () => {
    it('should hash a file and a buffer identically', async () => {
      const filePath = path.join(testDir, 'hello.txt');
      await fs.writeFile(filePath, 'hello');

      expect(await FileUtils.getFileMd5(filePath)).toBe('5d41402abc4b2a76b9719d911017c592');
      expect(FileUtils.md5(Buffer.from('hello'))).toBe('5d41402abc4b2a76b9719d911017c592');
      expect(await FileUtils.getFileSize(filePath)).toBe(5);
    });
  });

  describe('isDirectory', () => {
    it('should distinguish files, directories and missing paths', async () => {
      const filePath = path.join(testDir, 'file.txt');
      await fs.writeFile(filePath, 'x');

      expect(await FileUtils.isDirectory(testDir)).toBe(true);
      expect(await FileUtils.isDirectory(filePath)).toBe(false);
      expect(await FileUtils.isDirectory(path.join(testDir, 'missing'))).toBe(false);
    });
  });

  describe('listFilesRecursive', () => {
    it('should list nested files relative to the root', async () => {
      await fs.outputFile(path.join(testDir, 'tree', 'b.txt'), 'b');
      await fs.outputFile(path.join(testDir, 'tree', 'a', 'c.txt'), 'c');
      await fs.outputFile(path.join(testDir, 'tree', 'a.txt'), 'a');

      expect(await FileUtils.listFilesRecursive(path.join(testDir, 'tree'))).toEqual(['a.txt', 'a/c.txt', 'b.txt']);
    });
  });

  describe('streams', () => {
    it('should buffer a readable stream', async () => {
      const data = await FileUtils.readStream(Readable.from([Buffer.from('ab'), Buffer.from('cd')]));
      expect(data.toString()).toBe('abcd');
    });

    it('should write a stream to a new directory', async () => {
      const target = path.join(testDir, 'out', 'nested', 'file.txt');
      await FileUtils.writeStream(Readable.from([Buffer.from('test content')]), target);

      expect(await fs.readFile(target, 'utf8')).toBe('test content');
    });
  });

  describe('writeStream failures', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should close the target file when the source stream fails', async () => {
      const createWriteStream = jest.spyOn(fs, 'createWriteStream');
      const failing = new Readable({
        read() {
          this.destroy(new Error('source failed'));
        },
      });

      await expect(FileUtils.writeStream(failing, path.join(testDir, 'partial.bin'))).rejects.toThrow('source failed');
      expect(createWriteStream.mock.results[0].value.destroyed).toBe(true);
    });
  });

  describe('spoolToTempFile', () => {
    it('should copy a stream into a temporary file', async () => {
      const spooled = await FileUtils.spoolToTempFile(Readable.from([Buffer.from('test '), Buffer.from('content')]));

      expect(await fs.readFile(spooled, 'utf8')).toBe('test content');
      await FileUtils.deleteFile(path.dirname(spooled));
      expect(await fs.pathExists(spooled)).toBe(false);
    });
  });

  describe('deleteFile', () => {
    it('should delete existing files and ignore missing ones', async () => {
      const filePath = path.join(testDir, 'doomed.txt');
      await fs.writeFile(filePath, 'x');

      await FileUtils.deleteFile(filePath);
      await FileUtils.deleteFile(filePath);

      expect(await fs.pathExists(filePath)).toBe(false);
    });
  });
});
