import { promises as fs } from 'fs';
import path from 'path';
import { isExecutableFile, resolveExecutable } from '../src/convert/binary';
import { makeTempDir, removeTempDir } from './helpers/fs';

describe('binary resolution', () => {
  let root: string;

  async function writeBinary(relativePath: string, mode: number): Promise<string> {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, '#!/bin/sh\nexit 0\n');
    await fs.chmod(filePath, mode);
    return filePath;
  }

  beforeEach(async () => {
    root = await makeTempDir('binary-test-');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  describe('isExecutableFile', () => {
    it('should accept an executable regular file', async () => {
      expect(await isExecutableFile(await writeBinary('soffice', 0o755))).toBe(true);
    });

    it('should reject a file without execute permission', async () => {
      expect(await isExecutableFile(await writeBinary('soffice', 0o644))).toBe(false);
    });

    it('should reject a directory', async () => {
      expect(await isExecutableFile(root)).toBe(false);
    });

    it('should reject a missing path', async () => {
      expect(await isExecutableFile(path.join(root, 'missing'))).toBe(false);
    });
  });

  describe('resolveExecutable', () => {
    it('should check a path with a separator directly', async () => {
      const binary = await writeBinary('program/soffice', 0o755);

      expect(await resolveExecutable(binary, '')).toBe(binary);
      expect(await resolveExecutable(path.join(root, 'program', 'missing'), '')).toBeNull();
    });

    it('should look a bare name up in the search path in order', async () => {
      const first = path.join(root, 'first');
      const second = path.join(root, 'second');
      await writeBinary('first/soffice', 0o644);
      const expected = await writeBinary('second/soffice', 0o755);

      const searchPath = ['', first, second].join(path.delimiter);

      expect(await resolveExecutable('soffice', searchPath)).toBe(expected);
    });

    it('should return null when no search path entry has the binary', async () => {
      expect(await resolveExecutable('soffice', path.join(root, 'empty'))).toBeNull();
    });
  });
});
