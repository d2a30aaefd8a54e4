import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { discoverPdfs } from './crawler';
import { InputPathError } from '../errors';

let dir: string;

function touch(relativePath: string, content = 'x'): string {
  const filePath = path.join(dir, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-renamer-crawler-'));
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('discoverPdfs', () => {
  it('lists PDFs in a directory, sorted, skipping other and hidden files', async () => {
    touch('b.pdf');
    touch('A.PDF');
    touch('notes.txt');
    touch('.hidden.pdf');
    touch('sub/c.pdf');

    const files = await discoverPdfs(dir);

    expect(files.map((file) => path.basename(file.path))).toEqual(['A.PDF', 'b.pdf']);
  });

  it('descends into subdirectories when recursive', async () => {
    touch('b.pdf');
    touch('sub/c.pdf');
    touch('sub/deeper/d.pdf');
    touch('node_modules/pkg/e.pdf');
    touch('.git/f.pdf');

    const files = await discoverPdfs(dir, { recursive: true });

    expect(files.map((file) => path.relative(dir, file.path))).toEqual([
      'b.pdf',
      path.join('sub', 'c.pdf'),
      path.join('sub', 'deeper', 'd.pdf'),
    ]);
  });

  it('returns a single file as given, whatever its extension', async () => {
    const filePath = touch('report.txt', 'hello');

    const files = await discoverPdfs(filePath);

    expect(files).toHaveLength(1);
    expect(files[0].path).toBe(filePath);
    expect(files[0].size).toBe(5);
    expect(files[0].modifiedAt).toBeInstanceOf(Date);
  });

  it('returns an empty list for a directory without PDFs', async () => {
    touch('readme.md');
    await expect(discoverPdfs(dir)).resolves.toEqual([]);
  });

  it('raises InputPathError for a missing path', async () => {
    const missing = path.join(dir, 'nope');
    await expect(discoverPdfs(missing)).rejects.toThrow(new InputPathError(missing, `No such file or directory: ${missing}`));
  });
});
