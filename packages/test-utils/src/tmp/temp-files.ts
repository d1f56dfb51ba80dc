/**
 * Temporary file helpers for tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/**
 * A scratch directory removed by `cleanup`
 */
export interface TempDir {
  readonly dir: string;
  /** Absolute path of a file inside the directory (not created) */
  file(name: string): string;
  /** Write a file inside the directory and return its path */
  write(name: string, content: string): string;
  read(name: string): string;
  cleanup(): void;
}

/**
 * Create a scratch directory under the OS temp dir
 */
export function createTempDir(prefix = 'yamlnote-'): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));

  return {
    dir,
    file: (name) => path.join(dir, name),
    write: (name, content) => {
      const filePath = path.join(dir, name);
      fs.writeFileSync(filePath, content, 'utf-8');
      return filePath;
    },
    read: (name) => fs.readFileSync(path.join(dir, name), 'utf-8'),
    cleanup: () => {
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
