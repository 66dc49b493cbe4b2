/**
 * Temporary directories for file-layer and CLI tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface TempDir {
  path: string;
  /** Write a file relative to the directory and return its absolute path */
  write: (name: string, content: string) => string;
  /** Absolute path of a (possibly missing) file in the directory */
  resolve: (name: string) => string;
  remove: () => void;
}

export function createTempDir(prefix = 'xslchunk-test-'): TempDir {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    path: dir,
    write: (name, content) => {
      const file = path.join(dir, name);
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, content, 'utf-8');
      return file;
    },
    resolve: (name) => path.join(dir, name),
    remove: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
