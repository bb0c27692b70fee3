/**
 * Loads query and DDL files. One statement per file; the file stem names it.
 */
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface SqlFile {
  name: string;
  path: string;
  sql: string;
}

/**
 * `*.sql` files in a directory, sorted by file name. A missing directory is
 * an error: there is nothing to run.
 */
export async function loadSqlFiles(dir: string): Promise<SqlFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    throw new Error(`SQL directory not found: ${dir}`, { cause: error });
  }

  const files = entries.filter((entry) => entry.toLowerCase().endsWith('.sql')).sort();
  return Promise.all(
    files.map(async (file) => {
      const path = join(dir, file);
      const sql = (await readFile(path, 'utf-8')).trim();
      return { name: file.replace(/\.sql$/i, ''), path, sql };
    })
  );
}
