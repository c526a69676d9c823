/**
 * Case discovery and path resolution.
 */

import fs from 'node:fs';
import path from 'node:path';
import { CASE_CONFIG } from '../constants.js';

export interface ResolvedCase {
  requested: string;
  resolvedPath: string;
  exists: boolean;
}

export class CaseLibrary {
  constructor(
    readonly casesDir: string = CASE_CONFIG.CASES_DIR,
    private readonly extensions: readonly string[] = CASE_CONFIG.EXTENSIONS
  ) {}

  /**
   * Relative paths (forward slashes) of every case file under the cases directory, sorted.
   */
  async listCases(): Promise<string[]> {
    if (!fs.existsSync(this.casesDir)) {
      return [];
    }

    const files = await this.walk(this.casesDir);
    return files
      .filter(file => this.extensions.includes(path.extname(file).toLowerCase()))
      .map(file => path.relative(this.casesDir, file).split(path.sep).join('/'))
      .sort();
  }

  private async walk(dir: string): Promise<string[]> {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    const files: string[] = [];
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...await this.walk(full));
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
    return files;
  }

  /**
   * A built-in case relative to the cases directory wins; otherwise the
   * request is taken as a path of its own.
   */
  resolve(casePath: string): ResolvedCase {
    const builtIn = path.resolve(this.casesDir, casePath);
    if (this.isInsideCasesDir(builtIn) && fs.existsSync(builtIn)) {
      return { requested: casePath, resolvedPath: builtIn, exists: true };
    }

    const direct = path.resolve(casePath);
    return { requested: casePath, resolvedPath: direct, exists: fs.existsSync(direct) };
  }

  private isInsideCasesDir(candidate: string): boolean {
    const relative = path.relative(path.resolve(this.casesDir), candidate);
    return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
  }
}
