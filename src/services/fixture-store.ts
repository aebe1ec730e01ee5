/**
 * Fixture Store
 *
 * File-per-search cache of raw SerpApi response bodies, so a run can be
 * replayed without spending API quota. Files are named
 * `{origin}_{destination}_{departureDate}[_ret_{returnDate}].json`.
 */

import * as fs from 'fs';
import * as path from 'path';

export function fixtureKey(
  origin: string,
  destination: string,
  departureDate: string,
  returnDate?: string
): string {
  const base = `${origin}_${destination}_${departureDate}`;
  return returnDate ? `${base}_ret_${returnDate}` : base;
}

export class FixtureStore {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  pathFor(key: string): string {
    return path.join(this.dir, `${key}.json`);
  }

  has(key: string): boolean {
    return fs.existsSync(this.pathFor(key));
  }

  /**
   * Read a saved body, or null when no fixture exists for the key.
   */
  read(key: string): unknown {
    const filePath = this.pathFor(key);
    if (!fs.existsSync(filePath)) return null;
    const body: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    return body;
  }

  /**
   * Save a response body; returns the written path.
   */
  write(key: string, body: unknown): string {
    fs.mkdirSync(this.dir, { recursive: true });
    const filePath = this.pathFor(key);
    fs.writeFileSync(filePath, JSON.stringify(body, null, 2) + '\n', 'utf-8');
    return filePath;
  }
}
