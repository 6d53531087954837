/**
 * Default IStorage implementation using Node.js fs
 */

import { existsSync, readFileSync } from 'fs';
import type { IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string): string {
    return readFileSync(path, 'utf-8');
  }

  exists(path: string): boolean {
    return existsSync(path);
  }
}
