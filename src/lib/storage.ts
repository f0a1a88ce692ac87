import fs from 'node:fs';
import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function ensureParentDir(filePath: string) {
  ensureDir(path.dirname(filePath));
}
