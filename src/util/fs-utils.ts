// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the directory path.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Get file stats if they exist, otherwise null.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch {
      return null;
   }
}

/**
 * Path of `absolutePath` relative to `base`, POSIX style, for log output.
 * Paths outside `base` are returned unchanged.
 */
export function displayPath(base: string, absolutePath: string): string {
   const rel = path.relative(path.resolve(base), path.resolve(absolutePath));
   if (rel === '' || rel.startsWith('..') || path.isAbsolute(rel)) {
      return toPosixPath(absolutePath);
   }
   return toPosixPath(rel);
}
