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
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

/**
 * Write a UTF-8 file, creating parent directories if needed.
 * The content goes to a sibling temp file first and is renamed into
 * place, so readers never observe a half-written file.
 */
export function writeFileAtomicSync(filePath: string, contents: string): void {
   ensureDirSync(path.dirname(filePath));
   const tmp = `${filePath}.${process.pid}.tmp`;
   fs.writeFileSync(tmp, contents, 'utf8');
   fs.renameSync(tmp, filePath);
}

/**
 * Relative POSIX path of `target` under `base`, or null when the target
 * lies outside it.
 */
export function relativeInside(base: string, target: string): string | null {
   const absBase = path.resolve(base);
   const absTarget = path.resolve(target);
   const rel = path.relative(absBase, absTarget);
   if (rel.startsWith('..') || path.isAbsolute(rel)) return null;
   return toPosixPath(rel);
}

/**
 * Recursively list files under `rootDir`, skipping directories for which
 * `skipDir` returns true. Unreadable directories are reported through
 * `onError` and skipped.
 */
export function listFilesSync(
   rootDir: string,
   options: {
      skipDir?: (name: string) => boolean;
      onError?: (dir: string, err: unknown) => void;
   } = {},
): string[] {
   const out: string[] = [];

   function walk(dir: string) {
      let dirents: fs.Dirent[];
      try {
         dirents = fs.readdirSync(dir, { withFileTypes: true });
      } catch (err) {
         options.onError?.(dir, err);
         return;
      }

      dirents.sort((a, b) => a.name.localeCompare(b.name));

      for (const dirent of dirents) {
         const abs = path.join(dir, dirent.name);
         if (dirent.isDirectory()) {
            if (options.skipDir?.(dirent.name)) continue;
            walk(abs);
         } else if (dirent.isFile()) {
            out.push(abs);
         }
      }
   }

   walk(path.resolve(rootDir));
   return out;
}
