// src/core/source-scanner.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';

import type { DiscoveredMethod } from '../schema';
import { listFilesSync, relativeInside } from '../util/fs-utils';
import { defaultLogger, type Logger } from '../util/logger';

const SKIP_DIRS = new Set(['__pycache__', '.git', 'node_modules']);

const CONTROLLER_PATTERN = '**/doctype/*/*.py';

export const DEFAULT_SCAN_INCLUDE = ['**/*.py'];

export const DEFAULT_MARKERS = ['@frappe.whitelist', '@whitelist'];

/**
 * A function definition is looked for on this many lines after a marker.
 */
const LOOKAHEAD_LINES = 4;

const FUNCTION_DEF = /^(?:async\s+)?def\s+([A-Za-z_][A-Za-z0-9_]*)\s*\(/;

export interface MarkedFunction {
   methodName: string;
   /**
    * 1-based line of the function definition.
    */
   line: number;
}

/**
 * Find functions flagged by a marker line. For each marker, the first
 * function definition within the next few lines wins.
 */
export function findMarkedFunctions(content: string, markers: string[] = DEFAULT_MARKERS): MarkedFunction[] {
   const lines = content.split(/\r?\n/);
   const found: MarkedFunction[] = [];

   for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      if (!markers.some((m) => line.includes(m))) continue;

      const end = Math.min(i + 1 + LOOKAHEAD_LINES, lines.length);
      for (let j = i + 1; j < end; j++) {
         const match = FUNCTION_DEF.exec((lines[j] ?? '').trim());
         if (match?.[1]) {
            found.push({ methodName: match[1], line: j + 1 });
            break;
         }
      }
   }

   return found;
}

/**
 * Importable dotted path of `funcName` defined in `relPath` (POSIX,
 * relative to the package root).
 *
 * "accounts/doctype/invoice/invoice.py" + "billing" + "submit"
 *   -> "billing.accounts.doctype.invoice.invoice.submit"
 */
export function modulePathFor(relPath: string, packageName: string, funcName: string): string {
   const withoutExt = relPath.replace(/\.[^./]+$/, '');
   const segments = withoutExt.split('/').filter(Boolean);
   if (segments[segments.length - 1] === '__init__') segments.pop();

   if (segments[0] !== packageName) segments.unshift(packageName);

   return [...segments, funcName].join('.');
}

export interface ScanSourcesOptions {
   /**
    * Absolute package root.
    */
   sourceRoot: string;
   packageName?: string;
   include?: string[];
   markers?: string[];
   /**
    * Reads one file's text. Default: `fs.readFileSync` as UTF-8.
    */
   readFile?: (absPath: string) => string;
   logger?: Logger;
}

const readUtf8 = (absPath: string): string => fs.readFileSync(absPath, 'utf8');

/**
 * Scan a package for remotely callable functions: controller files
 * (`<dir>/doctype/<name>/<name>.py`) first, then every file matching
 * `include`. Files that cannot be read are logged and skipped.
 */
export function scanSources(options: ScanSourcesOptions): DiscoveredMethod[] {
   const logger = options.logger ?? defaultLogger.child('[scan]');
   const root = path.resolve(options.sourceRoot);
   const packageName = options.packageName ?? path.basename(root);
   const include = options.include ?? DEFAULT_SCAN_INCLUDE;
   const markers = options.markers ?? DEFAULT_MARKERS;
   const readFile = options.readFile ?? readUtf8;

   if (!fs.existsSync(root)) {
      logger.warn(`Source root ${root} does not exist; skipping scan.`);
      return [];
   }

   const files = listFilesSync(root, {
      skipDir: (name) => SKIP_DIRS.has(name),
      onError: (dir, err) => logger.warn(`Cannot read ${dir}, skipping.`, err),
   });

   const entries = files.flatMap((abs) => {
      const rel = relativeInside(root, abs);
      return rel === null ? [] : [{ abs, rel }];
   });

   const controllers = entries.filter(({ rel }) => {
      if (!minimatch(rel, CONTROLLER_PATTERN, { dot: true })) return false;
      const parts = rel.split('/');
      const dirName = parts[parts.length - 2];
      return `${dirName}.py` === parts[parts.length - 1];
   });

   const controllerFiles = new Set(controllers.map((c) => c.rel));
   const generic = entries.filter(({ rel }) =>
      !controllerFiles.has(rel) && include.some((pattern) => minimatch(rel, pattern, { dot: true })),
   );

   const results: DiscoveredMethod[] = [];

   for (const { abs, rel } of [...controllers, ...generic]) {
      let content: string;
      try {
         content = readFile(abs);
      } catch (err) {
         logger.warn(`Cannot read ${rel}, skipping.`, err);
         continue;
      }

      for (const fn of findMarkedFunctions(content, markers)) {
         results.push({
            path: modulePathFor(rel, packageName, fn.methodName),
            methodName: fn.methodName,
            description: `Remote method: ${fn.methodName}`,
            source: rel,
         });
      }
   }

   logger.debug(
      `Scanned ${controllers.length} controller(s) and ${generic.length} file(s) under ${root}: ${results.length} marked function(s).`,
   );

   return results;
}
