// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import { pathToFileURL } from 'url';
import { transform } from 'esbuild';

import { DeclarationError } from '../attr/errors';
import { DECLARATION_FILE_BASENAME, validateDeclarations, type DeclarationFile } from '../schema';
import { defaultLogger } from '../util/logger';
import { ensureDirSync, statSafeSync } from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

const CANDIDATE_EXTENSIONS = ['.ts', '.mts', '.mjs', '.js', '.cjs', '.json'];

export interface LoadDeclarationsResult {
   /**
    * Validated declarations.
    */
   declarations: DeclarationFile;

   /**
    * Absolute path of the file they were loaded from.
    */
   sourcePath: string;
}

/**
 * Load a declaration file.
 *
 * `target` may be a file, or a directory containing
 * `attrtype.config.{ts,mts,mjs,js,cjs,json}`; relative paths resolve
 * from `cwd`.
 */
export async function loadDeclarations(
   target: string,
   cwd: string = process.cwd(),
): Promise<LoadDeclarationsResult> {
   const sourcePath = resolveDeclarationPath(path.resolve(cwd, target));
   const loaded = await importDeclarations(sourcePath);
   const declarations = validateDeclarations(loaded, sourcePath);

   logger.debug(
      `Loaded ${declarations.rules.length} rule(s) for package "${declarations.package}" from ${sourcePath}`,
   );

   return { declarations, sourcePath };
}

/**
 * Map a file-or-directory argument to the declaration file it names.
 */
export function resolveDeclarationPath(absTarget: string): string {
   const stat = statSafeSync(absTarget);
   if (stat?.isFile()) return absTarget;

   if (stat?.isDirectory()) {
      for (const ext of CANDIDATE_EXTENSIONS) {
         const full = path.join(absTarget, `${DECLARATION_FILE_BASENAME}${ext}`);
         if (fs.existsSync(full)) {
            return full;
         }
      }
      throw new DeclarationError(
         `Could not find declarations in ${absTarget}. Looked for: ${CANDIDATE_EXTENSIONS.map(
            (ext) => DECLARATION_FILE_BASENAME + ext,
         ).join(', ')}`,
         absTarget,
      );
   }

   throw new DeclarationError(`Declaration file not found: ${absTarget}`, absTarget);
}

/**
 * Read the default export (or JSON content) of a declaration file.
 * - .json is parsed directly.
 * - .ts/.mts/.js/.mjs/.cjs is compiled with esbuild to ESM and imported
 *   from a temp file.
 */
async function importDeclarations(sourcePath: string): Promise<unknown> {
   const ext = path.extname(sourcePath).toLowerCase();

   if (ext === '.json') {
      const text = fs.readFileSync(sourcePath, 'utf8');
      try {
         return JSON.parse(text);
      } catch (err) {
         throw new DeclarationError(
            `Invalid JSON in ${sourcePath}: ${err instanceof Error ? err.message : String(err)}`,
            sourcePath,
         );
      }
   }

   return importCompiled(sourcePath, ext === '.ts' || ext === '.mts' ? 'ts' : 'js');
}

/**
 * Compile a module to ESM with esbuild and import the compiled file.
 * The temp file is keyed by path, mtime and content, so an edit always
 * yields a fresh module URL.
 */
async function importCompiled(sourcePath: string, loader: 'ts' | 'js'): Promise<unknown> {
   const source = fs.readFileSync(sourcePath, 'utf8');
   const stat = fs.statSync(sourcePath);

   const hash = crypto
      .createHash('sha1')
      .update(sourcePath)
      .update(String(stat.mtimeMs))
      .update(source)
      .digest('hex');

   const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'attrtype-declarations'));
   const tmpFile = path.join(tmpDir, `${hash}.mjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader,
         format: 'esm',
         sourcemap: 'inline',
         target: 'node20',
         sourcefile: sourcePath,
      });
      fs.writeFileSync(tmpFile, result.code, 'utf8');
      logger.debug(`Compiled ${sourcePath} -> ${tmpFile}`);
   }

   return importDefault(pathToFileURL(tmpFile).href);
}

async function importDefault(url: string): Promise<unknown> {
   const mod: unknown = await import(url);
   if (typeof mod === 'object' && mod !== null && 'default' in mod) {
      return mod.default;
   }
   return mod;
}
