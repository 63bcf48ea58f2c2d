// src/schema/validate.ts

import { createRequire } from 'module';
import Ajv, { type ErrorObject, type Schema } from 'ajv';

import { DeclarationError } from '../attr/errors';
import type { DeclarationFile } from './config';

const require = createRequire(import.meta.url);
export const declarationSchema: Schema = require('./declarations.schema.json');

const ajv = new Ajv({
   strict: true,
   allErrors: true,
});

const validateDeclarationSchema = ajv.compile<DeclarationFile>(declarationSchema);

/**
 * JSON pointer from ajv ("/rules/0/attributes/srcs") to the dotted form used
 * in messages ("rules[0].attributes.srcs").
 */
function errorPath(instancePath: string): string {
   if (instancePath === '') return 'declarations';

   return instancePath
      .split('/')
      .slice(1)
      .map((segment) => segment.replace(/~1/g, '/').replace(/~0/g, '~'))
      .reduce((acc, segment) => {
         if (/^\d+$/.test(segment)) return `${acc}[${segment}]`;
         return acc === '' ? segment : `${acc}.${segment}`;
      }, '');
}

function friendlyMessage(err: ErrorObject): string {
   if (err.keyword === 'additionalProperties') {
      return `unknown property "${String(err.params.additionalProperty)}"`;
   }

   if (err.keyword === 'enum') {
      const allowed: unknown = err.params.allowedValues;
      if (Array.isArray(allowed)) {
         return `must be one of ${allowed.map((v) => JSON.stringify(v)).join(', ')}`;
      }
   }

   return err.message ?? 'is invalid';
}

/**
 * Check the shape of loaded declarations against the declaration schema.
 * Attribute values are left as plain data; they are validated when
 * converted.
 */
export function validateDeclarations(value: unknown, source: string): DeclarationFile {
   if (validateDeclarationSchema(value)) {
      return value;
   }

   const problems = (validateDeclarationSchema.errors ?? []).map(
      (err) => `${errorPath(err.instancePath)}: ${friendlyMessage(err)}`,
   );
   throw new DeclarationError(`Invalid declarations in ${source}: ${problems.join('; ')}`, source);
}
