// src/schema/config.ts

import type {QuoteChar} from '../attr/printer';

/**
 * Conventional declaration file name looked up when the CLI is given a
 * directory instead of a file.
 */
export const DECLARATION_FILE_BASENAME = 'attrtype.config';

/**
 * A single attribute value as written in a declaration file.
 */
export interface AttributeDeclaration {
   /**
    * Attribute type keyword, e.g. "label", "label_list", "fileset_entry_list".
    */
   type: string;

   /**
    * Plain JS data: strings, integers, booleans, null, arrays, objects and
    * the `$select` / `$concat` / `$struct` marker objects.
    */
   value: unknown;

   /**
    * Whether select() is allowed for this attribute.
    * Default: true.
    */
   configurable?: boolean;
}

/**
 * A rule declared in the package, with its raw attribute values.
 */
export interface RuleDeclaration {
   /**
    * Target name of the rule inside the package (e.g. "baz").
    */
   name: string;

   attributes: Record<string, AttributeDeclaration>;
}

/**
 * Root object exported from a declaration file.
 */
export interface DeclarationFile {
   /**
    * Package the declarations belong to. Relative labels resolve here.
    *
    * Examples: "quux", "foo/bar", "@repo//foo".
    */
   package: string;

   /**
    * Quote character used when rendering converted values.
    * Default: '"'.
    */
   quote?: QuoteChar;

   rules: RuleDeclaration[];
}
