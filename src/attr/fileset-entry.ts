// src/attr/fileset-entry.ts

import {LABEL, LABEL_LIST} from './build-types';
import {ConversionError, forContext, nestedContext, type ConversionContext} from './errors';
import type {Label, PackageId} from './label';
import type {Printable, Printer} from './printer';
import {listOf, STRING, STRING_LIST, typeMismatch, type AttrType} from './types';
import type {RawEntry, RawValue} from '../schema/raw';

export type SymlinkBehavior = 'copy' | 'dereference';

export const SYMLINK_BEHAVIORS: readonly SymlinkBehavior[] = ['copy', 'dereference'];

export const DEFAULT_SYMLINK_BEHAVIOR: SymlinkBehavior = 'copy';

/** Strip prefix meaning "keep paths as they are". */
export const STRIP_PREFIX_WORKSPACE = '.';

export const FILESET_ENTRY_TYPE_NAME = 'FilesetEntry';

export interface FilesetEntryFields {
    srcdir: Label;
    /** null (or omitted) means "all files under srcdir". */
    files?: readonly Label[] | null;
    excludes?: readonly string[] | null;
    destdir?: string | null;
    symlinks?: string | null;
    stripPrefix?: string | null;
}

/**
 * One `FilesetEntry(...)` of a fileset: which files to copy from where,
 * and how to lay them out under the destination.
 */
export class FilesetEntry implements Printable {
    private constructor(
        readonly srcdir: Label,
        readonly files: readonly Label[] | null,
        readonly excludes: readonly string[],
        readonly destdir: string,
        readonly symlinks: SymlinkBehavior,
        readonly stripPrefix: string,
    ) {}

    /**
     * Validate all fields and build the entry. Throws ConversionError on
     * any invalid field or combination.
     */
    static create(fields: FilesetEntryFields, context: ConversionContext = null): FilesetEntry {
        const files = fields.files ? Object.freeze([...fields.files]) : null;
        const excludes = Object.freeze([...(fields.excludes ?? [])]);
        const destdir = fields.destdir ?? '';
        const stripPrefix = fields.stripPrefix ?? STRIP_PREFIX_WORKSPACE;
        const symlinks = parseSymlinkBehavior(fields.symlinks ?? DEFAULT_SYMLINK_BEHAVIOR, context);

        if (files !== null && files.length > 0 && excludes.length > 0) {
            throw invalidEntry(`cannot specify 'excludes' together with a non-empty 'files' list`, context);
        }
        if (destdir.startsWith('/')) {
            throw invalidEntry(`'destdir' must be a relative path, got '${destdir}'`, context);
        }
        if (stripPrefix === '') {
            throw invalidEntry(`'strip_prefix' must not be empty`, context);
        }
        if (stripPrefix.startsWith('/')) {
            throw invalidEntry(`'strip_prefix' must be a relative path, got '${stripPrefix}'`, context);
        }

        return new FilesetEntry(fields.srcdir, files, excludes, destdir, symlinks, stripPrefix);
    }

    /**
     * Labels this entry pulls in: the listed files when given, otherwise
     * the source directory itself.
     */
    getLabels(): Label[] {
        if (this.files === null) return [this.srcdir];
        return [...new Set(this.files)];
    }

    equals(other: FilesetEntry): boolean {
        return (
            this.srcdir.equals(other.srcdir) &&
            sameList(this.files, other.files, (a, b) => a.equals(b)) &&
            sameList(this.excludes, other.excludes, (a, b) => a === b) &&
            this.destdir === other.destdir &&
            this.symlinks === other.symlinks &&
            this.stripPrefix === other.stripPrefix
        );
    }

    repr(printer: Printer): void {
        printer
            .append(`${FILESET_ENTRY_TYPE_NAME}(`)
            .printKeyword('srcdir', this.srcdir)
            .append(', ')
            .printKeyword('files', this.files ?? [])
            .append(', ')
            .printKeyword('excludes', this.excludes)
            .append(', ')
            .printKeyword('destdir', this.destdir)
            .append(', ')
            .printKeyword('strip_prefix', this.stripPrefix)
            .append(', ')
            .printKeyword('symlinks', this.symlinks)
            .append(')');
    }
}

function sameList<T>(
    a: readonly T[] | null,
    b: readonly T[] | null,
    eq: (x: T, y: T) => boolean,
): boolean {
    if (a === null || b === null) return a === b;
    return a.length === b.length && a.every((x, i) => eq(x, b[i]));
}

function invalidEntry(detail: string, context: ConversionContext): ConversionError {
    return new ConversionError(`invalid ${FILESET_ENTRY_TYPE_NAME}${forContext(context)}: ${detail}`, context);
}

function parseSymlinkBehavior(text: string, context: ConversionContext): SymlinkBehavior {
    const normalized = text.toLowerCase();
    const match = SYMLINK_BEHAVIORS.find((b) => b === normalized);
    if (!match) {
        throw invalidEntry(
            `invalid symlink behavior '${text}', must be one of ${SYMLINK_BEHAVIORS.map((b) => `'${b}'`).join(', ')}`,
            context,
        );
    }
    return match;
}

// ---------------------------------------------------------------------------
// Converters
// ---------------------------------------------------------------------------

/**
 * Field name -> field type, in rendering order.
 */
const FIELD_TYPES = {
    srcdir: LABEL,
    files: LABEL_LIST,
    excludes: STRING_LIST,
    destdir: STRING,
    strip_prefix: STRING,
    symlinks: STRING,
} as const;

type FieldName = keyof typeof FIELD_TYPES;

function isFieldName(name: string): name is FieldName {
    return Object.prototype.hasOwnProperty.call(FIELD_TYPES, name);
}

class FilesetEntryType implements AttrType<FilesetEntry> {
    readonly name = FILESET_ENTRY_TYPE_NAME;
    readonly labelClass = 'fileset';
    readonly concatenable = false;

    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): FilesetEntry {
        let fields: readonly RawEntry[];
        if (raw.kind === 'struct' && raw.name === FILESET_ENTRY_TYPE_NAME) {
            fields = raw.fields;
        } else if (raw.kind === 'dict') {
            fields = raw.entries;
        } else {
            throw typeMismatch(this, raw, context);
        }

        const seen = new Set<string>();
        let srcdir: Label | undefined;
        const values: Omit<FilesetEntryFields, 'srcdir'> = {};

        for (const [name, value] of fields) {
            if (!isFieldName(name)) {
                throw invalidEntry(`unknown field '${name}'`, context);
            }
            if (seen.has(name)) {
                throw invalidEntry(`duplicate field '${name}'`, context);
            }
            seen.add(name);
            if (value.kind === 'none') continue;

            const fieldContext = nestedContext(`field '${name}'`, context);
            switch (name) {
                case 'srcdir':
                    srcdir = FIELD_TYPES.srcdir.convert(value, fieldContext, currentPackage);
                    break;
                case 'files':
                    values.files = FIELD_TYPES.files.convert(value, fieldContext, currentPackage);
                    break;
                case 'excludes':
                    values.excludes = FIELD_TYPES.excludes.convert(value, fieldContext, currentPackage);
                    break;
                case 'destdir':
                    values.destdir = FIELD_TYPES.destdir.convert(value, fieldContext, currentPackage);
                    break;
                case 'strip_prefix':
                    values.stripPrefix = FIELD_TYPES.strip_prefix.convert(value, fieldContext, currentPackage);
                    break;
                case 'symlinks':
                    values.symlinks = FIELD_TYPES.symlinks.convert(value, fieldContext, currentPackage);
                    break;
            }
        }

        if (!srcdir) {
            throw invalidEntry(`missing required field 'srcdir'`, context);
        }

        return FilesetEntry.create({...values, srcdir}, context);
    }

    flatten(value: FilesetEntry): Label[] {
        return value.getLabels();
    }
}

export const FILESET_ENTRY: AttrType<FilesetEntry> = new FilesetEntryType();

/**
 * list(FilesetEntry); flattening drops labels repeated across entries.
 */
class FilesetEntryListType implements AttrType<readonly FilesetEntry[]> {
    private readonly list = listOf(FILESET_ENTRY);
    readonly name = this.list.name;
    readonly labelClass = 'fileset';
    readonly concatenable = true;

    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): readonly FilesetEntry[] {
        return this.list.convert(raw, context, currentPackage);
    }

    flatten(value: readonly FilesetEntry[]): Label[] {
        return [...new Set(this.list.flatten(value))];
    }
}

export const FILESET_ENTRY_LIST: AttrType<readonly FilesetEntry[]> = new FilesetEntryListType();
