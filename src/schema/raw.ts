// src/schema/raw.ts

import {DeclarationError} from '../attr/errors';

/**
 * Raw literal values as produced by the expression evaluator.
 *
 * This is a closed union: converters switch on `kind` and anything
 * they do not handle is a conversion error.
 */
export type RawEntry = readonly [string, RawValue];

export interface RawString {
    kind: 'string';
    value: string;
}

export interface RawInt {
    kind: 'int';
    value: number;
}

export interface RawBool {
    kind: 'bool';
    value: boolean;
}

export interface RawNone {
    kind: 'none';
}

export interface RawList {
    kind: 'list';
    items: readonly RawValue[];
}

/** String-keyed mapping; entries keep their insertion order. */
export interface RawDict {
    kind: 'dict';
    entries: readonly RawEntry[];
}

/** A constructor call such as `FilesetEntry(srcdir = ..., files = [...])`. */
export interface RawStruct {
    kind: 'struct';
    name: string;
    fields: readonly RawEntry[];
}

/** `select({...}, no_match_error = "...")` */
export interface RawSelect {
    kind: 'select';
    entries: readonly RawEntry[];
    noMatchError?: string;
}

/** `a + select({...}) + ...` */
export interface RawSelectorList {
    kind: 'selectorList';
    elements: readonly RawValue[];
}

export type RawValue =
    | RawString
    | RawInt
    | RawBool
    | RawNone
    | RawList
    | RawDict
    | RawStruct
    | RawSelect
    | RawSelectorList;

export type RawKind = RawValue['kind'];

// ---------------------------------------------------------------------------
// Builders
// ---------------------------------------------------------------------------

export function str(value: string): RawString {
    return {kind: 'string', value};
}

export function int(value: number): RawInt {
    if (!Number.isSafeInteger(value)) {
        throw new RangeError(`Not an integer literal: ${value}`);
    }
    return {kind: 'int', value};
}

export function bool(value: boolean): RawBool {
    return {kind: 'bool', value};
}

export const none: RawNone = {kind: 'none'};

export function list(items: readonly RawValue[]): RawList {
    return {kind: 'list', items};
}

export function dict(entries: Record<string, RawValue> | readonly RawEntry[]): RawDict {
    return {kind: 'dict', entries: toEntries(entries)};
}

export function struct(name: string, fields: Record<string, RawValue> | readonly RawEntry[]): RawStruct {
    return {kind: 'struct', name, fields: toEntries(fields)};
}

export function select(
    entries: Record<string, RawValue> | readonly RawEntry[],
    noMatchError?: string,
): RawSelect {
    const result: RawSelect = {kind: 'select', entries: toEntries(entries)};
    if (noMatchError !== undefined) result.noMatchError = noMatchError;
    return result;
}

export function concat(...elements: RawValue[]): RawSelectorList {
    return {kind: 'selectorList', elements};
}

function toEntries(entries: Record<string, RawValue> | readonly RawEntry[]): readonly RawEntry[] {
    return isEntryArray(entries) ? entries : Object.entries(entries);
}

function isEntryArray(v: Record<string, RawValue> | readonly RawEntry[]): v is readonly RawEntry[] {
    return Array.isArray(v);
}

/**
 * Human-readable name of a raw value's kind, as used in
 * "but got ... (<name>)" messages.
 */
export function rawTypeName(raw: RawValue): string {
    switch (raw.kind) {
        case 'string':
            return 'string';
        case 'int':
            return 'int';
        case 'bool':
            return 'bool';
        case 'none':
            return 'NoneType';
        case 'list':
            return 'list';
        case 'dict':
            return 'dict';
        case 'struct':
            return raw.name;
        case 'select':
            return 'select';
        case 'selectorList':
            return 'select';
    }
}

// ---------------------------------------------------------------------------
// Plain JS data -> raw values (declaration files)
// ---------------------------------------------------------------------------

export const SELECT_MARKER = '$select';
export const NO_MATCH_ERROR_MARKER = '$noMatchError';
export const CONCAT_MARKER = '$concat';
export const STRUCT_MARKER = '$struct';

/**
 * Convert plain JavaScript data into a raw value.
 *
 * - string / integer / boolean / null map to their scalar kinds;
 * - arrays become lists, plain objects become dicts;
 * - `{$select: {...}, $noMatchError?: "..."}` becomes a select;
 * - `{$concat: [...]}` becomes a selector list;
 * - `{$struct: "Name", ...fields}` becomes a struct.
 *
 * Throws DeclarationError for anything else (floats, undefined, functions).
 */
export function fromJs(value: unknown, source = '<inline>', path = '$'): RawValue {
    if (typeof value === 'string') return str(value);
    if (typeof value === 'boolean') return bool(value);
    if (value === null) return none;

    if (typeof value === 'number') {
        if (!Number.isSafeInteger(value)) {
            throw new DeclarationError(`${path}: only integer numbers are supported, got ${value}`, source);
        }
        return int(value);
    }

    if (Array.isArray(value)) {
        return list(value.map((item: unknown, i) => fromJs(item, source, `${path}[${i}]`)));
    }

    if (typeof value === 'object') {
        const entries = Object.entries(value);
        const keys = new Set(entries.map(([k]) => k));

        if (keys.has(SELECT_MARKER)) {
            return selectFromJs(entries, source, path);
        }
        if (keys.has(CONCAT_MARKER)) {
            if (keys.size !== 1) {
                throw new DeclarationError(`${path}: "${CONCAT_MARKER}" cannot be combined with other keys`, source);
            }
            const elements: unknown = entries[0][1];
            if (!Array.isArray(elements)) {
                throw new DeclarationError(`${path}: "${CONCAT_MARKER}" must be an array`, source);
            }
            return concat(
                ...elements.map((el: unknown, i) => fromJs(el, source, `${path}.${CONCAT_MARKER}[${i}]`)),
            );
        }
        if (keys.has(STRUCT_MARKER)) {
            return structFromJs(entries, source, path);
        }

        return dict(entries.map(([k, v]): RawEntry => [k, fromJs(v, source, `${path}.${k}`)]));
    }

    throw new DeclarationError(`${path}: unsupported value of type ${typeof value}`, source);
}

function selectFromJs(entries: [string, unknown][], source: string, path: string): RawSelect {
    let branches: RawEntry[] | undefined;
    let noMatchError: string | undefined;

    for (const [key, v] of entries) {
        if (key === SELECT_MARKER) {
            if (typeof v !== 'object' || v === null || Array.isArray(v)) {
                throw new DeclarationError(`${path}: "${SELECT_MARKER}" must be an object`, source);
            }
            branches = Object.entries(v).map(
                ([cond, branch]): RawEntry => [cond, fromJs(branch, source, `${path}.${SELECT_MARKER}.${cond}`)],
            );
        } else if (key === NO_MATCH_ERROR_MARKER) {
            if (typeof v !== 'string') {
                throw new DeclarationError(`${path}: "${NO_MATCH_ERROR_MARKER}" must be a string`, source);
            }
            noMatchError = v;
        } else {
            throw new DeclarationError(`${path}: unexpected key "${key}" next to "${SELECT_MARKER}"`, source);
        }
    }

    return select(branches ?? [], noMatchError);
}

function structFromJs(entries: [string, unknown][], source: string, path: string): RawStruct {
    let name: string | undefined;
    const fields: RawEntry[] = [];

    for (const [key, v] of entries) {
        if (key === STRUCT_MARKER) {
            if (typeof v !== 'string') {
                throw new DeclarationError(`${path}: "${STRUCT_MARKER}" must be a type name`, source);
            }
            name = v;
        } else {
            fields.push([key, fromJs(v, source, `${path}.${key}`)]);
        }
    }

    return struct(name ?? '', fields);
}
