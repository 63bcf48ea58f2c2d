// src/attr/types.ts

import {
    ConversionError,
    forContext,
    nestedContext,
    type ConversionContext,
} from './errors';
import {FrozenMap} from './frozen-map';
import type {Label, PackageId} from './label';
import {reprRaw} from './printer';
import {rawTypeName, str, type RawValue} from '../schema/raw';

/**
 * How the labels returned by `flatten` relate to the declaring rule.
 *
 * - none:       the type holds no labels
 * - dependency: regular dependency edges
 * - nondep:     references that must not become dependency edges
 * - output:     files the rule produces
 * - fileset:    fileset sources
 */
export type LabelClass = 'none' | 'dependency' | 'nondep' | 'output' | 'fileset';

/**
 * A concrete attribute type: validates raw literals into `T` and
 * extracts the labels a value refers to.
 */
export interface AttrType<T> {
    /** Canonical name used in messages, e.g. "list(label)". */
    readonly name: string;

    readonly labelClass: LabelClass;

    /**
     * Whether values of this type can be joined with `+`, which is what
     * allows several select() expressions in one attribute.
     */
    readonly concatenable: boolean;

    /**
     * Convert a plain raw literal. select() input is always rejected;
     * configurable values go through `selectableConvert`.
     */
    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): T;

    /** Labels reachable from `value`, in encounter order. */
    flatten(value: T): Label[];
}

/**
 * The standard "expected value of type ..." failure.
 */
export function typeMismatch(
    type: { readonly name: string },
    raw: RawValue,
    context: ConversionContext,
    detail?: string,
): ConversionError {
    const suffix = detail ? `: ${detail}` : '';
    return new ConversionError(
        `expected value of type '${type.name}'${forContext(context)}, but got ${reprRaw(raw)} (${rawTypeName(raw)})${suffix}`,
        context,
    );
}

const NO_LABELS: readonly Label[] = Object.freeze([]);

function noLabels(): Label[] {
    return [...NO_LABELS];
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export type TriState = 'yes' | 'no' | 'auto';

class StringType implements AttrType<string> {
    readonly name = 'string';
    readonly labelClass = 'none';
    readonly concatenable = false;

    convert(raw: RawValue, context: ConversionContext): string {
        if (raw.kind !== 'string') throw typeMismatch(this, raw, context);
        return raw.value;
    }

    flatten(): Label[] {
        return noLabels();
    }
}

class IntegerType implements AttrType<number> {
    readonly name = 'int';
    readonly labelClass = 'none';
    readonly concatenable = false;

    convert(raw: RawValue, context: ConversionContext): number {
        if (raw.kind !== 'int') throw typeMismatch(this, raw, context);
        return raw.value;
    }

    flatten(): Label[] {
        return noLabels();
    }
}

class BooleanType implements AttrType<boolean> {
    readonly name = 'boolean';
    readonly labelClass = 'none';
    readonly concatenable = false;

    convert(raw: RawValue, context: ConversionContext): boolean {
        if (raw.kind === 'bool') return raw.value;
        if (raw.kind === 'int') {
            if (raw.value === 0) return false;
            if (raw.value === 1) return true;
            throw typeMismatch(this, raw, context, 'boolean is not one of [0, 1]');
        }
        throw typeMismatch(this, raw, context);
    }

    flatten(): Label[] {
        return noLabels();
    }
}

class TriStateType implements AttrType<TriState> {
    readonly name = 'tristate';
    readonly labelClass = 'none';
    readonly concatenable = false;

    convert(raw: RawValue, context: ConversionContext): TriState {
        if (raw.kind === 'bool') return raw.value ? 'yes' : 'no';
        if (raw.kind === 'int') {
            switch (raw.value) {
                case 1:
                    return 'yes';
                case 0:
                    return 'no';
                case -1:
                    return 'auto';
                default:
                    throw typeMismatch(this, raw, context, 'tristate is not one of [-1, 0, 1]');
            }
        }
        throw typeMismatch(this, raw, context);
    }

    flatten(): Label[] {
        return noLabels();
    }
}

export const STRING: AttrType<string> = new StringType();
export const INTEGER: AttrType<number> = new IntegerType();
export const BOOLEAN: AttrType<boolean> = new BooleanType();
export const TRISTATE: AttrType<TriState> = new TriStateType();

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

export class ListType<E> implements AttrType<readonly E[]> {
    readonly name: string;
    readonly concatenable = true;

    constructor(
        readonly elementType: AttrType<E>,
        readonly labelClass: LabelClass = elementType.labelClass,
    ) {
        this.name = `list(${elementType.name})`;
    }

    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): readonly E[] {
        if (raw.kind !== 'list') throw typeMismatch(this, raw, context);

        const result = raw.items.map((item, i) =>
            this.elementType.convert(item, nestedContext(`element ${i}`, context), currentPackage),
        );
        return Object.freeze(result);
    }

    flatten(value: readonly E[]): Label[] {
        const labels: Label[] = [];
        for (const item of value) {
            labels.push(...this.elementType.flatten(item));
        }
        return labels;
    }
}

export class DictType<K, V> implements AttrType<ReadonlyMap<K, V>> {
    readonly name: string;
    readonly labelClass: LabelClass;
    readonly concatenable = false;

    constructor(
        readonly keyType: AttrType<K>,
        readonly valueType: AttrType<V>,
    ) {
        this.name = `dict(${keyType.name}, ${valueType.name})`;
        this.labelClass = valueType.labelClass !== 'none' ? valueType.labelClass : keyType.labelClass;
    }

    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): ReadonlyMap<K, V> {
        if (raw.kind !== 'dict') throw typeMismatch(this, raw, context);

        const result = new Map<K, V>();
        for (const [rawKey, rawValue] of raw.entries) {
            const key = this.keyType.convert(str(rawKey), nestedContext('dict key', context), currentPackage);
            if (result.has(key)) {
                throw new ConversionError(
                    `duplicate key '${rawKey}' in value of type '${this.name}'${forContext(context)}`,
                    context,
                );
            }
            const value = this.valueType.convert(
                rawValue,
                nestedContext(`value of key '${rawKey}'`, context),
                currentPackage,
            );
            result.set(key, value);
        }
        return new FrozenMap(result);
    }

    flatten(value: ReadonlyMap<K, V>): Label[] {
        const labels: Label[] = [];
        for (const key of value.keys()) labels.push(...this.keyType.flatten(key));
        for (const v of value.values()) labels.push(...this.valueType.flatten(v));
        return labels;
    }
}

export function listOf<E>(elementType: AttrType<E>, labelClass?: LabelClass): ListType<E> {
    return new ListType(elementType, labelClass);
}

export function dictOf<K, V>(keyType: AttrType<K>, valueType: AttrType<V>): DictType<K, V> {
    return new DictType(keyType, valueType);
}

export const STRING_LIST = listOf(STRING);
export const INTEGER_LIST = listOf(INTEGER);
export const STRING_DICT = dictOf(STRING, STRING);
export const STRING_LIST_DICT = dictOf(STRING, STRING_LIST);
