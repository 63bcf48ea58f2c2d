// src/attr/selector.ts

import {convertLabel} from './build-types';
import {
    forContext,
    nestedContext,
    NoDefaultConditionError,
    SelectorIntegrityError,
    type ConversionContext,
} from './errors';
import {FrozenMap} from './frozen-map';
import type {Label, PackageId} from './label';
import type {Printable, Printer} from './printer';
import type {AttrType} from './types';
import {rawTypeName, type RawDict, type RawSelect, type RawValue} from '../schema/raw';

/**
 * Condition key of the branch taken when no other condition matches.
 */
export const DEFAULT_CONDITION_KEY = '//conditions:default';

/**
 * True exactly for the default-condition label. Compares canonical text,
 * never instance identity.
 */
export function isReservedLabel(label: Label): boolean {
    return label.toString() === DEFAULT_CONDITION_KEY;
}

/**
 * One `select({...})`: condition label -> value of a single attribute type.
 */
export class Selector<T> implements Printable {
    static readonly DEFAULT_CONDITION_KEY = DEFAULT_CONDITION_KEY;

    static isReservedLabel(label: Label): boolean {
        return isReservedLabel(label);
    }

    private readonly entries: ReadonlyMap<Label, T>;
    private readonly defaultValue: { present: true; value: T } | { present: false };
    private readonly noMatchError: string;

    constructor(
        raw: RawSelect | RawDict,
        context: ConversionContext,
        currentPackage: PackageId,
        private readonly originalType: AttrType<T>,
        private readonly unconditional = false,
    ) {
        if (raw.entries.length === 0) {
            throw new SelectorIntegrityError(
                `select() of type '${originalType.name}'${forContext(context)} must have at least one condition`,
                context,
            );
        }

        const entries = new Map<Label, T>();
        let defaultValue: { present: true; value: T } | { present: false } = {present: false};

        for (const [rawKey, rawValue] of raw.entries) {
            const key = convertLabel(rawKey, nestedContext('select key', context), currentPackage);
            if (entries.has(key)) {
                throw new SelectorIntegrityError(
                    `duplicate condition '${key.toString()}' in select()${forContext(context)}`,
                    context,
                );
            }

            const value = originalType.convert(
                rawValue,
                nestedContext(`select branch '${rawKey}'`, context),
                currentPackage,
            );
            entries.set(key, value);
            if (isReservedLabel(key)) defaultValue = {present: true, value};
        }

        this.entries = new FrozenMap(entries);
        this.defaultValue = defaultValue;
        this.noMatchError = raw.kind === 'select' ? raw.noMatchError ?? '' : '';
    }

    getOriginalType(): AttrType<T> {
        return this.originalType;
    }

    getEntries(): ReadonlyMap<Label, T> {
        return this.entries;
    }

    getKeyLabels(): Label[] {
        return [...this.entries.keys()];
    }

    hasDefault(): boolean {
        return this.defaultValue.present;
    }

    /**
     * Value of the default branch. Throws when the select has none.
     */
    getDefault(): T {
        if (!this.defaultValue.present) {
            throw new NoDefaultConditionError(
                `select() of type '${this.originalType.name}' has no '${DEFAULT_CONDITION_KEY}' condition`,
            );
        }
        return this.defaultValue.value;
    }

    /** Custom message for "no condition matched", or "". */
    getNoMatchError(): string {
        return this.noMatchError;
    }

    /**
     * True when this selector wraps a plain value of a selector list rather
     * than a written `select()`, even one with only a default branch.
     */
    isUnconditional(): boolean {
        return this.unconditional;
    }

    repr(printer: Printer): void {
        printer.append('select(').repr(this.entries);
        if (this.noMatchError) {
            printer.append(', ').printKeyword('no_match_error', this.noMatchError);
        }
        printer.append(')');
    }
}

/**
 * An attribute value built from `a + select({...}) + ...`: the active
 * branch of every selector, concatenated in order.
 */
export class SelectorList<T> implements Printable {
    private readonly selectors: readonly Selector<T>[];

    constructor(
        raw: RawValue,
        context: ConversionContext,
        currentPackage: PackageId,
        private readonly originalType: AttrType<T>,
    ) {
        const elements = raw.kind === 'selectorList' ? raw.elements : [raw];

        if (elements.length === 0) {
            throw new SelectorIntegrityError(
                `empty selector list for type '${originalType.name}'${forContext(context)}`,
                context,
            );
        }
        if (elements.length > 1 && !originalType.concatenable) {
            throw new SelectorIntegrityError(
                `type '${originalType.name}'${forContext(context)} does not support concatenation of select() expressions`,
                context,
            );
        }

        checkUniformShape(elements, originalType, context);

        this.selectors = Object.freeze(
            elements.map((element, i) => {
                const elementContext = elements.length > 1 ? nestedContext(`element ${i}`, context) : context;
                if (element.kind === 'select') {
                    return new Selector(element, elementContext, currentPackage, originalType);
                }
                const unconditional: RawDict = {kind: 'dict', entries: [[DEFAULT_CONDITION_KEY, element]]};
                return new Selector(unconditional, elementContext, currentPackage, originalType, true);
            }),
        );
    }

    getOriginalType(): AttrType<T> {
        return this.originalType;
    }

    getSelectors(): readonly Selector<T>[] {
        return this.selectors;
    }

    /**
     * Every condition label used by any selector, deduplicated, in
     * declaration order.
     */
    getKeyLabels(): ReadonlySet<Label> {
        const keys = new Set<Label>();
        for (const selector of this.selectors) {
            for (const key of selector.getEntries().keys()) keys.add(key);
        }
        return keys;
    }

    repr(printer: Printer): void {
        this.selectors.forEach((selector, i) => {
            if (i > 0) printer.append(' + ');
            if (selector.isUnconditional()) {
                printer.repr(selector.getDefault());
            } else {
                printer.repr(selector);
            }
        });
    }
}

/**
 * Shape of the value an element contributes: a select contributes the
 * shape of its first branch, None included. Only an empty select has none.
 */
function elementShape(raw: RawValue): string | null {
    if (raw.kind === 'select') {
        return raw.entries.length === 0 ? null : rawTypeName(raw.entries[0][1]);
    }
    return rawTypeName(raw);
}

function checkUniformShape(
    elements: readonly RawValue[],
    originalType: AttrType<unknown>,
    context: ConversionContext,
): void {
    let first: string | null = null;
    elements.forEach((element, i) => {
        const shape = elementShape(element);
        if (shape === null) return;
        if (first === null) {
            first = shape;
        } else if (shape !== first) {
            throw new SelectorIntegrityError(
                `expected value of type '${originalType.name}'${forContext(context)}, but element ${i} of the selector list is a ${element.kind === 'select' ? `select of ${shape}` : shape} while earlier elements are ${first}`,
                context,
            );
        }
    });
}
