// src/attr/selectable.ts

import type {ConversionContext} from './errors';
import type {Label, PackageId} from './label';
import {isReservedLabel, SelectorList} from './selector';
import type {AttrType} from './types';
import type {RawValue} from '../schema/raw';

/** Converted value of an attribute that may be configurable. */
export type SelectableValue<T> = T | SelectorList<T>;

/**
 * Whether a raw value carries select() expressions.
 */
export function isSelectable(raw: RawValue): boolean {
    return raw.kind === 'select' || raw.kind === 'selectorList';
}

/**
 * Convert an attribute value that is allowed to be configurable.
 *
 * Plain literals go through `type.convert`; anything with select() in it
 * becomes a SelectorList (one selector for a lone select()).
 */
export function selectableConvert<T>(
    type: AttrType<T>,
    raw: RawValue,
    context: ConversionContext,
    currentPackage: PackageId,
): SelectableValue<T> {
    if (isSelectable(raw)) {
        return new SelectorList(raw, context, currentPackage, type);
    }
    return type.convert(raw, context, currentPackage);
}

/**
 * Labels a possibly-configurable value refers to, for dependency
 * discovery: condition labels (except the default) followed by the labels
 * of every branch value, deduplicated in encounter order.
 */
export function collectLabels<T>(type: AttrType<T>, value: SelectableValue<T>): Label[] {
    if (!(value instanceof SelectorList)) {
        return type.flatten(value);
    }

    const labels = new Set<Label>();
    for (const selector of value.getSelectors()) {
        for (const [key, branch] of selector.getEntries()) {
            if (!isReservedLabel(key)) labels.add(key);
            for (const label of type.flatten(branch)) labels.add(label);
        }
    }
    return [...labels];
}
