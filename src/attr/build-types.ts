// src/attr/build-types.ts

import {ConversionError, AttrError, inContext, type ConversionContext} from './errors';
import {parseLabel, type Label, type PackageId} from './label';
import {
    dictOf,
    listOf,
    STRING,
    typeMismatch,
    type AttrType,
    type LabelClass,
} from './types';
import type {RawValue} from '../schema/raw';

/**
 * Wrap a label syntax failure into the conversion error callers key off:
 * "invalid label '<text>' in <context>: <reason>".
 */
export function convertLabel(text: string, context: ConversionContext, currentPackage: PackageId): Label {
    try {
        return parseLabel(text, currentPackage);
    } catch (err) {
        if (err instanceof AttrError) {
            throw new ConversionError(`invalid label '${text}'${inContext(context)}: ${err.message}`, context);
        }
        throw err;
    }
}

export class LabelType implements AttrType<Label> {
    readonly name: string;
    readonly concatenable = false;

    constructor(readonly labelClass: LabelClass = 'dependency', name = 'label') {
        this.name = name;
    }

    convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): Label {
        if (raw.kind !== 'string') throw typeMismatch(this, raw, context);
        return convertLabel(raw.value, context, currentPackage);
    }

    flatten(value: Label): Label[] {
        return [value];
    }
}

/**
 * Output files: labels that must name a target in the declaring package.
 */
class OutputType extends LabelType {
    constructor() {
        super('output', 'output');
    }

    override convert(raw: RawValue, context: ConversionContext, currentPackage: PackageId): Label {
        const label = super.convert(raw, context, currentPackage);
        if (!label.packageId.equals(currentPackage)) {
            const text = raw.kind === 'string' ? raw.value : label.toString();
            throw new ConversionError(
                `label '${text}' is not in the current package${inContext(context)}`,
                context,
            );
        }
        return label;
    }
}

export const LABEL: AttrType<Label> = new LabelType();
export const NODEP_LABEL: AttrType<Label> = new LabelType('nondep');
export const OUTPUT: AttrType<Label> = new OutputType();

export const LABEL_LIST = listOf(LABEL);
export const NODEP_LABEL_LIST = listOf(NODEP_LABEL);
export const OUTPUT_LIST = listOf(OUTPUT);

/** dict(string, label) */
export const LABEL_DICT_UNARY = dictOf(STRING, LABEL);

/** dict(label, string) */
export const LABEL_KEYED_STRING_DICT = dictOf(LABEL, STRING);
