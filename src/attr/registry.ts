// src/attr/registry.ts

import {
    LABEL,
    LABEL_DICT_UNARY,
    LABEL_KEYED_STRING_DICT,
    LABEL_LIST,
    NODEP_LABEL,
    NODEP_LABEL_LIST,
    OUTPUT,
    OUTPUT_LIST,
} from './build-types';
import {FILESET_ENTRY, FILESET_ENTRY_LIST} from './fileset-entry';
import {
    BOOLEAN,
    INTEGER,
    INTEGER_LIST,
    STRING,
    STRING_DICT,
    STRING_LIST,
    STRING_LIST_DICT,
    TRISTATE,
    type AttrType,
} from './types';

/**
 * Attribute types by the keyword a rule declaration uses for them
 * (`attr.label_list` -> "label_list").
 */
const ATTR_TYPES: Record<string, AttrType<unknown>> = {
    string: STRING,
    int: INTEGER,
    bool: BOOLEAN,
    tristate: TRISTATE,
    string_list: STRING_LIST,
    int_list: INTEGER_LIST,
    string_dict: STRING_DICT,
    string_list_dict: STRING_LIST_DICT,
    label: LABEL,
    label_list: LABEL_LIST,
    nodep_label: NODEP_LABEL,
    nodep_label_list: NODEP_LABEL_LIST,
    output: OUTPUT,
    output_list: OUTPUT_LIST,
    label_dict_unary: LABEL_DICT_UNARY,
    label_keyed_string_dict: LABEL_KEYED_STRING_DICT,
    fileset_entry: FILESET_ENTRY,
    fileset_entry_list: FILESET_ENTRY_LIST,
};

export function getAttrType(keyword: string): AttrType<unknown> | undefined {
    return Object.prototype.hasOwnProperty.call(ATTR_TYPES, keyword) ? ATTR_TYPES[keyword] : undefined;
}

export function attrTypeKeywords(): string[] {
    return Object.keys(ATTR_TYPES);
}
