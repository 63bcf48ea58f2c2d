// test/types.spec.ts

import {describe, it, expect} from 'vitest';
import {
    BOOLEAN,
    ConversionError,
    FrozenMap,
    getAttrType,
    INTEGER,
    LABEL,
    LABEL_DICT_UNARY,
    LABEL_KEYED_STRING_DICT,
    LABEL_LIST,
    OUTPUT,
    PackageId,
    STRING,
    STRING_LIST,
    STRING_LIST_DICT,
    TRISTATE,
    parseAbsoluteLabel,
} from '../src/attr';
import {bool, concat, fromJs, int, select, str} from '../src/schema';

const quux = PackageId.parse('quux');

describe('scalar types', () => {
    it('converts strings and rejects other kinds', () => {
        expect(STRING.convert(str('a'), null, quux)).toBe('a');
        expect(() => STRING.convert(int(1), null, quux)).toThrow(
            "expected value of type 'string', but got 1 (int)",
        );
    });

    it('converts integers', () => {
        expect(INTEGER.convert(int(42), null, quux)).toBe(42);
        expect(() => INTEGER.convert(str('42'), 'attribute \'n\'', quux)).toThrow(
            'expected value of type \'int\' for attribute \'n\', but got "42" (string)',
        );
    });

    it('accepts 0 and 1 as booleans', () => {
        expect(BOOLEAN.convert(bool(false), null, quux)).toBe(false);
        expect(BOOLEAN.convert(int(1), null, quux)).toBe(true);
        expect(() => BOOLEAN.convert(int(2), null, quux)).toThrow(
            "expected value of type 'boolean', but got 2 (int): boolean is not one of [0, 1]",
        );
    });

    it('maps tristate literals', () => {
        expect(TRISTATE.convert(int(-1), null, quux)).toBe('auto');
        expect(TRISTATE.convert(int(0), null, quux)).toBe('no');
        expect(TRISTATE.convert(bool(true), null, quux)).toBe('yes');
        expect(() => TRISTATE.convert(int(5), null, quux)).toThrow('tristate is not one of [-1, 0, 1]');
    });

    it('has no labels', () => {
        expect(STRING.flatten('//a:a')).toEqual([]);
        expect(STRING_LIST.flatten(['//a:a'])).toEqual([]);
    });
});

describe('label types', () => {
    it('converts label lists relative to the current package', () => {
        const value = LABEL_LIST.convert(fromJs(['//a:a1', ':a2']), null, quux);
        expect(value.map((l) => l.toString())).toEqual(['//a:a1', '//quux:a2']);
        expect(LABEL_LIST.flatten(value)).toEqual(value);
    });

    it('names the type and context when the shape is wrong', () => {
        expect(() => LABEL_LIST.convert(fromJs('//a:a'), 'attribute \'srcs\'', quux)).toThrow(
            'expected value of type \'list(label)\' for attribute \'srcs\', but got "//a:a" (string)',
        );
    });

    it('nests element contexts', () => {
        expect(() => LABEL_LIST.convert(fromJs(['//a:a', 3]), 'attribute \'srcs\'', quux)).toThrow(
            "expected value of type 'label' for element 1 of attribute 'srcs', but got 3 (int)",
        );
    });

    it('wraps label syntax errors', () => {
        expect(() => LABEL_LIST.convert(fromJs(['not a label']), null, quux)).toThrow(
            "invalid label 'not a label' in element 0: invalid target name 'not a label': target names may not contain ' '",
        );
    });

    it('rejects select() in plain conversion', () => {
        const raw = concat(select({'//conditions:a': fromJs(['//a:a1', '//a:a2'])}));
        expect(() => LABEL_LIST.convert(raw, null, quux)).toThrow(ConversionError);
        expect(() => LABEL_LIST.convert(raw, null, quux)).toThrow(
            'expected value of type \'list(label)\', but got select({"//conditions:a": ["//a:a1", "//a:a2"]}) (select)',
        );
    });

    it('keeps outputs inside the current package', () => {
        expect(OUTPUT.convert(str('out.txt'), null, quux).toString()).toBe('//quux:out.txt');
        expect(() => OUTPUT.convert(str('//other:out.txt'), null, quux)).toThrow(
            "label '//other:out.txt' is not in the current package",
        );
    });

    it('returns the label itself when flattened', () => {
        const label = LABEL.convert(str('//a:b'), null, quux);
        expect(LABEL.flatten(label)).toEqual([parseAbsoluteLabel('//a:b')]);
    });
});

describe('dict types', () => {
    it('converts label-keyed dicts', () => {
        const value = LABEL_KEYED_STRING_DICT.convert(fromJs({'//a:a': 'x', ':b': 'y'}), null, quux);
        expect([...value].map(([k, v]) => [k.toString(), v])).toEqual([
            ['//a:a', 'x'],
            ['//quux:b', 'y'],
        ]);
        expect(LABEL_KEYED_STRING_DICT.flatten(value).map((l) => l.toString())).toEqual(['//a:a', '//quux:b']);
    });

    it('returns a read-only map', () => {
        const value = LABEL_KEYED_STRING_DICT.convert(fromJs({'//a:a': 'x'}), null, quux);

        expect(value).toBeInstanceOf(FrozenMap);
        if (value instanceof FrozenMap) {
            expect(() => value.clear()).toThrow('Cannot modify a frozen map');
        }
        expect(value.size).toBe(1);
    });

    it('rejects keys that resolve to the same label', () => {
        expect(() => LABEL_KEYED_STRING_DICT.convert(fromJs({b: 'x', ':b': 'y'}), null, quux)).toThrow(
            "duplicate key ':b' in value of type 'dict(label, string)'",
        );
    });

    it('reports the key of a bad value', () => {
        expect(() => LABEL_DICT_UNARY.convert(fromJs({k: 1}), null, quux)).toThrow(
            "expected value of type 'label' for value of key 'k', but got 1 (int)",
        );
    });

    it('flattens dict values', () => {
        const value = LABEL_DICT_UNARY.convert(fromJs({k1: '//a:a'}), null, quux);
        expect(LABEL_DICT_UNARY.flatten(value).map((l) => l.toString())).toEqual(['//a:a']);
    });

    it('builds canonical names', () => {
        expect(LABEL_DICT_UNARY.name).toBe('dict(string, label)');
        expect(STRING_LIST_DICT.name).toBe('dict(string, list(string))');
    });
});

describe('getAttrType', () => {
    it('looks types up by keyword', () => {
        expect(getAttrType('label_list')).toBe(LABEL_LIST);
        expect(getAttrType('nope')).toBeUndefined();
        expect(getAttrType('toString')).toBeUndefined();
    });
});
