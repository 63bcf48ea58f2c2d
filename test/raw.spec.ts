// test/raw.spec.ts

import {describe, it, expect} from 'vitest';
import {DeclarationError} from '../src/attr';
import {
    concat,
    dict,
    fromJs,
    int,
    list,
    none,
    rawTypeName,
    select,
    str,
    struct,
} from '../src/schema';

describe('fromJs', () => {
    it('maps scalars, arrays and objects', () => {
        expect(fromJs('a')).toEqual(str('a'));
        expect(fromJs(3)).toEqual(int(3));
        expect(fromJs(null)).toBe(none);
        expect(fromJs(['a', 1])).toEqual(list([str('a'), int(1)]));
        expect(fromJs({k: 'v'})).toEqual(dict([['k', str('v')]]));
    });

    it('reads select markers', () => {
        expect(fromJs({$select: {'//conditions:a': 'x'}, $noMatchError: 'none matched'})).toEqual({
            kind: 'select',
            entries: [['//conditions:a', str('x')]],
            noMatchError: 'none matched',
        });
        expect(fromJs({$select: {'//conditions:a': 'x'}})).toEqual(select({'//conditions:a': str('x')}));
    });

    it('reads concat and struct markers', () => {
        expect(fromJs({$concat: [['a'], {$select: {'//conditions:a': ['b']}}]})).toEqual(
            concat(list([str('a')]), select({'//conditions:a': list([str('b')])})),
        );
        expect(fromJs({$struct: 'FilesetEntry', srcdir: '//a:b'})).toEqual(
            struct('FilesetEntry', [['srcdir', str('//a:b')]]),
        );
    });

    it('reports the path of unsupported values', () => {
        expect(() => fromJs(1.5)).toThrow(DeclarationError);
        expect(() => fromJs(1.5)).toThrow('$: only integer numbers are supported, got 1.5');
        expect(() => fromJs({a: [undefined]}, 'decl.json')).toThrow('$.a[0]: unsupported value of type undefined');
    });

    it('rejects malformed markers', () => {
        expect(() => fromJs({$concat: [1], x: 2})).toThrow('$: "$concat" cannot be combined with other keys');
        expect(() => fromJs({$concat: 'a'})).toThrow('$: "$concat" must be an array');
        expect(() => fromJs({$select: ['a']})).toThrow('$: "$select" must be an object');
        expect(() => fromJs({$select: {}, other: 1})).toThrow('$: unexpected key "other" next to "$select"');
        expect(() => fromJs({$struct: 3})).toThrow('$: "$struct" must be a type name');
    });
});

describe('rawTypeName', () => {
    it('names each kind', () => {
        expect(rawTypeName(none)).toBe('NoneType');
        expect(rawTypeName(struct('FilesetEntry', {}))).toBe('FilesetEntry');
        expect(rawTypeName(concat(str('a')))).toBe('select');
    });
});

describe('int', () => {
    it('rejects fractional values', () => {
        expect(() => int(0.5)).toThrow(RangeError);
    });
});
