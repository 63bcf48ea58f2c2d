// test/label.spec.ts

import {describe, it, expect} from 'vitest';
import {
    Label,
    LabelSyntaxError,
    PackageId,
    parseAbsoluteLabel,
    parseLabel,
} from '../src/attr';

const quux = PackageId.parse('quux');
const other = PackageId.parse('some/other');

describe('parseLabel', () => {
    it('ignores the current package for absolute labels', () => {
        const a = parseLabel('//foo:bar', quux);
        const b = parseLabel('//foo:bar', other);

        expect(a).toBe(b);
        expect(a.toString()).toBe('//foo:bar');
        expect(a.packageName).toBe('foo');
        expect(a.name).toBe('bar');
    });

    it('uses the last package segment as the implicit target name', () => {
        expect(parseLabel('//foo/bar', quux)).toBe(parseLabel('//foo/bar:bar', quux));
        expect(parseLabel('//x', quux).toString()).toBe('//x:x');
    });

    it('resolves bare and colon-prefixed names in the current package', () => {
        expect(parseLabel('baz', quux).toString()).toBe('//quux:baz');
        expect(parseLabel(':baz', quux)).toBe(parseLabel('baz', quux));
        expect(parseLabel('sub/file.txt', quux).toString()).toBe('//quux:sub/file.txt');
    });

    it('handles repository-qualified labels', () => {
        const label = parseLabel('@repo//a:b', quux);
        expect(label.toString()).toBe('@repo//a:b');
        expect(label.repository).toBe('repo');

        expect(parseLabel('@repo', quux).toString()).toBe('@repo//:repo');
        expect(parseLabel('@//a:b', quux)).toBe(parseLabel('//a:b', quux));
    });

    it('resolves relative names inside an external package', () => {
        const pkg = PackageId.parse('@r//p');
        expect(parseLabel('x', pkg).toString()).toBe('@r//p:x');
    });

    it('rejects whitespace in target names', () => {
        expect(() => parseLabel('not a label', quux)).toThrow(LabelSyntaxError);
        expect(() => parseLabel('not a label', quux)).toThrow(
            "invalid target name 'not a label': target names may not contain ' '",
        );
    });

    it('rejects malformed packages and names', () => {
        expect(() => parseLabel('', quux)).toThrow('empty label');
        expect(() => parseLabel('//', quux)).toThrow('empty package has no implicit target name');
        expect(() => parseLabel('//foo:', quux)).toThrow('empty target name');
        expect(() => parseLabel('//foo//bar:x', quux)).toThrow(
            "package names may not contain '//' path separators",
        );
        expect(() => parseLabel('//a/../b:c', quux)).toThrow("package name component '..' is not allowed");
        expect(() => parseLabel('//a:b/../c', quux)).toThrow("target names may not contain '..' path segments");
        expect(() => parseLabel('foo:bar', quux)).toThrow("absolute label must begin with '@' or '//'");
    });
});

describe('parseAbsoluteLabel', () => {
    it('accepts absolute forms only', () => {
        expect(parseAbsoluteLabel('//conditions:a').toString()).toBe('//conditions:a');
        expect(() => parseAbsoluteLabel('foo')).toThrow(LabelSyntaxError);
    });
});

describe('Label', () => {
    it('interns labels so equal labels are identical', () => {
        expect(Label.create('a', 'a')).toBe(parseAbsoluteLabel('//a:a'));
        expect(Label.create('a', 'a').equals(parseLabel(':a', PackageId.parse('a')))).toBe(true);
    });

    it('resolves relative text against its own package', () => {
        const rule = Label.create('quux', 'baz');
        expect(rule.getRelative('x').toString()).toBe('//quux:x');
        expect(rule.getRelative('//y').toString()).toBe('//y:y');
        expect(rule.packageId.equals(quux)).toBe(true);
    });

    it('validates parts on create', () => {
        expect(() => Label.create('foo/', 'x')).toThrow("package names may not end with '/'");
        expect(() => Label.create('foo', 'a b')).toThrow("target names may not contain ' '");
    });
});

describe('PackageId', () => {
    it('accepts both plain and // forms', () => {
        expect(PackageId.parse('//quux').equals(quux)).toBe(true);
        expect(quux.toString()).toBe('//quux');
        expect(PackageId.parse('@r//p').toString()).toBe('@r//p');
    });

    it('rejects a repository without a package separator', () => {
        expect(() => PackageId.parse('@r')).toThrow("missing '//' after repository");
    });
});
