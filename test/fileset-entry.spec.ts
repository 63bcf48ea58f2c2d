// test/fileset-entry.spec.ts

import {describe, it, expect} from 'vitest';
import {
    ConversionError,
    FILESET_ENTRY,
    FILESET_ENTRY_LIST,
    FilesetEntry,
    Label,
    PackageId,
} from '../src/attr';
import {dict, fromJs, list, none, str, struct} from '../src/schema';

const quux = PackageId.parse('quux');

describe('FILESET_ENTRY', () => {
    it('converts a FilesetEntry struct', () => {
        const srcDir = Label.create('foo', 'src');
        const entryLabel = Label.create('foo', 'entry');

        const converted = FILESET_ENTRY.convert(
            struct('FilesetEntry', {srcdir: str('//foo:src'), files: list([str('//foo:entry')])}),
            null,
            quux,
        );
        const expected = FilesetEntry.create({srcdir: srcDir, files: [entryLabel]});

        expect(converted.equals(expected)).toBe(true);
        expect(converted).toEqual(expected);
        expect(FILESET_ENTRY.flatten(converted)).toEqual([entryLabel]);
    });

    it('accepts a dict with the same fields', () => {
        const converted = FILESET_ENTRY.convert(
            fromJs({srcdir: ':data', destdir: 'out', strip_prefix: 'data', symlinks: 'DEREFERENCE'}),
            null,
            quux,
        );

        expect(converted.srcdir.toString()).toBe('//quux:data');
        expect(converted.files).toBeNull();
        expect(converted.destdir).toBe('out');
        expect(converted.stripPrefix).toBe('data');
        expect(converted.symlinks).toBe('dereference');
    });

    it('flattens to srcdir when files is omitted', () => {
        const converted = FILESET_ENTRY.convert(dict({srcdir: str('//foo:src'), files: none}), null, quux);
        expect(FILESET_ENTRY.flatten(converted)).toEqual([Label.create('foo', 'src')]);
    });

    it('applies defaults', () => {
        const entry = FilesetEntry.create({srcdir: Label.create('foo', 'src')});
        expect(entry.excludes).toEqual([]);
        expect(entry.destdir).toBe('');
        expect(entry.stripPrefix).toBe('.');
        expect(entry.symlinks).toBe('copy');
    });

    it('rejects unknown symlink behavior', () => {
        expect(() =>
            FILESET_ENTRY.convert(fromJs({srcdir: '//foo:src', symlinks: 'bogus'}), null, quux),
        ).toThrow("invalid FilesetEntry: invalid symlink behavior 'bogus', must be one of 'copy', 'dereference'");
    });

    it('rejects excludes next to files', () => {
        expect(() =>
            FILESET_ENTRY.convert(
                fromJs({srcdir: '//foo:src', files: ['//foo:a'], excludes: ['b']}),
                'attribute \'entries\'',
                quux,
            ),
        ).toThrow(
            "invalid FilesetEntry for attribute 'entries': cannot specify 'excludes' together with a non-empty 'files' list",
        );
    });

    it('rejects absolute paths', () => {
        const srcdir = Label.create('foo', 'src');
        expect(() => FilesetEntry.create({srcdir, destdir: '/abs'})).toThrow(
            "invalid FilesetEntry: 'destdir' must be a relative path, got '/abs'",
        );
        expect(() => FilesetEntry.create({srcdir, stripPrefix: ''})).toThrow(
            "invalid FilesetEntry: 'strip_prefix' must not be empty",
        );
    });

    it('rejects unknown, duplicate and missing fields', () => {
        expect(() => FILESET_ENTRY.convert(fromJs({srcdir: '//foo:src', srcs: []}), null, quux)).toThrow(
            "invalid FilesetEntry: unknown field 'srcs'",
        );
        expect(() =>
            FILESET_ENTRY.convert(
                struct('FilesetEntry', [
                    ['srcdir', str('//foo:a')],
                    ['srcdir', str('//foo:b')],
                ]),
                null,
                quux,
            ),
        ).toThrow("invalid FilesetEntry: duplicate field 'srcdir'");
        expect(() => FILESET_ENTRY.convert(fromJs({files: []}), null, quux)).toThrow(
            "invalid FilesetEntry: missing required field 'srcdir'",
        );
    });

    it('names the field holding a bad label', () => {
        expect(() =>
            FILESET_ENTRY.convert(fromJs({srcdir: '//foo:src', files: ['not a label']}), null, quux),
        ).toThrow("invalid label 'not a label' in element 0 of field 'files'");
    });

    it('rejects other shapes', () => {
        expect(() => FILESET_ENTRY.convert(str('x'), null, quux)).toThrow(ConversionError);
        expect(() => FILESET_ENTRY.convert(str('x'), null, quux)).toThrow(
            'expected value of type \'FilesetEntry\', but got "x" (string)',
        );
        expect(() => FILESET_ENTRY.convert(struct('Other', {}), null, quux)).toThrow(
            "expected value of type 'FilesetEntry', but got Other() (Other)",
        );
    });
});

describe('FILESET_ENTRY_LIST', () => {
    it('flattens the files of every entry', () => {
        const entry1 = Label.create('foo', 'entry1');
        const entry2 = Label.create('foo', 'entry2');

        const converted = FILESET_ENTRY_LIST.convert(
            fromJs([
                {$struct: 'FilesetEntry', srcdir: '//foo:src', files: ['//foo:entry1']},
                {$struct: 'FilesetEntry', srcdir: '//foo:src', files: ['//foo:entry2', '//foo:entry1']},
            ]),
            null,
            quux,
        );

        expect(FILESET_ENTRY_LIST.name).toBe('list(FilesetEntry)');
        expect(FILESET_ENTRY_LIST.flatten(converted)).toEqual([entry1, entry2]);
    });
});
