// src/attr/label.ts

import {LabelSyntaxError} from './errors';
import type {Printable, Printer} from './printer';

/**
 * Characters allowed in a package path segment.
 */
const PACKAGE_SEGMENT_RE = /^[A-Za-z0-9_\-.+=,@~!%^#$&()]+$/;

/**
 * Characters allowed in a target name (in addition to "/" as a separator).
 */
const TARGET_CHAR_RE = /^[A-Za-z0-9!%\-@^_`#$&'()*+,;<=>?[\]{|}~/.=]$/;

const REPOSITORY_RE = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Identifies a package: an optional external repository plus a
 * "/"-separated package path ("" is the root package).
 */
export class PackageId {
    private constructor(
        readonly repository: string,
        readonly packageName: string,
    ) {}

    static create(packageName: string, repository = ''): PackageId {
        const pkgError = validatePackageName(packageName);
        if (pkgError) {
            throw new LabelSyntaxError(`invalid package name '${packageName}': ${pkgError}`);
        }
        if (repository !== '' && !REPOSITORY_RE.test(repository)) {
            throw new LabelSyntaxError(`invalid repository name '@${repository}'`);
        }
        return new PackageId(repository, packageName);
    }

    /**
     * Parse "a/b", "//a/b" or "@repo//a/b".
     */
    static parse(text: string): PackageId {
        let rest = text;
        let repository = '';
        if (rest.startsWith('@')) {
            const sep = rest.indexOf('//');
            if (sep === -1) {
                throw new LabelSyntaxError(`invalid package identifier '${text}': missing '//' after repository`);
            }
            repository = rest.slice(1, sep);
            rest = rest.slice(sep);
        }
        if (rest.startsWith('//')) rest = rest.slice(2);
        return PackageId.create(rest, repository);
    }

    equals(other: PackageId): boolean {
        return this.repository === other.repository && this.packageName === other.packageName;
    }

    toString(): string {
        const repo = this.repository ? `@${this.repository}` : '';
        return `${repo}//${this.packageName}`;
    }
}

/**
 * A resolved build target reference.
 *
 * Labels are interned by canonical text, so equal labels are the same
 * instance and can be used directly as Map / Set keys.
 */
export class Label implements Printable {
    private static readonly interned = new Map<string, Label>();

    private readonly canonical: string;

    private constructor(
        readonly repository: string,
        readonly packageName: string,
        readonly name: string,
    ) {
        this.canonical = canonicalText(repository, packageName, name);
    }

    /**
     * Validate the parts and return the interned label.
     */
    static create(packageName: string, name: string, repository = ''): Label {
        const pkgError = validatePackageName(packageName);
        if (pkgError) {
            throw new LabelSyntaxError(`invalid package name '${packageName}': ${pkgError}`);
        }
        const nameError = validateTargetName(name);
        if (nameError) {
            throw new LabelSyntaxError(`invalid target name '${name}': ${nameError}`);
        }
        if (repository !== '' && !REPOSITORY_RE.test(repository)) {
            throw new LabelSyntaxError(`invalid repository name '@${repository}'`);
        }

        const key = canonicalText(repository, packageName, name);
        const existing = Label.interned.get(key);
        if (existing) return existing;

        const label = new Label(repository, packageName, name);
        Label.interned.set(key, label);
        return label;
    }

    get packageId(): PackageId {
        return PackageId.create(this.packageName, this.repository);
    }

    /**
     * Resolve `text` relative to this label's package.
     */
    getRelative(text: string): Label {
        return parseLabel(text, this.packageId);
    }

    equals(other: Label): boolean {
        return this.canonical === other.canonical;
    }

    toString(): string {
        return this.canonical;
    }

    repr(printer: Printer): void {
        printer.quote(this.canonical);
    }
}

function canonicalText(repository: string, packageName: string, name: string): string {
    const repo = repository ? `@${repository}` : '';
    return `${repo}//${packageName}:${name}`;
}

/**
 * Parse label text. Absolute forms ignore `currentPackage`; `:name` and
 * bare `name` resolve inside it.
 *
 *   @repo//pkg:name   @repo//pkg   @repo   @//pkg:name
 *   //pkg:name        //pkg        :name   name
 */
export function parseLabel(text: string, currentPackage: PackageId): Label {
    if (text === '') {
        throw new LabelSyntaxError('empty label');
    }

    if (text.startsWith('@')) {
        return parseRepositoryLabel(text);
    }

    if (text.startsWith('//')) {
        return parseAbsoluteBody(text, text.slice(2), '');
    }

    const name = text.startsWith(':') ? text.slice(1) : text;
    if (!text.startsWith(':') && name.includes(':')) {
        throw new LabelSyntaxError(
            `invalid label '${text}': absolute label must begin with '@' or '//'`,
        );
    }
    return createChecked(text, currentPackage.packageName, name, currentPackage.repository);
}

/**
 * Parse a label that must be absolute.
 */
export function parseAbsoluteLabel(text: string): Label {
    if (!text.startsWith('//') && !text.startsWith('@')) {
        throw new LabelSyntaxError(
            `invalid label '${text}': absolute label must begin with '@' or '//'`,
        );
    }
    return parseLabel(text, ROOT_PACKAGE);
}

const ROOT_PACKAGE = PackageId.create('');

function parseRepositoryLabel(text: string): Label {
    const sep = text.indexOf('//');
    if (sep === -1) {
        // "@repo" is shorthand for "@repo//:repo"
        const repository = text.slice(1);
        return createChecked(text, '', repository, repository);
    }
    const repository = text.slice(1, sep);
    return parseAbsoluteBody(text, text.slice(sep + 2), repository);
}

function parseAbsoluteBody(text: string, body: string, repository: string): Label {
    const colon = body.indexOf(':');
    if (colon === -1) {
        if (body === '') {
            throw new LabelSyntaxError(`invalid label '${text}': empty package has no implicit target name`);
        }
        const lastSlash = body.lastIndexOf('/');
        const implicitName = body.slice(lastSlash + 1);
        return createChecked(text, body, implicitName, repository);
    }
    return createChecked(text, body.slice(0, colon), body.slice(colon + 1), repository);
}

function createChecked(text: string, packageName: string, name: string, repository: string): Label {
    const pkgError = validatePackageName(packageName);
    if (pkgError) {
        throw new LabelSyntaxError(`invalid package name '${packageName}' in label '${text}': ${pkgError}`);
    }
    const nameError = validateTargetName(name);
    if (nameError) {
        throw new LabelSyntaxError(`invalid target name '${name}': ${nameError}`);
    }
    if (repository !== '' && !REPOSITORY_RE.test(repository)) {
        throw new LabelSyntaxError(`invalid repository name '@${repository}' in label '${text}'`);
    }
    return Label.create(packageName, name, repository);
}

/**
 * Returns an error description, or null when the package name is valid.
 */
export function validatePackageName(packageName: string): string | null {
    if (packageName === '') return null;
    if (packageName.startsWith('/')) return 'package names may not start with \'/\'';
    if (packageName.endsWith('/')) return 'package names may not end with \'/\'';

    for (const segment of packageName.split('/')) {
        if (segment === '') return 'package names may not contain \'//\' path separators';
        if (segment === '.' || segment === '..') {
            return `package name component '${segment}' is not allowed`;
        }
        if (!PACKAGE_SEGMENT_RE.test(segment)) {
            const bad = [...segment].find((ch) => !PACKAGE_SEGMENT_RE.test(ch));
            return `package names may not contain '${bad ?? segment}'`;
        }
    }
    return null;
}

/**
 * Returns an error description, or null when the target name is valid.
 */
export function validateTargetName(name: string): string | null {
    if (name === '') return 'empty target name';
    if (name.startsWith('/')) return 'target names may not start with \'/\'';
    if (name.endsWith('/')) return 'target names may not end with \'/\'';
    if (name.includes('//')) return 'target names may not contain \'//\' path separators';

    for (const ch of name) {
        if (!TARGET_CHAR_RE.test(ch)) {
            return `target names may not contain '${ch}'`;
        }
    }

    for (const segment of name.split('/')) {
        if (segment === '..') return 'target names may not contain \'..\' path segments';
        if (segment === '.' && name !== '.') return 'target names may not contain \'.\' as a path segment';
    }
    return null;
}
