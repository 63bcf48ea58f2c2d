// src/attr/errors.ts

/**
 * Typed errors raised by attribute conversion.
 *
 * - AttrError (base)
 *   - LabelSyntaxError (malformed label text)
 *   - ConversionError (raw value does not fit the declared type)
 *     - SelectorIntegrityError (inconsistent select() / selector list)
 *   - NoDefaultConditionError (default branch requested but absent)
 *   - DeclarationError (malformed declaration file)
 */

/**
 * Opaque attribution token forwarded into error messages
 * (e.g. "attribute 'srcs' of rule 'baz'"). Only its string form is used.
 */
export type ConversionContext = unknown;

export class AttrError extends Error {
    readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = 'AttrError';
        this.code = code;
        Error.captureStackTrace?.(this, this.constructor);
    }
}

export class LabelSyntaxError extends AttrError {
    constructor(message: string) {
        super(message, 'LABEL_SYNTAX');
        this.name = 'LabelSyntaxError';
    }
}

export class ConversionError extends AttrError {
    readonly context: ConversionContext;

    constructor(message: string, context: ConversionContext = null, code = 'CONVERSION') {
        super(message, code);
        this.name = 'ConversionError';
        this.context = context;
    }
}

export class SelectorIntegrityError extends ConversionError {
    constructor(message: string, context: ConversionContext = null) {
        super(message, context, 'SELECTOR_INTEGRITY');
        this.name = 'SelectorIntegrityError';
    }
}

export class NoDefaultConditionError extends AttrError {
    constructor(message: string) {
        super(message, 'NO_DEFAULT_CONDITION');
        this.name = 'NoDefaultConditionError';
    }
}

export class DeclarationError extends AttrError {
    readonly source: string;

    constructor(message: string, source: string) {
        super(message, 'DECLARATION');
        this.name = 'DeclarationError';
        this.source = source;
    }
}

/**
 * A context nested inside another one, e.g. "element 2 of attribute 'srcs'".
 */
export class NestedContext {
    constructor(
        readonly description: string,
        readonly parent: ConversionContext,
    ) {}

    toString(): string {
        return hasContext(this.parent)
            ? `${this.description} of ${String(this.parent)}`
            : this.description;
    }
}

export function nestedContext(description: string, parent: ConversionContext): NestedContext {
    return new NestedContext(description, parent);
}

export function hasContext(context: ConversionContext): boolean {
    return context !== null && context !== undefined && String(context) !== '';
}

/** " for <context>" or "" */
export function forContext(context: ConversionContext): string {
    return hasContext(context) ? ` for ${String(context)}` : '';
}

/** " in <context>" or "" */
export function inContext(context: ConversionContext): string {
    return hasContext(context) ? ` in ${String(context)}` : '';
}
