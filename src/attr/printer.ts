// src/attr/printer.ts

import type {RawEntry, RawValue} from '../schema/raw';

export type QuoteChar = '"' | '\'';

/**
 * Values that know how to render themselves (labels, structured values,
 * selectors).
 */
export interface Printable {
    repr(printer: Printer): void;
}

export function isPrintable(value: unknown): value is Printable {
    return (
        typeof value === 'object' &&
        value !== null &&
        'repr' in value &&
        typeof value.repr === 'function'
    );
}

/**
 * Deterministic renderer for converted attribute values.
 *
 * Never throws: unknown shapes print as `<unknown object Name>` and
 * self-containing containers print as `[...]` / `{...}`.
 */
export class Printer {
    private readonly parts: string[] = [];
    private readonly active = new Set<object>();

    constructor(readonly quoteChar: QuoteChar = '"') {}

    append(text: string): this {
        this.parts.push(text);
        return this;
    }

    quote(text: string): this {
        return this.append(quoteString(text, this.quoteChar));
    }

    repr(value: unknown): this {
        if (value === null || value === undefined) return this.append('None');

        switch (typeof value) {
            case 'string':
                return this.quote(value);
            case 'number':
                return this.append(Number.isFinite(value) ? String(value) : 'None');
            case 'boolean':
                return this.append(value ? 'True' : 'False');
            case 'bigint':
                return this.append(value.toString());
            case 'object':
                return this.reprObject(value);
            default:
                return this.append(`<unknown object ${typeof value}>`);
        }
    }

    /**
     * Print `open item, item close`.
     */
    printList(items: Iterable<unknown>, open = '[', close = ']'): this {
        this.append(open);
        let first = true;
        for (const item of items) {
            if (!first) this.append(', ');
            first = false;
            this.repr(item);
        }
        return this.append(close);
    }

    /**
     * Print `name = value` as used inside constructor-style renderings.
     */
    printKeyword(name: string, value: unknown): this {
        return this.append(`${name} = `).repr(value);
    }

    toString(): string {
        return this.parts.join('');
    }

    private reprObject(value: object): this {
        if (this.active.has(value)) {
            return this.append(value instanceof Map ? '{...}' : '[...]');
        }

        this.active.add(value);
        try {
            if (isPrintable(value)) {
                value.repr(this);
            } else if (Array.isArray(value)) {
                this.printList(value);
            } else if (value instanceof Map) {
                this.printMap(value);
            } else if (value instanceof Set) {
                this.printList(value);
            } else {
                this.append(`<unknown object ${value.constructor?.name ?? 'Object'}>`);
            }
        } finally {
            this.active.delete(value);
        }
        return this;
    }

    private printMap(map: Map<unknown, unknown>): void {
        this.append('{');
        let first = true;
        for (const [k, v] of map) {
            if (!first) this.append(', ');
            first = false;
            this.repr(k).append(': ').repr(v);
        }
        this.append('}');
    }
}

export function quoteString(text: string, quoteChar: QuoteChar = '"'): string {
    let out = quoteChar;
    for (const ch of text) {
        switch (ch) {
            case '\\':
                out += '\\\\';
                break;
            case '\n':
                out += '\\n';
                break;
            case '\r':
                out += '\\r';
                break;
            case '\t':
                out += '\\t';
                break;
            default:
                out += ch === quoteChar ? `\\${ch}` : ch;
        }
    }
    return out + quoteChar;
}

/**
 * Render any converted value.
 */
export function repr(value: unknown, quoteChar: QuoteChar = '"'): string {
    return new Printer(quoteChar).repr(value).toString();
}

// ---------------------------------------------------------------------------
// Raw values
// ---------------------------------------------------------------------------

/**
 * Render a raw literal the way it would appear in a build file.
 */
export function reprRaw(raw: RawValue, quoteChar: QuoteChar = '"'): string {
    const printer = new Printer(quoteChar);
    printRaw(printer, raw);
    return printer.toString();
}

function printRaw(printer: Printer, raw: RawValue): void {
    switch (raw.kind) {
        case 'string':
            printer.quote(raw.value);
            return;
        case 'int':
            printer.append(String(raw.value));
            return;
        case 'bool':
            printer.append(raw.value ? 'True' : 'False');
            return;
        case 'none':
            printer.append('None');
            return;
        case 'list':
            printer.append('[');
            raw.items.forEach((item, i) => {
                if (i > 0) printer.append(', ');
                printRaw(printer, item);
            });
            printer.append(']');
            return;
        case 'dict':
            printRawEntries(printer, raw.entries);
            return;
        case 'struct':
            printer.append(`${raw.name}(`);
            raw.fields.forEach(([name, v], i) => {
                if (i > 0) printer.append(', ');
                printer.append(`${name} = `);
                printRaw(printer, v);
            });
            printer.append(')');
            return;
        case 'select':
            printer.append('select(');
            printRawEntries(printer, raw.entries);
            if (raw.noMatchError) {
                printer.append(', ').printKeyword('no_match_error', raw.noMatchError);
            }
            printer.append(')');
            return;
        case 'selectorList':
            raw.elements.forEach((el, i) => {
                if (i > 0) printer.append(' + ');
                printRaw(printer, el);
            });
            return;
    }
}

function printRawEntries(printer: Printer, entries: readonly RawEntry[]): void {
    printer.append('{');
    entries.forEach(([k, v], i) => {
        if (i > 0) printer.append(', ');
        printer.quote(k).append(': ');
        printRaw(printer, v);
    });
    printer.append('}');
}
