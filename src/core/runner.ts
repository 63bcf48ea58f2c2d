// src/core/runner.ts

import pluralize from 'pluralize';
import { minimatch } from 'minimatch';
import { AttrError, DeclarationError } from '../attr/errors';
import { PackageId } from '../attr/label';
import { repr, type QuoteChar } from '../attr/printer';
import { getAttrType } from '../attr/registry';
import { collectLabels, selectableConvert } from '../attr/selectable';
import { SelectorList } from '../attr/selector';
import { fromJs, type DeclarationFile, type RawValue } from '../schema';
import { loadDeclarations } from './config-loader';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';

export interface AttributeResult {
    rule: string;
    attribute: string;
    /** Type keyword from the declaration. */
    type: string;
    ok: boolean;
    /** True when the value converted to a selector list. */
    selectable: boolean;
    /** Canonical rendering of the converted value. */
    rendered?: string;
    /** Referenced labels, canonical text. */
    labels?: string[];
    error?: { code: string; message: string };
}

export interface RunReport {
    package: string;
    sourcePath?: string;
    results: AttributeResult[];
    errorCount: number;
}

export interface RunOptions {
    /**
     * Glob patterns over "<rule>.<attribute>"; when given, only matching
     * attributes are converted.
     */
    filter?: string[];

    /**
     * Quote character for renderings; overrides the declaration file.
     */
    quote?: QuoteChar;

    /**
     * Optional logger override.
     */
    logger?: Logger;
}

/**
 * Convert every declared attribute and collect the outcome.
 *
 * Conversion failures (AttrError) are recorded per attribute; anything
 * else propagates.
 */
export function checkDeclarations(
    declarations: DeclarationFile,
    options: RunOptions = {},
    sourcePath = '<inline>',
): RunReport {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const quote = options.quote ?? declarations.quote ?? '"';
    const filter = options.filter ?? [];

    const currentPackage = PackageId.parse(declarations.package);
    const results: AttributeResult[] = [];

    for (const rule of declarations.rules) {
        const ruleLabel = `${currentPackage.toString()}:${rule.name}`;

        for (const [attribute, declaration] of Object.entries(rule.attributes)) {
            const qualified = `${rule.name}.${attribute}`;
            if (filter.length > 0 && !filter.some((p) => minimatch(qualified, p))) {
                logger.debug(`Skipping ${qualified} (filtered out)`);
                continue;
            }

            const result: AttributeResult = {
                rule: rule.name,
                attribute,
                type: declaration.type,
                ok: false,
                selectable: false,
            };

            try {
                const type = getAttrType(declaration.type);
                if (!type) {
                    throw new DeclarationError(`unknown attribute type '${declaration.type}'`, sourcePath);
                }

                const raw: RawValue = fromJs(declaration.value, sourcePath, qualified);
                const context = `attribute '${attribute}' of rule '${ruleLabel}'`;
                const value =
                    declaration.configurable === false
                        ? type.convert(raw, context, currentPackage)
                        : selectableConvert(type, raw, context, currentPackage);

                result.ok = true;
                result.selectable = value instanceof SelectorList;
                result.rendered = repr(value, quote);
                result.labels = collectLabels(type, value).map((l) => l.toString());
                logger.debug(`${qualified} = ${result.rendered}`);
            } catch (err) {
                if (!(err instanceof AttrError)) throw err;
                result.error = { code: err.code, message: err.message };
                logger.error(`${qualified}: ${err.message}`);
            }

            results.push(result);
        }
    }

    const errorCount = results.filter((r) => !r.ok).length;
    logger.info(
        `Checked ${pluralize('attribute', results.length, true)} in ${pluralize(
            'rule',
            declarations.rules.length,
            true,
        )}: ${errorCount === 0 ? 'no errors' : pluralize('error', errorCount, true)}`,
    );

    return { package: declarations.package, sourcePath, results, errorCount };
}

/**
 * Load a declaration file and check it.
 */
export async function runOnce(target: string, cwd: string, options: RunOptions = {}): Promise<RunReport> {
    const { declarations, sourcePath } = await loadDeclarations(target, cwd);
    return checkDeclarations(declarations, options, sourcePath);
}
