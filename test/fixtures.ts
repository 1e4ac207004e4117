// test/fixtures.ts

import type {FieldSchema, FieldType, RecordTypeSchema} from '../src/schema';
import {Logger, type LogSink} from '../src/util/logger';

export function field(name: string, kind: FieldType = 'Data', extra: Partial<FieldSchema> = {}): FieldSchema {
    return {name, label: name, kind, required: false, readOnly: false, hidden: false, ...extra};
}

export function recordType(
    name: string,
    module: string,
    fields: FieldSchema[] = [],
    extra: Partial<RecordTypeSchema> = {},
): RecordTypeSchema {
    return {name, module, isTable: false, fields, ...extra};
}

export const invoiceType = recordType('Invoice', 'Billing', [
    field('customer', 'Link', {required: true, options: 'Customer'}),
    field('posting_date', 'Date'),
    field('grand_total', 'Currency'),
    field('paid', 'Check'),
    field('items', 'Table', {options: 'Invoice Item'}),
    field('details', 'Section Break'),
    field('status', 'Select', {readOnly: true, options: 'Draft\nPaid'}),
    field('owner'),
]);

/**
 * Logger writing into an array instead of the console.
 */
export function captureLogger(): {logger: Logger; lines: string[]} {
    const lines: string[] = [];
    const push = (line: string) => {
        lines.push(line);
    };
    const sink: LogSink = {error: push, warn: push, info: push, debug: push};
    return {logger: new Logger({level: 'debug', prefix: '[test]', sink}), lines};
}
