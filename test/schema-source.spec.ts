// test/schema-source.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {FileSchemaSource, InMemorySchemaSource, parseRecordType} from '../src/core/schema-source';
import {captureLogger, recordType} from './fixtures';

let root: string;

function writeSchema(rel: string, value: unknown) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, typeof value === 'string' ? value : JSON.stringify(value), 'utf8');
}

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-source-'));
});

afterEach(() => {
    fs.rmSync(root, {recursive: true, force: true});
});

describe('parseRecordType', () => {
    it('normalizes flags and unknown field types', () => {
        const parsed = parseRecordType({
            name: 'Invoice',
            module: 'Billing',
            istable: 0,
            fields: [
                {fieldname: 'customer', label: 'Customer', fieldtype: 'Link', reqd: 1, options: 'Customer'},
                {fieldname: 'geo', fieldtype: 'Map Widget', read_only: true, hidden: 1},
                {label: 'no name'},
            ],
        });

        expect(parsed).toEqual({
            ok: true,
            value: {
                name: 'Invoice',
                module: 'Billing',
                isTable: false,
                description: undefined,
                fields: [
                    {
                        name: 'customer',
                        label: 'Customer',
                        kind: 'Link',
                        required: true,
                        readOnly: false,
                        hidden: false,
                        options: 'Customer',
                        description: undefined,
                    },
                    {
                        name: 'geo',
                        label: 'geo',
                        kind: 'Data',
                        required: false,
                        readOnly: true,
                        hidden: true,
                        options: undefined,
                        description: undefined,
                    },
                ],
            },
        });
    });

    it('skips values without a name', () => {
        expect(parseRecordType({module: 'Billing'})).toEqual({ok: false, reason: 'schema has no "name"'});
        expect(parseRecordType([])).toEqual({ok: false, reason: 'schema is not a JSON object'});
    });
});

describe('InMemorySchemaSource', () => {
    it('lists non-table record types by module in name order', () => {
        const source = new InMemorySchemaSource([
            recordType('Payment', 'Billing'),
            recordType('Invoice Item', 'Billing', [], {isTable: true}),
            recordType('Invoice', 'Billing'),
            recordType('Customer', 'Selling'),
        ]);

        expect(source.listRecordTypes('Billing')).toEqual(['Invoice', 'Payment']);
        expect(source.listRecordTypes()).toEqual(['Customer', 'Invoice', 'Payment']);
        expect(source.exists('Invoice Item')).toBe(true);
        expect(source.getRecordType('Quote')).toEqual({ok: false, reason: 'record type "Quote" not found'});
    });
});

describe('FileSchemaSource', () => {
    it('indexes schema files matching the include globs', () => {
        writeSchema('billing/doctype/invoice/invoice.json', {name: 'Invoice', module: 'Billing', fields: []});
        writeSchema('billing/doctype/payment/payment.json', {name: 'Payment', module: 'Billing'});
        writeSchema('billing/doctype/invoice/notes.txt', 'not a schema');
        writeSchema('billing/fixtures/records.json', {name: 'Fixture'});
        const {logger} = captureLogger();

        const source = new FileSchemaSource({root, logger});

        expect(source.listRecordTypes()).toEqual(['Invoice', 'Payment']);
        expect(source.exists('Fixture')).toBe(false);
        expect(source.matches(path.join(root, 'billing/doctype/invoice/invoice.json'))).toBe(true);
        expect(source.matches(path.join(os.tmpdir(), 'elsewhere.json'))).toBe(false);
    });

    it('skips unreadable files with a warning', () => {
        writeSchema('billing/doctype/broken/broken.json', '{ nope');
        writeSchema('billing/doctype/invoice/invoice.json', {name: 'Invoice', module: 'Billing'});
        const {logger, lines} = captureLogger();

        const source = new FileSchemaSource({root, logger});

        expect(source.listRecordTypes()).toEqual(['Invoice']);
        expect(lines.some((l) => l.includes('Skipping schema file: cannot read'))).toBe(true);
    });

    it('picks up new files after reload', () => {
        writeSchema('billing/doctype/invoice/invoice.json', {name: 'Invoice', module: 'Billing'});
        const source = new FileSchemaSource({root, logger: captureLogger().logger});
        expect(source.listRecordTypes()).toEqual(['Invoice']);

        writeSchema('billing/doctype/payment/payment.json', {name: 'Payment', module: 'Billing'});
        expect(source.listRecordTypes()).toEqual(['Invoice']);

        source.reload();
        expect(source.listRecordTypes()).toEqual(['Invoice', 'Payment']);
    });
});
