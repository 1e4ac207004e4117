// test/state-store.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {isGenerationRecord, StateStore} from '../src/core/state-store';
import type {ModuleGenerationRecord, SingleGenerationRecord} from '../src/schema';

let root: string;

const invoiceRecord: SingleGenerationRecord = {
    kind: 'single',
    name: 'Invoice',
    targetName: 'Invoice',
    moduleName: 'Billing',
    endpoints: [
        {method: 'GET', path: '/api/resource/Invoice', description: 'list', parameters: [], isCustomMethod: false},
    ],
    status: 'Active',
    autoGenerate: true,
    createdByHook: false,
    updatedAt: '2026-01-02T03:04:05.000Z',
};

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'state-store-'));
});

afterEach(() => {
    fs.rmSync(root, {recursive: true, force: true});
});

describe('StateStore', () => {
    it('starts empty and Inactive when no file exists', () => {
        const store = new StateStore(root, '.postman-sync/state.json');
        store.load();

        expect(store.list()).toEqual([]);
        expect(store.getSettings()).toEqual({status: 'Inactive'});
    });

    it('round-trips records and settings through the file', () => {
        const store = new StateStore(root, '.postman-sync/state.json');
        store.load();
        store.set(invoiceRecord);
        store.updateSettings({status: 'Active', lastSync: '2026-01-02T04:00:00.000Z'});
        store.save();

        const reloaded = new StateStore(root, '.postman-sync/state.json');
        reloaded.load();

        expect(reloaded.get('Invoice')).toEqual(invoiceRecord);
        expect(reloaded.getSettings()).toEqual({status: 'Active', lastSync: '2026-01-02T04:00:00.000Z'});
        expect(fs.existsSync(path.join(root, '.postman-sync/state.json'))).toBe(true);
    });

    it('filters by status', () => {
        const store = new StateStore(root, 'state.json');
        store.set(invoiceRecord);
        store.set({...invoiceRecord, name: 'Payment', targetName: 'Payment', status: 'Inactive'});

        expect(store.list('Active').map((r) => r.name)).toEqual(['Invoice']);
        expect(store.list().map((r) => r.name)).toEqual(['Invoice', 'Payment']);
    });

    it('resets on a version mismatch', () => {
        fs.writeFileSync(path.join(root, 'state.json'), JSON.stringify({version: 7, records: {}}), 'utf8');
        const store = new StateStore(root, 'state.json');
        store.set(invoiceRecord);

        store.load();

        expect(store.has('Invoice')).toBe(false);
    });

    it('drops malformed records and keeps the rest', () => {
        fs.writeFileSync(
            path.join(root, 'state.json'),
            JSON.stringify({
                version: 1,
                settings: {status: 'Error'},
                records: {Invoice: invoiceRecord, Broken: {kind: 'single', name: 'Broken'}},
            }),
            'utf8',
        );
        const store = new StateStore(root, 'state.json');

        store.load();

        expect(store.list().map((r) => r.name)).toEqual(['Invoice']);
        expect(store.getSettings().status).toBe('Error');
    });
});

describe('isGenerationRecord', () => {
    const moduleRecord = {
        kind: 'module',
        name: 'Billing Module',
        targetName: 'Billing',
        moduleName: 'Billing',
        status: 'Active',
        autoGenerate: false,
        createdByHook: false,
        updatedAt: '2026-01-02T03:04:05.000Z',
        endpoints: {Invoice: invoiceRecord.endpoints},
    };

    it('accepts module records with endpoint maps', () => {
        expect(isGenerationRecord(moduleRecord)).toBe(true);
        expect(isGenerationRecord({...moduleRecord, endpoints: []})).toBe(false);
    });

    it('rejects endpoints that could not be rendered', () => {
        const listEndpoint = invoiceRecord.endpoints[0];
        const withEndpoint = (endpoint: unknown) => ({...invoiceRecord, endpoints: [endpoint]});
        const withParameter = (parameter: unknown) => withEndpoint({...listEndpoint, parameters: [parameter]});
        const param = {name: 'name', kind: 'path', description: 'Document name', required: true};

        expect(isGenerationRecord(withParameter(param))).toBe(true);
        expect(isGenerationRecord(withEndpoint({...listEndpoint, method: 'HEAD'}))).toBe(false);
        expect(isGenerationRecord(withEndpoint({method: 'POST', path: '/api/method/x', description: 'x', isCustomMethod: true}))).toBe(false);
        expect(isGenerationRecord(withEndpoint({...listEndpoint, isCustomMethod: 'no'}))).toBe(false);
        expect(isGenerationRecord(withEndpoint({...listEndpoint, description: undefined}))).toBe(false);
        expect(isGenerationRecord(withParameter({...param, kind: 'header'}))).toBe(false);
        expect(isGenerationRecord(withParameter({...param, required: 'yes'}))).toBe(false);
        expect(isGenerationRecord({...invoiceRecord, autoGenerate: undefined})).toBe(false);
    });
});

describe('StateStore record keys', () => {
    it('drops records with an unknown method on load and keeps the rest', () => {
        fs.writeFileSync(
            path.join(root, 'state.json'),
            JSON.stringify({
                version: 1,
                settings: {status: 'Active'},
                records: {
                    Invoice: invoiceRecord,
                    Payment: {
                        ...invoiceRecord,
                        name: 'Payment',
                        targetName: 'Payment',
                        endpoints: [{method: 'HEAD', path: '/api/resource/Payment'}],
                    },
                },
            }),
            'utf8',
        );
        const store = new StateStore(root, 'state.json');

        store.load();

        expect(store.list().map((r) => r.name)).toEqual(['Invoice']);
        expect(store.has('Payment')).toBe(false);
    });

    it('keeps a single record and a module record with the same name apart', () => {
        const store = new StateStore(root, 'state.json');
        const single: SingleGenerationRecord = {...invoiceRecord, name: 'Billing Module', targetName: 'Billing Module'};
        const moduleRec: ModuleGenerationRecord = {
            kind: 'module',
            name: 'Billing Module',
            targetName: 'Billing',
            moduleName: 'Billing',
            endpoints: {Invoice: invoiceRecord.endpoints},
            status: 'Active',
            autoGenerate: false,
            createdByHook: false,
            updatedAt: '2026-01-02T03:04:05.000Z',
        };

        store.set(moduleRec);
        store.set(single);
        store.save();
        const reloaded = new StateStore(root, 'state.json');
        reloaded.load();

        expect(reloaded.get('Billing Module')).toEqual(single);
        expect(reloaded.get('Billing Module', 'module')).toEqual(moduleRec);
        expect(reloaded.list()).toHaveLength(2);
    });
});
