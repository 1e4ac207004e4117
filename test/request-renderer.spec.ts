// test/request-renderer.spec.ts

import {describe, it, expect} from 'vitest';
import {buildStandardEndpoints, customMethodEndpoint} from '../src/core/endpoint-builder';
import {ok, skip} from '../src/core/errors';
import {buildRequestUrl, parseQuery, renderRequest, requestName} from '../src/core/request-renderer';
import type {EndpointDescriptor} from '../src/schema';
import {field, invoiceType} from './fixtures';

const BASE = {baseUrl: 'http://localhost:8000/'};

const [list, byId, create, update, remove, advanced] = buildStandardEndpoints('Invoice');

const submit = customMethodEndpoint({
    path: 'billing.billing.doctype.invoice.invoice.submit_invoice',
    methodName: 'submit_invoice',
    description: 'Remote method: submit_invoice',
    source: 'manifest',
});

function std(index: number): EndpointDescriptor {
    const all = [list, byId, create, update, remove, advanced];
    const found = all[index];
    if (!found) throw new Error(`no standard endpoint at ${index}`);
    return found;
}

describe('requestName', () => {
    it('names standard endpoints by method and path shape', () => {
        expect([0, 1, 2, 3, 4, 5].map((i) => requestName(std(i), 'Invoice'))).toEqual([
            'List Invoice Records',
            'Invoice by ID',
            'Create Invoice Record',
            'Update Invoice Record',
            'Delete Invoice Record',
            'Advanced Invoice Query',
        ]);
    });

    it('names custom methods after the method', () => {
        expect(requestName(submit, 'Invoice')).toBe('POST submit_invoice');
        expect(requestName({...submit, methodName: undefined}, 'Invoice')).toBe('POST Custom Method');
    });

    it('falls back to a generic operation name', () => {
        const patch: EndpointDescriptor = {
            method: 'PATCH',
            path: '/api/resource/Invoice',
            description: '',
            parameters: [],
            isCustomMethod: false,
        };
        expect(requestName(patch, 'Invoice')).toBe('PATCH Invoice Operation');
    });
});

describe('buildRequestUrl', () => {
    it('joins base and path and keeps placeholders', () => {
        expect(buildRequestUrl('http://localhost:8000/', '/api/resource/Invoice/{name}')).toEqual({
            raw: 'http://localhost:8000/api/resource/Invoice/{name}',
            scheme: 'http',
            host: 'localhost:8000',
            pathSegments: ['api', 'resource', 'Invoice', '{name}'],
            queryParams: [],
        });
    });

    it('decodes query parameters in order', () => {
        const url = buildRequestUrl('https://erp.example.com', 'api/method/run?filters=%5B%5D&fields=a+b&flag');

        expect(url.scheme).toBe('https');
        expect(url.host).toBe('erp.example.com');
        expect(url.pathSegments).toEqual(['api', 'method', 'run']);
        expect(url.queryParams).toEqual([
            {key: 'filters', value: '[]'},
            {key: 'fields', value: 'a b'},
            {key: 'flag', value: ''},
        ]);
    });

    it('keeps repeated keys', () => {
        expect(parseQuery('a=1&a=2')).toEqual([
            {key: 'a', value: '1'},
            {key: 'a', value: '2'},
        ]);
    });
});

describe('renderRequest', () => {
    it('leaves GET requests without a body', () => {
        const template = renderRequest(std(0), 'Invoice', ok(invoiceType), BASE);

        expect(template.name).toBe('List Invoice Records');
        expect(template.method).toBe('GET');
        expect(template.body).toBeUndefined();
        expect(template.headers).toEqual([
            {key: 'Content-Type', value: 'application/json'},
            {key: 'Authorization', value: 'token {{api_key}}'},
        ]);
        expect(template.description).toBe('Auto-generated API for Invoice record type');
    });

    it('builds the create body from writable fields only', () => {
        const template = renderRequest(std(2), 'Invoice', ok(invoiceType), BASE);

        expect(template.body?.mode).toBe('raw');
        expect(template.body?.contentType).toBe('application/json');
        expect(JSON.parse(template.body?.raw ?? '')).toEqual({
            doctype: 'Invoice',
            name: '',
            customer: '',
            posting_date: '',
            grand_total: 0,
            paid: 0,
            items: [],
        });
    });

    it('accepts a bare field list', () => {
        const template = renderRequest(std(3), 'Invoice', [field('rate', 'Float'), field('modified', 'Datetime')], BASE);

        expect(template.body?.raw).toBe('{\n  "doctype": "Invoice",\n  "name": "",\n  "rate": 0\n}');
    });

    it('falls back to a generic body when the schema lookup failed', () => {
        const template = renderRequest(std(2), 'Invoice', skip('record type "Invoice" not found'), BASE);

        expect(JSON.parse(template.body?.raw ?? '')).toEqual({
            doctype: 'Invoice',
            name: '',
            field1: '',
            field2: '',
            field3: '',
        });
    });

    it('gives custom methods an args/kwargs body and a detailed description', () => {
        const template = renderRequest(submit, 'Invoice', ok(invoiceType), BASE);

        expect(JSON.parse(template.body?.raw ?? '')).toEqual({args: ['arg1', 'arg2'], kwargs: {key: 'value'}});
        expect(template.description).toBe(
            [
                'Auto-generated API for Invoice record type',
                '',
                'Custom Method: submit_invoice',
                'Path: /api/method/billing.billing.doctype.invoice.invoice.submit_invoice',
                '',
                'Parameters:',
                '- args (body): Method arguments',
                '- kwargs (body): Method keyword arguments',
            ].join('\n'),
        );
    });
});
