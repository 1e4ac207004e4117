// test/method-discovery.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {EndpointBuilder} from '../src/core/endpoint-builder';
import {ConfigError} from '../src/core/errors';
import {MethodCache, MethodDiscovery, MethodRegistry} from '../src/core/method-discovery';
import {InMemorySchemaSource} from '../src/core/schema-source';
import {findMarkedFunctions, modulePathFor, scanSources} from '../src/core/source-scanner';
import type {DiscoveredMethod} from '../src/schema';
import {captureLogger, recordType} from './fixtures';

let tmp: string;
let pkgRoot: string;

function write(rel: string, content: string) {
    const abs = path.join(pkgRoot, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, content, 'utf8');
}

beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'method-discovery-'));
    pkgRoot = path.join(tmp, 'billing');

    write('accounts/doctype/invoice/invoice.py', [
        'import frappe',
        '',
        '@frappe.whitelist()',
        'def submit_invoice(name):',
        '    pass',
        '',
        'def helper():',
        '    pass',
    ].join('\n'));
    write('accounts/doctype/invoice/test_invoice.py', 'def test_it():\n    pass\n');
    write('api.py', [
        '@frappe.whitelist(allow_guest=True)',
        '# public',
        'async def ping():',
        '    return "pong"',
    ].join('\n'));
    write('__init__.py', '@whitelist\ndef version():\n    return "1"\n');
    write('__pycache__/api.py', '@whitelist\ndef stale():\n    pass\n');
});

afterEach(() => {
    fs.rmSync(tmp, {recursive: true, force: true});
});

describe('findMarkedFunctions', () => {
    it('takes the first definition within the lookahead window', () => {
        const content = ['@frappe.whitelist()', '', '', '', '', 'def too_far():', '@whitelist', 'def near(): pass'].join('\n');

        expect(findMarkedFunctions(content)).toEqual([{methodName: 'near', line: 8}]);
    });
});

describe('modulePathFor', () => {
    it('converts a file path to a dotted import path', () => {
        expect(modulePathFor('accounts/doctype/invoice/invoice.py', 'billing', 'submit')).toBe(
            'billing.accounts.doctype.invoice.invoice.submit',
        );
        expect(modulePathFor('__init__.py', 'billing', 'version')).toBe('billing.version');
        expect(modulePathFor('billing/api.py', 'billing', 'ping')).toBe('billing.api.ping');
    });
});

describe('scanSources', () => {
    it('finds controller methods first, then the rest of the package', () => {
        const methods = scanSources({sourceRoot: pkgRoot, logger: captureLogger().logger});

        expect(methods[0]).toEqual({
            path: 'billing.accounts.doctype.invoice.invoice.submit_invoice',
            methodName: 'submit_invoice',
            description: 'Remote method: submit_invoice',
            source: 'accounts/doctype/invoice/invoice.py',
        });
        expect(methods.map((m) => m.path).sort()).toEqual([
            'billing.accounts.doctype.invoice.invoice.submit_invoice',
            'billing.api.ping',
            'billing.version',
        ]);
    });

    it('logs and skips a file that cannot be read', () => {
        const {logger, lines} = captureLogger();
        const controller = path.join('invoice', 'invoice.py');

        const methods = scanSources({
            sourceRoot: pkgRoot,
            logger,
            readFile: (abs) => {
                if (abs.endsWith(controller)) throw new Error('EACCES');
                return fs.readFileSync(abs, 'utf8');
            },
        });

        expect(methods.map((m) => m.path).sort()).toEqual(['billing.api.ping', 'billing.version']);
        expect(lines.some((l) => l.includes('Cannot read accounts/doctype/invoice/invoice.py, skipping.'))).toBe(true);
    });

    it('returns nothing for a missing root', () => {
        const {logger, lines} = captureLogger();
        expect(scanSources({sourceRoot: path.join(tmp, 'missing'), logger})).toEqual([]);
        expect(lines[0]).toContain('does not exist; skipping scan.');
    });
});

describe('MethodRegistry', () => {
    it('rejects paths that are not dotted', () => {
        const registry = new MethodRegistry();
        expect(() => registry.register({grouping: 'Billing', path: 'submit'})).toThrow(ConfigError);
    });
});

describe('MethodCache', () => {
    it('expires entries after the ttl', () => {
        let now = 1_000;
        const cache = new MethodCache(100, () => now);
        cache.set('Billing', []);

        now = 1_099;
        expect(cache.get('Billing')).toEqual([]);
        now = 1_100;
        expect(cache.get('Billing')).toBeUndefined();
    });

    it('is not affected by changes to the lists it hands out', () => {
        const ping: DiscoveredMethod = {path: 'billing.api.ping', methodName: 'ping', description: 'd', source: 'manifest'};
        const cache = new MethodCache();
        const stored = [ping];
        cache.set('Billing', stored);
        stored.push({...ping, path: 'billing.api.other'});

        const first = cache.get('Billing') ?? [];
        first.pop();
        const second = cache.get('Billing') ?? [];
        const entry = second[0];
        if (entry) entry.path = 'changed';

        expect(cache.get('Billing')).toEqual([ping]);
    });
});

describe('MethodDiscovery', () => {
    it('lists manifest entries before registry entries and skips the scan', () => {
        const discovery = new MethodDiscovery({
            config: {
                manifest: {Billing: ['billing.api.ping', 'not_dotted']},
                methods: [{grouping: 'Billing', path: 'billing.api.refund', description: 'Refund a payment'}],
            },
            sourceRoot: pkgRoot,
            logger: captureLogger().logger,
        });

        expect(discovery.discoverMethods('Billing')).toEqual([
            {path: 'billing.api.ping', methodName: 'ping', description: 'Remote method from manifest: ping', source: 'manifest'},
            {path: 'billing.api.refund', methodName: 'refund', description: 'Refund a payment', source: 'registry'},
        ]);
    });

    it('falls back to scanning when nothing is declared', () => {
        const discovery = new MethodDiscovery({sourceRoot: pkgRoot, logger: captureLogger().logger});

        expect(discovery.discoverMethods('Billing')).toHaveLength(3);
    });

    it('appends scanned methods in always mode without duplicating paths', () => {
        const discovery = new MethodDiscovery({
            config: {manifest: {Billing: ['billing.api.ping']}, scan: 'always'},
            sourceRoot: pkgRoot,
            logger: captureLogger().logger,
        });

        const paths = discovery.discoverMethods('Billing').map((m) => m.path);

        expect(paths[0]).toBe('billing.api.ping');
        expect(paths).toHaveLength(3);
    });

    it('never scans in off mode', () => {
        const discovery = new MethodDiscovery({config: {scan: 'off'}, sourceRoot: pkgRoot, logger: captureLogger().logger});
        expect(discovery.discoverMethods('Billing')).toEqual([]);
    });

    it('serves repeat lookups from the cache', () => {
        let now = 0;
        const discovery = new MethodDiscovery({
            sourceRoot: pkgRoot,
            cache: new MethodCache(1_000, () => now),
            logger: captureLogger().logger,
        });

        expect(discovery.discoverMethods('Billing')).toHaveLength(3);
        write('extra.py', '@whitelist\ndef added():\n    pass\n');
        expect(discovery.discoverMethods('Billing')).toHaveLength(3);

        now = 1_000;
        expect(discovery.discoverMethods('Billing')).toHaveLength(4);
    });

    it('only returns scanned methods from the grouping\'s module directory', () => {
        write('selling/api.py', '@whitelist\ndef make_quote():\n    pass\n');
        const discovery = new MethodDiscovery({sourceRoot: pkgRoot, logger: captureLogger().logger});

        expect(discovery.discoverMethods('Accounts').map((m) => m.path)).toEqual([
            'billing.accounts.doctype.invoice.invoice.submit_invoice',
        ]);
        expect(discovery.discoverMethods('Selling').map((m) => m.path)).toEqual(['billing.selling.api.make_quote']);
        expect(discovery.discoverMethods('HR')).toEqual([]);
    });

    it('scans a grouping\'s own package root when one is configured', () => {
        const hrRoot = path.join(tmp, 'hr');
        fs.mkdirSync(hrRoot, {recursive: true});
        fs.writeFileSync(path.join(hrRoot, 'api.py'), '@whitelist\ndef onboard():\n    pass\n', 'utf8');

        const discovery = new MethodDiscovery({
            sourceRoot: pkgRoot,
            sourceRoots: {HR: hrRoot},
            logger: captureLogger().logger,
        });

        expect(discovery.discoverMethods('HR').map((m) => m.path)).toEqual(['hr.api.onboard']);
        expect(discovery.discoverMethods('Selling')).toEqual([]);
    });

    it('does not give a record type custom methods from another grouping', () => {
        const {logger} = captureLogger();
        const schema = new InMemorySchemaSource([recordType('Invoice', 'Selling')]);
        const builder = new EndpointBuilder({
            schema,
            discovery: new MethodDiscovery({sourceRoot: pkgRoot, logger}),
            logger,
        });

        const endpoints = builder.buildCrudEndpoints('Invoice');

        expect(endpoints).toHaveLength(6);
        expect(endpoints.some((e) => e.isCustomMethod)).toBe(false);
    });
});
