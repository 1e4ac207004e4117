// test/runner.spec.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, it, expect} from 'vitest';
import {loadSyncConfig} from '../src/core/config-loader';
import {ConfigError} from '../src/core/errors';
import {initConfig} from '../src/core/init-config';
import {createContext, requireSyncer, runOnce} from '../src/core/runner';
import {fakeCollectionService} from './fake-remote';
import {captureLogger} from './fixtures';

let root: string;

function write(rel: string, value: unknown) {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, JSON.stringify(value), 'utf8');
}

beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-'));
    write('.postman-sync/config.json', {
        workspaceId: 'ws-1',
        collectionId: 'col-1',
        baseUrl: 'http://localhost:8000',
    });
    write('billing/doctype/invoice/invoice.json', {name: 'Invoice', module: 'Billing', fields: []});
});

afterEach(() => {
    fs.rmSync(root, {recursive: true, force: true});
});

describe('createContext', () => {
    it('wires the services from the config', async () => {
        const ctx = await createContext(root, {env: {}, logger: captureLogger().logger});

        expect(ctx.schema.listRecordTypes()).toEqual(['Invoice']);
        expect(ctx.store.statePathAbs).toBe(path.join(root, '.postman-sync', 'state.json'));
        expect(ctx.syncer).toBeUndefined();
        expect(() => requireSyncer(ctx)).toThrow(ConfigError);
    });
});

describe('runOnce', () => {
    it('skips while auto-sync is off', async () => {
        const remote = fakeCollectionService('col-1', {info: {name: 'API'}, item: []});

        const result = await runOnce(root, {
            env: {POSTMAN_API_KEY: 'test-secret'},
            adapter: remote.adapter,
            logger: captureLogger().logger,
        });

        expect(result).toEqual({status: 'skipped', reason: 'auto-sync disabled'});
        expect(remote.calls).toEqual([]);
    });

    it('pushes stored records when forced', async () => {
        const remote = fakeCollectionService('col-1', {info: {name: 'API'}, item: []});
        const options = {env: {POSTMAN_API_KEY: 'test-secret'}, adapter: remote.adapter, logger: captureLogger().logger};
        const ctx = await createContext(root, options);
        ctx.store.updateSettings({status: 'Active'});
        await ctx.generator.generateForRecordType('Invoice');

        const result = await runOnce(root, {...options, force: true});

        expect(result).toEqual({status: 'synced', collectionId: 'col-1', folders: ['Invoice'], itemCount: 1});
        expect(remote.calls.map((c) => c.apiKey)).toEqual(['test-secret', 'test-secret']);
    });
});

describe('initConfig', () => {
    it('writes a starter config that loads', async () => {
        const dir = path.join(root, 'fresh');

        const first = await initConfig(dir);
        const second = await initConfig(dir);
        const forced = await initConfig(dir, {force: true});

        expect(first).toEqual({
            dir: path.join(dir, '.postman-sync'),
            configPath: path.join(dir, '.postman-sync', 'config.ts'),
            created: true,
        });
        expect(second.created).toBe(false);
        expect(forced.created).toBe(true);

        const loaded = await loadSyncConfig(dir, {env: {}});
        expect(loaded.config).toMatchObject({
            workspaceId: '<workspace-id>',
            collectionId: '<collection-id>',
            baseUrl: 'http://localhost:8000',
            autoSync: false,
        });
    });
});
