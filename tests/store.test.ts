import fs from 'fs';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { ResultStore, fileTimestamp, safeLabel } from '../src/modules/store';
import { type BatchResult, ErrorKind, errorOutcome } from '../src/types';
import { StoreError } from '../src/utils/errors';
import { LOCAL_NOW, tempDir } from './helpers';

const batch: BatchResult = {
    country: 'BD',
    entries: [{ input: '12', outcome: errorOutcome(ErrorKind.InvalidInput, 'length out of range') }],
    total: 1,
    successful_count: 0,
    failed_count: 1,
    cancelled: false,
    started_at: '2026-01-02T03:04:05.000Z',
    finished_at: '2026-01-02T03:04:05.000Z',
};

describe('ResultStore', () => {
    it('formats local timestamps for file names', () => {
        expect(fileTimestamp(LOCAL_NOW)).toBe('20260102_030405');
    });

    it('turns labels into safe file name parts', () => {
        expect(safeLabel('+8801712345678')).toBe('8801712345678');
        expect(safeLabel(' +1 (202) ')).toBe('1__202_');
        expect(safeLabel('   ')).toBe('number');
    });

    it('saves a single outcome under the label and time', async () => {
        const dir = path.join(tempDir(), 'nested', 'results');
        const store = new ResultStore(dir, () => LOCAL_NOW);
        const outcome = errorOutcome(ErrorKind.NumberNotFound, 'Number not found by the lookup service');

        const saved = await store.saveSingle('+8801712345678', outcome);

        expect(saved).toBe(path.join(dir, '8801712345678_20260102_030405.json'));
        expect(fs.readFileSync(saved, 'utf8')).toBe(JSON.stringify(outcome, null, 2) + '\n');
    });

    it('adds a counter instead of overwriting a save from the same second', async () => {
        const dir = tempDir();
        const store = new ResultStore(dir, () => LOCAL_NOW);
        const first = errorOutcome(ErrorKind.NoData, 'No results found');
        const second = errorOutcome(ErrorKind.NumberNotFound, 'Number not found by the lookup service');

        const paths = [
            await store.saveSingle('+8801712345678', first),
            await store.saveSingle('+8801712345678', second),
            await store.saveSingle('+8801712345678', first),
        ];

        expect(paths.map(p => path.basename(p))).toEqual([
            '8801712345678_20260102_030405.json',
            '8801712345678_20260102_030405_1.json',
            '8801712345678_20260102_030405_2.json',
        ]);
        expect(await store.read('8801712345678_20260102_030405.json')).toEqual(first);
        expect(await store.read('8801712345678_20260102_030405_1.json')).toEqual(second);
    });

    it('lists result files newest name first and reads them back', async () => {
        const dir = tempDir();
        const store = new ResultStore(dir, () => LOCAL_NOW);
        await store.saveSingle('+8801712345678', errorOutcome(ErrorKind.NoData, 'No results found'));
        const bulk = await store.saveBulk(batch);
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

        expect(path.basename(bulk)).toBe('bulk_20260102_030405.json');
        expect(await store.list()).toEqual(['bulk_20260102_030405.json', '8801712345678_20260102_030405.json']);
        expect(await store.read('bulk_20260102_030405.json')).toEqual(batch);
    });

    it('lists nothing when the directory does not exist', async () => {
        const store = new ResultStore(path.join(tempDir(), 'absent'));
        expect(await store.list()).toEqual([]);
    });

    it('refuses names outside the results directory', async () => {
        const store = new ResultStore(tempDir());
        await expect(store.read('../secrets.json')).rejects.toBeInstanceOf(StoreError);
        await expect(store.read('.hidden.json')).rejects.toBeInstanceOf(StoreError);
        await expect(store.read('notes.txt')).rejects.toThrow('Not a result file name: notes.txt');
    });

    it('reports missing and corrupt files', async () => {
        const dir = tempDir();
        const store = new ResultStore(dir);
        fs.writeFileSync(path.join(dir, 'broken.json'), '{ nope');

        await expect(store.read('missing.json')).rejects.toThrow(/^Cannot read missing\.json/);
        await expect(store.read('broken.json')).rejects.toThrow(/^broken\.json is not valid JSON/);
    });
});
