import * as fs from 'fs';
import * as path from 'path';
import type { BatchResult, LookupOutcome } from '../../types';
import { StoreError } from '../../utils/errors';

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function fileTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function safeLabel(label: string): string {
    const cleaned = label.trim().replace(/^\+/, '').replace(/[^\w]/g, '_');
    return cleaned === '' ? 'number' : cleaned;
}

/**
 * 💾 RESULT STORE
 * Flat timestamped JSON files in one directory.
 */
export class ResultStore {
    constructor(private readonly dir: string, private readonly clock: () => Date = () => new Date()) {}

    get directory(): string {
        return this.dir;
    }

    /**
     * @param label normalized number when normalization succeeded, otherwise the raw input
     */
    async saveSingle(label: string, outcome: LookupOutcome): Promise<string> {
        return this.write(`${safeLabel(label)}_${fileTimestamp(this.clock())}`, outcome);
    }

    async saveBulk(batch: BatchResult): Promise<string> {
        return this.write(`bulk_${fileTimestamp(this.clock())}`, batch);
    }

    /** Saved result files, most recent first. */
    async list(): Promise<string[]> {
        let names: string[];
        try {
            names = await fs.promises.readdir(this.dir);
        } catch (e: unknown) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return [];
            throw e;
        }
        return names.filter(n => n.endsWith('.json')).sort().reverse();
    }

    async read(filename: string): Promise<unknown> {
        if (filename !== path.basename(filename) || filename.startsWith('.') || !filename.endsWith('.json')) {
            throw new StoreError(`Not a result file name: ${filename}`, filename);
        }
        let contents: string;
        try {
            contents = await fs.promises.readFile(path.join(this.dir, filename), 'utf8');
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new StoreError(`Cannot read ${filename}: ${reason}`, filename);
        }
        try {
            return JSON.parse(contents);
        } catch (e: unknown) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new StoreError(`${filename} is not valid JSON: ${reason}`, filename);
        }
    }

    /** Never overwrites: a name taken within the same second gets a `_1`, `_2`... suffix. */
    private async write(baseName: string, value: unknown): Promise<string> {
        await fs.promises.mkdir(this.dir, { recursive: true });
        const contents = JSON.stringify(value, null, 2) + '\n';

        for (let attempt = 0; ; attempt++) {
            const filename = attempt === 0 ? `${baseName}.json` : `${baseName}_${attempt}.json`;
            const filePath = path.join(this.dir, filename);
            try {
                await fs.promises.writeFile(filePath, contents, { encoding: 'utf8', flag: 'wx' });
                return filePath;
            } catch (e: unknown) {
                if (e instanceof Error && 'code' in e && e.code === 'EEXIST') continue;
                throw e;
            }
        }
    }
}
