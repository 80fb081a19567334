import fs from 'fs';
import path from 'path';
import dayjs from 'dayjs';
import { CacheFileData, CacheItem, TranslationStatus } from './types';

export const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

function isCacheItem(value: unknown): value is CacheItem {
    if (typeof value !== 'object' || value === null) return false;
    return 'index' in value && Number.isInteger(value.index)
        && 'source' in value && typeof value.source === 'string'
        && 'status' in value && (value.status === 'untranslated' || value.status === 'translated' || value.status === 'failed');
}

/**
 * TranslationCache - per-file record of every entry and its translation,
 * saved after each batch so an interrupted run can pick up where it stopped
 */
export class TranslationCache {
    private items: Map<number, CacheItem> = new Map();

    constructor(
        readonly name: string,
        readonly sourceLanguage: string,
        readonly targetLanguage: string,
        private dataDir: string = 'data'
    ) {}

    get filePath(): string {
        const safeName = this.name.replace(/[^\w.-]+/g, '_');
        return path.join(this.dataDir, `${safeName}.${this.targetLanguage.replace(/[^\w.-]+/g, '_')}.cache.json`);
    }

    /**
     * Load the stored cache for `name`, or start an empty one when there is none
     * (or when the stored one was made for other languages)
     */
    static async open(name: string, sourceLanguage: string, targetLanguage: string, dataDir = 'data'): Promise<TranslationCache> {
        const cache = new TranslationCache(name, sourceLanguage, targetLanguage, dataDir);

        let raw: string;
        try {
            raw = await fs.promises.readFile(cache.filePath, 'utf8');
        } catch (error) {
            if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
                return cache;
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            console.warn(`⚠️ Cache ${cache.filePath} is not valid JSON (${error instanceof Error ? error.message : error}), starting fresh.`);
            return cache;
        }
        if (typeof data !== 'object' || data === null || !('items' in data) || !Array.isArray(data.items)) {
            console.warn(`⚠️ Cache ${cache.filePath} is malformed, starting fresh.`);
            return cache;
        }
        if ('sourceLanguage' in data && data.sourceLanguage !== sourceLanguage) {
            console.warn(`⚠️ Cache ${cache.filePath} was made from ${String(data.sourceLanguage)}, starting fresh.`);
            return cache;
        }

        for (const item of data.items) {
            if (isCacheItem(item)) {
                cache.addItem(item);
            }
        }
        console.log(`📂 Loaded ${cache.items.size} cached item(s) from ${cache.filePath}`);
        return cache;
    }

    addItem(item: CacheItem): void {
        this.items.set(item.index, { ...item });
    }

    /**
     * Make the cache hold exactly these sources. Items whose source text changed start over.
     */
    syncSources(sources: string[]): void {
        const next: Map<number, CacheItem> = new Map();
        sources.forEach((source, index) => {
            const existing = this.items.get(index);
            next.set(index, existing && existing.source === source
                ? existing
                : { index, source, status: 'untranslated' });
        });
        this.items = next;
    }

    getItem(index: number): CacheItem | undefined {
        const item = this.items.get(index);
        return item ? { ...item } : undefined;
    }

    getAllItems(): CacheItem[] {
        return Array.from(this.items.values())
            .sort((a, b) => a.index - b.index)
            .map(item => ({ ...item }));
    }

    /**
     * Items still needing a translation, failed ones included
     */
    getPending(): CacheItem[] {
        return this.getAllItems().filter(item => item.status !== 'translated');
    }

    markTranslated(index: number, translation: string, model: string): void {
        this.update(index, {
            status: 'translated',
            translation,
            model,
            translatedAt: dayjs().format(TIMESTAMP_FORMAT)
        });
    }

    markFailed(index: number): void {
        this.update(index, { status: 'failed' });
    }

    countByStatus(): Record<TranslationStatus, number> {
        const counts: Record<TranslationStatus, number> = { untranslated: 0, translated: 0, failed: 0 };
        for (const item of this.items.values()) {
            counts[item.status]++;
        }
        return counts;
    }

    private update(index: number, changes: Partial<CacheItem>): void {
        const item = this.items.get(index);
        if (!item) {
            throw new Error(`No cache item with index ${index}`);
        }
        this.items.set(index, { ...item, ...changes, index });
    }

    toJSON(): CacheFileData {
        return {
            name: this.name,
            sourceLanguage: this.sourceLanguage,
            targetLanguage: this.targetLanguage,
            items: this.getAllItems(),
            lastUpdate: dayjs().format(TIMESTAMP_FORMAT)
        };
    }

    async save(): Promise<void> {
        await fs.promises.mkdir(this.dataDir, { recursive: true });
        await fs.promises.writeFile(this.filePath, JSON.stringify(this.toJSON(), null, 2));
    }
}
