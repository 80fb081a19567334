import fs from 'fs';
import os from 'os';
import path from 'path';
import { TranslationCache } from './TranslationCache';

describe('TranslationCache', () => {
  let dir: string;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'translation-cache-'));
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should name the file after the input and target language', () => {
    const cache = new TranslationCache('my file.json', 'Japanese', 'Simplified Chinese', dir);
    expect(cache.filePath).toBe(path.join(dir, 'my_file.json.Simplified_Chinese.cache.json'));
  });

  it('should start empty when nothing is stored', async () => {
    const cache = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    expect(cache.getAllItems()).toEqual([]);
  });

  it('should track status and survive a save and reopen', async () => {
    const cache = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    cache.syncSources(['はい', 'いいえ', '']);
    cache.markTranslated(0, 'Yes', 'test-model');
    cache.markFailed(1);
    await cache.save();

    const reopened = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    expect(reopened.countByStatus()).toEqual({ untranslated: 1, translated: 1, failed: 1 });
    expect(reopened.getItem(0)).toMatchObject({ source: 'はい', translation: 'Yes', model: 'test-model' });
    expect(reopened.getItem(0)?.translatedAt).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(reopened.getPending().map(item => item.index)).toEqual([1, 2]);
  });

  it('should reset items whose source changed and drop removed ones', () => {
    const cache = new TranslationCache('game.json', 'Japanese', 'English', dir);
    cache.syncSources(['a', 'b', 'c']);
    cache.markTranslated(0, 'A', 'test-model');
    cache.markTranslated(1, 'B', 'test-model');

    cache.syncSources(['a', 'changed']);
    expect(cache.getAllItems()).toEqual([
      expect.objectContaining({ index: 0, source: 'a', status: 'translated', translation: 'A' }),
      { index: 1, source: 'changed', status: 'untranslated' }
    ]);
  });

  it('should start fresh when the stored cache has another source language', async () => {
    const cache = new TranslationCache('game.json', 'Korean', 'English', dir);
    cache.syncSources(['안녕']);
    await cache.save();

    const reopened = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    expect(reopened.getAllItems()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(`⚠️ Cache ${reopened.filePath} was made from Korean, starting fresh.`);
  });

  it('should start fresh when the stored cache was cut off mid-write', async () => {
    const cache = new TranslationCache('game.json', 'Japanese', 'English', dir);
    fs.writeFileSync(cache.filePath, '{"items": [');

    const reopened = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    expect(reopened.getAllItems()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toContain(`⚠️ Cache ${cache.filePath} is not valid JSON`);
  });

  it('should start fresh when the stored cache is malformed', async () => {
    const cache = new TranslationCache('game.json', 'Japanese', 'English', dir);
    fs.writeFileSync(cache.filePath, JSON.stringify({ foo: 1 }));

    const reopened = await TranslationCache.open('game.json', 'Japanese', 'English', dir);
    expect(reopened.getAllItems()).toEqual([]);
    expect(warn).toHaveBeenCalledWith(`⚠️ Cache ${cache.filePath} is malformed, starting fresh.`);
  });

  it('should return copies of items', () => {
    const cache = new TranslationCache('game.json', 'Japanese', 'English', dir);
    cache.syncSources(['a']);
    const item = cache.getItem(0);
    if (item) {
      item.source = 'mutated';
    }
    expect(cache.getItem(0)?.source).toBe('a');
  });

  it('should refuse to update an unknown item', () => {
    const cache = new TranslationCache('game.json', 'Japanese', 'English', dir);
    expect(() => cache.markFailed(5)).toThrow('No cache item with index 5');
  });
});
