/**
 * Unit tests for ProfileDataStore
 */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { OutputError } from '../../../src/domain/errors/ProfileToolError';
import { ProfileDataStore } from '../../../src/infrastructure/storage/ProfileDataStore';
import { sampleRecord } from '../../helpers/sampleRecord';

describe('ProfileDataStore', () => {
    let dir: string;
    let store: ProfileDataStore;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'profile-store-'));
        store = new ProfileDataStore();
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('should save and load a record', async () => {
        const filePath = path.join(dir, 'data', 'profile_raw.json');
        const record = sampleRecord();

        await store.save(record, filePath);

        expect(await store.exists(filePath)).toBe(true);
        expect(await store.load(filePath)).toEqual(record);
    });

    it('should reject data that is not a profile record', async () => {
        const filePath = path.join(dir, 'profile_raw.json');
        await fs.writeFile(filePath, JSON.stringify({ name: 'Jane Placeholder' }), 'utf-8');

        await expect(store.load(filePath)).rejects.toThrow(OutputError);
        await expect(store.load(filePath)).rejects.toThrow("must have required property 'contact'");
    });

    it('should reject unreadable files', async () => {
        await expect(store.load(path.join(dir, 'missing.json'))).rejects.toThrow('Failed to read profile data');
        expect(await store.exists(path.join(dir, 'missing.json'))).toBe(false);
    });
});
