import Ajv, { ValidateFunction } from 'ajv';
import fs from 'fs/promises';
import path from 'path';
import profileRecordSchema from '../../../assets/profile-record.schema.json';
import { ProfileRecord } from '../../domain/entities/ProfileRecord';
import { OutputError } from '../../domain/errors/ProfileToolError';

/**
 * Persists the raw (unredacted) record. Only used when raw data is kept
 * on purpose; deletion belongs to RawDataRetentionService.
 */
export class ProfileDataStore {
    private readonly validate: ValidateFunction<ProfileRecord>;

    constructor() {
        const ajv = new Ajv({ allErrors: true });
        this.validate = ajv.compile<ProfileRecord>(profileRecordSchema);
    }

    async save(record: ProfileRecord, filePath: string): Promise<void> {
        try {
            await fs.mkdir(path.dirname(filePath), { recursive: true });
            await fs.writeFile(filePath, JSON.stringify(record, null, 2), 'utf-8');
            console.log(`[ProfileDataStore] Raw profile data saved to ${filePath}`);
        } catch (error) {
            throw new OutputError(`Failed to save raw profile data: ${error instanceof Error ? error.message : String(error)}`, filePath);
        }
    }

    /**
     * Loads and validates a saved record.
     * @throws OutputError when the file is unreadable or not a profile record
     */
    async load(filePath: string): Promise<ProfileRecord> {
        let data: unknown;
        try {
            data = JSON.parse(await fs.readFile(filePath, 'utf-8'));
        } catch (error) {
            throw new OutputError(`Failed to read profile data: ${error instanceof Error ? error.message : String(error)}`, filePath);
        }

        if (!this.validate(data)) {
            const problems = (this.validate.errors ?? [])
                .map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
                .join('; ');
            throw new OutputError(`Profile data in ${filePath} is not a valid profile record: ${problems}`, filePath);
        }
        return data;
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fs.access(filePath);
            return true;
        } catch {
            return false;
        }
    }
}
