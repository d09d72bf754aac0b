/**
 * RawDataRetentionService - lifecycle of the unredacted profile data
 *
 * 1. Deletes raw data files (the only component that does)
 * 2. Generates deletion certificates for the audit trail
 */
import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { RawDataRemover, RemovalResult } from '../../application/services/ComplianceAuditor';

/**
 * Deletion certificate for audit trail
 */
export interface DeletionCertificate {
    /** Unique certificate ID */
    certificateId: string;
    /** Files that were deleted */
    deletedPaths: string[];
    /** Timestamp of deletion */
    deletedAt: Date;
    /** Retention period that was applied (hours) */
    retentionHoursApplied: number;
    /** SHA-256 hash of deletion operation for integrity */
    operationHash: string;
    /** Whether deletion was successful */
    success: boolean;
    /** Any errors encountered */
    errors?: string[];
}

export interface RawDataRetentionConfig {
    /** Retention period in hours (default: 0, delete as soon as possible) */
    retentionHours: number;
    /** Directory to store deletion certificates; none are written when unset */
    certificateDir?: string;
}

const DEFAULT_CONFIG: RawDataRetentionConfig = {
    retentionHours: 0,
};

export class RawDataRetentionService implements RawDataRemover {
    private readonly config: RawDataRetentionConfig;

    constructor(config?: Partial<RawDataRetentionConfig>) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    /**
     * Deletes the given files. Missing files are neither deleted nor errors.
     * The certificate id is returned once the certificate is on disk.
     */
    async deleteFiles(paths: string[]): Promise<RemovalResult> {
        const deleted: string[] = [];
        const errors: string[] = [];

        for (const filePath of paths) {
            if (!(await this.pathExists(filePath))) continue;
            try {
                await fs.unlink(filePath);
                deleted.push(filePath);
            } catch (e) {
                errors.push(`Failed to delete ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
            }
        }

        if (deleted.length === 0) {
            return { deleted, errors };
        }

        console.log(`[RawDataRetention] Deleted ${deleted.length} raw data file(s)`);
        const certificate = await this.generateDeletionCertificate(deleted, errors.length === 0, errors.length > 0 ? errors : undefined);
        const persisted = this.config.certificateDir
            ? await this.persistCertificate(this.config.certificateDir, certificate)
            : false;
        return persisted ? { deleted, errors, certificateId: certificate.certificateId } : { deleted, errors };
    }

    /**
     * Generate a deletion certificate for audit trail
     */
    async generateDeletionCertificate(
        deletedPaths: string[],
        success: boolean,
        errors?: string[]
    ): Promise<DeletionCertificate> {
        const certificateId = crypto.randomUUID();
        const deletedAt = new Date();

        const hashInput = `${certificateId}:${deletedPaths.join(',')}:${deletedAt.toISOString()}`;
        const operationHash = crypto.createHash('sha256').update(hashInput).digest('hex');

        const certificate: DeletionCertificate = {
            certificateId,
            deletedPaths,
            deletedAt,
            retentionHoursApplied: this.config.retentionHours,
            operationHash,
            success,
            errors,
        };

        return certificate;
    }

    private async persistCertificate(certDir: string, certificate: DeletionCertificate): Promise<boolean> {
        try {
            await fs.mkdir(certDir, { recursive: true });

            const filename = `deletion_${certificate.certificateId}.json`;
            await fs.writeFile(path.join(certDir, filename), JSON.stringify(certificate, null, 2), 'utf-8');
            console.log(`[RawDataRetention] Deletion certificate saved: ${filename}`);
            return true;
        } catch (e) {
            console.error('[RawDataRetention] Failed to persist certificate:', e);
            return false;
        }
    }

    private async pathExists(p: string): Promise<boolean> {
        try {
            await fs.access(p);
            return true;
        } catch {
            return false;
        }
    }
}

export function createRawDataRetentionService(config?: Partial<RawDataRetentionConfig>): RawDataRetentionService {
    return new RawDataRetentionService(config);
}
