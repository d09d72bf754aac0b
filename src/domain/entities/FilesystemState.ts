import { PrivacyLevel } from './ProfileRecord';

export interface RawDataFile {
    path: string;
    modifiedAt: Date;
}

/**
 * One rendered document as recorded in the output manifest sidecar.
 */
export interface OutputManifestEntry {
    file: string;
    format: string;
    /** Absent when the document was written from an unredacted record. */
    redactionLevel?: PrivacyLevel;
    renderedAt: string;
}

export interface IgnoreFile {
    path: string;
    content: string;
}

/**
 * Snapshot of the files the compliance audit reasons about.
 */
export interface FilesystemState {
    now: Date;
    retentionHours: number;
    /** Configured raw data location, whether or not the file exists. */
    rawDataPath: string;
    rawDataFiles: RawDataFile[];
    outputDir: string;
    outputs: OutputManifestEntry[];
    /** Undefined when the workspace has no ignore file. */
    ignoreFile?: IgnoreFile;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * True once `retentionHours` have passed since `createdAt`. A window of 0
 * has always elapsed.
 */
export function hasRetentionElapsed(createdAt: Date, retentionHours: number, now: Date): boolean {
    return now.getTime() - createdAt.getTime() >= retentionHours * HOUR_MS;
}
