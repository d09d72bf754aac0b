import type { ComplianceReport } from '../entities/ComplianceReport';

/**
 * Phase of a run in which a failure happened. Surfaced in the user-facing
 * message and mapped to an exit code by the entry point.
 */
export type FailurePhase =
    | 'config'
    | 'auth'
    | 'navigation'
    | 'extraction'
    | 'output'
    | 'compliance'
    | 'cancelled';

/**
 * Base class for every failure the tool raises on purpose.
 */
export class ProfileToolError extends Error {
    constructor(
        public readonly phase: FailurePhase,
        message: string,
        public readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'ProfileToolError';
    }
}

/**
 * Invalid or missing settings. Fatal, never retried.
 */
export class ConfigurationError extends ProfileToolError {
    constructor(message: string, public readonly problems: string[] = []) {
        super('config', message, problems.length > 0 ? { problems } : undefined);
        this.name = 'ConfigurationError';
    }
}

/**
 * Credentials or a second-factor challenge were rejected.
 */
export class AuthenticationError extends ProfileToolError {
    constructor(message: string) {
        super('auth', message);
        this.name = 'AuthenticationError';
    }
}

/**
 * A specific page could not be reached. Contained by the assembler unless
 * it is the overview page itself. Transient failures are worth a retry.
 */
export class NavigationError extends ProfileToolError {
    constructor(message: string, public readonly url: string, public readonly transient = false) {
        super('navigation', message, { url, transient });
        this.name = 'NavigationError';
    }
}

/**
 * The document handle is no longer usable (closed session, detached page).
 */
export class ExtractionError extends ProfileToolError {
    constructor(message: string) {
        super('extraction', message);
        this.name = 'ExtractionError';
    }
}

/**
 * No identity data (the profile name) could be obtained.
 */
export class ProfileIdentityError extends ProfileToolError {
    constructor(message: string, public readonly profileUrl: string) {
        super('extraction', message, { profileUrl });
        this.name = 'ProfileIdentityError';
    }
}

export class OutputError extends ProfileToolError {
    constructor(message: string, public readonly path: string) {
        super('output', message, { path });
        this.name = 'OutputError';
    }
}

/**
 * A finding at or above the configured severity threshold. The rendered
 * output may still exist and be inspectable.
 */
export class ComplianceViolation extends ProfileToolError {
    constructor(public readonly report: ComplianceReport) {
        const blocking = report.findings.filter(f => f.blocking).length;
        super('compliance', `Compliance audit failed with ${blocking} blocking finding(s)`, { reportId: report.id });
        this.name = 'ComplianceViolation';
    }
}

export class RunCancelledError extends ProfileToolError {
    constructor(message = 'Run cancelled before completion') {
        super('cancelled', message);
        this.name = 'RunCancelledError';
    }
}
