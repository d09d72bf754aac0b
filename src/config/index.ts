import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../domain/errors/ProfileToolError';
import { PrivacyLevel } from '../domain/entities/ProfileRecord';
import { DEFAULT_SENSITIVE_PATTERNS } from '../domain/entities/RedactionPolicy';
import { Severity, SEVERITY_ORDER } from '../domain/entities/ComplianceReport';

// Load environment variables
dotenv.config();

export type SessionMode = 'browser' | 'http' | 'fixtures';
export type OutputFormat = 'markdown' | 'html' | 'json';

export const SESSION_MODES: readonly SessionMode[] = ['browser', 'http', 'fixtures'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['markdown', 'html', 'json'];
const PRIVACY_LEVELS: readonly PrivacyLevel[] = ['strict', 'normal', 'minimal'];

export const MIN_STEP_TIMEOUT_MS = 5000;
export const MAX_STEP_TIMEOUT_MS = 300000;

/**
 * Application configuration, built once at start-up and passed explicitly
 * to every component.
 */
export interface Config {
    // Profile source
    profileUrl: string;
    sessionMode: SessionMode;
    credentials: {
        email?: string;
        password?: string;
    };
    sessionCookie?: string;
    fixturesDir?: string;
    browser: {
        headless: boolean;
        executablePath?: string;
    };

    // Output
    outputDir: string;
    outputFormat: OutputFormat;
    privacyLevel: PrivacyLevel;
    sensitivePatterns: string[];

    // Data lifecycle
    keepRawData: boolean;
    rawDataPath: string;
    retentionHours: number;
    /** Where deletion certificates are written when fix mode removes raw data. */
    certificateDir: string;
    minAuditSeverity: Severity;
    workspaceDir: string;

    // Timing
    stepTimeoutMs: number;
    navigationRetries: number;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, key: string, defaultValue?: string): string {
    let value = env[key];
    if (value === undefined || value.trim() === '') {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getOptionalEnvVar(env: Env, key: string): string | undefined {
    const value = getEnvVar(env, key, '');
    return value === '' ? undefined : value;
}

function getEnvVarNumber(env: Env, key: string, defaultValue?: number): number {
    const value = getEnvVar(env, key, defaultValue?.toString());
    const parsed = Number(value);
    if (value === '' || isNaN(parsed)) {
        throw new ConfigurationError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(env: Env, key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(env, key, defaultValue?.toString()).toLowerCase();
    if (['true', '1', 'yes'].includes(value)) return true;
    if (['false', '0', 'no'].includes(value)) return false;
    throw new ConfigurationError(`Environment variable ${key} must be true or false, got: ${value}`);
}

function getEnvVarChoice<T extends string>(env: Env, key: string, allowed: readonly T[], defaultValue: T): T {
    const value = getEnvVar(env, key, defaultValue).toLowerCase();
    const match = allowed.find(option => option === value);
    if (!match) {
        throw new ConfigurationError(`Environment variable ${key} must be one of ${allowed.join(', ')}, got: ${value}`);
    }
    return match;
}

function keywordPatterns(list: string | undefined): string[] {
    if (!list) return [...DEFAULT_SENSITIVE_PATTERNS];
    return list
        .split(',')
        .map(keyword => keyword.trim())
        .filter(Boolean)
        .map(keyword => `\\b${keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`);
}

function withTrailingSlash(url: string): string {
    return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Builds the configuration from environment variables.
 * Malformed values raise ConfigurationError; cross-field checks live in
 * validateConfig.
 */
export function loadConfig(env: Env = process.env): Config {
    return {
        // Profile source
        profileUrl: withTrailingSlash(getEnvVar(env, 'PROFILE_URL', 'https://www.linkedin.com/in/me/')),
        sessionMode: getEnvVarChoice(env, 'SESSION_MODE', SESSION_MODES, 'browser'),
        credentials: {
            email: getOptionalEnvVar(env, 'PROFILE_EMAIL'),
            password: getOptionalEnvVar(env, 'PROFILE_PASSWORD'),
        },
        sessionCookie: getOptionalEnvVar(env, 'SESSION_COOKIE'),
        fixturesDir: getOptionalEnvVar(env, 'FIXTURES_DIR'),
        browser: {
            headless: getEnvVarBoolean(env, 'HEADLESS', true),
            executablePath: getOptionalEnvVar(env, 'BROWSER_EXECUTABLE_PATH'),
        },

        // Output
        outputDir: getEnvVar(env, 'OUTPUT_DIR', './output'),
        outputFormat: getEnvVarChoice(env, 'OUTPUT_FORMAT', OUTPUT_FORMATS, 'markdown'),
        privacyLevel: getEnvVarChoice(env, 'PRIVACY_LEVEL', PRIVACY_LEVELS, 'normal'),
        sensitivePatterns: keywordPatterns(getOptionalEnvVar(env, 'SENSITIVE_KEYWORDS')),

        // Data lifecycle
        keepRawData: getEnvVarBoolean(env, 'KEEP_RAW_DATA', false),
        rawDataPath: getEnvVar(env, 'RAW_DATA_PATH', './data/profile_raw.json'),
        retentionHours: getEnvVarNumber(env, 'RETENTION_HOURS', 0),
        certificateDir: getEnvVar(env, 'CERTIFICATE_DIR', './data/certificates'),
        minAuditSeverity: getEnvVarChoice(env, 'MIN_AUDIT_SEVERITY', SEVERITY_ORDER, 'medium'),
        workspaceDir: getEnvVar(env, 'WORKSPACE_DIR', '.'),

        // Timing
        stepTimeoutMs: getEnvVarNumber(env, 'STEP_TIMEOUT_MS', 30000),
        navigationRetries: getEnvVarNumber(env, 'NAVIGATION_RETRIES', 1),
    };
}

/**
 * Validates that required configuration is present for the chosen mode.
 * Session settings are skipped for commands that never open a session.
 * Returns a list of problems (empty when valid).
 */
export function validateConfig(config: Config, options: { requireSession?: boolean } = {}): string[] {
    const errors: string[] = [];
    const requireSession = options.requireSession ?? true;

    try {
        new URL(config.profileUrl);
    } catch {
        errors.push(`PROFILE_URL is not a valid URL: ${config.profileUrl}`);
    }

    if (requireSession && config.sessionMode === 'browser' && (!config.credentials.email || !config.credentials.password)) {
        errors.push('PROFILE_EMAIL and PROFILE_PASSWORD are required when SESSION_MODE=browser');
    }
    if (requireSession && config.sessionMode === 'http' && !config.sessionCookie) {
        errors.push('SESSION_COOKIE is required when SESSION_MODE=http');
    }
    if (requireSession && config.sessionMode === 'fixtures' && !config.fixturesDir) {
        errors.push('FIXTURES_DIR is required when SESSION_MODE=fixtures');
    }

    if (config.retentionHours < 0) {
        errors.push('RETENTION_HOURS must not be negative');
    }
    if (path.resolve(config.certificateDir) === path.resolve(config.outputDir)) {
        errors.push('CERTIFICATE_DIR must not be the output directory');
    }
    if (config.stepTimeoutMs < MIN_STEP_TIMEOUT_MS || config.stepTimeoutMs > MAX_STEP_TIMEOUT_MS) {
        errors.push(`STEP_TIMEOUT_MS must be between ${MIN_STEP_TIMEOUT_MS} and ${MAX_STEP_TIMEOUT_MS}`);
    }
    if (!Number.isInteger(config.navigationRetries) || config.navigationRetries < 0) {
        errors.push('NAVIGATION_RETRIES must be a non-negative integer');
    }
    if (config.sensitivePatterns.length === 0 && config.privacyLevel === 'strict') {
        errors.push('SENSITIVE_KEYWORDS must name at least one keyword when PRIVACY_LEVEL=strict');
    }

    return errors;
}

/**
 * Loads and validates in one step.
 * @throws ConfigurationError listing every problem found
 */
export function loadValidatedConfig(env: Env = process.env, options: { requireSession?: boolean } = {}): Config {
    const config = loadConfig(env);
    const problems = validateConfig(config, options);
    if (problems.length > 0) {
        throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
    }
    return config;
}
