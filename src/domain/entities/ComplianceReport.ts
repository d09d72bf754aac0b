/**
 * Compliance findings and reports produced by the auditor.
 */

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITY_ORDER: readonly Severity[] = ['low', 'medium', 'high', 'critical'];

export function severityRank(severity: Severity): number {
    return SEVERITY_ORDER.indexOf(severity);
}

export function isSeverity(value: string): value is Severity {
    return SEVERITY_ORDER.some(s => s === value);
}

export interface ComplianceFinding {
    /** Stable finding id such as RET-001. */
    id: string;
    ruleId: string;
    severity: Severity;
    message: string;
    autoFixable: boolean;
    /** At or above the report's minimum severity. */
    blocking: boolean;
    path?: string;
}

export interface Remediation {
    findingId: string;
    action: string;
    path?: string;
    success: boolean;
    error?: string;
    /** Deletion certificate issued for this change, when one was persisted. */
    certificateId?: string;
}

export interface ComplianceReport {
    id: string;
    auditedAt: string;
    minimumSeverity: Severity;
    findings: ComplianceFinding[];
    passed: boolean;
    remediations: Remediation[];
}

/**
 * Builds a report from findings, deriving blocking flags and the overall verdict.
 */
export function createComplianceReport(
    id: string,
    findings: Array<Omit<ComplianceFinding, 'blocking'>>,
    minimumSeverity: Severity,
    auditedAt: Date = new Date(),
    remediations: Remediation[] = []
): ComplianceReport {
    const threshold = severityRank(minimumSeverity);
    const withBlocking = findings.map(finding => ({
        ...finding,
        blocking: severityRank(finding.severity) >= threshold,
    }));
    return {
        id,
        auditedAt: auditedAt.toISOString(),
        minimumSeverity,
        findings: withBlocking,
        passed: !withBlocking.some(f => f.blocking),
        remediations,
    };
}
