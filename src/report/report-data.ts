import { partitionGroups } from '../analyzers/aggregator.js';
import type {
    AnalysisResult,
    FindingsBySeverity,
    GroupSummary,
    Inventory,
    SeverityBucket,
    SummaryStats,
} from '../types/index.js';

export interface ReportData {
    scanDate: string;
    generatedDate: string;
    accountId: string;
    accountAlias: string;
    totalRegions: number;
    stats: SummaryStats;
    findings: FindingsBySeverity;
    severityCounts: Record<SeverityBucket, number>;
    usedSecurityGroups: GroupSummary[];
    unusedSecurityGroups: GroupSummary[];
}

const MONTHS = [
    'January',
    'February',
    'March',
    'April',
    'May',
    'June',
    'July',
    'August',
    'September',
    'October',
    'November',
    'December',
];

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Formats a date as "January 12, 2026 14:30 UTC".
 */
export function formatReportDate(date: Date): string {
    return (
        `${MONTHS[date.getUTCMonth()]} ${pad(date.getUTCDate())}, ${date.getUTCFullYear()} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())} UTC`
    );
}

/**
 * Assembles everything a report renderer needs from the inventory header and
 * the analysis result. `generatedAt` is passed in so the output stays reproducible.
 */
export function buildReportData(inventory: Inventory, analysis: AnalysisResult, generatedAt: Date): ReportData {
    const { findings } = analysis;
    const { used, unused } = partitionGroups(analysis.groups);

    return {
        scanDate: formatReportDate(inventory.scanTimestamp),
        generatedDate: formatReportDate(generatedAt),
        accountId: inventory.accountId,
        accountAlias: inventory.accountAlias,
        totalRegions: inventory.regions.length,
        stats: analysis.stats,
        findings,
        severityCounts: {
            critical: findings.critical.length,
            high: findings.high.length,
            medium: findings.medium.length,
            low: findings.low.length,
            info: findings.info.length,
        },
        usedSecurityGroups: used,
        unusedSecurityGroups: unused,
    };
}
