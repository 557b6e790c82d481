import type {
    AnalysisResult,
    Finding,
    FindingsBySeverity,
    GroupSummary,
    SummaryStats,
} from '../types/index.js';
import { severityBucket } from './sg-rules.js';

export function emptyFindings(): FindingsBySeverity {
    return { critical: [], high: [], medium: [], low: [], info: [] };
}

/**
 * Collects findings, counters and group summaries for a single analysis run.
 * Create one per run; nothing here outlives it.
 */
export class FindingAggregator {
    private readonly findings: FindingsBySeverity = emptyFindings();
    private readonly stats: SummaryStats = { totalGroups: 0, unusedGroups: 0, riskyRules: 0 };
    private readonly groups: GroupSummary[] = [];

    add(finding: Finding): void {
        this.findings[severityBucket(finding.severity)].push(finding);
        if (finding.direction === 'ingress') {
            this.stats.riskyRules += 1;
        }
    }

    recordGroup(): void {
        this.stats.totalGroups += 1;
    }

    recordUnused(): void {
        this.stats.unusedGroups += 1;
    }

    addGroupSummary(row: GroupSummary): void {
        this.groups.push(row);
    }

    result(): AnalysisResult {
        return {
            findings: this.findings,
            stats: { ...this.stats },
            groups: this.groups,
        };
    }
}

/**
 * Splits group summaries by whether anything is attached, keeping input order.
 */
export function partitionGroups(groups: GroupSummary[]): { used: GroupSummary[]; unused: GroupSummary[] } {
    return {
        used: groups.filter((g) => g.isUsed),
        unused: groups.filter((g) => !g.isUsed),
    };
}
