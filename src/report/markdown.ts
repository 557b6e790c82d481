import type { Finding, GroupSummary, SeverityBucket } from '../types/index.js';
import type { ReportData } from './report-data.js';

const SEVERITY_ORDER: { bucket: SeverityBucket; title: string }[] = [
    { bucket: 'critical', title: 'Critical' },
    { bucket: 'high', title: 'High' },
    { bucket: 'medium', title: 'Medium' },
    { bucket: 'low', title: 'Low' },
    { bucket: 'info', title: 'Info' },
];

/** Escapes characters that would break a Markdown table cell. */
export function escapeCell(value: string): string {
    return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function renderFinding(finding: Finding, n: number): string[] {
    const lines = [`${n}. **${finding.type}**: \`${finding.groupId}\` (${finding.groupName}), ${finding.region}, ${finding.vpcId}`];
    if (finding.rule) lines.push(`   - Rule: \`${finding.rule}\``);
    lines.push(`   - Description: ${finding.description}`);
    if (finding.rule) {
        lines.push(`   - Attached resources: ${finding.attachedResources}`);
        for (const a of finding.attachments) {
            lines.push(`     - ${a.interfaceId} (${a.privateIp})${a.description ? ` ${a.description}` : ''}`);
        }
    }
    lines.push(`   - Recommendation: ${finding.recommendation}`);
    return lines;
}

function renderGroupTable(groups: GroupSummary[]): string[] {
    if (groups.length === 0) return ['_None_'];

    const lines = [
        '| Group ID | Name | Region | VPC | Attached | Ingress |',
        '| --- | --- | --- | --- | --- | --- |',
    ];
    for (const g of groups) {
        const ingress =
            g.ingressRules.map((r) => `${r.port}/${r.protocol} from ${r.source}`).join('<br>') || '-';
        lines.push(
            `| ${escapeCell(g.groupId)} | ${escapeCell(g.groupName)} | ${g.region} | ${g.vpcId} | ${g.attachedResources} | ${escapeCell(ingress)} |`
        );
    }
    return lines;
}

/**
 * Renders the audit report as Markdown.
 */
export function renderMarkdown(report: ReportData): string {
    const lines: string[] = [
        '# Security Group Audit Report',
        '',
        `- Account: ${report.accountId} (${report.accountAlias})`,
        `- Scan date: ${report.scanDate}`,
        `- Generated: ${report.generatedDate}`,
        `- Regions: ${report.totalRegions}`,
        '',
        '## Statistics',
        '',
        '| Total Security Groups | Unused Groups | Risky Rules |',
        '| --- | --- | --- |',
        `| ${report.stats.totalGroups} | ${report.stats.unusedGroups} | ${report.stats.riskyRules} |`,
        '',
        '## Findings by Severity',
        '',
        '| Severity | Count |',
        '| --- | --- |',
        ...SEVERITY_ORDER.map(({ bucket, title }) => `| ${title} | ${report.severityCounts[bucket]} |`),
    ];

    for (const { bucket, title } of SEVERITY_ORDER) {
        const findings = report.findings[bucket];
        if (findings.length === 0) continue;

        lines.push('', `## ${title} Findings`, '');
        findings.forEach((finding, i) => lines.push(...renderFinding(finding, i + 1)));
    }

    lines.push(
        '',
        `## Security Groups In Use (${report.usedSecurityGroups.length})`,
        '',
        ...renderGroupTable(report.usedSecurityGroups),
        '',
        `## Unused Security Groups (${report.unusedSecurityGroups.length})`,
        '',
        ...renderGroupTable(report.unusedSecurityGroups),
        ''
    );

    return lines.join('\n');
}
