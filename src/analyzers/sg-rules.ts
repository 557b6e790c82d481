import type {
    AddressRange,
    Attachment,
    Direction,
    Finding,
    FindingType,
    Port,
    SecurityGroup,
    SecurityGroupRule,
    Severity,
    SeverityBucket,
} from '../types/index.js';
import { EGRESS_RECOMMENDATION, resolveRecommendation } from './recommendations.js';

/** Ports that should never be reachable from 0.0.0.0/0. */
export const CRITICAL_PORTS: ReadonlySet<number> = new Set([
    22, 23, 3389, 1433, 3306, 5432, 6379, 27017, 9200,
]);

export const MANAGEMENT_PORTS: ReadonlySet<number> = new Set([22, 3389, 5900, 5985, 5986]);

export const RISKY_PORTS: ReadonlyMap<number, string> = new Map([
    [20, 'FTP Data'],
    [21, 'FTP Control'],
    [22, 'SSH'],
    [23, 'Telnet'],
    [25, 'SMTP'],
    [53, 'DNS'],
    [80, 'HTTP'],
    [135, 'MS RPC'],
    [137, 'NetBIOS'],
    [138, 'NetBIOS'],
    [139, 'NetBIOS'],
    [443, 'HTTPS'],
    [445, 'SMB'],
    [1433, 'SQL Server'],
    [1434, 'SQL Server'],
    [3306, 'MySQL'],
    [3389, 'RDP'],
    [5432, 'PostgreSQL'],
    [5900, 'VNC'],
    [6379, 'Redis'],
    [8080, 'HTTP Alt'],
    [8443, 'HTTPS Alt'],
    [9200, 'Elasticsearch'],
    [27017, 'MongoDB'],
]);

export const PUBLIC_CIDRS: ReadonlySet<string> = new Set(['0.0.0.0/0', '::/0']);

/** Findings only carry this many attachments for display; the full count is kept separately. */
export const MAX_SAMPLED_ATTACHMENTS = 5;

export interface RuleContext {
    region: string;
    group: SecurityGroup;
    attachments: readonly Attachment[];
}

export function isPublicCidr(cidr: string): boolean {
    return PUBLIC_CIDRS.has(cidr);
}

const SEVERITY_BUCKETS: Readonly<Record<Severity, SeverityBucket>> = {
    CRITICAL: 'critical',
    HIGH: 'high',
    MEDIUM: 'medium',
    LOW: 'low',
    INFO: 'info',
};

/** Findings are filed under the lowercased severity. */
export function severityBucket(severity: Severity): SeverityBucket {
    return SEVERITY_BUCKETS[severity];
}

/**
 * Renders the port part of a rule, e.g. "Port 22", "Ports 8000-8080" or "All Ports".
 */
export function describePorts(rule: Pick<SecurityGroupRule, 'protocol' | 'fromPort' | 'toPort'>): string {
    if (rule.protocol === 'all' || rule.fromPort === 'all') return 'All Ports';
    if (rule.fromPort === rule.toPort || rule.toPort === 'all') return `Port ${rule.fromPort}`;
    return `Ports ${rule.fromPort}-${rule.toPort}`;
}

export function protocolLabel(protocol: string): string {
    return protocol === 'all' ? 'All' : protocol;
}

function inSet(set: ReadonlySet<number> | ReadonlyMap<number, string>, from: number, to: Port): boolean {
    return set.has(from) || (typeof to === 'number' && set.has(to));
}

function rateIngress(rule: SecurityGroupRule): { severity: Severity; type: FindingType } {
    let severity: Severity = 'MEDIUM';
    let type: FindingType = 'Internet-Exposed Port';

    const { fromPort, toPort } = rule;
    if (typeof fromPort === 'number') {
        if (inSet(CRITICAL_PORTS, fromPort, toPort)) {
            severity = 'CRITICAL';
            type = 'Critical Port Exposed to Internet';
        } else if (inSet(MANAGEMENT_PORTS, fromPort, toPort)) {
            severity = 'HIGH';
            type = 'Management Port Exposed to Internet';
        } else if (inSet(RISKY_PORTS, fromPort, toPort)) {
            severity = 'HIGH';
            type = 'Risky Port Exposed to Internet';
        }
    }

    // Protocol scope dominates port specificity
    if (rule.protocol === 'all') {
        severity = 'CRITICAL';
        type = 'All Protocols/Ports Open to Internet';
    }

    return { severity, type };
}

/**
 * Classifies one address range of one rule. Returns undefined when the range
 * is not internet-facing or the direction/protocol combination is not reported.
 */
export function classifyRule(
    rule: SecurityGroupRule,
    direction: Direction,
    range: AddressRange,
    context: RuleContext
): Finding | undefined {
    if (!isPublicCidr(range.cidr)) return undefined;

    const { group, region, attachments } = context;
    const base = {
        direction,
        region,
        groupId: group.groupId,
        groupName: group.groupName,
        vpcId: group.vpcId,
        attachedResources: attachments.length,
        attachments: attachments.slice(0, MAX_SAMPLED_ATTACHMENTS),
    };
    const ports = describePorts(rule);
    const protocol = protocolLabel(rule.protocol);

    if (direction === 'egress') {
        if (rule.protocol !== 'all') return undefined;
        return {
            ...base,
            type: 'Permissive Egress Rule',
            severity: 'LOW',
            rule: `EGRESS: ${ports} (${protocol}) → ${range.cidr}`,
            description: 'All outbound traffic allowed to internet',
            recommendation: EGRESS_RECOMMENDATION,
        };
    }

    const { severity, type } = rateIngress(rule);
    const serviceName = typeof rule.fromPort === 'number' ? RISKY_PORTS.get(rule.fromPort) : undefined;
    const portName = serviceName ? ` (${serviceName})` : '';

    return {
        ...base,
        type,
        severity,
        rule: `INGRESS: ${ports}${portName} (${protocol}) → ${range.cidr}`,
        description: range.description ?? 'No description provided',
        recommendation: resolveRecommendation(rule.fromPort, rule.protocol),
    };
}
