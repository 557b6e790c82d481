import type { Logger } from '../logging/logger.js';
import type {
    AnalysisResult,
    Attachment,
    Direction,
    GroupSummary,
    IngressRow,
    Inventory,
    SecurityGroup,
    SecurityGroupRule,
} from '../types/index.js';
import { FindingAggregator } from './aggregator.js';
import { attachmentsFor, buildAttachmentIndex } from './attachment-index.js';
import { UNUSED_GROUP_RECOMMENDATION } from './recommendations.js';
import { classifyRule, protocolLabel, type RuleContext } from './sg-rules.js';

/** The implicit group every VPC gets; it is never reported as unused. */
export const DEFAULT_GROUP_NAME = 'default';

export interface AnalyzeOptions {
    logger?: Logger;
}

/**
 * Walks every region, security group, rule and address range of an inventory
 * and returns findings grouped by severity, summary counters and a per-group table.
 * Pure apart from optional debug logging: the same inventory always yields the same result.
 */
export function analyzeInventory(inventory: Inventory, options: AnalyzeOptions = {}): AnalysisResult {
    const { logger } = options;
    const aggregator = new FindingAggregator();

    for (const region of inventory.regions) {
        logger?.debug(
            { region: region.regionName, securityGroups: region.securityGroups.length },
            'Analyzing region'
        );
        const index = buildAttachmentIndex(region.networkInterfaces);

        for (const group of region.securityGroups) {
            const attachments = attachmentsFor(index, group.groupId);
            analyzeGroup(aggregator, { region: region.regionName, group, attachments });
            aggregator.addGroupSummary(summarizeGroup(group, region.regionName, attachments));
        }
    }

    return aggregator.result();
}

function analyzeGroup(aggregator: FindingAggregator, context: RuleContext): void {
    const { group, region, attachments } = context;
    aggregator.recordGroup();

    if (attachments.length === 0 && group.groupName !== DEFAULT_GROUP_NAME) {
        aggregator.recordUnused();
        aggregator.add({
            type: 'Unused Security Group',
            severity: 'INFO',
            region,
            groupId: group.groupId,
            groupName: group.groupName,
            vpcId: group.vpcId,
            description: `Security group '${group.groupName}' has no attached resources`,
            attachedResources: 0,
            attachments: [],
            recommendation: UNUSED_GROUP_RECOMMENDATION,
        });
    }

    walkRules(aggregator, group.ingress, 'ingress', context);
    walkRules(aggregator, group.egress, 'egress', context);
}

function walkRules(
    aggregator: FindingAggregator,
    rules: SecurityGroupRule[],
    direction: Direction,
    context: RuleContext
): void {
    for (const rule of rules) {
        for (const range of [...rule.ipv4Ranges, ...rule.ipv6Ranges]) {
            const finding = classifyRule(rule, direction, range, context);
            if (finding) aggregator.add(finding);
        }
    }
}

/**
 * Flattens a group's ingress rules into display rows. Unlike findings, this
 * includes every rule that names at least one address range, risky or not.
 */
export function summarizeGroup(
    group: SecurityGroup,
    region: string,
    attachments: readonly Attachment[]
): GroupSummary {
    const ingressRules: IngressRow[] = [];

    for (const rule of group.ingress) {
        const cidrs = [...rule.ipv4Ranges, ...rule.ipv6Ranges].map((r) => r.cidr);
        if (cidrs.length === 0) continue;

        ingressRules.push({
            port: summaryPort(rule),
            protocol: protocolLabel(rule.protocol),
            source: cidrs.join(', '),
        });
    }

    return {
        groupId: group.groupId,
        groupName: group.groupName,
        region,
        vpcId: group.vpcId,
        attachedResources: attachments.length,
        isUsed: attachments.length > 0,
        ingressRules,
    };
}

function summaryPort(rule: SecurityGroupRule): string {
    if (rule.protocol === 'all' || rule.fromPort === 'all') return 'All Ports';
    if (rule.fromPort === rule.toPort || rule.toPort === 'all') return String(rule.fromPort);
    return `${rule.fromPort}-${rule.toPort}`;
}
