import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { analyzeInventory } from '../analyzers/sg-walker.js';
import { parseInventory } from '../inventory/schema.js';
import type { Logger } from '../logging/logger.js';
import { renderMarkdown } from '../report/markdown.js';
import { buildReportData, type ReportData } from '../report/report-data.js';

/**
 * Zod schema for validating audit_security_groups tool input.
 */
export const auditSecurityGroupsSchema = z
    .object({
        inventoryJson: z
            .string()
            .optional()
            .describe('Security group inventory document as a JSON string'),
        inventoryPath: z
            .string()
            .min(1)
            .optional()
            .describe('Path to a security group inventory JSON file on the server host'),
        format: z
            .enum(['json', 'markdown'])
            .default('json')
            .describe('Output format of the audit report'),
    })
    .refine((input) => (input.inventoryJson === undefined) !== (input.inventoryPath === undefined), {
        message: 'Provide exactly one of "inventoryJson" or "inventoryPath"',
    });

export type AuditSecurityGroupsInput = z.infer<typeof auditSecurityGroupsSchema>;

export interface AuditOptions {
    logger?: Logger;
    now?: () => Date;
}

export interface AuditOutput {
    report: ReportData;
    text: string;
}

async function readInventorySource(input: AuditSecurityGroupsInput): Promise<string> {
    if (input.inventoryJson !== undefined) return input.inventoryJson;

    const path = input.inventoryPath ?? '';
    try {
        return await readFile(path, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new Error(`Cannot read inventory file "${path}": ${reason}`);
    }
}

/**
 * Loads an inventory document, runs the exposure analysis, and returns the
 * report data together with its rendering in the requested format.
 */
export async function auditSecurityGroups(
    input: AuditSecurityGroupsInput,
    options: AuditOptions = {}
): Promise<AuditOutput> {
    const { logger } = options;
    const source = await readInventorySource(input);

    let raw: unknown;
    try {
        raw = JSON.parse(source);
    } catch {
        throw new Error(
            'Invalid JSON: Please provide a valid security group inventory document. ' +
            'Expected format: {"scan_timestamp": "...", "account_id": "...", "account_alias": "...", "regions": [...]}'
        );
    }

    const inventory = parseInventory(raw, { logger });
    const analysis = analyzeInventory(inventory, { logger });
    const report = buildReportData(inventory, analysis, (options.now ?? (() => new Date()))());

    logger?.info(
        {
            account: inventory.accountId,
            regions: report.totalRegions,
            ...report.severityCounts,
            totalGroups: report.stats.totalGroups,
            unusedGroups: report.stats.unusedGroups,
        },
        'Security group audit complete'
    );

    const text = input.format === 'markdown' ? renderMarkdown(report) : JSON.stringify(report, null, 2);
    return { report, text };
}
