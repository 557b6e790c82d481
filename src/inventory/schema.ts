import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type {
    AddressRange,
    Inventory,
    NetworkInterface,
    Port,
    Protocol,
    RegionInventory,
    SecurityGroup,
    SecurityGroupRule,
} from '../types/index.js';

/**
 * Top-level document shape. Anything wrong here aborts the audit.
 */
const regionSchema = z.object({
    region_name: z.string().min(1),
    security_groups: z.array(z.unknown()).nullish(),
    network_interfaces: z.array(z.unknown()).nullish(),
});

export const inventoryDocumentSchema = z.object({
    scan_timestamp: z
        .string()
        .datetime({ offset: true, local: true, message: 'must be an ISO-8601 timestamp' }),
    account_id: z.union([z.string(), z.number()]).transform(String),
    account_alias: z.string(),
    regions: z.array(regionSchema),
});

// Record-level schemas. A record that fails these is skipped, not fatal.

const groupRecordSchema = z.object({
    GroupId: z.string().min(1),
    GroupName: z.string().optional().catch(undefined),
    VpcId: z.string().optional().catch(undefined),
    IpPermissions: z.array(z.unknown()).catch([]),
    IpPermissionsEgress: z.array(z.unknown()).catch([]),
});

const ruleRecordSchema = z.object({
    IpProtocol: z.unknown(),
    FromPort: z.unknown(),
    ToPort: z.unknown(),
    IpRanges: z.array(z.unknown()).catch([]),
    Ipv6Ranges: z.array(z.unknown()).catch([]),
});

const ipv4RangeSchema = z.object({
    CidrIp: z.string(),
    Description: z.string().optional().catch(undefined),
});

const ipv6RangeSchema = z.object({
    CidrIpv6: z.string(),
    Description: z.string().optional().catch(undefined),
});

const interfaceRecordSchema = z.object({
    NetworkInterfaceId: z.string().optional().catch(undefined),
    Description: z.string().optional().catch(undefined),
    PrivateIpAddress: z.string().optional().catch(undefined),
    Groups: z.array(z.unknown()).catch([]),
});

const groupRefSchema = z.object({ GroupId: z.string().min(1) });

const NAMED_PROTOCOLS: ReadonlySet<string> = new Set(['tcp', 'udp', 'icmp', 'icmpv6']);
const PROTOCOL_NUMBERS: ReadonlyMap<string, string> = new Map([
    ['6', 'tcp'],
    ['17', 'udp'],
    ['1', 'icmp'],
    ['58', 'icmpv6'],
]);

export const UNKNOWN_INTERFACE_ID = 'unknown';
export const UNKNOWN_PRIVATE_IP = 'N/A';
export const NO_VPC = 'EC2-Classic';

/**
 * Normalizes an IpProtocol value. "-1", a missing value and anything
 * unrecognized become the 'all' sentinel; IANA numbers for the common
 * protocols become their names.
 */
export function normalizeProtocol(value: unknown): Protocol {
    const raw = typeof value === 'number' ? String(value) : value;
    if (typeof raw !== 'string') return 'all';

    const token = raw.trim().toLowerCase();
    if (token === '-1' || token === 'all') return 'all';
    if (NAMED_PROTOCOLS.has(token)) return token;
    if (/^\d+$/.test(token) && Number(token) <= 255) {
        return PROTOCOL_NUMBERS.get(token) ?? token;
    }
    return 'all';
}

const UTC_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Converts a validated ISO-8601 timestamp to a Date. Timestamps without an
 * offset are read as UTC, never as server local time.
 */
export function parseScanTimestamp(value: string): Date {
    return new Date(UTC_OFFSET.test(value) ? value : `${value}Z`);
}

export function normalizePort(value: unknown): Port {
    return typeof value === 'number' && Number.isInteger(value) ? value : 'all';
}

function collect<T>(records: unknown[], parse: (record: unknown) => T | undefined): T[] {
    const parsed: T[] = [];
    for (const record of records) {
        const value = parse(record);
        if (value !== undefined) parsed.push(value);
    }
    return parsed;
}

function parseIpv4Range(record: unknown): AddressRange | undefined {
    const result = ipv4RangeSchema.safeParse(record);
    if (!result.success) return undefined;
    return { cidr: result.data.CidrIp, description: result.data.Description };
}

function parseIpv6Range(record: unknown): AddressRange | undefined {
    const result = ipv6RangeSchema.safeParse(record);
    if (!result.success) return undefined;
    return { cidr: result.data.CidrIpv6, description: result.data.Description };
}

function parseRule(record: unknown): SecurityGroupRule | undefined {
    const result = ruleRecordSchema.safeParse(record);
    if (!result.success) return undefined;

    const rule = result.data;
    return {
        protocol: normalizeProtocol(rule.IpProtocol),
        fromPort: normalizePort(rule.FromPort),
        toPort: normalizePort(rule.ToPort),
        ipv4Ranges: collect(rule.IpRanges, parseIpv4Range),
        ipv6Ranges: collect(rule.Ipv6Ranges, parseIpv6Range),
    };
}

function parseSecurityGroup(record: unknown): SecurityGroup | undefined {
    const result = groupRecordSchema.safeParse(record);
    if (!result.success) return undefined;

    const group = result.data;
    return {
        groupId: group.GroupId,
        groupName: group.GroupName ?? group.GroupId,
        vpcId: group.VpcId ?? NO_VPC,
        ingress: collect(group.IpPermissions, parseRule),
        egress: collect(group.IpPermissionsEgress, parseRule),
    };
}

function parseNetworkInterface(record: unknown): NetworkInterface | undefined {
    const result = interfaceRecordSchema.safeParse(record);
    if (!result.success) return undefined;

    const eni = result.data;
    return {
        interfaceId: eni.NetworkInterfaceId ?? UNKNOWN_INTERFACE_ID,
        description: eni.Description ?? '',
        privateIp: eni.PrivateIpAddress ?? UNKNOWN_PRIVATE_IP,
        groupIds: collect(eni.Groups, (ref) => {
            const parsed = groupRefSchema.safeParse(ref);
            return parsed.success ? parsed.data.GroupId : undefined;
        }),
    };
}

export interface ParseOptions {
    logger?: Logger;
}

/**
 * Validates an exported inventory document and converts it to the engine's model.
 * Throws when the document itself is unusable; malformed individual records are dropped.
 */
export function parseInventory(raw: unknown, options: ParseOptions = {}): Inventory {
    const document = inventoryDocumentSchema.safeParse(raw);
    if (!document.success) {
        const issues = document.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid inventory document: ${issues}`);
    }

    const { data } = document;
    const regions: RegionInventory[] = data.regions.map((region) => {
        const rawGroups = region.security_groups ?? [];
        const rawInterfaces = region.network_interfaces ?? [];
        const securityGroups = collect(rawGroups, parseSecurityGroup);
        const networkInterfaces = collect(rawInterfaces, parseNetworkInterface);

        const skipped = rawGroups.length - securityGroups.length;
        if (skipped > 0) {
            options.logger?.debug(
                { region: region.region_name, skipped },
                'Skipped malformed security group records'
            );
        }

        return { regionName: region.region_name, securityGroups, networkInterfaces };
    });

    return {
        scanTimestamp: parseScanTimestamp(data.scan_timestamp),
        accountId: data.account_id,
        accountAlias: data.account_alias,
        regions,
    };
}
