export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'INFO';

export type SeverityBucket = Lowercase<Severity>;

export type Direction = 'ingress' | 'egress';

/** `'all'` stands for "every protocol" or "every port" depending on where it appears. */
export type Protocol = string;
export type Port = number | 'all';

export type FindingType =
    | 'Critical Port Exposed to Internet'
    | 'Management Port Exposed to Internet'
    | 'Risky Port Exposed to Internet'
    | 'Internet-Exposed Port'
    | 'All Protocols/Ports Open to Internet'
    | 'Permissive Egress Rule'
    | 'Unused Security Group';

export interface Attachment {
    interfaceId: string;
    description: string;
    privateIp: string;
}

export interface AddressRange {
    cidr: string;
    description?: string;
}

export interface SecurityGroupRule {
    protocol: Protocol;
    fromPort: Port;
    toPort: Port;
    ipv4Ranges: AddressRange[];
    ipv6Ranges: AddressRange[];
}

export interface SecurityGroup {
    groupId: string;
    groupName: string;
    vpcId: string;
    ingress: SecurityGroupRule[];
    egress: SecurityGroupRule[];
}

export interface NetworkInterface {
    interfaceId: string;
    description: string;
    privateIp: string;
    groupIds: string[];
}

export interface RegionInventory {
    regionName: string;
    securityGroups: SecurityGroup[];
    networkInterfaces: NetworkInterface[];
}

export interface Inventory {
    scanTimestamp: Date;
    accountId: string;
    accountAlias: string;
    regions: RegionInventory[];
}

export interface Finding {
    readonly type: FindingType;
    readonly severity: Severity;
    /** Absent on findings about the group itself rather than one of its rules. */
    readonly direction?: Direction;
    readonly region: string;
    readonly groupId: string;
    readonly groupName: string;
    readonly vpcId: string;
    readonly rule?: string;
    readonly description: string;
    readonly attachedResources: number;
    readonly attachments: readonly Attachment[];
    readonly recommendation: string;
}

export type FindingsBySeverity = Record<SeverityBucket, Finding[]>;

export interface SummaryStats {
    totalGroups: number;
    unusedGroups: number;
    riskyRules: number;
}

export interface IngressRow {
    port: string;
    protocol: string;
    source: string;
}

export interface GroupSummary {
    groupId: string;
    groupName: string;
    region: string;
    vpcId: string;
    attachedResources: number;
    isUsed: boolean;
    ingressRules: IngressRow[];
}

export interface AnalysisResult {
    findings: FindingsBySeverity;
    stats: SummaryStats;
    groups: GroupSummary[];
}
