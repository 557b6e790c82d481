import type {
    Attachment,
    Inventory,
    NetworkInterface,
    RegionInventory,
    SecurityGroup,
    SecurityGroupRule,
} from '../../src/types/index.js';

export function makeRule(overrides: Partial<SecurityGroupRule> = {}): SecurityGroupRule {
    return {
        protocol: 'tcp',
        fromPort: 22,
        toPort: 22,
        ipv4Ranges: [],
        ipv6Ranges: [],
        ...overrides,
    };
}

export function publicRule(fromPort: number, toPort = fromPort, protocol = 'tcp'): SecurityGroupRule {
    return makeRule({ protocol, fromPort, toPort, ipv4Ranges: [{ cidr: '0.0.0.0/0' }] });
}

export function makeGroup(overrides: Partial<SecurityGroup> = {}): SecurityGroup {
    return {
        groupId: 'sg-1',
        groupName: 'web',
        vpcId: 'vpc-1',
        ingress: [],
        egress: [],
        ...overrides,
    };
}

export function makeAttachment(n: number): Attachment {
    return { interfaceId: `eni-${n}`, description: `interface ${n}`, privateIp: `10.0.0.${n}` };
}

export function makeInterface(id: string, groupIds: string[]): NetworkInterface {
    return { interfaceId: id, description: '', privateIp: '10.0.0.10', groupIds };
}

export function makeRegion(
    regionName: string,
    securityGroups: SecurityGroup[],
    networkInterfaces: NetworkInterface[] = []
): RegionInventory {
    return { regionName, securityGroups, networkInterfaces };
}

export function makeInventory(regions: RegionInventory[]): Inventory {
    return {
        scanTimestamp: new Date('2026-01-12T14:30:22Z'),
        accountId: '123456789012',
        accountAlias: 'test-account',
        regions,
    };
}

/**
 * A raw export document in the collector's wire format.
 */
export function sampleDocument(): Record<string, unknown> {
    return {
        scan_timestamp: '2026-01-12T14:30:22Z',
        account_id: '123456789012',
        account_alias: 'test-account',
        regions: [
            {
                region_name: 'us-east-1',
                security_groups: [
                    {
                        GroupId: 'sg-1',
                        GroupName: 'web',
                        VpcId: 'vpc-1',
                        IpPermissions: [
                            {
                                IpProtocol: 'tcp',
                                FromPort: 22,
                                ToPort: 22,
                                IpRanges: [{ CidrIp: '0.0.0.0/0' }],
                                Ipv6Ranges: [],
                            },
                        ],
                        IpPermissionsEgress: [],
                    },
                    {
                        GroupId: 'sg-2',
                        GroupName: 'app',
                        VpcId: 'vpc-1',
                        IpPermissions: [
                            {
                                IpProtocol: 'tcp',
                                FromPort: 443,
                                ToPort: 443,
                                IpRanges: [{ CidrIp: '10.0.0.0/8', Description: 'internal' }],
                            },
                        ],
                        IpPermissionsEgress: [
                            {
                                IpProtocol: '-1',
                                IpRanges: [{ CidrIp: '0.0.0.0/0' }],
                            },
                        ],
                    },
                ],
                network_interfaces: [
                    {
                        NetworkInterfaceId: 'eni-1',
                        Description: 'app server',
                        PrivateIpAddress: '10.0.1.5',
                        Groups: [{ GroupId: 'sg-2' }],
                    },
                ],
            },
        ],
    };
}
