import type { Port, Protocol } from '../types/index.js';

const REMOTE_ACCESS_PORTS: ReadonlySet<number> = new Set([22, 3389]);
const DATABASE_PORTS: ReadonlySet<number> = new Set([1433, 3306, 5432, 27017, 6379, 9200]);
const TELNET_PORT = 23;

export const EGRESS_RECOMMENDATION = 'Consider restricting egress to specific ports/protocols';
export const UNUSED_GROUP_RECOMMENDATION =
    'Consider removing unused security groups to reduce complexity';

/**
 * Maps an exposed port and protocol to remediation guidance.
 * Protocol scope is checked before the port, so "all traffic" rules always get the urgent message.
 */
export function resolveRecommendation(port: Port, protocol: Protocol): string {
    if (protocol === 'all') {
        return 'URGENT: Restrict to specific protocols and ports. Use a VPN or bastion host for management access.';
    }

    if (typeof port === 'number') {
        if (REMOTE_ACCESS_PORTS.has(port)) {
            return 'Use AWS Systems Manager Session Manager or a VPN instead of direct internet access';
        }
        if (DATABASE_PORTS.has(port)) {
            return 'Databases should NEVER be exposed to the internet. Use a VPN, VPC peering, or PrivateLink';
        }
        if (port === TELNET_PORT) {
            return 'Telnet is insecure and deprecated. Use SSH instead and restrict access';
        }
    }

    return 'Restrict the source to specific IP addresses or front the service with CloudFront, an ALB, or another managed edge service';
}
