import { describe, it, expect } from 'vitest';
import {
    CRITICAL_PORTS,
    MAX_SAMPLED_ATTACHMENTS,
    RISKY_PORTS,
    classifyRule,
    describePorts,
    isPublicCidr,
    severityBucket,
    type RuleContext,
} from '../../src/analyzers/sg-rules.js';
import { makeAttachment, makeGroup, makeRule, publicRule } from '../helpers/fixtures.js';

const context: RuleContext = { region: 'us-east-1', group: makeGroup(), attachments: [] };
const ipv4Public = { cidr: '0.0.0.0/0' };
const ipv6Public = { cidr: '::/0' };

describe('isPublicCidr', () => {
    it('matches only the any-address blocks', () => {
        expect(isPublicCidr('0.0.0.0/0')).toBe(true);
        expect(isPublicCidr('::/0')).toBe(true);
        expect(isPublicCidr('0.0.0.0/1')).toBe(false);
        expect(isPublicCidr('10.0.0.0/8')).toBe(false);
        expect(isPublicCidr('2001:db8::/32')).toBe(false);
    });
});

describe('describePorts', () => {
    it('renders single ports, ranges and the all-ports case', () => {
        expect(describePorts({ protocol: 'tcp', fromPort: 22, toPort: 22 })).toBe('Port 22');
        expect(describePorts({ protocol: 'tcp', fromPort: 8000, toPort: 8080 })).toBe('Ports 8000-8080');
        expect(describePorts({ protocol: 'all', fromPort: 80, toPort: 80 })).toBe('All Ports');
        expect(describePorts({ protocol: 'udp', fromPort: 'all', toPort: 'all' })).toBe('All Ports');
    });
});

describe('severityBucket', () => {
    it('lowercases severities', () => {
        expect(severityBucket('CRITICAL')).toBe('critical');
        expect(severityBucket('INFO')).toBe('info');
    });
});

describe('classifyRule - ingress', () => {
    it('ignores non-public address ranges', () => {
        for (const cidr of ['10.0.0.0/8', '192.168.1.0/24', '0.0.0.0/1', 'fd00::/8']) {
            expect(classifyRule(publicRule(22), 'ingress', { cidr }, context)).toBeUndefined();
            expect(classifyRule(makeRule({ protocol: 'all' }), 'ingress', { cidr }, context)).toBeUndefined();
        }
    });

    it('flags SSH open to the internet as critical', () => {
        const finding = classifyRule(publicRule(22), 'ingress', ipv4Public, context);
        expect(finding).toEqual({
            type: 'Critical Port Exposed to Internet',
            severity: 'CRITICAL',
            direction: 'ingress',
            region: 'us-east-1',
            groupId: 'sg-1',
            groupName: 'web',
            vpcId: 'vpc-1',
            rule: 'INGRESS: Port 22 (SSH) (tcp) → 0.0.0.0/0',
            description: 'No description provided',
            attachedResources: 0,
            attachments: [],
            recommendation: 'Use AWS Systems Manager Session Manager or a VPN instead of direct internet access',
        });
    });

    it('rates every critical port as critical for specific protocols', () => {
        for (const port of CRITICAL_PORTS) {
            for (const protocol of ['tcp', 'udp']) {
                const finding = classifyRule(publicRule(port, port, protocol), 'ingress', ipv4Public, context);
                expect(finding?.severity).toBe('CRITICAL');
                expect(finding?.type).toBe('Critical Port Exposed to Internet');
            }
        }
    });

    it('rates management ports outside the critical set as high', () => {
        const vnc = classifyRule(publicRule(5900), 'ingress', ipv4Public, context);
        expect(vnc?.severity).toBe('HIGH');
        expect(vnc?.type).toBe('Management Port Exposed to Internet');
        expect(vnc?.rule).toBe('INGRESS: Port 5900 (VNC) (tcp) → 0.0.0.0/0');

        const winrm = classifyRule(publicRule(5985), 'ingress', ipv6Public, context);
        expect(winrm?.severity).toBe('HIGH');
        expect(winrm?.type).toBe('Management Port Exposed to Internet');
        expect(winrm?.rule).toBe('INGRESS: Port 5985 (tcp) → ::/0');
    });

    it('rates other well-known service ports as high risk', () => {
        const https = classifyRule(publicRule(443), 'ingress', ipv4Public, context);
        expect(https?.severity).toBe('HIGH');
        expect(https?.type).toBe('Risky Port Exposed to Internet');
        expect(https?.rule).toBe('INGRESS: Port 443 (HTTPS) (tcp) → 0.0.0.0/0');
    });

    it('checks both ends of a port range', () => {
        expect(classifyRule(publicRule(3300, 3306), 'ingress', ipv4Public, context)?.severity).toBe('CRITICAL');
        expect(classifyRule(publicRule(5800, 5900), 'ingress', ipv4Public, context)?.type).toBe(
            'Management Port Exposed to Internet'
        );

        const range = classifyRule(publicRule(20, 21), 'ingress', ipv4Public, context);
        expect(range?.type).toBe('Risky Port Exposed to Internet');
        expect(range?.rule).toBe('INGRESS: Ports 20-21 (FTP Data) (tcp) → 0.0.0.0/0');
    });

    it('defaults other public ports to medium', () => {
        const finding = classifyRule(publicRule(8000, 8100), 'ingress', ipv4Public, context);
        expect(finding?.severity).toBe('MEDIUM');
        expect(finding?.type).toBe('Internet-Exposed Port');
        expect(finding?.rule).toBe('INGRESS: Ports 8000-8100 (tcp) → 0.0.0.0/0');
        expect(finding?.recommendation).toMatch(/^Restrict the source/);
    });

    it('gives a medium finding when a specific protocol has no port range', () => {
        const rule = makeRule({ protocol: 'udp', fromPort: 'all', toPort: 'all' });
        const finding = classifyRule(rule, 'ingress', ipv4Public, context);
        expect(finding?.severity).toBe('MEDIUM');
        expect(finding?.rule).toBe('INGRESS: All Ports (udp) → 0.0.0.0/0');
    });

    it('forces all-protocol rules to critical regardless of ports', () => {
        for (const rule of [
            makeRule({ protocol: 'all', fromPort: 'all', toPort: 'all' }),
            makeRule({ protocol: 'all', fromPort: 8000, toPort: 8100 }),
            makeRule({ protocol: 'all', fromPort: 5900, toPort: 5900 }),
        ]) {
            const finding = classifyRule(rule, 'ingress', ipv6Public, context);
            expect(finding?.severity).toBe('CRITICAL');
            expect(finding?.type).toBe('All Protocols/Ports Open to Internet');
            expect(finding?.recommendation).toMatch(/^URGENT:/);
        }

        const all = classifyRule(makeRule({ protocol: 'all', fromPort: 'all', toPort: 'all' }), 'ingress', ipv4Public, context);
        expect(all?.rule).toBe('INGRESS: All Ports (All) → 0.0.0.0/0');
    });

    it('uses the range description when one is present', () => {
        const finding = classifyRule(publicRule(80), 'ingress', { cidr: '0.0.0.0/0', description: 'public site' }, context);
        expect(finding?.description).toBe('public site');
    });

    it('keeps an explicitly empty range description', () => {
        const finding = classifyRule(publicRule(80), 'ingress', { cidr: '0.0.0.0/0', description: '' }, context);
        expect(finding?.description).toBe('');
    });

    it('samples at most five attachments but reports the full count', () => {
        const attachments = [1, 2, 3, 4, 5, 6, 7].map(makeAttachment);
        const finding = classifyRule(publicRule(443), 'ingress', ipv4Public, { ...context, attachments });
        expect(finding?.attachedResources).toBe(7);
        expect(finding?.attachments).toHaveLength(MAX_SAMPLED_ATTACHMENTS);
        expect(finding?.attachments.map((a) => a.interfaceId)).toEqual(['eni-1', 'eni-2', 'eni-3', 'eni-4', 'eni-5']);
    });

    it('names every port in the risky-port table', () => {
        expect(RISKY_PORTS.size).toBe(24);
        expect(RISKY_PORTS.get(3306)).toBe('MySQL');
    });
});

describe('classifyRule - egress', () => {
    it('flags all-traffic egress to the internet as low', () => {
        const rule = makeRule({ protocol: 'all', fromPort: 'all', toPort: 'all' });
        const finding = classifyRule(rule, 'egress', ipv4Public, context);
        expect(finding?.severity).toBe('LOW');
        expect(finding?.type).toBe('Permissive Egress Rule');
        expect(finding?.direction).toBe('egress');
        expect(finding?.rule).toBe('EGRESS: All Ports (All) → 0.0.0.0/0');
        expect(finding?.description).toBe('All outbound traffic allowed to internet');
        expect(finding?.recommendation).toBe('Consider restricting egress to specific ports/protocols');
    });

    it('ignores port-restricted egress even to the internet', () => {
        expect(classifyRule(publicRule(443), 'egress', ipv4Public, context)).toBeUndefined();
        expect(classifyRule(publicRule(22), 'egress', ipv6Public, context)).toBeUndefined();
    });

    it('ignores all-traffic egress to private ranges', () => {
        const rule = makeRule({ protocol: 'all' });
        expect(classifyRule(rule, 'egress', { cidr: '10.0.0.0/16' }, context)).toBeUndefined();
    });
});
