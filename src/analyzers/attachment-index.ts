import type { Attachment, NetworkInterface } from '../types/index.js';

export type AttachmentIndex = Map<string, Attachment[]>;

/**
 * Builds a lookup from security group ID to the network interfaces it is attached to.
 */
export function buildAttachmentIndex(interfaces: NetworkInterface[]): AttachmentIndex {
    const index: AttachmentIndex = new Map();

    for (const eni of interfaces) {
        for (const groupId of eni.groupIds) {
            if (!groupId) continue;

            const attachment: Attachment = {
                interfaceId: eni.interfaceId,
                description: eni.description,
                privateIp: eni.privateIp,
            };
            const existing = index.get(groupId);
            if (existing) {
                existing.push(attachment);
            } else {
                index.set(groupId, [attachment]);
            }
        }
    }

    return index;
}

export function attachmentsFor(index: AttachmentIndex, groupId: string): Attachment[] {
    return index.get(groupId) ?? [];
}
