import { isIP } from 'node:net';
import { z } from 'zod';
import { InvalidAddressError } from '../errors/outcomeErrors.js';

/**
 * Transport-level peer addresses in the `type:host/port` text form,
 * e.g. `udp:10.0.0.5/161` or `tcp:::1/1161`.
 */

export const TRANSPORT_TYPES = ['udp', 'tcp', 'tls', 'dtls'] as const;

export type TransportType = typeof TRANSPORT_TYPES[number];

export const DEFAULT_TRANSPORT: TransportType = 'udp';

export const TransportAddressSchema = z.object({
    transport: z.enum(TRANSPORT_TYPES),
    host: z.string().refine((host) => isIP(host) !== 0, { message: 'host must be an IPv4 or IPv6 literal' }),
    port: z.number().int().min(0).max(65535),
});

export interface TransportAddress {
    readonly transport: TransportType;
    readonly host: string;
    readonly port: number;
}

function isTransportType(value: string): value is TransportType {
    return TRANSPORT_TYPES.some((type) => type === value);
}

/**
 * Parses `type:host/port`. Without a known `type:` prefix the whole string is
 * taken as `host/port` over UDP.
 *
 * @throws InvalidAddressError
 */
export function parseTransportAddress(text: string): TransportAddress {
    const trimmed = text.trim();
    let transport: TransportType = DEFAULT_TRANSPORT;
    let rest = trimmed;

    const colon = trimmed.indexOf(':');
    if (colon > 0) {
        const prefix = trimmed.slice(0, colon).toLowerCase();
        if (isTransportType(prefix)) {
            transport = prefix;
            rest = trimmed.slice(colon + 1);
        } else if (/^[a-z]+$/.test(prefix) && isIP(trimmed.slice(0, trimmed.lastIndexOf('/'))) === 0) {
            throw new InvalidAddressError(text, `unknown transport "${prefix}"`);
        }
    }

    const slash = rest.lastIndexOf('/');
    if (slash < 0) {
        throw new InvalidAddressError(text, 'missing "/port" suffix');
    }

    const host = rest.slice(0, slash);
    const portText = rest.slice(slash + 1);
    if (!/^\d+$/.test(portText)) {
        throw new InvalidAddressError(text, `port "${portText}" is not a number`);
    }

    const result = TransportAddressSchema.safeParse({ transport, host, port: Number(portText) });
    if (!result.success) {
        throw new InvalidAddressError(text, result.error.issues.map((issue) => issue.message).join(', '));
    }
    return Object.freeze(result.data);
}

export function formatTransportAddress(address: TransportAddress): string {
    return `${address.transport}:${address.host}/${address.port}`;
}

export function isTransportAddress(value: unknown): value is TransportAddress {
    return TransportAddressSchema.safeParse(value).success;
}

/**
 * Renders any peer address for log output.
 */
export function describePeer(peer: unknown): string | undefined {
    if (peer === undefined || peer === null) return undefined;
    if (isTransportAddress(peer)) return formatTransportAddress(peer);
    return String(peer);
}
