import { type NetworkInterfaceInfo, networkInterfaces } from 'node:os';

/**
 * First non-internal IPv4 address of this machine, so devices on the same
 * network can reach the result server. Falls back to loopback.
 */
export function getLocalIp(
	interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces(),
): string {
	for (const addresses of Object.values(interfaces)) {
		for (const address of addresses ?? []) {
			if (address.family === 'IPv4' && !address.internal) {
				return address.address;
			}
		}
	}
	return '127.0.0.1';
}
