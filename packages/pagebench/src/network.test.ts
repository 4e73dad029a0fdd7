import type { NetworkInterfaceInfo } from 'node:os';
import { describe, expect, it } from 'vitest';
import { getLocalIp } from './network.js';

function iface(address: string, family: 'IPv4' | 'IPv6', internal: boolean): NetworkInterfaceInfo {
	if (family === 'IPv4') {
		return { address, family, internal, netmask: '255.255.255.0', mac: '00:00:00:00:00:00', cidr: null };
	}
	return { address, family, internal, netmask: 'ffff:ffff:ffff:ffff::', mac: '00:00:00:00:00:00', cidr: null, scopeid: 0 };
}

describe('getLocalIp', () => {
	it('picks the first external IPv4 address', () => {
		expect(
			getLocalIp({
				lo: [iface('127.0.0.1', 'IPv4', true)],
				eth0: [iface('fe80::1', 'IPv6', false), iface('192.168.1.20', 'IPv4', false)],
				wlan0: [iface('10.0.0.5', 'IPv4', false)],
			}),
		).toBe('192.168.1.20');
	});

	it('falls back to loopback', () => {
		expect(getLocalIp({ lo: [iface('127.0.0.1', 'IPv4', true)], eth0: undefined })).toBe('127.0.0.1');
	});
});
