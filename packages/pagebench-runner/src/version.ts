import type { ClientMetadata, VersionLabelPolicy } from './types.js';

const BROWSER_TOKEN = /(?:Firefox|Chrome)\/([\d.]+)/;

/**
 * Browser version from a user-agent string: the digits after the first
 * `Firefox/` or `Chrome/` token, or undefined when neither is present.
 */
export function extractBrowserVersion(userAgent: string | undefined): string | undefined {
	if (!userAgent) return undefined;
	return BROWSER_TOKEN.exec(userAgent)?.[1];
}

/** The user-agent header of a postback, if any */
export function userAgentOf(metadata: ClientMetadata): string | undefined {
	const header = metadata['user-agent'];
	return Array.isArray(header) ? header[0] : header;
}

/**
 * Apply a target's version-label policy. Truncation only happens where a
 * target asks for it.
 */
export function formatVersionLabel(
	version: string | undefined,
	policy: VersionLabelPolicy,
): string | undefined {
	if (version === undefined) return undefined;
	switch (policy.mode) {
		case 'full':
			return version;
		case 'truncate':
			return version.slice(0, policy.length);
	}
}
