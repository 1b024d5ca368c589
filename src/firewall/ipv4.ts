const DOTTED_QUAD = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

/**
 * Strict dotted-quad IPv4 check: exactly four groups of 1-3 digits, each 0-255.
 * Rejects CIDR suffixes, trailing text, IPv6 and IPv4-mapped IPv6.
 */
export function isStrictIpv4(token: string): boolean {
	const match = DOTTED_QUAD.exec(token);
	if (!match) return false;

	for (const group of match.slice(1)) {
		if (Number.parseInt(group, 10) > 255) return false;
	}
	return true;
}
