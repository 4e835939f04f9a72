/**
 * Converting snake_case keys to camelCase.
 *
 * The platform API speaks camelCase, but the OAuth token endpoint and
 * configuration files written for other tooling use snake_case keys.
 */

export function snakeToCamelString(str: string): string {
	return str.replace(/_([a-z0-9])/g, (_, letter: string) =>
		letter.toUpperCase(),
	);
}

function transformKeys(obj: unknown, rename: (key: string) => string): unknown {
	if (obj === null || typeof obj !== "object") {
		return obj;
	}

	if (Array.isArray(obj)) {
		return obj.map((item) => transformKeys(item, rename));
	}

	// Typed arrays and dates are values, not records
	if (ArrayBuffer.isView(obj) || obj instanceof Date) {
		return obj;
	}

	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[rename(key)] = transformKeys(value, rename);
	}
	return result;
}

/**
 * Recursively transform all keys in a value from snake_case to camelCase.
 *
 * @example
 * toCamelCase({ access_token: "x", expires_in: 3600 }); // { accessToken: "x", expiresIn: 3600 }
 */
export function toCamelCase(obj: unknown): unknown {
	return transformKeys(obj, snakeToCamelString);
}
