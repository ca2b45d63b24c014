export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const isFiniteNumber = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value);

export const readString = (
	source: Record<string, unknown>,
	key: string
): string | undefined => {
	const value = source[key];
	return typeof value === "string" ? value : undefined;
};

export const readNumber = (
	source: Record<string, unknown>,
	key: string
): number | undefined => {
	const value = source[key];
	return isFiniteNumber(value) ? value : undefined;
};

export const readBoolean = (
	source: Record<string, unknown>,
	key: string
): boolean | undefined => {
	const value = source[key];
	return typeof value === "boolean" ? value : undefined;
};

/** Coerces venue payload fields ("123.4", 123.4, null) to a number. */
export const toNumber = (value: unknown, fallback = 0): number => {
	if (value === null || value === undefined || value === "") {
		return fallback;
	}
	const parsed = Number(value);
	return Number.isFinite(parsed) ? parsed : fallback;
};
