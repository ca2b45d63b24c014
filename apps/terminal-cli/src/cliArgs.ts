export type ArgValue = string | boolean;

export interface ParsedArgs {
	/** Bare tokens in order, e.g. ["alerts", "add", "700.HK"] */
	positionals: string[];
	flags: Record<string, ArgValue>;
}

/**
 * `--key value`, `--key=value` and bare `--flag` (true). A token after a
 * flag that itself starts with `--` is not taken as its value; negative
 * numbers therefore need the `--key=-1` form.
 */
export const parseCliArgs = (argv: readonly string[]): ParsedArgs => {
	const flags: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i] ?? "";
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			flags[token.slice(2, eqIdx)] = token.slice(eqIdx + 1);
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			flags[key] = next;
			i += 1;
		} else {
			flags[key] = true;
		}
	}
	return { positionals, flags };
};

export const getStringArg = (
	args: ParsedArgs,
	key: string
): string | undefined => {
	const value = args.flags[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const getBooleanArg = (args: ParsedArgs, key: string): boolean => {
	const value = args.flags[key];
	return value === true || value === "true";
};

export const getListArg = (
	args: ParsedArgs,
	key: string
): string[] | undefined => {
	const raw = getStringArg(args, key);
	if (!raw) {
		return undefined;
	}
	const items = raw
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return items.length ? items : undefined;
};

export const getNumberArg = (
	args: ParsedArgs,
	key: string
): number | undefined => {
	const raw = getStringArg(args, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new Error(`--${key} must be a number, got "${raw}"`);
	}
	return value;
};
