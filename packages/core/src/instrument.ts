import type { InstrumentId } from "./types";

const MARKET_PATTERN = /^[A-Za-z][A-Za-z0-9]*$/;

const splitInstrument = (
	value: string
): { code: string; market: string } | null => {
	const idx = value.lastIndexOf(".");
	if (idx <= 0 || idx === value.length - 1) {
		return null;
	}
	const code = value.slice(0, idx);
	const market = value.slice(idx + 1);
	if (!code.trim() || !MARKET_PATTERN.test(market)) {
		return null;
	}
	return { code, market };
};

export const isInstrumentId = (value: unknown): value is InstrumentId =>
	typeof value === "string" && splitInstrument(value) !== null;

/**
 * Normalizes user input ("btc/usdt.binance", " 700.hk ") into an InstrumentId.
 * The code keeps its case except for letters, which are upper-cased the way
 * venues list them.
 */
export const parseInstrumentId = (value: string): InstrumentId => {
	const trimmed = value.trim();
	const parts = splitInstrument(trimmed);
	if (!parts) {
		throw new Error(
			`Invalid instrument "${value}". Expected CODE.MARKET, e.g. 700.HK or BTC/USDT.BINANCE`
		);
	}
	return toInstrumentId(parts.code, parts.market);
};

export const toInstrumentId = (code: string, market: string): InstrumentId =>
	`${code.trim().toUpperCase()}.${market.trim().toUpperCase()}`;

export const instrumentCode = (id: InstrumentId): string =>
	splitInstrument(id)?.code ?? id;

export const instrumentMarket = (id: InstrumentId): string =>
	splitInstrument(id)?.market ?? "";

const MARKET_PRIORITY: Record<string, number> = {
	US: 0,
	HK: 1,
	SH: 2,
	SZ: 2,
	SG: 3,
};

/** Lower sorts first; unknown markets go last. */
export const marketPriority = (id: InstrumentId): number =>
	MARKET_PRIORITY[instrumentMarket(id)] ?? 99;
