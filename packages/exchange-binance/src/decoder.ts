import {
	DecodeError,
	isRecord,
	type DepthLevel,
	type FrameDecoder,
	type InstrumentId,
	type PushEvent,
	type TradeDirection,
} from "@tapewatch/core";
import type { BinanceSymbolMap } from "./symbols";

export interface BinanceDecoderOptions {
	/** Stamp for payloads that carry no event time (partial depth) */
	now?: () => number;
}

const requireNumber = (
	source: Record<string, unknown>,
	key: string,
	context: string
): number => {
	const raw = source[key];
	const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new DecodeError(`${context}: field "${key}" is not numeric`);
	}
	return value;
};

const parseLevels = (
	raw: unknown,
	context: string
): DepthLevel[] => {
	if (!Array.isArray(raw)) {
		throw new DecodeError(`${context}: depth side is not an array`);
	}
	return raw.map((level: unknown, idx) => {
		if (!Array.isArray(level) || level.length < 2) {
			throw new DecodeError(`${context}: malformed depth level ${idx}`);
		}
		const price = Number(level[0]);
		const volume = Number(level[1]);
		if (!Number.isFinite(price) || !Number.isFinite(volume)) {
			throw new DecodeError(`${context}: malformed depth level ${idx}`);
		}
		return { position: idx + 1, price, volume, orderCount: 0 };
	});
};

// The buyer being the maker means the aggressor sold.
const tradeDirection = (buyerIsMaker: unknown): TradeDirection => {
	if (buyerIsMaker === true) {
		return "down";
	}
	if (buyerIsMaker === false) {
		return "up";
	}
	return "neutral";
};

/**
 * Decoder for Binance spot combined-stream frames
 * (`{ "stream": "...", "data": {...} }`). Subscription acknowledgements and
 * frames for symbols that were never registered decode to nothing.
 */
export const createBinanceDecoder = (
	symbols: BinanceSymbolMap,
	options: BinanceDecoderOptions = {}
): FrameDecoder => {
	const now = options.now ?? (() => Date.now());

	const resolve = (symbol: unknown): InstrumentId | undefined =>
		typeof symbol === "string" ? symbols.instrumentFor(symbol) : undefined;

	return (frame: string): PushEvent[] => {
		let parsed: unknown;
		try {
			parsed = JSON.parse(frame);
		} catch (error) {
			throw new DecodeError("Frame is not valid JSON", { cause: error });
		}
		if (!isRecord(parsed)) {
			throw new DecodeError("Frame is not a JSON object");
		}
		if ("result" in parsed && "id" in parsed) {
			return [];
		}
		const stream = typeof parsed.stream === "string" ? parsed.stream : "";
		const data = parsed.data ?? parsed;
		if (!isRecord(data)) {
			throw new DecodeError(`Frame for ${stream || "unknown stream"} has no data object`);
		}

		if (stream.includes("@depth")) {
			const instrument = resolve(stream.split("@")[0]);
			if (!instrument) {
				return [];
			}
			return [
				{
					instrument,
					category: "depth",
					payload: {
						bids: parseLevels(data.bids, stream),
						asks: parseLevels(data.asks, stream),
						timestamp: now(),
					},
				},
			];
		}

		const eventType = data.e;
		const instrument = resolve(data.s);
		if (!instrument) {
			return [];
		}
		const context = `${String(eventType)} ${String(data.s)}`;

		switch (eventType) {
			case "24hrTicker":
				return [
					{
						instrument,
						category: "quote",
						payload: {
							lastPrice: requireNumber(data, "c", context),
							open: requireNumber(data, "o", context),
							high: requireNumber(data, "h", context),
							low: requireNumber(data, "l", context),
							prevClose: requireNumber(data, "x", context),
							change: requireNumber(data, "p", context),
							changePercent: requireNumber(data, "P", context),
							volume: requireNumber(data, "v", context),
							turnover: requireNumber(data, "q", context),
							timestamp: requireNumber(data, "E", context),
							tradeSession: "regular",
							tradeStatus: "normal",
						},
					},
				];
			case "trade":
				return [
					{
						instrument,
						category: "trades",
						payload: [
							{
								price: requireNumber(data, "p", context),
								volume: requireNumber(data, "q", context),
								timestamp: requireNumber(data, "T", context),
								direction: tradeDirection(data.m),
							},
						],
					},
				];
			case "kline": {
				const kline = data.k;
				if (!isRecord(kline)) {
					throw new DecodeError(`${context}: kline payload missing`);
				}
				return [
					{
						instrument,
						category: "candle",
						payload: {
							timestamp: requireNumber(kline, "t", context),
							open: requireNumber(kline, "o", context),
							high: requireNumber(kline, "h", context),
							low: requireNumber(kline, "l", context),
							close: requireNumber(kline, "c", context),
							volume: requireNumber(kline, "v", context),
						},
						...(typeof kline.i === "string" ? { timeframe: kline.i } : {}),
					},
				];
			}
			default:
				return [];
		}
	};
};
