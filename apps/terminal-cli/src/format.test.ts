import { describe, expect, it } from "vitest";
import type { Candle, MarketSnapshot } from "@tapewatch/core";
import {
	depthLines,
	formatPercent,
	formatPrice,
	formatVolume,
	sparkline,
	tradeLines,
	watchlistRow,
} from "./format";

const candle = (timestamp: number, close: number): Candle => ({
	timestamp,
	open: close,
	high: close,
	low: close,
	close,
	volume: 1,
});

describe("terminal formatting", () => {
	it("formats numbers for narrow columns", () => {
		expect(formatPrice(65_100.5)).toBe("65100.50");
		expect(formatPrice(0.000123456)).toBe("0.0001235");
		expect(formatPrice(undefined)).toBe("--");
		expect(formatPercent(1.234)).toBe("+1.23%");
		expect(formatPercent(-0.5)).toBe("-0.50%");
		expect(formatVolume(1_234_567)).toBe("1.23M");
		expect(formatVolume(950)).toBe("950");
		expect(formatVolume(0.25)).toBe("0.25");
	});

	it("lays out a watchlist row", () => {
		const snapshot: MarketSnapshot = {
			instrument: "ETH/USDT.BINANCE",
			quote: {
				lastPrice: 3_010,
				open: 3_000,
				high: 3_050,
				low: 2_990,
				changePercent: 0.33,
				volume: 12_500,
				turnover: 0,
				timestamp: 1,
			},
			trades: [],
			candles: [],
			updatedAt: 1,
		};
		expect(watchlistRow("ETH/USDT.BINANCE", snapshot, true)).toBe(
			"> ETH/USDT          3010.00    +0.33%     12.50K"
		);
	});

	it("stacks asks above bids with the best prices in the middle", () => {
		const lines = depthLines(
			{
				bids: [
					{ position: 1, price: 99, volume: 1, orderCount: 0 },
					{ position: 2, price: 98, volume: 2, orderCount: 0 },
				],
				asks: [
					{ position: 1, price: 100, volume: 3, orderCount: 0 },
					{ position: 2, price: 101, volume: 4, orderCount: 0 },
				],
				timestamp: 0,
			},
			2
		);
		expect(lines.map((line) => line.split(/\s+/)[1])).toEqual(["101.00", "100.00", "99.00", "98.00"]);
	});

	it("lists trades newest first", () => {
		const lines = tradeLines(
			[
				{ price: 10, volume: 1, timestamp: Date.UTC(2024, 0, 1, 9, 30, 0), direction: "up" },
				{ price: 11, volume: 2, timestamp: Date.UTC(2024, 0, 1, 9, 30, 5), direction: "down" },
			],
			5
		);
		expect(lines[0]?.startsWith("09:30:05 -")).toBe(true);
		expect(lines[1]?.startsWith("09:30:00 +")).toBe(true);
	});

	it("scales the sparkline to the visible window", () => {
		const candles = [candle(1, 10), candle(2, 20), candle(3, 15), candle(4, 30)];
		expect(sparkline(candles, 3)).toBe("▃▁█");
		expect(sparkline(candles, 3, 1)).toBe("▁█▅");
		expect(sparkline([], 10)).toBe("");
	});
});
