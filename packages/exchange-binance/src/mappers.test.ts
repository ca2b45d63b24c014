import { describe, expect, it } from "vitest";
import {
	balanceToPortfolio,
	ohlcvToCandle,
	orderBookToDepth,
	tickerToQuote,
	tradeToTick,
} from "./mappers";

describe("ccxt mappers", () => {
	it("maps a ticker and falls back to the fetch time", () => {
		expect(
			tickerToQuote(
				{ last: 3_010, open: 3_000, high: 3_050, low: 2_990, previousClose: 3_000, percentage: 0.33, baseVolume: 12, quoteVolume: 36_000 },
				99
			)
		).toEqual({
			lastPrice: 3_010,
			open: 3_000,
			high: 3_050,
			low: 2_990,
			prevClose: 3_000,
			change: undefined,
			changePercent: 0.33,
			volume: 12,
			turnover: 36_000,
			timestamp: 99,
			tradeSession: "regular",
			tradeStatus: "normal",
		});
	});

	it("maps OHLCV rows with missing values as zero", () => {
		expect(ohlcvToCandle([60_000, 1, 2, undefined, 1.5, 7])).toEqual({
			timestamp: 60_000,
			open: 1,
			high: 2,
			low: 0,
			close: 1.5,
			volume: 7,
		});
	});

	it("numbers order book levels from the top", () => {
		expect(orderBookToDepth({ bids: [[10, 1]], asks: [[11, 2], [12, 3]], timestamp: 5 }, 0)).toEqual({
			bids: [{ position: 1, price: 10, volume: 1, orderCount: 0 }],
			asks: [
				{ position: 1, price: 11, volume: 2, orderCount: 0 },
				{ position: 2, price: 12, volume: 3, orderCount: 0 },
			],
			timestamp: 5,
		});
	});

	it("maps trade sides to directions", () => {
		expect(tradeToTick({ price: 1, amount: 2, timestamp: 3, side: "sell" }).direction).toBe("down");
		expect(tradeToTick({ price: 1, amount: 2, timestamp: 3, side: "buy" }).direction).toBe("up");
		expect(tradeToTick({ price: 1, amount: 2, timestamp: 3 }).direction).toBe("neutral");
	});

	it("keeps non-zero balances and links them to USDT pairs", () => {
		const balance = {
			info: {},
			total: { USDT: 1_500, ETH: 0.5, DOGE: 0 },
			free: { USDT: 1_000, ETH: 0.5 },
			used: { USDT: 500 },
		};

		expect(balanceToPortfolio(balance, 7)).toEqual({
			holdings: [
				{ asset: "ETH", free: 0.5, used: 0, total: 0.5, instrument: "ETH/USDT.BINANCE" },
				{ asset: "USDT", free: 1_000, used: 500, total: 1_500, instrument: undefined },
			],
			fetchedAt: 7,
		});
	});
});
