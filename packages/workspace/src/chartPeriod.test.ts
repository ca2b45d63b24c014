import { describe, expect, it } from "vitest";
import {
	chartPeriodToTimeframe,
	isChartPeriod,
	nextChartPeriod,
	periodForTimeframe,
	prevChartPeriod,
} from "./chartPeriod";

describe("chart periods", () => {
	it("steps through the ordered periods and saturates at both ends", () => {
		expect(nextChartPeriod("1h")).toBe("day");
		expect(prevChartPeriod("day")).toBe("1h");
		expect(nextChartPeriod("year")).toBe("year");
		expect(prevChartPeriod("1m")).toBe("1m");
	});

	it("maps periods to venue timeframes", () => {
		expect(chartPeriodToTimeframe("15m")).toBe("15m");
		expect(chartPeriodToTimeframe("day")).toBe("1d");
		expect(chartPeriodToTimeframe("week")).toBe("1w");
		expect(chartPeriodToTimeframe("year")).toBe("1M");
	});

	it("finds the period for a configured timeframe", () => {
		expect(periodForTimeframe("1m")).toBe("1m");
		expect(periodForTimeframe("1M")).toBe("month");
		expect(periodForTimeframe("4h")).toBeUndefined();
	});

	it("recognises only known periods", () => {
		expect(isChartPeriod("month")).toBe(true);
		expect(isChartPeriod("2h")).toBe(false);
		expect(isChartPeriod(5)).toBe(false);
	});
});
