export const CHART_PERIODS = [
	"1m",
	"5m",
	"15m",
	"30m",
	"1h",
	"day",
	"week",
	"month",
	"year",
] as const;

export type ChartPeriod = (typeof CHART_PERIODS)[number];

export const DEFAULT_CHART_PERIOD: ChartPeriod = "day";

const TIMEFRAMES: Record<ChartPeriod, string> = {
	"1m": "1m",
	"5m": "5m",
	"15m": "15m",
	"30m": "30m",
	"1h": "1h",
	day: "1d",
	week: "1w",
	month: "1M",
	// no yearly candles on the venue; monthly bars cover the range
	year: "1M",
};

export const isChartPeriod = (value: unknown): value is ChartPeriod =>
	typeof value === "string" && CHART_PERIODS.some((period) => period === value);

const shiftPeriod = (period: ChartPeriod, step: number): ChartPeriod => {
	const idx = CHART_PERIODS.indexOf(period);
	const next = Math.min(Math.max(idx + step, 0), CHART_PERIODS.length - 1);
	return CHART_PERIODS[next] ?? period;
};

/** Saturates at "year". */
export const nextChartPeriod = (period: ChartPeriod): ChartPeriod => shiftPeriod(period, 1);

/** Saturates at "1m". */
export const prevChartPeriod = (period: ChartPeriod): ChartPeriod => shiftPeriod(period, -1);

export const chartPeriodToTimeframe = (period: ChartPeriod): string => TIMEFRAMES[period];

/** First period drawn with the given venue timeframe. */
export const periodForTimeframe = (timeframe: string): ChartPeriod | undefined =>
	CHART_PERIODS.find((period) => TIMEFRAMES[period] === timeframe);
