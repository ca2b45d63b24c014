import { describe, expect, it } from "vitest";
import { getListArg, getNumberArg, getStringArg, parseCliArgs } from "./cliArgs";

describe("parseCliArgs", () => {
	it("separates positionals from flags", () => {
		const args = parseCliArgs(["alerts", "add", "700.HK", "price_above", "320", "--cooldown", "60"]);
		expect(args).toEqual({
			positionals: ["alerts", "add", "700.HK", "price_above", "320"],
			flags: { cooldown: "60" },
		});
		expect(getNumberArg(args, "cooldown")).toBe(60);
	});

	it("reads inline values, bare flags and lists", () => {
		const args = parseCliArgs([
			"watch",
			"--profile=hk-desk",
			"--instruments",
			"700.HK, 9988.HK,,AAPL.US",
			"--json",
		]);
		expect(getStringArg(args, "profile")).toBe("hk-desk");
		expect(getListArg(args, "instruments")).toEqual(["700.HK", "9988.HK", "AAPL.US"]);
		expect(args.flags.json).toBe(true);
		expect(getStringArg(args, "json")).toBeUndefined();
	});

	it("rejects non-numeric numbers", () => {
		const args = parseCliArgs(["--cooldown", "soon"]);
		expect(() => getNumberArg(args, "cooldown")).toThrowError('--cooldown must be a number, got "soon"');
	});
});
