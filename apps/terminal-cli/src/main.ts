#!/usr/bin/env node

import fs from "node:fs";
import process from "node:process";
import {
	createLogger,
	getConfigMetadata,
	getLogFile,
	loadTapewatchConfig,
	missingCredentials,
	parseInstrumentId,
	setLogFile,
} from "@tapewatch/core";
import { AlertEngine, AlertLog, RuleStorage } from "@tapewatch/alerts";
import { createMarketContext } from "@tapewatch/app-di";
import { MarketStateStore } from "@tapewatch/market-state";
import { runAlertsCommand } from "./alertsCommand";
import { getBooleanArg, getListArg, getStringArg, parseCliArgs } from "./cliArgs";
import { dataFiles } from "./paths";
import { runWatch } from "./watch";

const logger = createLogger("terminal-cli");

const USAGE = `Usage:
  tapewatch [watch] [options]
  tapewatch alerts <command> [options]

Options:
  --instruments <ids>   Comma separated instruments, replaces the profile's list
  --profile <name>      Terminal profile under config/terminal (default: default)
  --envPath <path>      Custom .env path
  --configDir <path>    Custom config directory
  --help                Show this message
`;

const main = async (): Promise<number> => {
	const args = parseCliArgs(process.argv.slice(2));
	const command = args.positionals[0] ?? "watch";
	if (getBooleanArg(args, "help") || command === "help") {
		console.log(USAGE);
		return 0;
	}

	const instruments = getListArg(args, "instruments")?.map(parseInstrumentId);
	const config = loadTapewatchConfig({
		envPath: getStringArg(args, "envPath"),
		configDir: getStringArg(args, "configDir"),
		profile: getStringArg(args, "profile"),
		instruments,
	});
	fs.mkdirSync(config.dataDir, { recursive: true });
	const files = dataFiles(config.dataDir);

	switch (command) {
		case "alerts": {
			const history = new AlertLog(files.history);
			const engine = new AlertEngine({
				store: new MarketStateStore(),
				storage: new RuleStorage(files.rules),
				history,
				defaultCooldownSeconds: config.terminal.alerts.defaultCooldownSeconds,
			});
			engine.load();
			return runAlertsCommand(args, {
				engine,
				history,
				print: (line) => console.log(line),
			});
		}
		case "watch": {
			// The screen owns stdout while watching.
			if (process.stdout.isTTY && !getLogFile()) {
				setLogFile(files.log);
			}
			const missing = missingCredentials(config.env);
			if (missing.length) {
				logger.warn("portfolio_disabled", { missing });
			}
			const meta = getConfigMetadata(config.terminal);
			logger.info("config_loaded", {
				profile: meta?.profile ?? config.env.profile,
				source: meta?.source ?? "embedded",
				configPath: meta?.path ?? null,
				venue: config.terminal.venue,
				instruments: config.terminal.instruments,
				dataDir: config.dataDir,
			});
			const context = createMarketContext(config);
			return runWatch({
				config,
				context,
				files,
				io: { input: process.stdin, output: process.stdout },
			});
		}
		default:
			console.error(`Unknown command: ${command}`);
			console.log(USAGE);
			return 1;
	}
};

main()
	.then((code) => process.exit(code))
	.catch((error) => {
		logger.error("cli_unhandled_error", {
			message: error instanceof Error ? error.message : String(error),
			stack: error instanceof Error ? error.stack : undefined,
		});
		process.exit(1);
	});
