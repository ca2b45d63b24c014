import {
	AlertRuleError,
	errorMessage,
	instrumentCode,
	parseInstrumentId,
} from "@tapewatch/core";
import {
	ALERT_KINDS,
	isAlertKind,
	type AlertEngine,
	type AlertLog,
	type AlertRule,
} from "@tapewatch/alerts";
import { getBooleanArg, getNumberArg, getStringArg, type ParsedArgs } from "./cliArgs";

export interface AlertsCommandDeps {
	engine: AlertEngine;
	history: AlertLog;
	print: (line: string) => void;
}

export const ALERTS_USAGE = [
	"usage: tapewatch alerts <command>",
	"  list [--instrument ID] [--json]",
	`  add <instrument> <${ALERT_KINDS.join("|")}> <threshold> [--cooldown SECONDS] [--disabled]`,
	"  enable <rule-id>",
	"  disable <rule-id>",
	"  delete <rule-id>",
	"  log [--limit N]",
].join("\n");

const describeRule = (rule: AlertRule): string =>
	[
		rule.id,
		rule.enabled ? "on " : "off",
		instrumentCode(rule.instrument).padEnd(12),
		rule.kind.padEnd(20),
		String(rule.threshold).padStart(12),
		`cooldown ${rule.cooldownSeconds}s`,
		rule.lastTriggeredAt === null
			? "never fired"
			: `last ${new Date(rule.lastTriggeredAt).toISOString()}`,
	].join("  ");

const requireArg = (value: string | undefined, name: string): string => {
	if (!value) {
		throw new AlertRuleError(`Missing ${name}\n${ALERTS_USAGE}`);
	}
	return value;
};

const parseInstrument = (value: string): string => {
	try {
		return parseInstrumentId(value);
	} catch (error) {
		throw new AlertRuleError(errorMessage(error), { cause: error });
	}
};

/**
 * `tapewatch alerts ...`. Returns the process exit code; rule validation
 * problems are reported and give 1.
 */
export const runAlertsCommand = (
	args: ParsedArgs,
	deps: AlertsCommandDeps
): number => {
	const [, subcommand, ...rest] = args.positionals;
	const { engine, history, print } = deps;
	try {
		switch (subcommand) {
			case "list": {
				const instrument = getStringArg(args, "instrument");
				const rules = engine.listRules(
					instrument === undefined ? undefined : parseInstrument(instrument)
				);
				if (getBooleanArg(args, "json")) {
					print(JSON.stringify(rules, null, 2));
				} else if (rules.length === 0) {
					print("no alert rules");
				} else {
					rules.forEach((rule) => print(describeRule(rule)));
				}
				return 0;
			}
			case "add": {
				const [instrumentArg, kindArg, thresholdArg] = rest;
				const instrument = parseInstrument(requireArg(instrumentArg, "instrument"));
				const kind = requireArg(kindArg, "kind");
				if (!isAlertKind(kind)) {
					throw new AlertRuleError(
						`Unknown alert kind "${kind}". Expected one of: ${ALERT_KINDS.join(", ")}`
					);
				}
				const threshold = Number(requireArg(thresholdArg, "threshold"));
				const rule = engine.createRule({
					instrument,
					kind,
					threshold,
					cooldownSeconds: getNumberArg(args, "cooldown"),
					enabled: !getBooleanArg(args, "disabled"),
				});
				print(`created ${describeRule(rule)}`);
				return 0;
			}
			case "enable":
				print(`enabled ${describeRule(engine.enableRule(requireArg(rest[0], "rule id")))}`);
				return 0;
			case "disable":
				print(`disabled ${describeRule(engine.disableRule(requireArg(rest[0], "rule id")))}`);
				return 0;
			case "delete":
				print(`deleted ${engine.deleteRule(requireArg(rest[0], "rule id")).id}`);
				return 0;
			case "log": {
				const events = history.tail(getNumberArg(args, "limit") ?? 20);
				if (events.length === 0) {
					print("no alerts fired yet");
				}
				for (const event of events) {
					print(
						`${new Date(event.triggeredAt).toISOString()}  ${instrumentCode(event.instrument)}  ${event.kind} ${event.threshold}  value ${event.value}  (${event.ruleId})`
					);
				}
				return 0;
			}
			default:
				print(ALERTS_USAGE);
				return subcommand === undefined || subcommand === "help" ? 0 : 1;
		}
	} catch (error) {
		if (error instanceof AlertRuleError) {
			print(`error: ${error.message}`);
			return 1;
		}
		throw error;
	}
};
