import {
	backupCorruptFile,
	createLogger,
	errorMessage,
	readJsonFileSafe,
	writeJsonFileAtomic,
	type ModuleLogger,
} from "@tapewatch/core";
import { RULE_FILE_VERSION, parseRuleFile, type RuleFile } from "./ruleSchema";
import type { AlertRule } from "./types";

export interface RuleLoadResult {
	rules: AlertRule[];
	/** Where an unreadable rule file was moved, if it was */
	backupPath: string | null;
}

export interface RuleStorageOptions {
	now?: () => number;
	logger?: ModuleLogger;
}

/** Alert rules persisted as a single versioned JSON document. */
export class RuleStorage {
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(
		readonly filePath: string,
		options: RuleStorageOptions = {}
	) {
		this.now = options.now ?? (() => Date.now());
		this.logger = options.logger ?? createLogger("alert-rules");
	}

	/**
	 * A missing file is an empty rule set. A file that cannot be parsed or
	 * validated is moved aside and loading continues with no rules.
	 */
	load(): RuleLoadResult {
		const result = readJsonFileSafe(this.filePath);
		if (result.status === "missing") {
			return { rules: [], backupPath: null };
		}
		let failure: unknown = result.status === "invalid" ? result.error : null;
		if (result.status === "ok") {
			try {
				return { rules: parseRuleFile(result.value), backupPath: null };
			} catch (error) {
				failure = error;
			}
		}
		let backupPath: string | null = null;
		try {
			backupPath = backupCorruptFile(this.filePath, this.now());
		} catch (error) {
			this.logger.error("alert_rules_backup_failed", {
				filePath: this.filePath,
				message: errorMessage(error),
			});
		}
		this.logger.warn("alert_rules_corrupt", {
			filePath: this.filePath,
			backupPath,
			message: errorMessage(failure),
		});
		return { rules: [], backupPath };
	}

	/** Throws PersistenceError; the previous file is left intact on failure. */
	save(rules: readonly AlertRule[]): void {
		const document: RuleFile = { version: RULE_FILE_VERSION, rules: [...rules] };
		writeJsonFileAtomic(this.filePath, document);
	}
}
