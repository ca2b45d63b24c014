import { randomUUID } from "node:crypto";
import {
	AlertRuleError,
	createLogger,
	errorMessage,
	isInstrumentId,
	type ChangeNotification,
	type InstrumentId,
	type ModuleLogger,
} from "@tapewatch/core";
import type { MarketStateView } from "@tapewatch/market-state";
import type { AlertLog } from "./AlertLog";
import { evaluateRule } from "./predicates";
import { isValidCooldown } from "./ruleSchema";
import type { RuleLoadResult, RuleStorage } from "./RuleStorage";
import { isAlertKind, type AlertEvent, type AlertRule, type NewAlertRule } from "./types";

export type AlertListener = (event: AlertEvent) => void;

export interface AlertEngineOptions {
	store: MarketStateView;
	storage: RuleStorage;
	/** History sink; firings are still delivered when it is absent */
	history?: AlertLog;
	defaultCooldownSeconds?: number;
	/** Fired events kept in memory for the UI (default 50) */
	recentLimit?: number;
	now?: () => number;
	generateId?: () => string;
	logger?: ModuleLogger;
}

export const DEFAULT_COOLDOWN_SECONDS = 30;

/**
 * Evaluates alert rules against quote changes.
 *
 * Rules are edge triggered: a rule fires when its condition goes from false
 * to true, and then not again until the condition has been false in between
 * and the cooldown since the previous firing has elapsed. Every rule
 * mutation is persisted before it becomes visible.
 */
export class AlertEngine {
	private readonly store: MarketStateView;
	private readonly storage: RuleStorage;
	private readonly history?: AlertLog;
	private readonly defaultCooldownSeconds: number;
	private readonly recentLimit: number;
	private readonly now: () => number;
	private readonly generateId: () => string;
	private readonly logger: ModuleLogger;
	private rules: AlertRule[] = [];
	private byInstrument = new Map<InstrumentId, AlertRule[]>();
	private readonly satisfied = new Map<string, boolean>();
	private readonly listeners = new Set<AlertListener>();
	private readonly recent: AlertEvent[] = [];

	constructor(options: AlertEngineOptions) {
		this.store = options.store;
		this.storage = options.storage;
		this.history = options.history;
		this.defaultCooldownSeconds =
			options.defaultCooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS;
		this.recentLimit = options.recentLimit ?? 50;
		this.now = options.now ?? (() => Date.now());
		this.generateId = options.generateId ?? randomUUID;
		this.logger = options.logger ?? createLogger("alerts");
	}

	load(): RuleLoadResult {
		const result = this.storage.load();
		this.rules = result.rules;
		this.satisfied.clear();
		this.reindex();
		this.logger.info("alert_rules_loaded", {
			count: this.rules.length,
			backupPath: result.backupPath,
		});
		return result;
	}

	save(): void {
		this.storage.save(this.rules);
	}

	listRules(instrument?: InstrumentId): AlertRule[] {
		return this.rules
			.filter((rule) => instrument === undefined || rule.instrument === instrument)
			.map((rule) => ({ ...rule }));
	}

	getRule(id: string): AlertRule | undefined {
		const rule = this.rules.find((candidate) => candidate.id === id);
		return rule ? { ...rule } : undefined;
	}

	createRule(input: NewAlertRule): AlertRule {
		if (!isInstrumentId(input.instrument)) {
			throw new AlertRuleError(`Invalid instrument: ${String(input.instrument)}`);
		}
		if (!isAlertKind(input.kind)) {
			throw new AlertRuleError(`Unknown alert kind: ${String(input.kind)}`);
		}
		assertThreshold(input.threshold);
		const cooldownSeconds = input.cooldownSeconds ?? this.defaultCooldownSeconds;
		if (!isValidCooldown(cooldownSeconds)) {
			throw new AlertRuleError(
				`Cooldown must be a non-negative whole number of seconds: ${cooldownSeconds}`
			);
		}
		const at = this.now();
		const rule: AlertRule = {
			id: this.generateId(),
			instrument: input.instrument,
			kind: input.kind,
			threshold: input.threshold,
			enabled: input.enabled ?? true,
			cooldownSeconds,
			lastTriggeredAt: null,
			createdAt: at,
			updatedAt: at,
		};
		this.commit([...this.rules, rule]);
		this.logger.info("alert_rule_created", { ...rule });
		return { ...rule };
	}

	enableRule(id: string): AlertRule {
		return this.setEnabled(id, true);
	}

	disableRule(id: string): AlertRule {
		return this.setEnabled(id, false);
	}

	updateThreshold(id: string, threshold: number): AlertRule {
		assertThreshold(threshold);
		return this.replaceRule(id, (rule) => ({ ...rule, threshold }));
	}

	deleteRule(id: string): AlertRule {
		const rule = this.requireRule(id);
		this.commit(this.rules.filter((candidate) => candidate.id !== id));
		this.satisfied.delete(id);
		this.logger.info("alert_rule_deleted", { id, instrument: rule.instrument });
		return { ...rule };
	}

	/** Returns an unsubscribe function. */
	onAlert(listener: AlertListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/** Most recent first. */
	recentEvents(limit = this.recentLimit): AlertEvent[] {
		return this.recent.slice(-limit).reverse();
	}

	/**
	 * Checks the enabled rules of the changed instrument against its current
	 * quote. Only quote changes are considered. Returns the events fired, in
	 * rule creation order.
	 */
	evaluate(change: ChangeNotification): AlertEvent[] {
		if (change.category !== "quote") {
			return [];
		}
		const rules = this.byInstrument.get(change.instrument);
		if (!rules || rules.length === 0) {
			return [];
		}
		const quote = this.store.get(change.instrument)?.quote;
		if (!quote) {
			return [];
		}
		const at = this.now();
		const fired: AlertEvent[] = [];
		for (const rule of rules) {
			const { satisfied, value } = evaluateRule(rule, quote);
			const wasSatisfied = this.satisfied.get(rule.id) ?? false;
			this.satisfied.set(rule.id, satisfied);
			if (!satisfied || wasSatisfied || value === undefined) {
				continue;
			}
			if (
				rule.lastTriggeredAt !== null &&
				at - rule.lastTriggeredAt < rule.cooldownSeconds * 1_000
			) {
				this.logger.debug("alert_suppressed_cooldown", {
					ruleId: rule.id,
					instrument: rule.instrument,
					sinceLastMs: at - rule.lastTriggeredAt,
				});
				continue;
			}
			fired.push({
				ruleId: rule.id,
				instrument: rule.instrument,
				kind: rule.kind,
				threshold: rule.threshold,
				value,
				triggeredAt: at,
			});
		}
		if (fired.length > 0) {
			this.record(fired);
		}
		return fired;
	}

	private record(events: readonly AlertEvent[]): void {
		const firedAt = new Map(events.map((event) => [event.ruleId, event.triggeredAt]));
		this.rules = this.rules.map((rule) => {
			const at = firedAt.get(rule.id);
			return at === undefined ? rule : { ...rule, lastTriggeredAt: at };
		});
		this.reindex();
		try {
			this.storage.save(this.rules);
		} catch (error) {
			this.logger.error("alert_state_save_failed", { message: errorMessage(error) });
		}

		for (const event of events) {
			this.recent.push(event);
			if (this.recent.length > this.recentLimit) {
				this.recent.shift();
			}
			try {
				this.history?.append(event);
			} catch (error) {
				this.logger.error("alert_history_append_failed", {
					ruleId: event.ruleId,
					message: errorMessage(error),
				});
			}
			this.logger.info("alert_triggered", { ...event });
			for (const listener of this.listeners) {
				try {
					listener(event);
				} catch (error) {
					this.logger.error("alert_listener_failed", {
						ruleId: event.ruleId,
						message: errorMessage(error),
					});
				}
			}
		}
	}

	private setEnabled(id: string, enabled: boolean): AlertRule {
		const rule = this.requireRule(id);
		if (rule.enabled === enabled) {
			return { ...rule };
		}
		return this.replaceRule(id, (current) => ({ ...current, enabled }));
	}

	private replaceRule(id: string, update: (rule: AlertRule) => AlertRule): AlertRule {
		const current = this.requireRule(id);
		const next: AlertRule = { ...update(current), id, updatedAt: this.now() };
		this.commit(this.rules.map((rule) => (rule.id === id ? next : rule)));
		this.satisfied.delete(id);
		this.logger.info("alert_rule_updated", {
			id,
			enabled: next.enabled,
			threshold: next.threshold,
		});
		return { ...next };
	}

	private requireRule(id: string): AlertRule {
		const rule = this.rules.find((candidate) => candidate.id === id);
		if (!rule) {
			throw new AlertRuleError(`Unknown alert rule: ${id}`);
		}
		return rule;
	}

	// Persist first; on failure the in-memory rule set is untouched.
	private commit(next: AlertRule[]): void {
		this.storage.save(next);
		this.rules = next;
		this.reindex();
	}

	private reindex(): void {
		const index = new Map<InstrumentId, AlertRule[]>();
		for (const rule of this.rules) {
			if (!rule.enabled) {
				continue;
			}
			const bucket = index.get(rule.instrument);
			if (bucket) {
				bucket.push(rule);
			} else {
				index.set(rule.instrument, [rule]);
			}
		}
		this.byInstrument = index;
	}
}

const assertThreshold = (threshold: number): void => {
	if (!Number.isFinite(threshold)) {
		throw new AlertRuleError(`Threshold must be a finite number: ${threshold}`);
	}
};
