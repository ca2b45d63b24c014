import {
	backupCorruptFile,
	createLogger,
	errorMessage,
	readJsonFileSafe,
	writeJsonFileAtomicAsync,
	type ModuleLogger,
} from "@tapewatch/core";
import { defaultWorkspace, parseWorkspace, type WorkspaceSnapshot } from "./snapshot";

export interface WorkspaceStoreOptions {
	filePath: string;
	/** Upper bound on a save during shutdown (default 1500) */
	saveTimeoutMs?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

export interface WorkspaceLoadResult {
	snapshot: WorkspaceSnapshot;
	/** Where an unreadable workspace file was moved, if it was */
	backupPath: string | null;
}

type SaveOutcome = { status: "written" } | { status: "failed"; error: unknown } | { status: "timeout" };

/**
 * UI layout persisted between sessions. Content problems never surface as
 * errors: the caller always gets a usable snapshot on load and a boolean on
 * save.
 */
export class WorkspaceStore {
	readonly filePath: string;
	private readonly saveTimeoutMs: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(options: WorkspaceStoreOptions) {
		this.filePath = options.filePath;
		this.saveTimeoutMs = options.saveTimeoutMs ?? 1_500;
		this.now = options.now ?? (() => Date.now());
		this.logger = options.logger ?? createLogger("workspace");
	}

	load(): WorkspaceLoadResult {
		const result = readJsonFileSafe(this.filePath);
		if (result.status === "missing") {
			return { snapshot: defaultWorkspace(), backupPath: null };
		}
		let reason: string;
		if (result.status === "ok") {
			const parsed = parseWorkspace(result.value);
			if (parsed.ok) {
				return { snapshot: parsed.snapshot, backupPath: null };
			}
			reason = parsed.reason;
		} else {
			reason = errorMessage(result.error);
		}

		let backupPath: string | null = null;
		try {
			backupPath = backupCorruptFile(this.filePath, this.now());
		} catch (error) {
			this.logger.error("workspace_backup_failed", {
				filePath: this.filePath,
				message: errorMessage(error),
			});
		}
		this.logger.warn("workspace_corrupt", { filePath: this.filePath, backupPath, reason });
		return { snapshot: defaultWorkspace(), backupPath };
	}

	/** Resolves true once written; false (logged) on failure or timeout. */
	async save(snapshot: WorkspaceSnapshot): Promise<boolean> {
		const document: WorkspaceSnapshot = { ...snapshot, savedAt: this.now() };
		let timer: ReturnType<typeof setTimeout> | undefined;
		const write = writeJsonFileAtomicAsync(this.filePath, document).then(
			(): SaveOutcome => ({ status: "written" }),
			(error: unknown): SaveOutcome => ({ status: "failed", error })
		);
		const timeout = new Promise<SaveOutcome>((resolve) => {
			timer = setTimeout(() => resolve({ status: "timeout" }), this.saveTimeoutMs);
		});

		const outcome = await Promise.race([write, timeout]);
		clearTimeout(timer);

		switch (outcome.status) {
			case "written":
				this.logger.debug("workspace_saved", { filePath: this.filePath });
				return true;
			case "failed":
				this.logger.error("workspace_save_failed", {
					filePath: this.filePath,
					message: errorMessage(outcome.error),
				});
				return false;
			case "timeout":
				this.logger.warn("workspace_save_timeout", {
					filePath: this.filePath,
					timeoutMs: this.saveTimeoutMs,
				});
				return false;
		}
	}
}
