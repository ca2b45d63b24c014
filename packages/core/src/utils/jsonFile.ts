import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

import { PersistenceError } from "../errors";
import { toUnixSeconds } from "../time";

export type JsonReadResult =
	| { status: "missing" }
	| { status: "ok"; value: unknown }
	| { status: "invalid"; error: unknown };

/** Reads and parses a JSON file without throwing for absent or unparsable content. */
export const readJsonFileSafe = (filePath: string): JsonReadResult => {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		if (isNotFound(error)) {
			return { status: "missing" };
		}
		return { status: "invalid", error };
	}
	try {
		return { status: "ok", value: JSON.parse(contents) };
	} catch (error) {
		return { status: "invalid", error };
	}
};

const tempPathFor = (filePath: string): string => `${filePath}.tmp`;

const serialize = (data: unknown): string => `${JSON.stringify(data, null, 2)}\n`;

/**
 * Pretty-printed JSON written to `<file>.tmp` and renamed over the target, so
 * the target is either the old content or the new, never a partial write.
 */
export const writeJsonFileAtomic = (filePath: string, data: unknown): void => {
	const tmp = tempPathFor(filePath);
	try {
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		fs.writeFileSync(tmp, serialize(data), "utf-8");
		fs.renameSync(tmp, filePath);
	} catch (error) {
		removeIfPresent(tmp);
		throw new PersistenceError(filePath, error);
	}
};

export const writeJsonFileAtomicAsync = async (
	filePath: string,
	data: unknown
): Promise<void> => {
	const tmp = tempPathFor(filePath);
	try {
		await fsp.mkdir(path.dirname(filePath), { recursive: true });
		await fsp.writeFile(tmp, serialize(data), "utf-8");
		await fsp.rename(tmp, filePath);
	} catch (error) {
		removeIfPresent(tmp);
		throw new PersistenceError(filePath, error);
	}
};

/**
 * Moves an unreadable file aside as `<file>.corrupt.<unixSeconds>.bak` and
 * returns the backup path.
 */
export const backupCorruptFile = (filePath: string, now = Date.now()): string => {
	const base = `${filePath}.corrupt.${toUnixSeconds(now)}`;
	let backupPath = `${base}.bak`;
	for (let n = 1; fs.existsSync(backupPath); n += 1) {
		backupPath = `${base}-${n}.bak`;
	}
	fs.renameSync(filePath, backupPath);
	return backupPath;
};

const removeIfPresent = (filePath: string): void => {
	if (fs.existsSync(filePath)) {
		fs.rmSync(filePath, { force: true });
	}
};

const isNotFound = (error: unknown): boolean =>
	error instanceof Error && Reflect.get(error, "code") === "ENOENT";
