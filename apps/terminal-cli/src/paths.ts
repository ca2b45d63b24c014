import path from "node:path";

export interface DataFiles {
	rules: string;
	history: string;
	workspace: string;
	log: string;
}

export const dataFiles = (dataDir: string): DataFiles => ({
	rules: path.join(dataDir, "alerts.json"),
	history: path.join(dataDir, "alert-history.ndjson"),
	workspace: path.join(dataDir, "workspace.json"),
	log: path.join(dataDir, "tapewatch.log"),
});
