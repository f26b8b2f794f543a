import { isSessionActive } from "../cluster/session";
import type { Config } from "../config";
import { occupancyAt } from "../stats/occupancy";
import type { Computer } from "../types";
import { formatDuration } from "../utils";
import { fmtInstant } from "./format-helpers";
import { bold, dim, green, loadCluster } from "./shared";

const inUseFor = (computer: Computer, now: number): string => {
	const active = computer.sessions.find((s) => isSessionActive(s, now));
	return active ? `for ${formatDuration(now - active.start_ms)}` : "";
};

export const occupancyCommand = async (args: { config: Config; json: boolean }): Promise<void> => {
	const { config } = args;
	const { cluster } = await loadCluster(config);
	const computers = occupancyAt(cluster, config.now);

	if (args.json) {
		const inUse = computers.map((c) => c.name);
		console.log(JSON.stringify({ at: new Date(config.now).toISOString(), in_use: inUse }, null, 2));
		return;
	}

	console.log(bold(`In use at ${fmtInstant(config.now, config.timeZone)} (${config.timeZone})`));
	if (computers.length === 0) {
		console.log(dim("No computer in use."));
		return;
	}
	console.log(computers.map((c) => `${green(c.name.padEnd(12))} ${dim(inUseFor(c, config.now))}`).join("\n"));
	console.log(dim(`\n${computers.length} computer(s) in use`));
};
