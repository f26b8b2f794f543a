import { writeFileSync } from "node:fs";
import type { Config } from "../config";
import { buildClusterReport } from "../stats/report";
import { dim, green, loadCluster } from "./shared";

export const reportCommand = async (args: { config: Config; json: boolean }): Promise<void> => {
	const { config } = args;
	const { cluster, accepted, refined } = await loadCluster(config);
	const report = buildClusterReport(cluster, { now: config.now, timeZone: config.timeZone });
	const text = JSON.stringify(report, null, 4);

	if (args.json) {
		console.log(text);
		return;
	}

	writeFileSync(config.output, `${text}\n`);
	const refinedNote = refined > 0 ? `, ${refined} refined` : "";
	console.log(green(`Wrote ${config.output}`));
	console.log(dim(`${accepted} session(s) accepted${refinedNote}, time zone ${config.timeZone}`));
};
