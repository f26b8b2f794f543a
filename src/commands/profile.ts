import { flattenSessions } from "../cluster/cluster";
import type { Config } from "../config";
import { parseWeekday } from "../stats/calendar";
import { BUCKET_LABELS, computeWeekdayConcurrency, computeWeeklyConcurrency } from "../stats/concurrency";
import { compareWeekdayWeekend } from "../stats/occupancy";
import type { ConcurrencyGraph, WeeklyConcurrency } from "../types";
import { WEEKDAY_VALUES } from "../types";
import { renderBar } from "./format-helpers";
import { bold, cyan, dim, loadCluster } from "./shared";

const BAR_WIDTH = 40;

/** Peak of the six 10-minute buckets of each hour. */
export const hourlyPeaks = (graph: ConcurrencyGraph): readonly number[] =>
	Array.from({ length: 24 }, (_, hour) =>
		BUCKET_LABELS.slice(hour * 6, hour * 6 + 6).reduce((max, label) => Math.max(max, graph[label] ?? 0), 0),
	);

const printDay = (day: string, graph: ConcurrencyGraph): void => {
	const labels = Object.keys(graph);
	if (labels.length === 0) {
		console.log(`No ${day} in the observed range.`);
		return;
	}
	const max = labels.reduce((m, l) => Math.max(m, graph[l]), 0);
	console.log(bold(`${day}: average concurrent sessions`));
	console.log(labels.map((l) => `${dim(l)} ${cyan(renderBar(graph[l], max, BAR_WIDTH))} ${graph[l]}`).join("\n"));
};

const printWeek = (profile: WeeklyConcurrency): void => {
	const header = `${"".padEnd(10)}${Array.from({ length: 24 }, (_, h) => String(h).padStart(4)).join("")}`;
	console.log(bold("Hourly peak of average concurrent sessions"));
	console.log(dim(header));
	console.log(
		WEEKDAY_VALUES.map(
			(day) => `${day.padEnd(10)}${hourlyPeaks(profile[day]).map((v) => String(v).padStart(4)).join("")}`,
		).join("\n"),
	);
};

export const profileCommand = async (args: { config: Config; day?: string; json: boolean }): Promise<void> => {
	const { config } = args;
	const weekday = args.day !== undefined ? parseWeekday(args.day) : undefined;
	const { cluster } = await loadCluster(config);

	if (weekday) {
		const graph = computeWeekdayConcurrency(flattenSessions(cluster), weekday, config.now, config.timeZone);
		if (args.json) {
			console.log(JSON.stringify(graph, null, 2));
			return;
		}
		printDay(weekday, graph);
		return;
	}

	const profile = computeWeeklyConcurrency(cluster, config.now, config.timeZone);
	if (args.json) {
		console.log(JSON.stringify({ days: profile, ...compareWeekdayWeekend(profile) }, null, 2));
		return;
	}
	printWeek(profile);
};
