#!/usr/bin/env node
import { parseFlags, parseOptions, positionalArgs, validateFlags } from "./commands/args";
import type { Flags } from "./commands/shared";
import type { ConfigInput } from "./config";

const VERSION = "0.1.0";

type CommandContext = {
	readonly positional: readonly string[];
	readonly flags: Flags;
	readonly options: ConfigInput;
};
type CommandDef = {
	readonly description: string;
	readonly handler: (ctx: CommandContext) => Promise<void>;
};

// --- commands ---

const commands: Readonly<Record<string, CommandDef>> = {
	report: {
		description: "Write the full statistics report as JSON",
		handler: async (ctx) => {
			const { resolveConfig } = await import("./config");
			const { reportCommand } = await import("./commands/report");
			await reportCommand({ config: resolveConfig(ctx.options), json: ctx.flags.json });
		},
	},
	summary: {
		description: "Per-computer usage table for one window",
		handler: async (ctx) => {
			const { resolveConfig } = await import("./config");
			const { summaryCommand } = await import("./commands/summary");
			await summaryCommand({ config: resolveConfig(ctx.options), json: ctx.flags.json });
		},
	},
	profile: {
		description: "Weekly concurrency profile, or one weekday in 10-minute buckets",
		handler: async (ctx) => {
			const { resolveConfig } = await import("./config");
			const { profileCommand } = await import("./commands/profile");
			await profileCommand({
				config: resolveConfig(ctx.options),
				day: ctx.positional[1],
				json: ctx.flags.json,
			});
		},
	},
	occupancy: {
		description: "Computers in use at the evaluation instant",
		handler: async (ctx) => {
			const { resolveConfig } = await import("./config");
			const { occupancyCommand } = await import("./commands/occupancy");
			await occupancyCommand({ config: resolveConfig(ctx.options), json: ctx.flags.json });
		},
	},
};

// --- Help text ---

const printHelp = (): void => {
	const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
	const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
	const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

	console.log(`${bold("clusterstat")} v${VERSION}

${bold("Usage:")} clusterstat <command> [day] [options]

${bold("Commands:")}
  ${cyan("report")}            Write the full statistics report (JSON)
  ${cyan("summary")}           Per-computer usage for one window
  ${cyan("profile [day]")}     Concurrency profile (all days, or one weekday)
  ${cyan("occupancy")}         Computers in use at --now

${bold("Options:")}
  ${dim("--input <file>")}   Session payload file ({"sessions": [...]} or array)
  ${dim("--url <url>")}      Fetch the session payload over HTTP
  ${dim("--output <file>")}  Report destination (default cluster.json)
  ${dim("--tz <zone>")}      IANA time zone for days and weekdays
  ${dim("--now <instant>")}  Evaluation instant, epoch ms or ISO-8601
  ${dim("--window <w>")}     Summary window: 1d, 7d, 30d, 12h, all (default 7d)
  ${dim("--refine")}         Let a later record close an open session
  ${dim("--quiet")}          Do not print ingestion warnings
  ${dim("--json")}           Output structured JSON
  ${dim("--version")}        Show version
  ${dim("--help")}           Show help

${bold("Environment:")}
  CLUSTERSTAT_INPUT, CLUSTERSTAT_URL, CLUSTERSTAT_TZ

${bold("Examples:")}
  clusterstat report --input sessions.json            # Write cluster.json
  clusterstat summary --input sessions.json --window 30d
  clusterstat profile Monday --input sessions.json --tz Europe/Paris
  clusterstat occupancy --url https://example.test/sessions`);
};

// --- Main ---

const main = async (args: readonly string[]): Promise<void> => {
	const flags = parseFlags(args);
	const positional = positionalArgs(args);
	const command = positional[0];

	if (flags.version) {
		console.log(VERSION);
		return;
	}

	if (flags.help || !command) {
		printHelp();
		return;
	}

	const def = commands[command];
	if (!def) {
		console.error(`\x1b[31mUnknown command: ${command}\x1b[0m`);
		console.error("Run 'clusterstat --help' for usage.");
		process.exit(1);
	}

	const flagError = validateFlags(command, args);
	if (flagError) {
		console.error(`\x1b[31mError: ${flagError}\x1b[0m`);
		process.exit(1);
	}

	try {
		await def.handler({ positional, flags, options: parseOptions(args, flags) });
	} catch (err) {
		const msg = err instanceof Error ? err.message : String(err);
		console.error(`\x1b[31mError: ${msg}\x1b[0m`);
		process.exit(1);
	}
};

if (require.main === module) {
	void main(process.argv.slice(2));
}
