import type { ConfigInput } from "../config";
import type { Flags } from "./shared";

const GLOBAL_FLAGS = new Set(["--help", "-h", "--version", "-v"]);
const SOURCE_FLAGS = ["--input", "--url", "--tz", "--now", "--quiet", "--refine"] as const;

/** Flags followed by a value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set(["--input", "--url", "--output", "--tz", "--now", "--window"]);

const VALID_FLAGS_BY_COMMAND: Readonly<Record<string, ReadonlySet<string>>> = {
	report: new Set([...SOURCE_FLAGS, "--output", "--json"]),
	summary: new Set([...SOURCE_FLAGS, "--window", "--json"]),
	profile: new Set([...SOURCE_FLAGS, "--json"]),
	occupancy: new Set([...SOURCE_FLAGS, "--json"]),
};

/** Value following `flag`, if present. */
export const flagValue = (args: readonly string[], flag: string): string | undefined => {
	const idx = args.indexOf(flag);
	return idx >= 0 && idx + 1 < args.length ? args[idx + 1] : undefined;
};

/** Arguments that are neither flags nor flag values. */
export const positionalArgs = (args: readonly string[]): readonly string[] =>
	args.filter((a, i) => !a.startsWith("-") && !(i > 0 && VALUE_FLAGS.has(args[i - 1])));

export const parseFlags = (args: readonly string[]): Flags => ({
	json: args.includes("--json"),
	help: args.includes("--help") || args.includes("-h"),
	version: args.includes("--version") || args.includes("-v"),
	quiet: args.includes("--quiet"),
	refine: args.includes("--refine"),
});

export const parseOptions = (args: readonly string[], flags: Flags): ConfigInput => ({
	input: flagValue(args, "--input"),
	url: flagValue(args, "--url"),
	output: flagValue(args, "--output"),
	tz: flagValue(args, "--tz"),
	now: flagValue(args, "--now"),
	window: flagValue(args, "--window"),
	refine: flags.refine,
	quiet: flags.quiet,
});

/** Find which command a flag belongs to, for suggestion messages. */
const findFlagOwner = (flag: string): string | undefined =>
	Object.entries(VALID_FLAGS_BY_COMMAND)
		.find(([, validSet]) => validSet.has(flag))
		?.[0];

/** Validate that all --flags in argv are valid for the resolved command. Returns error message or undefined. */
export const validateFlags = (cmd: string, rawArgs: readonly string[]): string | undefined => {
	const validSet = VALID_FLAGS_BY_COMMAND[cmd];
	if (!validSet) return undefined;

	const actualFlags = rawArgs.filter(
		(a, i) => a.startsWith("-") && !(i > 0 && VALUE_FLAGS.has(rawArgs[i - 1])),
	);
	const missingValue = actualFlags.find((f) => VALUE_FLAGS.has(f) && flagValue(rawArgs, f) === undefined);
	if (missingValue) return `Flag ${missingValue} needs a value.`;

	const invalid = actualFlags.filter((f) => !validSet.has(f) && !GLOBAL_FLAGS.has(f));
	if (invalid.length === 0) return undefined;

	const flag = invalid[0];
	const owner = findFlagOwner(flag);
	return owner
		? `Unknown flag ${flag} for '${cmd}'. Did you mean 'clusterstat ${owner} ${flag}'?`
		: `Unknown flag ${flag} for '${cmd}'. Run 'clusterstat --help' for valid options.`;
};
