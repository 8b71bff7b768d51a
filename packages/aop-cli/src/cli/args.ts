/**
 * CLI argument parsing for aop.
 */

import chalk from "chalk";
import type { LogFormat } from "aop-log";

export const COMMANDS = [
	"start",
	"interrupt",
	"resume",
	"abort",
	"end",
	"comment",
	"issue",
	"point",
	"frame",
	"condition",
	"vso",
	"show",
	"list",
	"config",
] as const;

export type Command = (typeof COMMANDS)[number];

const VALID_FORMATS = new Set<string>(["line", "tree", "both"]);
const VALUE_FLAGS = new Set(["--format", "--gear", "--code", "--meta"]);

export interface Args {
	command?: Command;
	positionals: string[];
	help?: boolean;
	version?: boolean;
	verbose?: boolean;
	root?: string;
	session?: string;
	format?: LogFormat;
	time?: string;
	// start
	name?: string;
	observer?: string;
	location?: string;
	longitude?: number;
	latitude?: number;
	project?: string;
	target?: string;
	objective?: string;
	gear?: string[];
	meta: Record<string, string>;
	// point
	ra?: number;
	dec?: number;
	// frame
	iso?: number;
	exposure?: number;
	aperture?: number;
	// condition
	description?: string;
	temp?: number;
	pressure?: number;
	humidity?: number;
	// vso
	chart?: string;
	comp1?: string;
	comp2?: string;
	codes?: string[];
}

function isCommand(value: string): value is Command {
	return COMMANDS.some((command) => command === value);
}

function isLogFormat(value: string): value is LogFormat {
	return VALID_FORMATS.has(value);
}

function parseNumber(flag: string, value: string): number | undefined {
	const number = Number(value);
	if (value.trim() === "" || !Number.isFinite(number)) {
		console.error(chalk.yellow(`Warning: ${flag} expects a number, got "${value}"`));
		return undefined;
	}
	return number;
}

const NUMBER_FLAGS = {
	"--longitude": "longitude",
	"--latitude": "latitude",
	"--ra": "ra",
	"--dec": "dec",
	"--iso": "iso",
	"--exp": "exposure",
	"--aperture": "aperture",
	"--temp": "temp",
	"--pressure": "pressure",
	"--humidity": "humidity",
} as const satisfies Record<string, keyof Args>;

const STRING_FLAGS = {
	"--root": "root",
	"--session": "session",
	"--time": "time",
	"--name": "name",
	"--observer": "observer",
	"--location": "location",
	"--project": "project",
	"--target": "target",
	"--objective": "objective",
	"--description": "description",
	"--chart": "chart",
	"--comp1": "comp1",
	"--comp2": "comp2",
} as const satisfies Record<string, keyof Args>;

function isNumberFlag(arg: string): arg is keyof typeof NUMBER_FLAGS {
	return Object.hasOwn(NUMBER_FLAGS, arg);
}

function isStringFlag(arg: string): arg is keyof typeof STRING_FLAGS {
	return Object.hasOwn(STRING_FLAGS, arg);
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		positionals: [],
		meta: {},
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if (arg === "--verbose") {
			result.verbose = true;
		} else if (arg === "--format" && i + 1 < args.length) {
			const format = args[++i];
			if (isLogFormat(format)) {
				result.format = format;
			} else {
				console.error(chalk.yellow(`Warning: Invalid format "${format}". Valid values: line, tree, both`));
			}
		} else if (isStringFlag(arg) && i + 1 < args.length) {
			result[STRING_FLAGS[arg]] = args[++i];
		} else if (isNumberFlag(arg) && i + 1 < args.length) {
			result[NUMBER_FLAGS[arg]] = parseNumber(arg, args[++i]);
		} else if (arg === "--gear" && i + 1 < args.length) {
			result.gear = result.gear ?? [];
			result.gear.push(args[++i]);
		} else if (arg === "--code" && i + 1 < args.length) {
			result.codes = result.codes ?? [];
			result.codes.push(args[++i]);
		} else if (arg === "--meta" && i + 1 < args.length) {
			const pair = args[++i];
			const separator = pair.indexOf("=");
			if (separator > 0) {
				result.meta[pair.slice(0, separator)] = pair.slice(separator + 1);
			} else {
				console.error(chalk.yellow(`Warning: --meta expects key=value, got "${pair}"`));
			}
		} else if (VALUE_FLAGS.has(arg) || isStringFlag(arg) || isNumberFlag(arg)) {
			console.error(chalk.yellow(`Warning: ${arg} needs a value`));
		} else if (arg.startsWith("--")) {
			console.error(chalk.yellow(`Warning: Unknown option "${arg}"`));
		} else if (result.command === undefined && result.positionals.length === 0) {
			if (isCommand(arg)) {
				result.command = arg;
			} else {
				result.positionals.push(arg);
			}
		} else {
			result.positionals.push(arg);
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold("aop")} - astronomical observation protocol logger

${chalk.bold("Usage:")}
  aop <command> [arguments] [options]

${chalk.bold("Session commands:")}
  start                          Start a new session and make it current
  interrupt                      Interrupt the current session
  resume                         Resume an interrupted session
  abort <reason>                 Abort the session
  end                            End the session

${chalk.bold("Log commands:")}
  comment <text>                 Log a comment
  issue <severity> <message>     Log an issue: potential, normal, major (or p, n, m)
  point <target...>              Log pointing at named targets
  point --ra <h> --dec <deg>     Log pointing at coordinates
  frame <count> <type>           Log frames: science, dark, flat, bias, pointing
                                 with --iso <n> --exp <s> --aperture <f>
  condition                      Log conditions with --description, --temp,
                                 --pressure, --humidity
  vso <star> <magnitude>         Log a variable star estimate with --chart <id>
                                 --comp1 <label> [--comp2 <label>] [--code <c>...]

${chalk.bold("Other commands:")}
  show [session]                 Print a session's metadata and log
  list                           List sessions under the storage root
  config [key] [value]           Show or change settings

${chalk.bold("Options:")}
  --root <dir>                   Storage root (default: settings, then ~/.aop/sessions)
  --session <id>                 Session to act on (default: the last one started)
  --format <format>              Format for new sessions: line (default), tree, both
  --time <iso>                   Timestamp for the entry (default: now)
  --verbose                      Print each written entry
  --help, -h                     Show this help
  --version, -v                  Show version number

${chalk.bold("Start options:")}
  --name, --observer, --location, --project, --target, --objective <text>
  --longitude <deg>, --latitude <deg>
  --gear <item>                  Equipment in use (repeatable)
  --meta <key=value>             Any other session attribute (repeatable)

${chalk.bold("Examples:")}
  aop start --observer "Jane Doe" --gear "8in Dobsonian" --gear DSLR
  aop point M42 M43
  aop frame 20 science --iso 800 --exp 30 --aperture 5.6
  aop condition --temp 4.5 --humidity 71
  aop issue n "Dew on the secondary mirror"
  aop end

${chalk.bold("Environment Variables:")}
  AOP_DIR                 Configuration directory (default: ~/.aop)
`);
}
