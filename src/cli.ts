import minimist from "minimist";
import { defaultLogger, type Logger } from "./logger.ts";
import { RENDER_FORMATS, type ProcessRunner } from "./render.ts";
import { STT } from "./stt.ts";

export const HELP = `
sttp - State transition table parser

Usage:
  sttp <stt_file> <command> [options]

Commands:
  jsonify               Print the JSON representation of the state machine
  dotify                Print the DOT language source of the state machine
  mermaidify            Print the Mermaid stateDiagram-v2 of the state machine
  visualize <filename>  Render the state machine graph via Graphviz

Options:
  --format <fmt>    Render format for visualize (default: "pdf")
  --view            Open the rendered file after visualize
  --debug           Log parsing details
  --help            Show this help message

Formats:
  ${RENDER_FORMATS.join(", ")}

Examples:
  sttp machine.csv jsonify
  sttp machine dotify > machine.dot
  sttp machine.csv visualize machine --format png --view
`;

export const COMMANDS = ["jsonify", "dotify", "mermaidify", "visualize"] as const;

export type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
	return (COMMANDS as readonly string[]).includes(value);
}

/** Where the CLI writes to and how it reaches files and processes. */
export type CliIO = {
	stdout: (text: string) => void;
	stderr: (text: string) => void;
	readFile?: (path: string) => string;
	runner?: ProcessRunner;
	/** Receives debug output when `--debug` is set (default: console) */
	logger?: Logger;
};

function isFileNotFound(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Runs the command line interface.
 *
 * @param argv - Arguments without the node executable and script path
 * @param io - Output streams and process boundaries
 * @returns Process exit code (0 ok, 1 error, 2 usage)
 */
export function main(argv: string[], io: CliIO): number {
	const args = minimist(argv, {
		string: ["_", "format"],
		boolean: ["help", "view", "debug"],
		default: { format: "pdf" },
		alias: { h: "help" },
	});

	if (args.help === true) {
		io.stdout(HELP);
		return 0;
	}

	const [sttFile, command, filename] = args._.map(String);

	if (!sttFile || !command) {
		io.stderr("Error: <stt_file> and <command> are required");
		io.stderr("Run with --help for usage information");
		return 2;
	}

	if (!isCommand(command)) {
		io.stderr(
			`Error: Unknown command "${command}" (expected one of: ${COMMANDS.join(", ")})`
		);
		return 2;
	}

	const stt = STT.fromFile(
		sttFile,
		{ debug: args.debug === true, logger: io.logger ?? defaultLogger },
		io.readFile
	);

	try {
		switch (command) {
			case "jsonify":
				io.stdout(stt.toJson());
				break;
			case "dotify":
				io.stdout(stt.toDot());
				break;
			case "mermaidify":
				io.stdout(stt.toMermaid());
				break;
			case "visualize": {
				if (!filename) {
					io.stderr("Error: visualize requires a <filename>");
					return 2;
				}
				const outfile = stt.render(
					{ filename, format: String(args.format), view: args.view === true },
					io.runner
				);
				io.stdout(`Written ${outfile}`);
				break;
			}
		}
	} catch (error) {
		if (isFileNotFound(error)) {
			io.stderr(`Error: File not found: ${error.path ?? sttFile}`);
			return 1;
		}
		io.stderr(`Error: ${error instanceof Error ? error.message : error}`);
		return 1;
	}

	return 0;
}
