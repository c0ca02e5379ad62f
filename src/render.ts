import { spawn, spawnSync } from "node:child_process";
import { RenderError } from "./errors.ts";
import { createDebugLog, defaultLogger, type STTOptions } from "./logger.ts";

/** Output formats accepted by `dot -T<format>`. */
export const RENDER_FORMATS = [
	"bmp",
	"canon",
	"cmap",
	"cmapx",
	"dot",
	"eps",
	"fig",
	"gif",
	"gv",
	"ico",
	"imap",
	"jpe",
	"jpeg",
	"jpg",
	"json",
	"pdf",
	"pic",
	"plain",
	"png",
	"ps",
	"ps2",
	"svg",
	"svgz",
	"tif",
	"tiff",
	"vml",
	"webp",
	"xdot",
	"xdot_json",
] as const;

export type RenderFormat = (typeof RENDER_FORMATS)[number];

export function isRenderFormat(value: string): value is RenderFormat {
	return (RENDER_FORMATS as readonly string[]).includes(value);
}

export type RenderOptions = STTOptions & {
	/** Output file name; a trailing `.<format>` is optional */
	filename: string;
	/** Output format (default: "pdf") */
	format?: string;
	/** Open the rendered file with the system viewer (default: false) */
	view?: boolean;
	/** Graphviz layout executable (default: "dot") */
	engine?: string;
};

export type RunResult = {
	status: number | null;
	stderr: string;
	error?: Error;
};

/**
 * Process boundary of the renderer. The default implementation shells out;
 * tests provide their own.
 */
export interface ProcessRunner {
	/** Runs a command to completion, feeding `input` on stdin. */
	run(command: string, args: string[], input?: string): RunResult;
	/**
	 * Starts a command in the background without waiting for it. Failing to
	 * start (e.g. the command does not exist) is reported to `onError`.
	 */
	open(command: string, args: string[], onError: (error: Error) => void): void;
}

export const nodeProcessRunner: ProcessRunner = {
	run(command, args, input) {
		const result = spawnSync(command, args, { input, encoding: "utf8" });
		return {
			status: result.status,
			stderr: result.stderr ?? "",
			error: result.error,
		};
	},
	open(command, args, onError) {
		spawn(command, args, { detached: true, stdio: "ignore" })
			.on("error", onError)
			.unref();
	},
};

/** Command used to open a file with the platform's default application. */
export function viewerCommand(
	file: string,
	platform: NodeJS.Platform = process.platform
): [string, string[]] {
	if (platform === "darwin") return ["open", [file]];
	if (platform === "win32") return ["cmd", ["/c", "start", '""', file]];
	return ["xdg-open", [file]];
}

/**
 * Renders DOT source into an image file by delegating to Graphviz.
 *
 * @param dot - DOT source
 * @param options - Target file, format and viewer options
 * @param runner - Process runner (default: child_process based)
 * @returns Path of the written file
 * @throws RenderError if the format is unsupported or Graphviz fails
 *
 * @example
 * ```typescript
 * renderDot(stt.toDot(), { filename: "machine.png", format: "png" });
 * // → "machine.png"
 * ```
 */
export function renderDot(
	dot: string,
	options: RenderOptions,
	runner: ProcessRunner = nodeProcessRunner
): string {
	const { format = "pdf", view = false, engine = "dot" } = options;
	const debugLog = createDebugLog(options);

	if (!isRenderFormat(format)) {
		throw new RenderError(
			`Unsupported format "${format}" (expected one of: ${RENDER_FORMATS.join(", ")})`
		);
	}

	const extension = `.${format}`;
	const base = options.filename.endsWith(extension)
		? options.filename.slice(0, -extension.length)
		: options.filename;
	if (!base) {
		throw new RenderError(`Invalid output filename "${options.filename}"`);
	}
	const outfile = `${base}${extension}`;

	const args = [`-T${format}`, "-o", outfile];
	debugLog(`rendering: ${engine} ${args.join(" ")}`);
	const result = runner.run(engine, args, dot);

	if (result.error) {
		throw new RenderError(
			`Failed to execute "${engine}", make sure Graphviz is installed`,
			result.error.message
		);
	}
	if (result.status !== 0) {
		throw new RenderError(
			`"${engine}" exited with status ${result.status}`,
			result.stderr
		);
	}

	if (view) {
		const [command, viewerArgs] = viewerCommand(outfile);
		debugLog(`opening: ${command} ${viewerArgs.join(" ")}`);
		const logger = options.logger ?? defaultLogger;
		runner.open(command, viewerArgs, (error) => {
			logger.warn(`Could not open "${outfile}" with "${command}": ${error.message}`);
		});
	}

	return outfile;
}
