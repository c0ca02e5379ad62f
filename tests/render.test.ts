import assert from "node:assert/strict";
import { test } from "node:test";
import { RenderError } from "../src/errors.ts";
import type { Logger } from "../src/logger.ts";
import {
	isRenderFormat,
	nodeProcessRunner,
	renderDot,
	viewerCommand,
	type ProcessRunner,
	type RunResult,
} from "../src/render.ts";

const DOT = "digraph {\n\tA\n\tB\n\tA -> B [label=go]\n}\n";

function createFakeRunner(result: RunResult = { status: 0, stderr: "" }) {
	const calls: { command: string; args: string[]; input?: string }[] = [];
	const opened: { command: string; args: string[] }[] = [];
	const runner: ProcessRunner = {
		run(command, args, input) {
			calls.push({ command, args, input });
			return result;
		},
		open(command, args) {
			opened.push({ command, args });
		},
	};
	return { runner, calls, opened };
}

test("renders with dot, DOT source on stdin", () => {
	const { runner, calls, opened } = createFakeRunner();

	const outfile = renderDot(DOT, { filename: "machine" }, runner);

	assert.equal(outfile, "machine.pdf");
	assert.deepEqual(calls, [
		{ command: "dot", args: ["-Tpdf", "-o", "machine.pdf"], input: DOT },
	]);
	assert.deepEqual(opened, []);
});

test("format extension on the filename is optional", () => {
	const { runner, calls } = createFakeRunner();

	assert.equal(
		renderDot(DOT, { filename: "out/machine.png", format: "png" }, runner),
		"out/machine.png"
	);
	assert.equal(
		renderDot(DOT, { filename: "machine.pdf", format: "svg" }, runner),
		"machine.pdf.svg"
	);
	assert.deepEqual(
		calls.map((c) => c.args),
		[
			["-Tpng", "-o", "out/machine.png"],
			["-Tsvg", "-o", "machine.pdf.svg"],
		]
	);
});

test("custom layout engine", () => {
	const { runner, calls } = createFakeRunner();
	renderDot(DOT, { filename: "m", format: "svg", engine: "neato" }, runner);
	assert.equal(calls[0].command, "neato");
});

test("unsupported format", () => {
	const { runner, calls } = createFakeRunner();
	assert.throws(
		() => renderDot(DOT, { filename: "m", format: "docx" }, runner),
		RenderError
	);
	assert.deepEqual(calls, []);
	assert.equal(isRenderFormat("png"), true);
	assert.equal(isRenderFormat("docx"), false);
});

test("empty filename", () => {
	const { runner } = createFakeRunner();
	assert.throws(
		() => renderDot(DOT, { filename: ".pdf" }, runner),
		RenderError
	);
});

test("graphviz failure", () => {
	const { runner, opened } = createFakeRunner({
		status: 1,
		stderr: "Error: syntax error in line 1\n",
	});
	assert.throws(
		() => renderDot(DOT, { filename: "m", view: true }, runner),
		{
			name: "RenderError",
			message: '"dot" exited with status 1: Error: syntax error in line 1',
		}
	);
	assert.deepEqual(opened, []);
});

test("graphviz not installed", () => {
	const { runner } = createFakeRunner({
		status: null,
		stderr: "",
		error: new Error("spawnSync dot ENOENT"),
	});
	assert.throws(() => renderDot(DOT, { filename: "m" }, runner), {
		name: "RenderError",
		message:
			'Failed to execute "dot", make sure Graphviz is installed: spawnSync dot ENOENT',
	});
});

test("view opens the rendered file", () => {
	const { runner, opened } = createFakeRunner();
	const outfile = renderDot(DOT, { filename: "m", format: "png", view: true }, runner);
	assert.deepEqual(opened, [viewerCommand(outfile)].map(([command, args]) => ({
		command,
		args,
	})));
});

test("viewer per platform", () => {
	assert.deepEqual(viewerCommand("m.pdf", "darwin"), ["open", ["m.pdf"]]);
	assert.deepEqual(viewerCommand("m.pdf", "linux"), ["xdg-open", ["m.pdf"]]);
	assert.deepEqual(viewerCommand("m.pdf", "win32"), [
		"cmd",
		["/c", "start", '""', "m.pdf"],
	]);
});

test("viewer that cannot start is reported as a warning", () => {
	const warnings: unknown[][] = [];
	const logger: Logger = {
		debug: () => "",
		log: () => "",
		warn: (...args) => {
			warnings.push(args);
			return String(args[0] ?? "");
		},
		error: () => "",
	};
	const runner: ProcessRunner = {
		run: () => ({ status: 0, stderr: "" }),
		open(command, _args, onError) {
			onError(new Error(`spawn ${command} ENOENT`));
		},
	};

	const outfile = renderDot(
		DOT,
		{ filename: "m", format: "png", view: true, logger },
		runner
	);

	assert.equal(outfile, "m.png");
	const [command] = viewerCommand(outfile);
	assert.deepEqual(warnings, [
		[`Could not open "m.png" with "${command}": spawn ${command} ENOENT`],
	]);
});

test("node runner passes a missing viewer to the error callback", async () => {
	const error = await new Promise<Error>((resolve) => {
		nodeProcessRunner.open("sttp-no-such-viewer-command", ["m.pdf"], resolve);
	});
	assert.match(error.message, /ENOENT/);
});
