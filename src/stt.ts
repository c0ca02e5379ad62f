import { readFileSync } from "node:fs";
import {
	buildGraph,
	graphToDot,
	graphToMermaid,
	type GraphEdgeList,
} from "./graph.ts";
import { createDebugLog, type STTOptions } from "./logger.ts";
import { parseTable, type TransitionTable } from "./parse-table.ts";
import {
	nodeProcessRunner,
	renderDot,
	type ProcessRunner,
	type RenderOptions,
} from "./render.ts";

export const CSV_EXTENSION = ".csv";

/** `source -> dest -> trigger` lookup. */
export type AdjacencyMap = Record<string, Record<string, string>>;

/** Structured export document: `{ "transitions": [...] }`. */
export type STTExport = {
	transitions: TransitionTable;
};

/**
 * A parsed state transition table.
 *
 * The table is read and parsed lazily, on first access, and is immutable
 * afterwards. Every projection is computed once per instance and cached.
 *
 * @example
 * ```typescript
 * const stt = new STT(`SOURCE,DEST,TRIGGER
 * Idle,Running,_start
 * Running,Idle,stop
 * `);
 *
 * stt.toAdjacency(); // { Idle: { Running: "EVT_start" }, Running: { Idle: "stop" } }
 * console.log(stt.toDot());
 * ```
 */
export class STT {
	#load: () => string;
	#debugLog: (...args: unknown[]) => void;

	#transitions: TransitionTable | null = null;
	#adjacency: AdjacencyMap | null = null;
	#export: STTExport | null = null;
	#json: string | null = null;
	#graph: GraphEdgeList | null = null;
	#dot: string | null = null;
	#mermaid: string | null = null;

	/**
	 * @param source - CSV text, or a function returning it (called once, on first access)
	 * @param options - Debug/logger options
	 */
	constructor(
		source: string | (() => string),
		public readonly options: STTOptions = {}
	) {
		if (typeof source === "function") {
			this.#load = source;
		} else {
			const csv = source;
			this.#load = () => csv;
		}
		this.#debugLog = createDebugLog(options);
	}

	/**
	 * Creates a table backed by a CSV file. The `.csv` extension is appended
	 * when missing. The file is not read until the table is first accessed.
	 */
	static fromFile(
		file: string,
		options: STTOptions = {},
		readFile: (path: string) => string = (path) => readFileSync(path, "utf8")
	): STT {
		const path = file.endsWith(CSV_EXTENSION) ? file : file + CSV_EXTENSION;
		return new STT(() => readFile(path), options);
	}

	/** The parsed, frozen transitions in input order. */
	get transitions(): TransitionTable {
		if (this.#transitions === null) {
			this.#debugLog("parsing table");
			this.#transitions = parseTable(this.#load(), this.options);
		}
		return this.#transitions;
	}

	/**
	 * Returns the `source -> dest -> trigger` mapping. When several
	 * transitions share the same source and destination, the last one wins.
	 */
	toAdjacency(): AdjacencyMap {
		if (this.#adjacency === null) {
			const map = new Map<string, Map<string, string>>();
			for (const { trigger, source, dest } of this.transitions) {
				let targets = map.get(source);
				if (!targets) {
					targets = new Map();
					map.set(source, targets);
				}
				targets.set(dest, trigger);
			}
			this.#adjacency = Object.freeze(
				Object.fromEntries(
					[...map].map(([source, targets]): [string, Record<string, string>] => [
						source,
						Object.freeze(Object.fromEntries(targets)),
					])
				)
			);
		}
		return this.#adjacency;
	}

	/** Returns the structured export document. */
	toExport(): STTExport {
		if (this.#export === null) {
			this.#export = Object.freeze({ transitions: this.transitions });
		}
		return this.#export;
	}

	/** Returns the structured export serialized as JSON (4 space indent). */
	toJson(): string {
		if (this.#json === null) {
			this.#json = JSON.stringify(this.toExport(), null, 4);
		}
		return this.#json;
	}

	/** Returns the node and edge lists of the state graph. */
	toGraph(): GraphEdgeList {
		if (this.#graph === null) {
			this.#graph = buildGraph(this.transitions);
		}
		return this.#graph;
	}

	/** Returns the Graphviz DOT source of the state graph. */
	toDot(): string {
		if (this.#dot === null) {
			this.#dot = graphToDot(this.toGraph());
		}
		return this.#dot;
	}

	/** Returns the Mermaid stateDiagram-v2 notation of the state graph. */
	toMermaid(): string {
		if (this.#mermaid === null) {
			this.#mermaid = graphToMermaid(this.toGraph());
		}
		return this.#mermaid;
	}

	/**
	 * Renders the state graph to an image file via Graphviz.
	 * @returns Path of the written file
	 */
	render(
		options: RenderOptions,
		runner: ProcessRunner = nodeProcessRunner
	): string {
		return renderDot(this.toDot(), { ...this.options, ...options }, runner);
	}
}
