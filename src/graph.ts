import type { Transition } from "./normalize-row.ts";

/** Directed, labeled edge between two states. */
export type GraphEdge = {
	source: string;
	dest: string;
	label: string;
};

/**
 * Node and edge lists handed to graph renderers. Parallel edges between
 * the same pair of states are kept, one per transition.
 */
export type GraphEdgeList = {
	nodes: string[];
	edges: GraphEdge[];
};

/**
 * Builds the edge list of a table. Nodes are registered once, in order of
 * first appearance (source before destination).
 */
export function buildGraph(table: readonly Transition[]): GraphEdgeList {
	const nodes = new Set<string>();
	const edges: GraphEdge[] = [];

	for (const { trigger, source, dest } of table) {
		nodes.add(source);
		nodes.add(dest);
		edges.push({ source, dest, label: trigger });
	}

	return { nodes: [...nodes], edges };
}

const DOT_KEYWORDS = new Set([
	"node",
	"edge",
	"graph",
	"digraph",
	"subgraph",
	"strict",
]);

// plain identifier, or numeral
const DOT_ID = /^(?:[a-zA-Z_\u0080-\uffff][a-zA-Z0-9_\u0080-\uffff]*|-?(?:\.[0-9]+|[0-9]+(?:\.[0-9]*)?))$/;

/**
 * Quotes a DOT identifier unless it can be written bare.
 *
 * @example
 * ```typescript
 * quoteDotId("Idle");             // Idle
 * quoteDotId("(after 5 sec.)");   // "(after 5 sec.)"
 * ```
 */
export function quoteDotId(id: string): string {
	if (DOT_ID.test(id) && !DOT_KEYWORDS.has(id.toLowerCase())) {
		return id;
	}
	const escaped = id
		.replace(/\\/g, "\\\\")
		.replace(/"/g, '\\"')
		.replace(/\r?\n/g, "\\n");
	return `"${escaped}"`;
}

/**
 * Generates the Graphviz DOT source of a graph.
 *
 * @example
 * ```typescript
 * graphToDot(buildGraph(table));
 * // digraph {
 * // 	Idle
 * // 	Running
 * // 	Idle -> Running [label=EVT_start]
 * // }
 * ```
 */
export function graphToDot(graph: GraphEdgeList): string {
	let dot = "digraph {\n";
	for (const node of graph.nodes) {
		dot += `\t${quoteDotId(node)}\n`;
	}
	for (const { source, dest, label } of graph.edges) {
		dot += `\t${quoteDotId(source)} -> ${quoteDotId(dest)} [label=${quoteDotId(label)}]\n`;
	}
	dot += "}\n";
	return dot;
}

/**
 * Generates a Mermaid stateDiagram-v2 notation of a graph.
 * States whose names are not plain words are declared with an alias
 * (`state "Long name" as s1`) and referenced through it. Aliases never
 * reuse the name of another state.
 *
 * @example
 * ```typescript
 * graphToMermaid(buildGraph(table));
 * // stateDiagram-v2
 * //     Idle --> Running: EVT_start
 * ```
 */
export function graphToMermaid(graph: GraphEdgeList): string {
	let mermaid = "stateDiagram-v2\n";

	const names = new Set(graph.nodes);
	const ids = new Map<string, string>();
	let next = 0;
	graph.nodes.forEach((node) => {
		if (/^\w+$/.test(node)) {
			ids.set(node, node);
		} else {
			let alias = `s${next++}`;
			while (names.has(alias)) alias = `s${next++}`;
			ids.set(node, alias);
			mermaid += `    state "${node.replace(/"/g, "#quot;")}" as ${alias}\n`;
		}
	});

	for (const { source, dest, label } of graph.edges) {
		const from = ids.get(source) ?? source;
		const to = ids.get(dest) ?? dest;
		mermaid += `    ${from} --> ${to}: ${label}\n`;
	}

	return mermaid;
}
