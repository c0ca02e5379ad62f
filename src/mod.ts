/**
 * @module
 *
 * State transition table parser.
 *
 * Parses a CSV description of a finite-state machine (`SOURCE,DEST,TRIGGER`)
 * into a validated, immutable list of transitions, and exports it as an
 * adjacency map, a JSON document, a DOT or Mermaid graph, or an image
 * rendered by Graphviz.
 *
 * @example Basic usage
 * ```typescript
 * import { STT } from "sttp";
 *
 * const stt = new STT(`SOURCE,DEST,TRIGGER
 * Idle,Running,_start
 * ,Running,__10
 * Running,Idle,stop
 * `);
 *
 * stt.transitions;
 * // [
 * //   { trigger: "EVT_start", source: "Idle", dest: "Running" },
 * //   { trigger: "(after 10 sec.)", source: "Idle", dest: "Running" },
 * //   { trigger: "stop", source: "Running", dest: "Idle" },
 * // ]
 * ```
 *
 * @example From a file
 * ```typescript
 * const stt = STT.fromFile("machine"); // reads machine.csv
 * console.log(stt.toDot());
 * stt.render({ filename: "machine", format: "png" });
 * ```
 */

export * from "./errors.ts";
export * from "./logger.ts";
export * from "./normalize-row.ts";
export * from "./parse-table.ts";
export * from "./graph.ts";
export * from "./render.ts";
export * from "./stt.ts";
