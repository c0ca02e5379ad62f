import Papa from "papaparse";
import {
	CsvSyntaxError,
	HeaderFormatError,
	StructuralInvariantError,
} from "./errors.ts";
import { createDebugLog, type STTOptions } from "./logger.ts";
import { normalizeRow, type Transition } from "./normalize-row.ts";

/** Required first row of every table, in this exact order. */
export const HEADER_ROW = ["SOURCE", "DEST", "TRIGGER"] as const;

/** Keys every built transition must carry. */
export const TRANSITION_KEYS = ["trigger", "source", "dest"] as const;

/** Frozen, ordered list of transitions parsed from one document. */
export type TransitionTable = readonly Transition[];

/**
 * Splits CSV text into rows of cells. A leading BOM and blank lines are
 * dropped, and any tokenizer error rejects the whole document.
 */
export function readCsvRows(csv: string): string[][] {
	const result = Papa.parse<string[]>(csv.replace(/^\uFEFF/, ""), {
		delimiter: ",",
		skipEmptyLines: true,
	});

	if (result.errors.length) {
		const [first] = result.errors;
		// row indexes count the header as 0, so they match data row numbers
		const rowNumber = typeof first.row === "number" ? first.row : null;
		throw new CsvSyntaxError(rowNumber, first.message);
	}

	return result.data;
}

function isHeaderRow(row: readonly string[] | undefined): boolean {
	return (
		!!row &&
		row.length === HEADER_ROW.length &&
		HEADER_ROW.every((name, i) => row[i] === name)
	);
}

/**
 * Asserts every transition carries a non-empty value for each required key.
 * Normalization already guarantees this; the check guards the boundary to
 * the consumers of the table.
 */
export function validateTable(table: readonly Transition[]): void {
	table.forEach((transition, index) => {
		for (const key of TRANSITION_KEYS) {
			if (typeof transition[key] !== "string" || !transition[key]) {
				throw new StructuralInvariantError(index, key);
			}
		}
	});
}

/**
 * Parses a CSV state transition table into a frozen list of transitions.
 *
 * The header must be exactly `SOURCE,DEST,TRIGGER`. Each data row is
 * normalized in order (see `normalizeRow`), with the last non-empty source
 * carried into rows that leave it blank. The first invalid row aborts the
 * parse.
 *
 * @param csv - The CSV document
 * @param options - Debug/logger options
 * @returns The frozen table; empty when the document only has a header
 * @throws HeaderFormatError, CsvSyntaxError, or one of the row errors
 *
 * @example
 * ```typescript
 * parseTable("SOURCE,DEST,TRIGGER\nIdle,Running,_start\n,Idle,stop\n");
 * // [
 * //   { trigger: "EVT_start", source: "Idle", dest: "Running" },
 * //   { trigger: "stop", source: "Idle", dest: "Idle" },
 * // ]
 * ```
 */
export function parseTable(
	csv: string,
	options: STTOptions = {}
): TransitionTable {
	const debugLog = createDebugLog(options);
	const [header, ...rows] = readCsvRows(csv);

	if (!isHeaderRow(header)) {
		throw new HeaderFormatError(header ?? null, HEADER_ROW);
	}

	const table: Transition[] = [];
	let previousSource: string | null = null;

	rows.forEach((cells, i) => {
		const { transition, source } = normalizeRow(cells, previousSource, i + 1);
		previousSource = source;
		debugLog(
			`row ${i + 1}: "${transition.source}" -> "${transition.dest}" (${transition.trigger})`
		);
		table.push(Object.freeze(transition));
	});

	validateTable(table);
	debugLog(`parsed ${table.length} transition(s)`);

	return Object.freeze(table);
}
