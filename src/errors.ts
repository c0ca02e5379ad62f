/**
 * Base class of every error thrown while parsing or exporting a state
 * transition table. All of them are fatal: a table with any defect is
 * rejected as a whole.
 */
export class STTError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/** The first CSV row is not exactly `SOURCE,DEST,TRIGGER`. */
export class HeaderFormatError extends STTError {
	constructor(
		public readonly header: readonly string[] | null,
		expected: readonly string[]
	) {
		super(`Invalid header format: must be: ${expected.join(",")}`);
	}
}

/** The CSV text itself could not be tokenized (e.g. unterminated quotes). */
export class CsvSyntaxError extends STTError {
	constructor(
		public readonly rowNumber: number | null,
		reason: string
	) {
		super(
			rowNumber === null
				? `Invalid CSV: ${reason}`
				: `Invalid CSV near row ${rowNumber}: ${reason}`
		);
	}
}

/**
 * Common shape of the errors raised for a single data row.
 * `rowNumber` is 1-based and does not count the header.
 */
export class InvalidRowError extends STTError {
	constructor(
		public readonly row: readonly string[],
		public readonly rowNumber: number,
		reason: string
	) {
		super(`Invalid row ${rowNumber}: ${JSON.stringify(row)}. ${reason}`);
	}
}

export class MissingSourceError extends InvalidRowError {
	constructor(row: readonly string[], rowNumber: number) {
		super(row, rowNumber, "Undefined previous source state.");
	}
}

export class MissingDestinationError extends InvalidRowError {
	constructor(row: readonly string[], rowNumber: number) {
		super(row, rowNumber, "Undefined destination state.");
	}
}

export class InvalidTimedTriggerError extends InvalidRowError {
	constructor(
		row: readonly string[],
		rowNumber: number,
		public readonly suffix: string
	) {
		super(
			row,
			rowNumber,
			`A '__' prefix indicates a timed transition and must be followed ` +
				`by a number (seconds). Invalid value: ${suffix}`
		);
	}
}

/** A built transition lacks one of its required fields. Should not happen. */
export class StructuralInvariantError extends STTError {
	constructor(
		public readonly index: number,
		public readonly key: string
	) {
		super(`Invalid transition at index ${index}: missing "${key}"`);
	}
}

/** Graphviz could not be run, or rejected the graph. */
export class RenderError extends STTError {
	constructor(
		message: string,
		public readonly stderr = ""
	) {
		super(stderr ? `${message}: ${stderr.trim()}` : message);
	}
}
