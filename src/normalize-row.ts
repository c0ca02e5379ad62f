import {
	InvalidTimedTriggerError,
	MissingDestinationError,
	MissingSourceError,
} from "./errors.ts";

/**
 * A single validated edge of the state machine.
 *
 * Key order (`trigger`, `source`, `dest`) is part of the export format and
 * must be preserved wherever a transition is created.
 */
export type Transition = {
	readonly trigger: string;
	readonly source: string;
	readonly dest: string;
};

/**
 * Classified trigger cell.
 * - `plain` - label used verbatim (e.g. `go`)
 * - `event` - named event (`_start`, or an empty cell which names the event after the destination)
 * - `timed` - automatic transition after a number of seconds (`__10`)
 */
export type Trigger =
	| { kind: "plain"; label: string }
	| { kind: "event"; name: string }
	| { kind: "timed"; seconds: bigint };

/** Result of {@link classifyTrigger}: a trigger, or a timed prefix with a bad suffix. */
export type TriggerClassification =
	| Trigger
	| { kind: "invalid-timed"; suffix: string };

export const EVENT_PREFIX = "_";
export const EVENT_LABEL_PREFIX = "EVT_";
export const TIMED_TRANSITION_PREFIX = "__";

/**
 * Parses the seconds of a timed trigger. Accepts surrounding whitespace, an
 * optional sign and single underscores between digit groups (`1_000`);
 * anything else is rejected. The value is kept exact at any size.
 */
export function parseSeconds(value: string): bigint | null {
	const match = value.match(/^\s*([+-]?)(\d+(?:_\d+)*)\s*$/);
	if (!match) return null;
	const [, sign, digits] = match;
	const seconds = BigInt(digits.replace(/_/g, ""));
	return sign === "-" ? -seconds : seconds;
}

/**
 * Classifies a raw trigger cell. Pure function of the raw cell and the
 * (already resolved) destination state.
 *
 * @example
 * ```typescript
 * classifyTrigger("", "Idle");    // { kind: "event", name: "Idle" }
 * classifyTrigger("_foo", "B");   // { kind: "event", name: "foo" }
 * classifyTrigger("__5", "B");    // { kind: "timed", seconds: 5n }
 * classifyTrigger("go", "B");     // { kind: "plain", label: "go" }
 * ```
 */
export function classifyTrigger(
	rawTrigger: string,
	dest: string
): TriggerClassification {
	if (rawTrigger.startsWith(TIMED_TRANSITION_PREFIX)) {
		const suffix = rawTrigger.slice(TIMED_TRANSITION_PREFIX.length);
		const seconds = parseSeconds(suffix);
		return seconds === null
			? { kind: "invalid-timed", suffix }
			: { kind: "timed", seconds };
	}

	// omitted trigger means "the event named after where we are going"
	if (!rawTrigger) {
		return { kind: "event", name: dest };
	}

	if (rawTrigger.startsWith(EVENT_PREFIX)) {
		return { kind: "event", name: rawTrigger.slice(EVENT_PREFIX.length) };
	}

	return { kind: "plain", label: rawTrigger };
}

/** Renders a classified trigger into its transition label. */
export function formatTrigger(trigger: Trigger): string {
	switch (trigger.kind) {
		case "timed":
			return `(after ${trigger.seconds} sec.)`;
		case "event":
			return `${EVENT_LABEL_PREFIX}${trigger.name}`;
		case "plain":
			return trigger.label;
	}
}

/** Output of {@link normalizeRow}. */
export type NormalizedRow = {
	transition: Transition;
	/** Source state to carry into the next row. */
	source: string;
};

/**
 * Resolves one data row `[source, dest, trigger]` into a transition.
 *
 * An empty source inherits `previousSource` (rows grouped under the same
 * state), an empty destination is always an error, and the trigger is
 * classified from its raw text.
 *
 * @param cells - Raw CSV cells; missing cells read as empty, extra cells are ignored
 * @param previousSource - Source carried from the preceding rows, `null` before the first one
 * @param rowNumber - 1-based data row number used in error messages
 * @throws MissingSourceError, MissingDestinationError, InvalidTimedTriggerError
 */
export function normalizeRow(
	cells: readonly string[],
	previousSource: string | null,
	rowNumber: number
): NormalizedRow {
	const [rawSource = "", rawDest = "", rawTrigger = ""] = cells;

	let source: string;
	if (rawSource) {
		source = rawSource;
	} else if (previousSource === null) {
		throw new MissingSourceError(cells, rowNumber);
	} else {
		source = previousSource;
	}

	if (!rawDest) {
		throw new MissingDestinationError(cells, rowNumber);
	}
	const dest = rawDest;

	const trigger = classifyTrigger(rawTrigger, dest);
	if (trigger.kind === "invalid-timed") {
		throw new InvalidTimedTriggerError(cells, rowNumber, trigger.suffix);
	}

	return {
		transition: { trigger: formatTrigger(trigger), source, dest },
		source,
	};
}
