// CHANGE: Glob pattern compiler for preference-key queries
// PURITY: CORE
// INVARIANT: compileGlob either yields an anchored RegExp or an InvalidGlobPattern; it never throws
// COMPLEXITY: O(|pattern|) to compile

import { Either } from "effect";

import { InvalidGlobPattern } from "../errors.js";

const REGEX_SYNTAX = /[$()*+./?[\\\]^{|}]/u;

function escapeLiteral(c: string): string {
	return REGEX_SYNTAX.test(c) ? `\\${c}` : c;
}

function escapeClassMember(c: string): string {
	return c === "\\" || c === "]" || c === "[" || c === "^" || c === "-" ? `\\${c}` : c;
}

type Step = Either.Either<{ readonly source: string; readonly next: number }, string>;

/**
 * `[...]` starting at `start` (the index of `[`). A `]` right after `[` or
 * `[!` is a literal member.
 */
function compileClass(chars: readonly string[], start: number): Step {
	let i = start + 1;
	const negated = chars[i] === "!";
	if (negated) i++;

	let body = "";
	let first = true;
	for (;;) {
		const c = chars[i];
		if (c === undefined) return Either.left("unmatched '['");
		if (c === "]" && !first) break;
		first = false;

		const dash = chars[i + 1];
		const end = chars[i + 2];
		if (dash === "-" && end !== undefined && end !== "]") {
			if (end < c) return Either.left(`invalid range '${c}-${end}'`);
			body += `${escapeClassMember(c)}-${escapeClassMember(end)}`;
			i += 3;
		} else {
			body += escapeClassMember(c);
			i++;
		}
	}
	return Either.right({ source: `[${negated ? "^" : ""}${body}]`, next: i + 1 });
}

/**
 * A run of `*` starting at `start`: one star is any run of characters, two
 * stars must form a whole `/`-separated component.
 */
function compileStars(chars: readonly string[], start: number): Step {
	let end = start;
	while (chars[end] === "*") end++;
	const run = end - start;
	if (run === 1) return Either.right({ source: ".*", next: end });
	if (run > 2) return Either.left("wildcards are either regular '*' or recursive '**'");

	const before = chars[start - 1];
	const after = chars[end];
	const wholeComponent =
		(before === undefined || before === "/") && (after === undefined || after === "/");
	if (!wholeComponent) {
		return Either.left("recursive wildcards must form a single path component");
	}
	if (after === "/") return Either.right({ source: "(?:.*/)?", next: end + 1 });
	return Either.right({ source: ".*", next: end });
}

/**
 * Compile a glob into an anchored regular expression.
 *
 * Syntax: `*`, `?`, `[abc]`, `[a-z]`, `[!x]`, and `**` as a whole path component.
 *
 * @pure true
 * @example Either.getOrThrow(compileGlob("network.*")).test("network.proxy.type") === true
 */
export function compileGlob(pattern: string): Either.Either<RegExp, InvalidGlobPattern> {
	const chars = Array.from(pattern);
	let source = "";
	let i = 0;
	while (i < chars.length) {
		const c = chars[i] ?? "";
		let step: Step;
		if (c === "*") step = compileStars(chars, i);
		else if (c === "?") step = Either.right({ source: ".", next: i + 1 });
		else if (c === "[") step = compileClass(chars, i);
		else step = Either.right({ source: escapeLiteral(c), next: i + 1 });

		if (Either.isLeft(step)) {
			return Either.left(new InvalidGlobPattern({ pattern, detail: step.left }));
		}
		source += step.right.source;
		i = step.right.next;
	}

	try {
		return Either.right(new RegExp(`^${source}$`, "su"));
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		return Either.left(new InvalidGlobPattern({ pattern, detail }));
	}
}
