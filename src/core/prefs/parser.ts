// CHANGE: Recursive-descent parser for `fn("key", value);` statements
// PURITY: CORE
// INVARIANT: One PrefEntry per statement, in file order; no deduplication
// INVARIANT: Only user_pref | pref | lock_pref | sticky_pref are accepted
// COMPLEXITY: O(n) over the input with one token of lookahead

import { Either } from "effect";
import { match } from "ts-pattern";

import { ParserError } from "../errors.js";
import { Lexer } from "./lexer.js";
import type { PrefEntry, PrefType } from "./types.js";
import { PrefValue, Token } from "./types.js";
import { prefTypeFromFunction, prefValueFromNumber } from "./value.js";

type ParseStep<A> = Either.Either<A, ParserError>;

/**
 * Short description of a token for diagnostics.
 *
 * @pure true
 */
export function describeToken(token: Token): string {
	return match(token)
		.with({ _tag: "Identifier" }, (t) => `identifier '${t.text}'`)
		.with({ _tag: "String" }, (t) => `string ${JSON.stringify(t.value)}`)
		.with({ _tag: "Number" }, (t) => `number ${String(t.value)}`)
		.with({ _tag: "Boolean" }, (t) => `boolean ${String(t.value)}`)
		.with({ _tag: "Null" }, () => "null")
		.with({ _tag: "LeftParen" }, () => "'('")
		.with({ _tag: "RightParen" }, () => "')'")
		.with({ _tag: "Comma" }, () => "','")
		.with({ _tag: "Semicolon" }, () => "';'")
		.with({ _tag: "Eof" }, () => "end of input")
		.exhaustive();
}

type PunctuationTag = "LeftParen" | "RightParen" | "Comma" | "Semicolon";

const PUNCTUATION: Readonly<Record<PunctuationTag, string>> = {
	LeftParen: "'('",
	RightParen: "')'",
	Comma: "','",
	Semicolon: "';'",
};

class Parser {
	private readonly lexer: Lexer;
	private current: Token = Token.Eof();
	private line = 1;
	private column = 1;

	constructor(input: string) {
		this.lexer = new Lexer(input);
	}

	parse(): ParseStep<readonly PrefEntry[]> {
		const primed = this.advance();
		if (Either.isLeft(primed)) return Either.left(primed.left);

		const entries: PrefEntry[] = [];
		while (this.current._tag !== "Eof") {
			const entry = this.parseStatement();
			if (Either.isLeft(entry)) return Either.left(entry.left);
			entries.push(entry.right);
		}
		return Either.right(entries);
	}

	/** Pull the next token; lexer failures become ParserError at the lexer's position. */
	private advance(): ParseStep<void> {
		const next = this.lexer.next();
		if (Either.isLeft(next)) {
			const { line, column, message } = next.left;
			return Either.left(new ParserError({ line, column, message }));
		}
		this.current = next.right;
		this.line = this.lexer.tokenLine;
		this.column = this.lexer.tokenColumn;
		return Either.right(undefined);
	}

	private fail(message: string): ParserError {
		return new ParserError({ line: this.line, column: this.column, message });
	}

	private parseStatement(): ParseStep<PrefEntry> {
		const prefType = this.parsePrefType();
		if (Either.isLeft(prefType)) return Either.left(prefType.left);

		const open = this.expect("LeftParen");
		if (Either.isLeft(open)) return Either.left(open.left);

		const key = this.expectString();
		if (Either.isLeft(key)) return Either.left(key.left);

		const comma = this.expect("Comma");
		if (Either.isLeft(comma)) return Either.left(comma.left);

		const value = this.parseValue();
		if (Either.isLeft(value)) return Either.left(value.left);

		const close = this.expect("RightParen");
		if (Either.isLeft(close)) return Either.left(close.left);

		const end = this.expect("Semicolon");
		if (Either.isLeft(end)) return Either.left(end.left);

		return Either.right({
			key: key.right,
			value: value.right,
			prefType: prefType.right,
		});
	}

	private parsePrefType(): ParseStep<PrefType> {
		const token = this.current;
		if (token._tag !== "Identifier") {
			return Either.left(
				this.fail(
					`Expected pref function name (user_pref, pref, lock_pref, sticky_pref), got ${describeToken(token)}`,
				),
			);
		}
		const prefType = prefTypeFromFunction(token.text);
		if (prefType === undefined) {
			return Either.left(
				this.fail(
					`Unknown pref function '${token.text}'. Expected user_pref, pref, lock_pref, or sticky_pref`,
				),
			);
		}
		return Either.map(this.advance(), () => prefType);
	}

	private expect(tag: PunctuationTag): ParseStep<void> {
		if (this.current._tag !== tag) {
			return Either.left(
				this.fail(
					`Expected ${PUNCTUATION[tag]}, got ${describeToken(this.current)}`,
				),
			);
		}
		return this.advance();
	}

	private expectString(): ParseStep<string> {
		const token = this.current;
		if (token._tag !== "String") {
			return Either.left(
				this.fail(`Expected preference key string, got ${describeToken(token)}`),
			);
		}
		return Either.map(this.advance(), () => token.value);
	}

	private parseValue(): ParseStep<PrefValue> {
		const token = this.current;
		if (token._tag === "Number" && !Number.isFinite(token.value)) {
			return Either.left(this.fail(`Invalid number ${String(token.value)}`));
		}
		const value = match(this.current)
			.with({ _tag: "String" }, (t): PrefValue | undefined =>
				PrefValue.String({ value: t.value }),
			)
			.with({ _tag: "Number" }, (t) => prefValueFromNumber(t.value))
			.with({ _tag: "Boolean" }, (t) => PrefValue.Bool({ value: t.value }))
			.with({ _tag: "Null" }, () => PrefValue.Null())
			.otherwise(() => undefined);

		if (value === undefined) {
			const message =
				this.current._tag === "Eof"
					? "Unexpected end of input"
					: `Expected value, got ${describeToken(this.current)}`;
			return Either.left(this.fail(message));
		}
		return Either.map(this.advance(), () => value);
	}
}

/**
 * Parse preference DSL text into entries.
 *
 * @pure true
 * @invariant entries.length = number of statements in `text`
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parsePrefs('user_pref("a.b", 1);'); // Right([{ key: "a.b", value: Integer(1n), prefType: "user" }])
 * ```
 */
export function parsePrefs(text: string): Either.Either<readonly PrefEntry[], ParserError> {
	return new Parser(text).parse();
}
