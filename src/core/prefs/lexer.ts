// CHANGE: Hand-written tokenizer for the preference DSL
// PURITY: CORE
// INVARIANT: line/column are 1-based and advance on every consumed character,
//            including characters inside comments and string literals
// COMPLEXITY: O(n) over the input, one token of state

import { Either } from "effect";

import { LexerError } from "../errors.js";
import { Token } from "./types.js";

const SIMPLE_ESCAPES: ReadonlyMap<string, string> = new Map([
	['"', '"'],
	["'", "'"],
	["\\", "\\"],
	["n", "\n"],
	["r", "\r"],
	["t", "\t"],
	["b", "\b"],
	["f", "\f"],
]);

const KEYWORDS: ReadonlyMap<string, Token> = new Map<string, Token>([
	["true", Token.Boolean({ value: true })],
	["false", Token.Boolean({ value: false })],
	["null", Token.Null()],
]);

const REPLACEMENT_CHARACTER = "\uFFFD";

function isDigit(c: string | undefined): boolean {
	return c !== undefined && c >= "0" && c <= "9";
}

function isHexDigit(c: string | undefined): boolean {
	return c !== undefined && /^[0-9a-fA-F]$/u.test(c);
}

function isIdentifierStart(c: string | undefined): boolean {
	return c !== undefined && /^[A-Za-z_]$/u.test(c);
}

function isIdentifierPart(c: string | undefined): boolean {
	return c !== undefined && /^[A-Za-z0-9_]$/u.test(c);
}

/**
 * Pull-based lexer: call {@link Lexer.next} until it yields `Eof`.
 *
 * @example
 * ```ts
 * const lexer = new Lexer('pref("a", 1);');
 * lexer.next(); // Right(Identifier("pref"))
 * ```
 */
export class Lexer {
	private readonly chars: readonly string[];
	private pos = 0;
	private line = 1;
	private column = 1;
	private startLine = 1;
	private startColumn = 1;

	constructor(input: string) {
		// Code points, so columns count characters rather than UTF-16 units
		this.chars = Array.from(input);
	}

	/** Line of the first character of the most recent token (or error). */
	get tokenLine(): number {
		return this.startLine;
	}

	get tokenColumn(): number {
		return this.startColumn;
	}

	/**
	 * Produce the next token.
	 *
	 * @pure false (advances internal cursor)
	 * @invariant after Eof every further call yields Eof
	 */
	next(): Either.Either<Token, LexerError> {
		const skipped = this.skipWhitespaceAndComments();
		if (skipped !== undefined) return Either.left(skipped);

		this.startLine = this.line;
		this.startColumn = this.column;

		const c = this.peek();
		if (c === undefined) return Either.right(Token.Eof());

		switch (c) {
			case "(":
				this.advance();
				return Either.right(Token.LeftParen());
			case ")":
				this.advance();
				return Either.right(Token.RightParen());
			case ",":
				this.advance();
				return Either.right(Token.Comma());
			case ";":
				this.advance();
				return Either.right(Token.Semicolon());
			case '"':
				return this.lexString();
			default:
				break;
		}

		if (c === "-" || isDigit(c)) return this.lexNumber();
		if (isIdentifierStart(c)) return Either.right(this.lexIdentifier());
		return Either.left(this.error(`Unexpected character: '${c}'`));
	}

	private peek(offset = 0): string | undefined {
		return this.chars[this.pos + offset];
	}

	private advance(): string | undefined {
		const c = this.chars[this.pos];
		if (c === undefined) return undefined;
		this.pos++;
		if (c === "\n") {
			this.line++;
			this.column = 1;
		} else {
			this.column++;
		}
		return c;
	}

	private error(message: string, line = this.line, column = this.column): LexerError {
		return new LexerError({ line, column, message });
	}

	/**
	 * Skip whitespace, `//` line comments and `/* *\/` block comments.
	 * An unterminated block comment runs to end of input without error.
	 */
	private skipWhitespaceAndComments(): LexerError | undefined {
		for (;;) {
			const c = this.peek();
			if (c === " " || c === "\t" || c === "\r" || c === "\n") {
				this.advance();
				continue;
			}
			if (c !== "/") return undefined;

			const after = this.peek(1);
			if (after === "/") {
				while (this.peek() !== undefined && this.peek() !== "\n") this.advance();
				continue;
			}
			if (after === "*") {
				this.advance();
				this.advance();
				while (this.peek() !== undefined) {
					if (this.advance() === "*" && this.peek() === "/") {
						this.advance();
						break;
					}
				}
				continue;
			}
			return this.error("Unexpected character: '/'");
		}
	}

	private lexIdentifier(): Token {
		let text = "";
		while (isIdentifierPart(this.peek())) text += this.advance() ?? "";
		return KEYWORDS.get(text) ?? Token.Identifier({ text });
	}

	private lexString(): Either.Either<Token, LexerError> {
		const openLine = this.line;
		const openColumn = this.column;
		this.advance();

		let value = "";
		for (;;) {
			const c = this.advance();
			if (c === undefined) {
				return Either.left(
					this.error("Unterminated string literal", openLine, openColumn),
				);
			}
			if (c === '"') return Either.right(Token.String({ value }));
			if (c !== "\\") {
				value += c;
				continue;
			}
			const decoded = this.lexEscape();
			if (Either.isLeft(decoded)) return Either.left(decoded.left);
			value += decoded.right;
		}
	}

	/**
	 * Decode the escape following a consumed backslash.
	 *
	 * @invariant `\00` is rejected; `\0` followed by 1-9 yields NUL and leaves the digit
	 */
	private lexEscape(): Either.Either<string, LexerError> {
		const c = this.advance();
		if (c === undefined) {
			return Either.left(this.error("Unexpected end of input in escape sequence"));
		}
		const simple = SIMPLE_ESCAPES.get(c);
		if (simple !== undefined) return Either.right(simple);

		switch (c) {
			case "0":
				if (this.peek() === "0") {
					return Either.left(
						this.error(
							"Octal escape sequences are not supported. Use \\x00 instead.",
						),
					);
				}
				return Either.right("\0");
			case "x": {
				const hex = this.takeHexDigits(2);
				if (hex.length !== 2) {
					return Either.left(this.error(`Incomplete hex escape: \\x${hex}`));
				}
				return Either.right(String.fromCharCode(Number.parseInt(hex, 16)));
			}
			case "u": {
				const hex = this.takeHexDigits(4);
				if (hex.length !== 4) {
					return Either.left(this.error(`Incomplete unicode escape: \\u${hex}`));
				}
				const unit = Number.parseInt(hex, 16);
				// Lone surrogate halves are not scalar values
				if (unit >= 0xd800 && unit <= 0xdfff) {
					return Either.right(REPLACEMENT_CHARACTER);
				}
				return Either.right(String.fromCharCode(unit));
			}
			default:
				return Either.left(this.error(`Invalid escape sequence: \\${c}`));
		}
	}

	private takeHexDigits(count: number): string {
		let hex = "";
		while (hex.length < count && isHexDigit(this.peek())) hex += this.advance() ?? "";
		return hex;
	}

	/**
	 * `-? digits (. digits)? ([eE] [+-]? digits)?`, decoded as an f64.
	 */
	private lexNumber(): Either.Either<Token, LexerError> {
		const startColumn = this.column;
		let text = "";
		if (this.peek() === "-") text += this.advance() ?? "";
		while (isDigit(this.peek())) text += this.advance() ?? "";

		if (this.peek() === ".") {
			text += this.advance() ?? "";
			while (isDigit(this.peek())) text += this.advance() ?? "";
		}

		const e = this.peek();
		if (e === "e" || e === "E") {
			this.advance();
			text += "e";
			const sign = this.peek();
			if (sign === "+" || sign === "-") text += this.advance() ?? "";
			let exponentDigits = 0;
			while (isDigit(this.peek())) {
				text += this.advance() ?? "";
				exponentDigits++;
			}
			if (exponentDigits === 0) {
				return Either.left(
					this.error("Missing exponent digits in scientific notation"),
				);
			}
		}

		const value = Number(text);
		if (Number.isNaN(value)) {
			return Either.left(
				this.error(`Failed to parse number: ${text}`, this.line, startColumn),
			);
		}
		return Either.right(Token.Number({ value }));
	}
}

/**
 * Tokenize a whole input, stopping at the first error.
 *
 * @pure true
 * @complexity O(n)
 */
export function tokenize(input: string): Either.Either<readonly Token[], LexerError> {
	const lexer = new Lexer(input);
	const tokens: Token[] = [];
	for (;;) {
		const next = lexer.next();
		if (Either.isLeft(next)) return Either.left(next.left);
		tokens.push(next.right);
		if (next.right._tag === "Eof") return Either.right(tokens);
	}
}
