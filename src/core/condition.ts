import { matchesGlob } from "../utils/glob.js";
import { ConditionSyntaxError } from "./errors.js";

export type Operand = { kind: "variable"; name: string } | { kind: "literal"; value: string };

export type StringFunction = "startsWith" | "endsWith" | "contains";

export type Condition =
	| { kind: "constant"; value: boolean }
	| { kind: "truthy"; operand: Operand }
	| { kind: "equals"; left: Operand; right: Operand; negated: boolean }
	| { kind: "glob"; subject: Operand; pattern: Operand }
	| { kind: "call"; name: StringFunction; args: [Operand, Operand] }
	| { kind: "not"; condition: Condition }
	| { kind: "and"; conditions: Condition[] }
	| { kind: "or"; conditions: Condition[] };

type Token =
	| { type: "string"; value: string; position: number }
	| { type: "word"; value: string; position: number }
	| { type: "op"; value: "==" | "!=" | "&&" | "||" | "!" | "(" | ")" | ","; position: number };

const STRING_FUNCTIONS: readonly StringFunction[] = ["startsWith", "endsWith", "contains"];

// Names used by hosted CI expressions that map onto run variables.
const VARIABLE_ALIASES: Record<string, string> = {
	"github.ref": "full_ref",
	"github.event.workflow_run.conclusion": "upstream_conclusion",
	"github.event.workflow_run.head_branch": "upstream_branch",
	"github.event.workflow_run.name": "upstream_pipeline",
};

const EXPRESSION_WRAPPER = /^\$\{\{([\s\S]*)\}\}$/;
const INTERPOLATION = /\$\{\{\s*([^}]*?)\s*\}\}/g;

export function parseCondition(input: string): Condition {
	const source = unwrapExpression(input);
	const parser = new ConditionParser(source, tokenize(source));
	return parser.parse();
}

export function evaluateCondition(
	condition: Condition,
	variables: Record<string, string>,
): boolean {
	switch (condition.kind) {
		case "constant":
			return condition.value;
		case "truthy":
			return isTruthy(resolveOperand(condition.operand, variables));
		case "equals": {
			const equal =
				resolveOperand(condition.left, variables) === resolveOperand(condition.right, variables);
			return condition.negated ? !equal : equal;
		}
		case "glob":
			return matchesGlob(
				resolveOperand(condition.subject, variables),
				resolveOperand(condition.pattern, variables),
			);
		case "call": {
			const [subject, search] = condition.args.map((arg) => resolveOperand(arg, variables));
			switch (condition.name) {
				case "startsWith":
					return subject.startsWith(search);
				case "endsWith":
					return subject.endsWith(search);
				case "contains":
					return subject.includes(search);
			}
			return false;
		}
		case "not":
			return !evaluateCondition(condition.condition, variables);
		case "and":
			return condition.conditions.every((item) => evaluateCondition(item, variables));
		case "or":
			return condition.conditions.some((item) => evaluateCondition(item, variables));
	}
}

export function resolveVariable(name: string, variables: Record<string, string>): string {
	const direct = variables[name];
	if (direct !== undefined) {
		return direct;
	}
	const alias = VARIABLE_ALIASES[name];
	if (alias && variables[alias] !== undefined) {
		return variables[alias];
	}
	if (name.startsWith("github.")) {
		return variables[name.slice("github.".length)] ?? "";
	}
	return "";
}

/** Replaces `${{ name }}` placeholders with run variables. */
export function interpolate(text: string, variables: Record<string, string>): string {
	return text.replace(INTERPOLATION, (_match, name: string) => resolveVariable(name, variables));
}

function unwrapExpression(input: string): string {
	const trimmed = input.trim();
	const wrapped = trimmed.match(EXPRESSION_WRAPPER);
	return wrapped ? wrapped[1].trim() : trimmed;
}

function resolveOperand(operand: Operand, variables: Record<string, string>): string {
	return operand.kind === "literal" ? operand.value : resolveVariable(operand.name, variables);
}

function isTruthy(value: string): boolean {
	return value !== "" && value !== "false" && value !== "0";
}

function tokenize(source: string): Token[] {
	const tokens: Token[] = [];
	let index = 0;

	while (index < source.length) {
		const char = source[index];
		if (/\s/.test(char)) {
			index += 1;
			continue;
		}

		if (char === "'" || char === '"') {
			const start = index;
			let value = "";
			index += 1;
			let closed = false;
			while (index < source.length) {
				const current = source[index];
				if (current === char) {
					// '' inside a single-quoted string is an escaped quote
					if (source[index + 1] === char) {
						value += char;
						index += 2;
						continue;
					}
					index += 1;
					closed = true;
					break;
				}
				value += current;
				index += 1;
			}
			if (!closed) {
				throw new ConditionSyntaxError("Unterminated string", source, start);
			}
			tokens.push({ type: "string", value, position: start });
			continue;
		}

		const twoChars = source.slice(index, index + 2);
		if (twoChars === "==" || twoChars === "!=" || twoChars === "&&" || twoChars === "||") {
			tokens.push({ type: "op", value: twoChars, position: index });
			index += 2;
			continue;
		}

		if (char === "!" || char === "(" || char === ")" || char === ",") {
			tokens.push({ type: "op", value: char, position: index });
			index += 1;
			continue;
		}

		const word = source.slice(index).match(/^[A-Za-z0-9_][A-Za-z0-9_.-]*/);
		if (word) {
			tokens.push({ type: "word", value: word[0], position: index });
			index += word[0].length;
			continue;
		}

		throw new ConditionSyntaxError(`Unexpected character "${char}"`, source, index);
	}

	return tokens;
}

class ConditionParser {
	private index = 0;

	constructor(
		private readonly source: string,
		private readonly tokens: Token[],
	) {}

	parse(): Condition {
		if (this.tokens.length === 0) {
			throw new ConditionSyntaxError("Empty condition", this.source, 0);
		}
		const condition = this.parseOr();
		const extra = this.peek();
		if (extra) {
			throw new ConditionSyntaxError(`Unexpected "${extra.value}"`, this.source, extra.position);
		}
		return condition;
	}

	private parseOr(): Condition {
		const conditions = [this.parseAnd()];
		while (this.acceptOp("||")) {
			conditions.push(this.parseAnd());
		}
		return conditions.length === 1 ? conditions[0] : { kind: "or", conditions };
	}

	private parseAnd(): Condition {
		const conditions = [this.parseUnary()];
		while (this.acceptOp("&&")) {
			conditions.push(this.parseUnary());
		}
		return conditions.length === 1 ? conditions[0] : { kind: "and", conditions };
	}

	private parseUnary(): Condition {
		if (this.acceptOp("!")) {
			return { kind: "not", condition: this.parseUnary() };
		}
		return this.parsePrimary();
	}

	private parsePrimary(): Condition {
		if (this.acceptOp("(")) {
			const inner = this.parseOr();
			this.expectOp(")");
			return inner;
		}

		const token = this.peek();
		const next = this.tokens[this.index + 1];
		if (token?.type === "word" && next?.type === "op" && next.value === "(") {
			return this.parseCall();
		}

		const left = this.parseOperand();
		if (this.acceptOp("==")) {
			return { kind: "equals", left, right: this.parseOperand(), negated: false };
		}
		if (this.acceptOp("!=")) {
			return { kind: "equals", left, right: this.parseOperand(), negated: true };
		}
		const keyword = this.peek();
		if (keyword?.type === "word" && keyword.value === "matches") {
			this.index += 1;
			return { kind: "glob", subject: left, pattern: this.parseOperand() };
		}
		return { kind: "truthy", operand: left };
	}

	private parseCall(): Condition {
		const nameToken = this.next();
		this.expectOp("(");
		const args: Operand[] = [];
		if (!this.acceptOp(")")) {
			do {
				args.push(this.parseOperand());
			} while (this.acceptOp(","));
			this.expectOp(")");
		}

		const name = nameToken.value;
		if (name === "success" && args.length === 0) {
			return { kind: "constant", value: true };
		}
		const fn = STRING_FUNCTIONS.find((candidate) => candidate === name);
		if (!fn) {
			throw new ConditionSyntaxError(
				`Unsupported function "${name}"`,
				this.source,
				nameToken.position,
			);
		}
		const [subject, search] = args;
		if (args.length !== 2 || !subject || !search) {
			throw new ConditionSyntaxError(
				`${fn}() takes 2 arguments, got ${args.length}`,
				this.source,
				nameToken.position,
			);
		}
		return { kind: "call", name: fn, args: [subject, search] };
	}

	private parseOperand(): Operand {
		const token = this.next();
		if (token.type === "string") {
			return { kind: "literal", value: token.value };
		}
		if (token.type === "word") {
			if (token.value === "true" || token.value === "false") {
				return { kind: "literal", value: token.value };
			}
			if (token.value === "null") {
				return { kind: "literal", value: "" };
			}
			if (/^[0-9]/.test(token.value)) {
				return { kind: "literal", value: token.value };
			}
			return { kind: "variable", name: token.value };
		}
		throw new ConditionSyntaxError(`Unexpected "${token.value}"`, this.source, token.position);
	}

	private peek(): Token | undefined {
		return this.tokens[this.index];
	}

	private next(): Token {
		const token = this.tokens[this.index];
		if (!token) {
			throw new ConditionSyntaxError("Unexpected end of condition", this.source, this.source.length);
		}
		this.index += 1;
		return token;
	}

	private acceptOp(value: string): boolean {
		const token = this.peek();
		if (token?.type === "op" && token.value === value) {
			this.index += 1;
			return true;
		}
		return false;
	}

	private expectOp(value: string): void {
		if (!this.acceptOp(value)) {
			const token = this.peek();
			throw new ConditionSyntaxError(
				`Expected "${value}"`,
				this.source,
				token?.position ?? this.source.length,
			);
		}
	}
}
