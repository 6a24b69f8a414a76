import { matchesGlob } from "../utils/glob.js";
import { ConditionEvaluationError } from "./errors.js";
import type { MatrixAssignment, RunContext } from "./types.js";

export type Expression =
	| { type: "literal"; value: string | boolean }
	| { type: "variable"; name: string }
	| { type: "call"; name: FunctionName; args: Expression[] }
	| { type: "not"; operand: Expression }
	| { type: "binary"; op: "==" | "!=" | "&&" | "||"; left: Expression; right: Expression };

export type ExpressionValue = string | boolean;

export type DependencyStatus = {
	success: boolean;
	failure: boolean;
	cancelled: boolean;
};

export type ExpressionScope = {
	variables: Record<string, string | undefined>;
	status?: DependencyStatus;
};

type FunctionName =
	| "startsWith"
	| "endsWith"
	| "contains"
	| "matches"
	| "success"
	| "failure"
	| "always"
	| "cancelled";

const FUNCTION_ARITY: Record<FunctionName, number> = {
	startsWith: 2,
	endsWith: 2,
	contains: 2,
	matches: 2,
	success: 0,
	failure: 0,
	always: 0,
	cancelled: 0,
};

const STATUS_FUNCTIONS = new Set<FunctionName>(["success", "failure", "always", "cancelled"]);

export const CONTEXT_VARIABLES = [
	"event",
	"ref",
	"ref_name",
	"ref_kind",
	"actor",
	"base_ref",
	"sha",
	"github.event_name",
	"github.ref",
	"github.ref_name",
	"github.ref_type",
	"github.actor",
	"github.base_ref",
	"github.sha",
] as const;

const CONTEXT_VARIABLE_SET = new Set<string>(CONTEXT_VARIABLES);

export function isContextVariable(name: string): boolean {
	return CONTEXT_VARIABLE_SET.has(name);
}

export function contextVariables(context: RunContext): Record<string, string | undefined> {
	return {
		event: context.event,
		ref: context.ref,
		ref_name: context.refName,
		ref_kind: context.refKind,
		actor: context.actor,
		base_ref: context.baseRef,
		sha: context.sha,
		"github.event_name": context.event === "tag_push" ? "push" : context.event,
		"github.ref": context.ref,
		"github.ref_name": context.refName,
		"github.ref_type": context.refKind,
		"github.actor": context.actor,
		"github.base_ref": context.baseRef,
		"github.sha": context.sha,
	};
}

export function matrixVariables(matrix: MatrixAssignment): Record<string, string> {
	return Object.fromEntries(
		Object.entries(matrix).map(([axis, value]) => [`matrix.${axis}`, String(value)]),
	);
}

export function createScope(
	context: RunContext,
	matrix: MatrixAssignment = {},
	status?: DependencyStatus,
): ExpressionScope {
	return {
		variables: { ...contextVariables(context), ...matrixVariables(matrix) },
		status,
	};
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

type Token =
	| { kind: "string"; value: string }
	| { kind: "ident"; value: string }
	| { kind: "op"; value: "==" | "!=" | "&&" | "||" | "!" }
	| { kind: "punct"; value: "(" | ")" | "," };

export function stripExpressionWrapper(source: string): string {
	const trimmed = source.trim();
	if (trimmed.startsWith("${{") && trimmed.endsWith("}}")) {
		return trimmed.slice(3, -2).trim();
	}
	return trimmed;
}

export function parseExpression(source: string): Expression {
	const body = stripExpressionWrapper(source);
	const tokens = tokenize(body, source);
	if (tokens.length === 0) {
		throw new ConditionEvaluationError(`Empty expression`, source);
	}
	const parser = new Parser(tokens, source);
	const expression = parser.parseOr();
	parser.expectEnd();
	return expression;
}

function tokenize(body: string, source: string): Token[] {
	const tokens: Token[] = [];
	let i = 0;
	while (i < body.length) {
		const char = body[i];
		if (/\s/.test(char)) {
			i += 1;
			continue;
		}
		if (char === "'" || char === '"') {
			let value = "";
			let j = i + 1;
			for (; j < body.length; j += 1) {
				if (body[j] === char) {
					// '' inside a single-quoted string is an escaped quote
					if (body[j + 1] === char) {
						value += char;
						j += 1;
						continue;
					}
					break;
				}
				value += body[j];
			}
			if (j >= body.length) {
				throw new ConditionEvaluationError(`Unterminated string in expression: ${source}`, source);
			}
			tokens.push({ kind: "string", value });
			i = j + 1;
			continue;
		}
		const two = body.slice(i, i + 2);
		if (two === "==" || two === "!=" || two === "&&" || two === "||") {
			tokens.push({ kind: "op", value: two });
			i += 2;
			continue;
		}
		if (char === "!") {
			tokens.push({ kind: "op", value: "!" });
			i += 1;
			continue;
		}
		if (char === "(" || char === ")" || char === ",") {
			tokens.push({ kind: "punct", value: char });
			i += 1;
			continue;
		}
		const identMatch = /^[A-Za-z_][A-Za-z0-9_.-]*/.exec(body.slice(i));
		if (identMatch) {
			tokens.push({ kind: "ident", value: identMatch[0] });
			i += identMatch[0].length;
			continue;
		}
		throw new ConditionEvaluationError(
			`Unexpected character "${char}" in expression: ${source}`,
			source,
		);
	}
	return tokens;
}

class Parser {
	private position = 0;

	constructor(
		private readonly tokens: Token[],
		private readonly source: string,
	) {}

	parseOr(): Expression {
		let left = this.parseAnd();
		while (this.matchOp("||")) {
			left = { type: "binary", op: "||", left, right: this.parseAnd() };
		}
		return left;
	}

	expectEnd(): void {
		const token = this.tokens[this.position];
		if (token) {
			this.fail(`unexpected "${token.value}"`);
		}
	}

	private parseAnd(): Expression {
		let left = this.parseEquality();
		while (this.matchOp("&&")) {
			left = { type: "binary", op: "&&", left, right: this.parseEquality() };
		}
		return left;
	}

	private parseEquality(): Expression {
		let left = this.parseUnary();
		for (;;) {
			if (this.matchOp("==")) {
				left = { type: "binary", op: "==", left, right: this.parseUnary() };
			} else if (this.matchOp("!=")) {
				left = { type: "binary", op: "!=", left, right: this.parseUnary() };
			} else {
				return left;
			}
		}
	}

	private parseUnary(): Expression {
		if (this.matchOp("!")) {
			return { type: "not", operand: this.parseUnary() };
		}
		return this.parsePrimary();
	}

	private parsePrimary(): Expression {
		const token = this.tokens[this.position];
		if (!token) {
			return this.fail("unexpected end of expression");
		}
		this.position += 1;

		if (token.kind === "string") {
			return { type: "literal", value: token.value };
		}
		if (token.kind === "punct" && token.value === "(") {
			const inner = this.parseOr();
			this.expectPunct(")");
			return inner;
		}
		if (token.kind !== "ident") {
			return this.fail(`unexpected "${token.value}"`);
		}
		if (token.value === "true" || token.value === "false") {
			return { type: "literal", value: token.value === "true" };
		}
		if (this.peekPunct("(")) {
			return this.parseCall(token.value);
		}
		return { type: "variable", name: token.value };
	}

	private parseCall(name: string): Expression {
		if (!isFunctionName(name)) {
			return this.fail(`unknown function "${name}"`);
		}
		this.expectPunct("(");
		const args: Expression[] = [];
		if (!this.peekPunct(")")) {
			args.push(this.parseOr());
			while (this.peekPunct(",")) {
				this.position += 1;
				args.push(this.parseOr());
			}
		}
		this.expectPunct(")");
		if (args.length !== FUNCTION_ARITY[name]) {
			return this.fail(`${name}() takes ${FUNCTION_ARITY[name]} argument(s), got ${args.length}`);
		}
		return { type: "call", name, args };
	}

	private matchOp(value: string): boolean {
		const token = this.tokens[this.position];
		if (token?.kind === "op" && token.value === value) {
			this.position += 1;
			return true;
		}
		return false;
	}

	private peekPunct(value: string): boolean {
		const token = this.tokens[this.position];
		return token?.kind === "punct" && token.value === value;
	}

	private expectPunct(value: string): void {
		if (!this.peekPunct(value)) {
			this.fail(`expected "${value}"`);
		}
		this.position += 1;
	}

	private fail(detail: string): never {
		throw new ConditionEvaluationError(
			`Invalid expression "${this.source}": ${detail}`,
			this.source,
		);
	}
}

function isFunctionName(name: string): name is FunctionName {
	return Object.hasOwn(FUNCTION_ARITY, name);
}

// ---------------------------------------------------------------------------
// Analysis
// ---------------------------------------------------------------------------

export function collectVariables(expression: Expression): string[] {
	switch (expression.type) {
		case "literal":
			return [];
		case "variable":
			return [expression.name];
		case "not":
			return collectVariables(expression.operand);
		case "binary":
			return [...collectVariables(expression.left), ...collectVariables(expression.right)];
		case "call":
			return expression.args.flatMap(collectVariables);
	}
}

export function unknownVariables(
	expression: Expression,
	isKnown: (name: string) => boolean,
): string[] {
	return [...new Set(collectVariables(expression).filter((name) => !isKnown(name)))];
}

export function usesStatusFunction(expression: Expression): boolean {
	switch (expression.type) {
		case "literal":
		case "variable":
			return false;
		case "not":
			return usesStatusFunction(expression.operand);
		case "binary":
			return usesStatusFunction(expression.left) || usesStatusFunction(expression.right);
		case "call":
			return STATUS_FUNCTIONS.has(expression.name) || expression.args.some(usesStatusFunction);
	}
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

export function evaluate(expression: Expression | string, scope: ExpressionScope): boolean {
	const parsed = typeof expression === "string" ? parseExpression(expression) : expression;
	return truthy(evaluateValue(parsed, scope, typeof expression === "string" ? expression : ""));
}

export function evaluateValue(
	expression: Expression,
	scope: ExpressionScope,
	source = "",
): ExpressionValue {
	switch (expression.type) {
		case "literal":
			return expression.value;
		case "variable":
			return resolveVariable(expression.name, scope, source);
		case "not":
			return !truthy(evaluateValue(expression.operand, scope, source));
		case "binary":
			return evaluateBinary(expression, scope, source);
		case "call":
			return evaluateCall(expression.name, expression.args, scope, source);
	}
}

function evaluateBinary(
	expression: Extract<Expression, { type: "binary" }>,
	scope: ExpressionScope,
	source: string,
): boolean {
	switch (expression.op) {
		case "&&":
			return (
				truthy(evaluateValue(expression.left, scope, source)) &&
				truthy(evaluateValue(expression.right, scope, source))
			);
		case "||":
			return (
				truthy(evaluateValue(expression.left, scope, source)) ||
				truthy(evaluateValue(expression.right, scope, source))
			);
		case "==":
			return (
				String(evaluateValue(expression.left, scope, source)) ===
				String(evaluateValue(expression.right, scope, source))
			);
		case "!=":
			return (
				String(evaluateValue(expression.left, scope, source)) !==
				String(evaluateValue(expression.right, scope, source))
			);
	}
}

function evaluateCall(
	name: FunctionName,
	args: Expression[],
	scope: ExpressionScope,
	source: string,
): boolean {
	const status = scope.status ?? { success: true, failure: false, cancelled: false };
	const text = (index: number): string => String(evaluateValue(args[index], scope, source));
	switch (name) {
		case "success":
			return status.success;
		case "failure":
			return status.failure;
		case "cancelled":
			return status.cancelled;
		case "always":
			return true;
		case "startsWith":
			return text(0).startsWith(text(1));
		case "endsWith":
			return text(0).endsWith(text(1));
		case "contains":
			return text(0).includes(text(1));
		case "matches":
			return matchesGlob(text(0), text(1));
	}
}

function resolveVariable(name: string, scope: ExpressionScope, source: string): string {
	if (!Object.hasOwn(scope.variables, name)) {
		throw new ConditionEvaluationError(`Unknown variable "${name}"`, source);
	}
	const value = scope.variables[name];
	if (value === undefined) {
		throw new ConditionEvaluationError(`Variable "${name}" has no value for this run`, source);
	}
	return value;
}

function truthy(value: ExpressionValue): boolean {
	return typeof value === "boolean" ? value : value.length > 0;
}

const TEMPLATE_PATTERN = /\$\{\{\s*(.+?)\s*\}\}/g;

export function interpolate(template: string, scope: ExpressionScope): string {
	return template.replace(TEMPLATE_PATTERN, (_match, body: string) =>
		String(evaluateValue(parseExpression(body), scope, body)),
	);
}

export function templateExpressions(template: string): string[] {
	return Array.from(template.matchAll(TEMPLATE_PATTERN), (match) => match[1] ?? "");
}
