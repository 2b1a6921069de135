import { OPERANDS, type Condition, type Expression, type Range } from './ast.js';
import { isIncludes } from '../misc/typed-utils.js';

export class PluralRuleSyntaxError extends Error {
	constructor(message: string, public readonly rule: string) {
		super(`${message} in plural rule "${rule}"`);
		this.name = 'PluralRuleSyntaxError';
	}
}

const TOKEN = /\s*(\d+|\.\.|!=|=|%|,|[a-z]+|\S)/y;

const tokenize = (rule: string): string[] => {
	const tokens: string[] = [];
	TOKEN.lastIndex = 0;

	while (TOKEN.lastIndex < rule.length) {
		const match = TOKEN.exec(rule);
		if (match === null) break;
		const token = match[1];
		if (token === undefined) break;
		tokens.push(token);
	}

	return tokens;
};

/** `@integer`・`@decimal`以降はサンプルなので読まない。 */
export const stripSamples = (rule: string): string => {
	const index = rule.indexOf('@');
	return (index === -1 ? rule : rule.slice(0, index)).trim();
};

class Parser {
	private readonly tokens: string[];
	private position = 0;

	constructor(private readonly rule: string) {
		this.tokens = tokenize(rule);
	}

	public parse(): Condition {
		const condition = this.condition();
		const rest = this.peek();
		if (rest !== undefined) {
			throw new PluralRuleSyntaxError(`Unexpected token '${rest}'`, this.rule);
		}
		return condition;
	}

	private peek(): string | undefined {
		return this.tokens[this.position];
	}

	private accept(token: string): boolean {
		if (this.peek() !== token) return false;
		this.position++;
		return true;
	}

	private next(): string {
		const token = this.peek();
		if (token === undefined) {
			throw new PluralRuleSyntaxError('Unexpected end of rule', this.rule);
		}
		this.position++;
		return token;
	}

	private condition(): Condition {
		let left = this.andCondition();
		while (this.accept('or')) {
			left = { kind: 'or', left, right: this.andCondition() };
		}
		return left;
	}

	private andCondition(): Condition {
		let left = this.relation();
		while (this.accept('and')) {
			left = { kind: 'and', left, right: this.relation() };
		}
		return left;
	}

	private relation(): Condition {
		const expression = this.expression();
		const token = this.next();

		switch (token) {
			case '=':
			case 'in':
				return { kind: 'rangeRelation', expression, ranges: this.rangeList() };
			case '!=':
				return {
					kind: 'not',
					condition: { kind: 'rangeRelation', expression, ranges: this.rangeList() },
				};
			case 'within':
				return { kind: 'relation', expression, ranges: this.rangeList() };
			case 'is': {
				const negated = this.accept('not');
				const value = this.value();
				const relation: Condition = {
					kind: 'rangeRelation',
					expression,
					ranges: [[value, value]],
				};
				return negated ? { kind: 'not', condition: relation } : relation;
			}
			case 'not': {
				const method = this.next();
				if (method === 'in') {
					return {
						kind: 'not',
						condition: { kind: 'rangeRelation', expression, ranges: this.rangeList() },
					};
				}
				if (method === 'within') {
					return {
						kind: 'not',
						condition: { kind: 'relation', expression, ranges: this.rangeList() },
					};
				}
				throw new PluralRuleSyntaxError(`Unexpected token '${method}'`, this.rule);
			}
			default:
				throw new PluralRuleSyntaxError(`Unexpected token '${token}'`, this.rule);
		}
	}

	private expression(): Expression {
		const name = this.next();
		if (!isIncludes(OPERANDS, name)) {
			throw new PluralRuleSyntaxError(`Unknown operand '${name}'`, this.rule);
		}

		const operand: Expression =
			name === 'n' || name === 'i'
				? { kind: 'operand', name }
				: { kind: 'zero', name };

		if (this.accept('mod') || this.accept('%')) {
			return { kind: 'mod', operand, divisor: this.value() };
		}

		return operand;
	}

	private rangeList(): Range[] {
		const ranges: Range[] = [];
		do {
			const from = this.value();
			const to = this.accept('..') ? this.value() : from;
			ranges.push([from, to]);
		} while (this.accept(','));
		return ranges;
	}

	private value(): number {
		const token = this.next();
		if (!/^\d+$/.test(token)) {
			throw new PluralRuleSyntaxError(`Expected a number but got '${token}'`, this.rule);
		}
		return Number.parseInt(token, 10);
	}
}

/**
 * 複数形規則の条件式を構文木にする。
 * 未知のトークンがあれば`PluralRuleSyntaxError`を投げる。
 */
export const parsePluralCondition = (rule: string): Condition => {
	return new Parser(stripSamples(rule)).parse();
};
