import type { Condition, Expression, Range } from './ast.js';

export type Predicate = (n: number) => boolean;

type Evaluator = (n: number) => number;

const inRanges = (value: number, ranges: Range[]): boolean =>
	ranges.some(([from, to]) => from <= value && value <= to);

/** 生成するPythonの`%`と同じく、結果の符号は除数に合わせる。 */
const floorMod = (value: number, divisor: number): number => ((value % divisor) + divisor) % divisor;

export const compileExpression = (expression: Expression): Evaluator => {
	switch (expression.kind) {
		// `i`は`n`と同じ値として扱う
		case 'operand':
			return (n) => n;
		case 'zero':
			return () => 0;
		case 'mod': {
			const operand = compileExpression(expression.operand);
			const divisor = expression.divisor;
			return (n) => floorMod(operand(n), divisor);
		}
		default:
			return expression satisfies never;
	}
};

/**
 * 構文木を述語関数の連なりに変換する。
 * 負の個数も絶対値を取らずにそのまま渡す（生成される`lambda n:`と同じ）。
 */
export const compileCondition = (condition: Condition): Predicate => {
	switch (condition.kind) {
		case 'or': {
			const left = compileCondition(condition.left);
			const right = compileCondition(condition.right);
			return (n) => left(n) || right(n);
		}
		case 'and': {
			const left = compileCondition(condition.left);
			const right = compileCondition(condition.right);
			return (n) => left(n) && right(n);
		}
		case 'not': {
			const inner = compileCondition(condition.condition);
			return (n) => !inner(n);
		}
		case 'relation': {
			const expression = compileExpression(condition.expression);
			const ranges = condition.ranges;
			return (n) => inRanges(expression(n), ranges);
		}
		case 'rangeRelation': {
			const expression = compileExpression(condition.expression);
			const ranges = condition.ranges;
			return (n) => {
				const value = expression(n);
				return Number.isInteger(value) && inRanges(value, ranges);
			};
		}
		default:
			return condition satisfies never;
	}
};
