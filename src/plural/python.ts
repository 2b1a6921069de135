import type { Condition, Expression, Range } from './ast.js';

export const toPythonExpression = (expression: Expression): string => {
	switch (expression.kind) {
		case 'operand':
			return 'n';
		case 'zero':
			return '0';
		case 'mod':
			return `${toPythonExpression(expression.operand)} % ${expression.divisor}`;
		default:
			return expression satisfies never;
	}
};

const rangeTest = (expression: string, ranges: Range[]): string =>
	ranges
		.map(([from, to]) =>
			from === to ? `${expression} == ${from}` : `${from} <= ${expression} <= ${to}`,
		)
		.join(' or ');

/**
 * 構文木をPythonの条件式にする。
 *
 * `rangeRelation`は比較対象をその整数値と比べる条件を前に置き、小数の個数に一致しないようにする。
 */
export const toPythonCondition = (condition: Condition): string => {
	switch (condition.kind) {
		case 'or':
			return `(${toPythonCondition(condition.left)} or ${toPythonCondition(condition.right)})`;
		case 'and':
			return `(${toPythonCondition(condition.left)} and ${toPythonCondition(condition.right)})`;
		case 'not':
			return `(not ${toPythonCondition(condition.condition)})`;
		case 'relation': {
			const expression = toPythonExpression(condition.expression);
			return `(${rangeTest(expression, condition.ranges)})`;
		}
		case 'rangeRelation': {
			const expression = toPythonExpression(condition.expression);
			return `(${expression} == int(${expression}) and (${rangeTest(expression, condition.ranges)}))`;
		}
		default:
			return condition satisfies never;
	}
};
