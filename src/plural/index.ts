export type { Condition, Expression, Operand, Range } from './ast.js';
export { compileCondition, compileExpression, type Predicate } from './evaluate.js';
export { PluralRuleSyntaxError, parsePluralCondition, stripSamples } from './parser.js';
export {
	PLURAL_CATEGORIES,
	PluralRules,
	type PluralCategory,
	type PluralRule,
	type PluralRuleSource,
} from './PluralRules.js';
export { toPythonCondition, toPythonExpression } from './python.js';
