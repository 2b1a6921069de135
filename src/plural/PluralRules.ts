import { reprString } from '../misc/python-literal.js';
import { compileCondition, type Predicate } from './evaluate.js';
import { parsePluralCondition } from './parser.js';
import { toPythonCondition } from './python.js';
import type { Condition } from './ast.js';

export const PLURAL_CATEGORIES = ['zero', 'one', 'two', 'few', 'many', 'other'] as const;

export type PluralCategory = (typeof PLURAL_CATEGORIES)[number];

/** カテゴリごとの条件式（CLDRの表記のまま） */
export type PluralRuleSource = Partial<Record<PluralCategory, string>>;

export type PluralRule = {
	category: Exclude<PluralCategory, 'other'>;
	condition: Condition;
	predicate: Predicate;
};

/**
 * あるロケールの複数形（または序数）規則。
 *
 * 規則は`zero`, `one`, `two`, `few`, `many`の順に評価され、最初に一致したものが選ばれる。
 * どれにも一致しなければ`other`。
 */
export class PluralRules {
	private constructor(public readonly rules: readonly PluralRule[]) {}

	public static parse(source: PluralRuleSource): PluralRules {
		const rules: PluralRule[] = [];

		for (const category of PLURAL_CATEGORIES) {
			if (category === 'other') continue;
			const text = source[category];
			if (text === undefined) continue;

			const condition = parsePluralCondition(text);
			rules.push({ category, condition, predicate: compileCondition(condition) });
		}

		return new PluralRules(rules);
	}

	public get categories(): PluralCategory[] {
		return [...this.rules.map((rule) => rule.category), 'other'];
	}

	public select(count: number): PluralCategory {
		const rule = this.rules.find((rule) => rule.predicate(count));
		return rule?.category ?? 'other';
	}

	/** `lambda n: 'one' if (...) else 'other'` */
	public toPythonLambda(): string {
		const branches = this.rules.map(
			(rule) => `${reprString(rule.category)} if ${toPythonCondition(rule.condition)} else `,
		);
		return `lambda n: ${branches.join('')}${reprString('other')}`;
	}
}
