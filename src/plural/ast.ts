export const OPERANDS = ['n', 'i', 'v', 'w', 'f', 't', 'c', 'e'] as const;

export type Operand = (typeof OPERANDS)[number];

/** 小数部や指数に関するオペランド。生成物は整数の個数しか扱わないので常に0として扱う。 */
export type ZeroOperand = Exclude<Operand, 'n' | 'i'>;

export type Expression =
	| { kind: 'operand'; name: 'n' | 'i' }
	| { kind: 'zero'; name: ZeroOperand }
	| { kind: 'mod'; operand: Expression; divisor: number };

/** 両端を含む範囲 */
export type Range = readonly [from: number, to: number];

export type Condition =
	| { kind: 'or'; left: Condition; right: Condition }
	| { kind: 'and'; left: Condition; right: Condition }
	| { kind: 'not'; condition: Condition }
	/** `within`: 値が範囲内にあればよい */
	| { kind: 'relation'; expression: Expression; ranges: Range[] }
	/** `=`, `is`, `in`: 値が整数であり、かつ範囲内にある */
	| { kind: 'rangeRelation'; expression: Expression; ranges: Range[] };
