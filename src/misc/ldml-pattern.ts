/**
 * CLDR（LDML）の日付パターンを、日付ライブラリの書式トークンに変換する。
 *
 * ```
 * convertLdmlPattern("EEEE, MMMM d, y") // "dddd, MMMM D, YYYY"
 * convertLdmlPattern("h 'o''clock' a") // "h [o'clock] A"
 * ```
 */

export class UnknownPatternFieldError extends Error {
	constructor(public readonly field: string) {
		super(`Unknown pattern field ${field}`);
		this.name = 'UnknownPatternFieldError';
	}
}

export class InvalidFieldLengthError extends Error {
	constructor(
		public readonly field: string,
		public readonly length: number,
	) {
		super(`Invalid field length ${length} for ${field}`);
		this.name = 'InvalidFieldLengthError';
	}
}

/** パターン文字 → 連続数 → 変換後のトークン */
const FIELDS: Record<string, Record<number, string>> = {
	y: { 1: 'YYYY', 2: 'YY', 4: 'YYYY' },
	Q: { 1: 'Q' },
	M: { 1: 'M', 2: 'MM', 3: 'MMM', 4: 'MMMM' },
	L: { 1: 'M', 2: 'MM', 3: 'MMM', 4: 'MMMM' },
	d: { 1: 'D', 2: 'DD' },
	D: { 1: 'DDD', 2: 'DDDD', 3: 'DDDD' },
	E: { 1: 'ddd', 2: 'ddd', 3: 'ddd', 4: 'dddd' },
	a: { 1: 'A' },
	h: { 1: 'h', 2: 'hh' },
	H: { 1: 'H', 2: 'HH' },
	m: { 1: 'm', 2: 'mm' },
	s: { 1: 's', 2: 'ss' },
	S: { 1: 'S', 2: 'SS', 3: 'SSS', 4: 'SSSS', 5: 'SSSSS', 6: 'SSSSSS' },
	z: { 1: 'z', 2: 'z', 3: 'z', 4: 'zz' },
	Z: { 1: 'ZZ', 2: 'ZZ', 3: 'ZZ', 5: 'Z' },
};

const TOKEN = /'(?:[^']|'')*'|([A-Za-z])\1*|[^A-Za-z']+/gy;

const convertLiteral = (quoted: string): string => {
	if (quoted === "''") return "'";
	return `[${quoted.slice(1, -1).replaceAll("''", "'")}]`;
};

const convertField = (field: string): string => {
	const char = field.charAt(0);
	const lengths = FIELDS[char];
	if (lengths === undefined) throw new UnknownPatternFieldError(char);

	const token = lengths[field.length];
	if (token === undefined) throw new InvalidFieldLengthError(char, field.length);

	return token;
};

export const convertLdmlPattern = (pattern: string): string => {
	let result = '';
	let position = 0;

	for (const match of pattern.matchAll(TOKEN)) {
		const token = match[0];
		position += token.length;
		if (token.startsWith("'")) {
			result += convertLiteral(token);
		} else if (match[1] !== undefined) {
			result += convertField(token);
		} else {
			result += token;
		}
	}

	if (position !== pattern.length) {
		throw new SyntaxError(`Unterminated literal in date pattern "${pattern}"`);
	}

	return result;
};
