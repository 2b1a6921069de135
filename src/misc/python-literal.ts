/**
 * Pythonのリテラル表記でデータを書き出す。
 *
 * 生成物はデータとしてではなくソースコードとして読み込まれるため、
 * JSONではなくPythonの`repr()`と同じ表記にそろえる。
 */

export type PythonDictKey = string | number;

export type PythonLiteral =
	| string
	| number
	| boolean
	| null
	| PythonDict;

/**
 * 整数キーを使うときは`Map`を、文字列キーのみなら普通のオブジェクトを使う。
 * 値が`undefined`の項目は書き出さない。
 */
export type PythonDict =
	| ReadonlyMap<PythonDictKey, PythonLiteral>
	| { readonly [key: string]: PythonLiteral | undefined };

const INDENT = '    ';

// ASCIIの空白以外の区切り文字と制御文字・書式文字など。Pythonの`str.isprintable()`に合わせる。
const NON_PRINTABLE = /[\p{C}\p{Z}]/u;

const escapeCodePoint = (char: string): string => {
	switch (char) {
		case '\\':
			return '\\\\';
		case '\n':
			return '\\n';
		case '\r':
			return '\\r';
		case '\t':
			return '\\t';
	}

	if (char === ' ' || !NON_PRINTABLE.test(char)) return char;

	const code = char.codePointAt(0) ?? 0;
	if (code < 0x100) return `\\x${code.toString(16).padStart(2, '0')}`;
	if (code < 0x10000) return `\\u${code.toString(16).padStart(4, '0')}`;
	return `\\U${code.toString(16).padStart(8, '0')}`;
};

export const reprString = (value: string): string => {
	const quote = value.includes("'") && !value.includes('"') ? '"' : "'";

	let body = '';
	for (const char of value) {
		body += char === quote ? `\\${quote}` : escapeCodePoint(char);
	}

	return `${quote}${body}${quote}`;
};

export const reprNumber = (value: number): string => {
	if (!Number.isFinite(value)) {
		throw new RangeError(`Cannot render ${value} as a Python literal`);
	}
	if (Number.isInteger(value)) return value.toFixed(0);
	return value.toString();
};

const isDict = (value: PythonLiteral): value is PythonDict =>
	typeof value === 'object' && value !== null;

const entriesOf = (dict: PythonDict): [PythonDictKey, PythonLiteral][] => {
	const entries: [PythonDictKey, PythonLiteral | undefined][] =
		dict instanceof Map ? [...dict.entries()] : Object.entries(dict);
	return entries.flatMap(([key, value]): [PythonDictKey, PythonLiteral][] =>
		value === undefined ? [] : [[key, value]],
	);
};

const renderKey = (key: PythonDictKey): string =>
	typeof key === 'number' ? reprNumber(key) : reprString(key);

/**
 * @param depth 辞書の中身を何段インデントするか。閉じ括弧はその1段上に置かれる。
 */
export const renderPythonLiteral = (value: PythonLiteral, depth = 1): string => {
	if (value === null) return 'None';
	if (typeof value === 'boolean') return value ? 'True' : 'False';
	if (typeof value === 'number') return reprNumber(value);
	if (typeof value === 'string') return reprString(value);
	if (!isDict(value)) return value satisfies never;

	const entries = entriesOf(value);
	if (entries.length === 0) return '{}';

	const lines = entries.map(
		([key, item]) =>
			`${INDENT.repeat(depth)}${renderKey(key)}: ${renderPythonLiteral(item, depth + 1)},\n`,
	);

	return `{\n${lines.join('')}${INDENT.repeat(depth - 1)}}`;
};
