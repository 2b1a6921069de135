const VARIANT = /^([a-z\d]{5,8}|\d[a-z\d]{3})$/i;

/**
 * ロケール識別子の正規化
 *
 * `en-gb` → `en_GB`, `zh-hant-tw` → `zh_Hant_TW`
 *
 * 言語は小文字、4文字の用字は先頭のみ大文字、地域は大文字、変種（`valencia`, `1901`）は小文字にする。
 * それ以外のサブタグは手を加えずに残すので、存在しないロケールとして後段で弾かれる。
 */
export const normalizeLocaleId = (input: string): string => {
	const [language = '', ...rest] = input.trim().replaceAll('-', '_').split('_');

	const subtags = rest.map((subtag, index) => {
		if (index === 0 && /^[a-z]{4}$/i.test(subtag)) {
			return subtag.charAt(0).toUpperCase() + subtag.slice(1).toLowerCase();
		}
		if (/^([a-z]{2}|\d{3})$/i.test(subtag)) {
			return subtag.toUpperCase();
		}
		if (VARIANT.test(subtag)) {
			return subtag.toLowerCase();
		}
		return subtag;
	});

	return [language.toLowerCase(), ...subtags].join('_');
};

/** 正規化済みの識別子として妥当な形か */
export const isWellFormedLocaleId = (id: string): boolean => {
	return /^[a-z]{2,3}(_[A-Z][a-z]{3})?(_([A-Z]{2}|\d{3}))?(_([a-z\d]{5,8}|\d[a-z\d]{3}))*$/.test(id);
};

/** 出力先ディレクトリ名。読み込む側は小文字のディレクトリ名を探す。 */
export const toLocaleDirName = (id: string): string => id.toLowerCase();

/** `en_GB` → `{ language: 'en', script: undefined, region: 'GB' }`（変種は含めない） */
export const splitLocaleId = (
	id: string,
): { language: string; script?: string; region?: string } => {
	const [language = '', ...rest] = id.split('_');
	const script = rest.find((subtag) => /^[A-Z][a-z]{3}$/.test(subtag));
	const region = rest.find((subtag) => /^([A-Z]{2}|\d{3})$/.test(subtag));
	return { language, script, region };
};
