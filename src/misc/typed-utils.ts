export const isIncludes = <T extends unknown[]>(
	values: readonly [...T],
	value: unknown,
): value is T[number] => {
	return values.includes(value);
};

/** 指定したキーだけを、指定した順に取り出す。元にないキーは含めない。 */
export const pickInOrder = <T, K extends string>(
	data: Readonly<Record<string, T>>,
	keys: readonly K[],
): Partial<Record<K, T>> => {
	const result: Partial<Record<K, T>> = {};
	for (const key of keys) {
		const value = data[key];
		if (value !== undefined) result[key] = value;
	}
	return result;
};

export const omitKeys = <T>(
	data: Readonly<Record<string, T>>,
	keys: readonly string[],
): Record<string, T> => {
	return Object.fromEntries(
		Object.entries(data).filter(([key]) => !keys.includes(key)),
	);
};

export const mapValues = <T, U>(
	data: Readonly<Record<string, T>>,
	fn: (value: T, key: string) => U,
): Record<string, U> => {
	return Object.fromEntries(
		Object.entries(data).map(([key, value]) => [key, fn(value, key)] as const),
	);
};

export const omitBy = <T>(
	data: Readonly<Record<string, T>>,
	fn: (key: string, value: T) => boolean,
): Record<string, T> => {
	return Object.fromEntries(Object.entries(data).filter(([key, value]) => !fn(key, value)));
};
