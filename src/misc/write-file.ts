import * as fs from 'node:fs';

/**
 * 出力先のディレクトリを1階層だけ作る。
 * 親ディレクトリがなければ`ENOENT`がそのまま投げられる。
 *
 * @returns 作った場合は`true`
 */
export const ensureDir = (path: string): boolean => {
	if (fs.existsSync(path)) return false;
	fs.mkdirSync(path);
	return true;
};

/** @returns 書き込んだ場合は`true`、既に存在していた場合は`false` */
export const writeFileIfAbsent = (path: string, content: string): boolean => {
	if (fs.existsSync(path)) return false;
	fs.writeFileSync(path, content, 'utf-8');
	return true;
};

export const overwriteFile = (path: string, content: string): void => {
	fs.writeFileSync(path, content, 'utf-8');
};
