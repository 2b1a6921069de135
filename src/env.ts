import { z } from 'zod';

const envOption_ = z
	.object({
		NODE_ENV: z.enum(['dev', 'development', 'test', 'production']).optional(),

		LOCALEGEN_CONFIG_YML: z.string().optional(),

		LG_QUIET: z.literal('').optional(),
		LG_VERBOSE: z.literal('').optional(),
		LG_WITH_LOG_TIME: z.literal('').optional(),
	})
	.parse(process.env);

export const NODE_ENV = envOption_.NODE_ENV;
export const LOCALEGEN_CONFIG_YML = envOption_.LOCALEGEN_CONFIG_YML;

const envOption = {
	quiet: envOption_.LG_QUIET !== undefined,
	verbose: envOption_.LG_VERBOSE !== undefined,
	withLogTime: envOption_.LG_WITH_LOG_TIME !== undefined,
};

if (NODE_ENV === 'test') {
	envOption.quiet = true;
}

export { envOption };
