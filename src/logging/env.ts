/**
 * Logger options from environment variables.
 *
 * - `LOG_SAVE_TO_FILE`: "true"/"false"/"1"/"0"/"yes"/"no" (any case)
 * - `LOG_FILE_PATH`: log file path, only read in file mode
 * - `LOG_LEVEL`: passed through; unknown levels become DEBUG later
 * - `LOG_ENCODING`: "json" or anything else
 */

import { z } from "zod";
import { ConfigError } from "../errors/logger-errors.ts";
import type { LoggerOptions } from "./config.ts";

const booleanFlag = z
	.string()
	.trim()
	.toLowerCase()
	.pipe(z.enum(["true", "false", "1", "0", "yes", "no", ""]))
	.transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
	LOG_SAVE_TO_FILE: booleanFlag.optional(),
	LOG_FILE_PATH: z.string().optional(),
	LOG_LEVEL: z.string().optional(),
	LOG_ENCODING: z.string().optional(),
});

/**
 * Read logger options from an environment map.
 *
 * @throws {ConfigError} when `LOG_SAVE_TO_FILE` is not a recognised boolean
 */
export function loadLoggerOptionsFromEnv(
	env: NodeJS.ProcessEnv = process.env,
): LoggerOptions {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(
			"Invalid logger environment configuration",
			"LOGGER_CONFIG_INVALID",
			{
				issues: parsed.error.issues.map((issue) => ({
					path: issue.path.join("."),
					message: issue.message,
				})),
			},
			parsed.error,
		);
	}

	const { LOG_SAVE_TO_FILE, LOG_FILE_PATH, LOG_LEVEL, LOG_ENCODING } =
		parsed.data;
	const options: LoggerOptions = {};
	if (LOG_SAVE_TO_FILE !== undefined) options.saveToFile = LOG_SAVE_TO_FILE;
	if (LOG_FILE_PATH !== undefined) options.filePath = LOG_FILE_PATH;
	if (LOG_LEVEL !== undefined) options.level = LOG_LEVEL;
	if (LOG_ENCODING !== undefined) options.encoding = LOG_ENCODING;
	return options;
}
