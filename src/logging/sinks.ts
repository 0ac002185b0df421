/**
 * Output sinks: standard output or a single log file.
 */

import { getFileSink } from "@logtape/file";
import type { LogRecord, Sink, TextFormatter } from "@logtape/logtape";
import { ConfigError } from "../errors/logger-errors.ts";
import { toError } from "../errors/structured-error.ts";
import type { ResolvedLoggerConfig } from "./config.ts";
import { getFormatter, TIMESTAMP_FORMATTERS } from "./formatters.ts";

/** Receives each formatted record, newline included. */
export type Writer = (chunk: string) => void;

export const stdoutWriter: Writer = (chunk) => {
	process.stdout.write(chunk);
};

/**
 * Synchronous sink writing formatted records through `writer`.
 */
export function getWriterSink(formatter: TextFormatter, writer: Writer): Sink {
	return (record: LogRecord) => {
		writer(formatter(record));
	};
}

/**
 * Build the sink a resolved configuration asks for.
 *
 * The file is opened immediately, so a bad path fails here rather than on
 * the first record. File writes are unbuffered: each record is on disk once
 * the call that wrote it returns.
 *
 * @throws {ConfigError} when the log file cannot be opened
 */
export function createSink(
	config: ResolvedLoggerConfig,
	writer: Writer = stdoutWriter,
): Sink {
	const formatter = getFormatter(
		config.encoding,
		TIMESTAMP_FORMATTERS[config.timestamp],
	);

	if (!config.filePath) {
		return getWriterSink(formatter, writer);
	}

	try {
		return getFileSink(config.filePath, {
			formatter,
			lazy: false,
			bufferSize: 0,
		});
	} catch (error: unknown) {
		throw new ConfigError(
			`Cannot open log file ${config.filePath}`,
			"LOGGER_BUILD_FAILED",
			{ filePath: config.filePath },
			toError(error),
		);
	}
}
