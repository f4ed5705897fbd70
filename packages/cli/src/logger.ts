/**
 * Where log lines go (console by default)
 */
export interface LogSink {
	log(message: string): void
	error(message: string): void
}

export interface Logger {
	info(message: string): void
	debug(message: string): void
	error(message: string): void
}

export interface LoggerOptions {
	verbose?: boolean
	quiet?: boolean
}

/**
 * Console logger honoring --verbose and --quiet
 *
 * debug needs --verbose, info is silenced by --quiet, errors always print.
 */
export function createLogger(options: LoggerOptions = {}, sink: LogSink = console): Logger {
	return {
		info(message) {
			if (!options.quiet) sink.log(message)
		},
		debug(message) {
			if (options.verbose && !options.quiet) sink.log(message)
		},
		error(message) {
			sink.error(message)
		},
	}
}
