// Error types surfaced to the CLI; none of them are retried

export class ConfigurationError extends Error {
	constructor(
		message: string,
		public readonly option?: string,
	) {
		super(message)
		this.name = 'ConfigurationError'
	}
}

export class ExternalToolError extends Error {
	public readonly exitCode?: number
	public readonly stderr?: string

	constructor(
		message: string,
		public readonly tool: string,
		details: { exitCode?: number; stderr?: string } = {},
	) {
		super(message)
		this.name = 'ExternalToolError'
		this.exitCode = details.exitCode
		this.stderr = details.stderr
	}
}

export class SilenceDetectionError extends ExternalToolError {
	constructor(message: string) {
		super(message, 'ffmpeg')
		this.name = 'SilenceDetectionError'
	}
}
