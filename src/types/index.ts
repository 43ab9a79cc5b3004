// Issue record types
export interface IssueComment {
	readonly created: string
	readonly body: string // raw HTML fragment
}

export interface IssueCustomField {
	readonly name: string
	readonly values: readonly string[]
}

/**
 * One JIRA issue as read from the first <item> of an XML export.
 * Display values only; ids and icon URLs are dropped during extraction.
 */
export interface IssueRecord {
	readonly key: string
	readonly summary: string
	readonly link: string
	readonly type: string
	readonly priority: string
	readonly status: string
	readonly resolution: string
	readonly assignee: string
	readonly reporter: string
	readonly labels: readonly string[]
	readonly description: string
	readonly created: string
	readonly updated: string
	readonly due: string
	readonly comments: readonly IssueComment[]
	readonly customFields: readonly IssueCustomField[]
}

// Rendering types
export interface RenderOptions {
	readonly includeDetails: boolean
}

// Conversion types
export interface ConvertOptions {
	readonly inputFiles: readonly string[]
	readonly output?: string | undefined // Explicit output path, overrides the derived one
	readonly includeDetails: boolean
	readonly verbose: boolean
	readonly force: boolean // Overwrite existing output files
}

/**
 * Error thrown when a single input file cannot be converted.
 * Aborts the whole run; the CLI reports it and exits non-zero.
 */
export class ConversionError extends Error {
	constructor(
		message: string,
		public readonly inputFile?: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
		this.name = 'ConversionError'
	}

	/**
	 * Returns a copy of this error bound to the file that produced it
	 */
	forFile(inputFile: string): ConversionError {
		return new ConversionError(this.message, inputFile, { cause: this.cause })
	}
}
