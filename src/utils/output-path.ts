import path from 'path'

/**
 * Output path for a converted file: the explicit override when given, otherwise
 * the input path without its extension plus ".details.md" (details on) or ".md".
 * The input's directory is kept, so "exports/PROJ-1.xml" becomes "exports/PROJ-1.details.md".
 */
export function deriveOutputPath(inputFile: string, includeDetails: boolean, override?: string): string {
	if (override) {
		return override
	}

	const extension = path.extname(inputFile)
	const base = extension ? inputFile.slice(0, -extension.length) : inputFile
	return `${base}${includeDetails ? '.details.md' : '.md'}`
}
