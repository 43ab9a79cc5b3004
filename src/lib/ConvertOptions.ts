import { z } from 'zod'
import type { ConvertOptions } from '../types/index.js'

const DETAILS_DISABLED = ['off', 'disabled', '0', 'false', 'no']

/**
 * Zod schema for the raw options commander hands to the action handler
 */
export const CliOptionsSchema = z.object({
	output: z
		.string()
		.min(1, 'Output path cannot be empty')
		.optional()
		.describe('Output file path (defaults to *.details.md or *.md)'),
	details: z
		.string()
		.default('enabled')
		.describe('Include custom fields details (on|off|enabled|disabled|1|0)'),
	verbose: z.boolean().default(false).describe('Log progress for each file'),
	force: z.boolean().default(false).describe('Overwrite existing output files'),
	debug: z.boolean().optional().describe('Enable debug output'),
})

/**
 * Interpret a --details value: off, disabled, 0, false and no (any case) turn
 * details off; on, enabled, 1, true, yes and anything unrecognized keep them on.
 */
export function parseDetailsMode(mode: string): boolean {
	return !DETAILS_DISABLED.includes(mode.toLowerCase())
}

function formatZodErrors(error: z.ZodError): Error {
	const errorMessages = error.issues.map(issue => {
		const path = issue.path.length > 0 ? issue.path.join('.') : 'root'
		return `  - ${path}: ${issue.message}`
	})

	return new Error(`Invalid options:\n${errorMessages.join('\n')}`)
}

/**
 * Validate commander options and build the immutable ConvertOptions for a run
 * @throws Error listing every invalid option
 */
export function parseConvertOptions(inputFiles: readonly string[], rawOptions: unknown): ConvertOptions {
	const result = CliOptionsSchema.safeParse(rawOptions)
	if (!result.success) {
		throw formatZodErrors(result.error)
	}

	const options = result.data
	return Object.freeze({
		inputFiles: [...inputFiles],
		output: options.output,
		includeDetails: parseDetailsMode(options.details),
		verbose: options.verbose,
		force: options.force,
	})
}
