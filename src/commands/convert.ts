import fs from 'fs-extra'
import { extractIssue } from '../lib/IssueExtractor.js'
import { renderIssueMarkdown } from '../lib/MarkdownRenderer.js'
import { ConversionError } from '../types/index.js'
import type { ConvertOptions } from '../types/index.js'
import { getLogger } from '../utils/logger-context.js'
import { deriveOutputPath } from '../utils/output-path.js'

/**
 * Input structure for ConvertCommand.execute()
 */
export interface ConvertCommandInput {
	options: ConvertOptions
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : 'Unknown error'
}

/**
 * ConvertCommand - Convert JIRA XML exports to Markdown files
 *
 * Files are processed one at a time. The first failure stops the run and
 * is rethrown as a ConversionError naming the offending input file.
 */
export class ConvertCommand {
	/**
	 * Convert every input file
	 * @returns Paths of the Markdown files written, in input order
	 */
	public async execute(input: ConvertCommandInput): Promise<string[]> {
		const written: string[] = []

		for (const inputFile of input.options.inputFiles) {
			try {
				written.push(await this.convertFile(inputFile, input.options))
			} catch (error) {
				if (error instanceof ConversionError) {
					throw error.inputFile ? error : error.forFile(inputFile)
				}
				throw new ConversionError(errorMessage(error), inputFile, { cause: error })
			}
		}

		return written
	}

	private async convertFile(inputFile: string, options: ConvertOptions): Promise<string> {
		const logger = getLogger()

		if (options.verbose) {
			logger.info(`Processing ${inputFile}...`)
		}

		let xml: string
		try {
			xml = await fs.readFile(inputFile, 'utf8')
		} catch (error) {
			throw new ConversionError(`failed to read file: ${errorMessage(error)}`, inputFile, { cause: error })
		}

		const issue = extractIssue(xml)
		logger.debug(`Extracted ${issue.key || '(no key)'} with ${issue.comments.length} comments and ${issue.customFields.length} custom fields`)

		const outputFile = deriveOutputPath(inputFile, options.includeDetails, options.output)
		if (!options.force && (await fs.pathExists(outputFile))) {
			throw new ConversionError(`output file ${outputFile} already exists (use -f to overwrite)`, inputFile)
		}

		const markdown = renderIssueMarkdown(issue, { includeDetails: options.includeDetails })

		try {
			await fs.writeFile(outputFile, markdown, 'utf8')
		} catch (error) {
			throw new ConversionError(`failed to write output: ${errorMessage(error)}`, inputFile, { cause: error })
		}

		if (options.verbose) {
			logger.success(`Created ${outputFile}`)
		}

		return outputFile
	}
}
