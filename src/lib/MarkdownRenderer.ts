import type { IssueCustomField, IssueRecord, RenderOptions } from '../types/index.js'
import { HtmlMarkdownConverter } from '../utils/html-markdown-converter.js'

/**
 * Custom field rendered again, HTML-converted, below the custom field list
 */
export const AUDIT_DESCRIPTION_FIELD = 'Audit Description'

function isDateField(field: IssueCustomField): boolean {
	return field.name.toLowerCase().includes('date')
}

function firstValue(field: IssueCustomField): string {
	return field.values[0] ?? ''
}

function bullet(label: string, value: string): string {
	return `- **${label}:** ${value}\n`
}

function renderTitle(issue: IssueRecord): string {
	return `# ${issue.key}: ${issue.summary}\n\n` + `**Link:** [${issue.link}](${issue.link})\n\n`
}

function renderOverview(issue: IssueRecord): string {
	let section = '## Overview\n\n'
	section += bullet('Type', issue.type)
	section += bullet('Priority', issue.priority)
	section += bullet('Status', issue.status)
	section += bullet('Resolution', issue.resolution)
	section += bullet('Assignee', issue.assignee)
	section += bullet('Reporter', issue.reporter)
	if (issue.labels.length > 0) {
		section += bullet('Labels', issue.labels.join(', '))
	}
	return section + '\n'
}

function renderDates(issue: IssueRecord, options: RenderOptions): string {
	let section = '## Dates\n\n'
	section += bullet('Created', issue.created)
	section += bullet('Updated', issue.updated)

	// Custom date fields only appear in details mode
	if (options.includeDetails) {
		for (const field of issue.customFields) {
			const value = firstValue(field)
			if (isDateField(field) && value !== '') {
				section += bullet(field.name, value)
			}
		}
	}

	return section + '\n'
}

function renderDetails(issue: IssueRecord): string {
	return '## Details\n\n' + HtmlMarkdownConverter.convert(issue.description) + '\n\n'
}

function renderComments(issue: IssueRecord): string {
	if (issue.comments.length === 0) {
		return ''
	}

	let section = '## Comments\n\n'
	for (const comment of issue.comments) {
		section += `### ${comment.created}\n\n`
		section += HtmlMarkdownConverter.convert(comment.body) + '\n\n'
	}
	return section
}

/**
 * Render one custom field as a bullet, or null when it has nothing to show.
 * Values are emitted verbatim, even when they contain markup.
 */
function renderCustomFieldBullet(field: IssueCustomField): string | null {
	if (isDateField(field)) {
		return null
	}

	const nonEmpty = field.values.filter((value) => value !== '')
	if (nonEmpty.length === 0) {
		return null
	}

	if (field.values.length > 1) {
		return bullet(field.name, nonEmpty.join(', '))
	}
	return bullet(field.name, firstValue(field))
}

function renderCustomFields(issue: IssueRecord, options: RenderOptions): string {
	if (!options.includeDetails || issue.customFields.length === 0) {
		return ''
	}

	let section = '## Custom Fields\n\n'
	for (const field of issue.customFields) {
		section += renderCustomFieldBullet(field) ?? ''
	}

	// Audit Description is listed raw above and repeated here converted
	for (const field of issue.customFields) {
		const value = firstValue(field)
		if (field.name === AUDIT_DESCRIPTION_FIELD && value !== '') {
			section += `\n## ${AUDIT_DESCRIPTION_FIELD}\n\n`
			section += HtmlMarkdownConverter.convert(value) + '\n'
		}
	}

	return section
}

/**
 * Render an issue record as a Markdown document.
 * Pure: the output depends only on the record and the options.
 */
export function renderIssueMarkdown(issue: IssueRecord, options: RenderOptions): string {
	return [
		renderTitle(issue),
		renderOverview(issue),
		renderDates(issue, options),
		renderDetails(issue),
		renderComments(issue),
		renderCustomFields(issue, options),
	].join('')
}
