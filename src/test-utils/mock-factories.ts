import type { IssueComment, IssueCustomField, IssueRecord } from '../types/index.js'

/**
 * Build an IssueRecord with empty defaults, overriding only what a test cares about
 */
export function createIssueRecord(overrides: Partial<IssueRecord> = {}): IssueRecord {
	return {
		key: '',
		summary: '',
		link: '',
		type: '',
		priority: '',
		status: '',
		resolution: '',
		assignee: '',
		reporter: '',
		labels: [],
		description: '',
		created: '',
		updated: '',
		due: '',
		comments: [],
		customFields: [],
		...overrides,
	}
}

export function createComment(created: string, body: string): IssueComment {
	return { created, body }
}

export function createCustomField(name: string, ...values: string[]): IssueCustomField {
	return { name, values }
}

/**
 * Minimal JIRA RSS export around a single <item> body
 */
export function createIssueXml(itemBody: string): string {
	return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="0.92">
  <channel>
    <title>Test JIRA</title>
    <item>
${itemBody}
    </item>
  </channel>
</rss>`
}
