// IssueExtractor - Maps a JIRA XML (RSS) issue export to an IssueRecord
// Uses fast-xml-parser for validation and parsing

import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { ConversionError } from '../types/index.js'
import type { IssueComment, IssueCustomField, IssueRecord } from '../types/index.js'

/**
 * Elements that may repeat; parsed as arrays even when they occur once
 */
const REPEATED_ELEMENTS = new Set(['item', 'label', 'comment', 'customfield', 'customfieldvalue'])

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: '@_',
	// Keys, ids and dates must stay strings ("007" is not 7)
	parseTagValue: false,
	parseAttributeValue: false,
	// Numeric character references (&#233;) and the common named HTML entities
	htmlEntities: true,
	trimValues: false,
	isArray: (tagName: string, _jPath: string, _isLeafNode: boolean, isAttribute: boolean) =>
		!isAttribute && REPEATED_ELEMENTS.has(tagName),
})

type XmlNode = Record<string, unknown>

function isNode(value: unknown): value is XmlNode {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function child(node: unknown, name: string): unknown {
	return isNode(node) ? node[name] : undefined
}

function children(node: unknown, name: string): unknown[] {
	const value = child(node, name)
	if (value === undefined) {
		return []
	}
	return Array.isArray(value) ? value : [value]
}

/**
 * Character data of an element: plain text for attribute-less elements,
 * the #text entry for elements that also carry attributes
 */
function textOf(value: unknown): string {
	if (typeof value === 'string') {
		return value
	}
	if (typeof value === 'number' || typeof value === 'boolean') {
		return String(value)
	}
	if (isNode(value)) {
		return textOf(value['#text'])
	}
	return ''
}

function attributeOf(node: unknown, name: string): string {
	return textOf(child(node, `@_${name}`))
}

function extractComments(item: unknown): IssueComment[] {
	return children(child(item, 'comments'), 'comment').map((comment) => ({
		created: attributeOf(comment, 'created'),
		body: textOf(comment),
	}))
}

function extractCustomFields(item: unknown): IssueCustomField[] {
	return children(child(item, 'customfields'), 'customfield').map((field) => ({
		name: textOf(child(field, 'customfieldname')),
		values: children(child(field, 'customfieldvalues'), 'customfieldvalue').map(textOf),
	}))
}

/**
 * Map one parsed <item> element to an IssueRecord
 */
export function mapItem(item: unknown): IssueRecord {
	const text = (name: string): string => textOf(child(item, name))

	return {
		key: text('key'),
		summary: text('summary'),
		link: text('link'),
		type: text('type'),
		priority: text('priority'),
		status: text('status'),
		resolution: text('resolution'),
		assignee: text('assignee'),
		reporter: text('reporter'),
		labels: children(child(item, 'labels'), 'label').map(textOf),
		description: text('description'),
		created: text('created'),
		updated: text('updated'),
		due: text('due'),
		comments: extractComments(item),
		customFields: extractCustomFields(item),
	}
}

/**
 * Parse a JIRA XML export and return the record for its first <item>.
 * Throws ConversionError for invalid XML, a missing <rss> root or an empty channel.
 */
export function extractIssue(xml: string): IssueRecord {
	const validation = XMLValidator.validate(xml)
	if (validation !== true) {
		const { msg, line } = validation.err
		throw new ConversionError(`failed to parse XML: ${msg} (line ${line})`)
	}

	const document: unknown = parser.parse(xml)
	const rss = child(document, 'rss')
	if (rss === undefined) {
		throw new ConversionError('failed to parse XML: missing <rss> root element')
	}

	const items = children(child(rss, 'channel'), 'item')
	const [first] = items
	if (first === undefined) {
		throw new ConversionError('no items found in XML')
	}

	return mapItem(first)
}
