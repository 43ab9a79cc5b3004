/**
 * Utility class for converting the HTML fragments found in JIRA XML exports
 * (description, comment bodies, some custom field values) to Markdown.
 *
 * This is a literal pattern rewriter for the small tag vocabulary JIRA emits,
 * not an HTML parser. Anything it does not recognize is passed through as-is,
 * and malformed input degrades to a partial conversion instead of an error.
 *
 * Recognized:
 * - Entities: &lt; &gt; &quot; &amp; &#8217;
 * - <p>, </p>, <br/>, <br />, <b>, </b>, <ul>, </ul>, <li>, </li>
 * - <a href="url">text</a> -> [text](url)
 * - <img src="url" ... /> -> ![Image](url), including the
 *   <span class="image-wrap"> wrapper JIRA puts around attachments
 */

/**
 * Entities decoded, in application order. &amp; comes after the entities it
 * could have escaped so that "&amp;lt;" ends up as "&lt;", not "<".
 */
const ENTITY_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
	['&lt;', '<'],
	['&gt;', '>'],
	['&quot;', '"'],
	['&amp;', '&'],
	['&#8217;', "'"],
]

const TAG_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
	['<p>', ''],
	['</p>', '\n\n'],
	['<br/>', '\n'],
	['<br />', '\n'],
	['<b>', '**'],
	['</b>', '**'],
	['<ul>', ''],
	['</ul>', ''],
	['<li>', '- '],
	['</li>', '\n'],
]

const LINK_OPEN = '<a href="'
const LINK_CLOSE = '</a>'
const IMAGE_OPEN = '<img src="'
const IMAGE_WRAP_OPEN = '<span class="image-wrap"'
const SPAN_CLOSE = '</span>'

/**
 * A located tag pattern: the span of the source to replace and its Markdown
 */
interface Match {
	start: number
	end: number
	markdown: string
}

export class HtmlMarkdownConverter {
	/**
	 * Convert one HTML fragment to Markdown. Never throws.
	 */
	static convert(fragment: string): string {
		if (!fragment) {
			return ''
		}

		let result = this.decodeEntities(fragment)
		result = this.replaceTags(result)
		result = this.convertLinks(result)
		result = this.convertImages(result)

		return result.trim()
	}

	static decodeEntities(text: string): string {
		return ENTITY_REPLACEMENTS.reduce((acc, [entity, char]) => acc.replaceAll(entity, char), text)
	}

	/**
	 * Literal block/inline tag rewriting. Not nesting aware: every occurrence is
	 * replaced regardless of balance.
	 */
	static replaceTags(text: string): string {
		return TAG_REPLACEMENTS.reduce((acc, [tag, markdown]) => acc.replaceAll(tag, markdown), text)
	}

	/**
	 * Rewrite <a href="url">text</a> anchors as [text](url).
	 * Stops at the first anchor that is not well formed and leaves the rest untouched.
	 */
	static convertLinks(text: string): string {
		return this.rewriteAll(text, (source) => this.findLink(source))
	}

	/**
	 * Rewrite <img src="url"> tags (optionally inside an image-wrap span) as ![Image](url).
	 * Same stop-on-first-failure rule as convertLinks.
	 */
	static convertImages(text: string): string {
		return this.rewriteAll(text, (source) => this.findImage(source))
	}

	/**
	 * Replace the leftmost match, then rescan from the start until nothing matches.
	 * Each finder consumes its opening token, so the loop always terminates.
	 */
	private static rewriteAll(text: string, find: (source: string) => Match | null): string {
		let result = text
		let match = find(result)

		while (match) {
			result = result.slice(0, match.start) + match.markdown + result.slice(match.end)
			match = find(result)
		}

		return result
	}

	private static findLink(source: string): Match | null {
		const start = source.indexOf(LINK_OPEN)
		if (start === -1) {
			return null
		}

		const urlStart = start + LINK_OPEN.length
		const urlEnd = source.indexOf('"', urlStart)
		if (urlEnd === -1) {
			return null
		}

		// Any further attributes sit between the closing quote and '>'
		const tagEnd = source.indexOf('>', urlEnd)
		if (tagEnd === -1) {
			return null
		}

		const textStart = tagEnd + 1
		const textEnd = source.indexOf(LINK_CLOSE, textStart)
		if (textEnd === -1) {
			return null
		}

		const url = source.slice(urlStart, urlEnd)
		const linkText = source.slice(textStart, textEnd)

		return {
			start,
			end: textEnd + LINK_CLOSE.length,
			markdown: `[${linkText}](${url})`,
		}
	}

	private static findImage(source: string): Match | null {
		const imgStart = source.indexOf(IMAGE_OPEN)
		if (imgStart === -1) {
			return null
		}

		const urlStart = imgStart + IMAGE_OPEN.length
		const urlEnd = source.indexOf('"', urlStart)
		if (urlEnd === -1) {
			return null
		}

		const tagEnd = this.findImageTagEnd(source, urlEnd)
		if (tagEnd === -1) {
			return null
		}

		const url = source.slice(urlStart, urlEnd)
		const wrapStart = this.findImageWrapStart(source, imgStart)
		let end = tagEnd

		if (wrapStart !== -1) {
			const rest = source.slice(end)
			const trimmedRest = rest.trimStart()
			if (trimmedRest.startsWith(SPAN_CLOSE)) {
				end += rest.length - trimmedRest.length + SPAN_CLOSE.length
			}
		}

		return {
			start: wrapStart === -1 ? imgStart : wrapStart,
			end,
			markdown: `![Image](${url})`,
		}
	}

	/**
	 * Index just past the end of an image tag: the next '/>' when there is one,
	 * otherwise the next '>'. -1 when neither follows the src attribute.
	 */
	private static findImageTagEnd(source: string, from: number): number {
		const selfClose = source.indexOf('/>', from)
		if (selfClose !== -1) {
			return selfClose + 2
		}

		const close = source.indexOf('>', from)
		return close === -1 ? -1 : close + 1
	}

	/**
	 * Start index of an image-wrap span whose opening tag directly precedes the
	 * image (only whitespace in between), or -1 when the image is not wrapped.
	 */
	private static findImageWrapStart(source: string, imgStart: number): number {
		const wrapStart = source.lastIndexOf(IMAGE_WRAP_OPEN, imgStart)
		if (wrapStart === -1) {
			return -1
		}

		const wrapTagEnd = source.indexOf('>', wrapStart)
		if (wrapTagEnd === -1 || wrapTagEnd >= imgStart) {
			return -1
		}

		const between = source.slice(wrapTagEnd + 1, imgStart)
		return between.trim() === '' ? wrapStart : -1
	}
}
