import { describe, test, expect } from 'vitest'
import { HtmlMarkdownConverter } from './html-markdown-converter.js'

describe('HtmlMarkdownConverter', () => {
	describe('convert', () => {
		test('strips paragraph markup and trims the result', () => {
			expect(HtmlMarkdownConverter.convert('<p>Hello</p>')).toBe('Hello')
		})

		test('converts bold tags to ** delimiters', () => {
			expect(HtmlMarkdownConverter.convert('<b>bold</b> text')).toBe('**bold** text')
		})

		test('converts an anchor to a markdown link', () => {
			expect(HtmlMarkdownConverter.convert('<a href="http://x.com">click</a>')).toBe('[click](http://x.com)')
		})

		test('converts a self-closing image to a markdown image', () => {
			expect(HtmlMarkdownConverter.convert('<img src="http://x.com/i.png"/>')).toBe('![Image](http://x.com/i.png)')
		})

		test('converts every anchor in the fragment', () => {
			expect(HtmlMarkdownConverter.convert('<a href="a">A</a> and <a href="b">B</a>')).toBe('[A](a) and [B](b)')
		})

		test('decodes escaped markup before rewriting tags', () => {
			expect(HtmlMarkdownConverter.convert('&lt;p&gt;Hi &lt;b&gt;there&lt;/b&gt;&lt;/p&gt;')).toBe('Hi **there**')
		})

		test('separates paragraphs with a blank line', () => {
			expect(HtmlMarkdownConverter.convert('<p>First</p><p>Second</p>')).toBe('First\n\nSecond')
		})

		test('converts line breaks in both spellings', () => {
			expect(HtmlMarkdownConverter.convert('line1<br/>line2<br />line3')).toBe('line1\nline2\nline3')
		})

		test('converts unordered lists to dash items', () => {
			expect(HtmlMarkdownConverter.convert('<ul><li>one</li><li>two</li></ul>')).toBe('- one\n- two')
		})

		test('leaves unknown tags untouched', () => {
			expect(HtmlMarkdownConverter.convert('<i>italic</i> <tt>code</tt>')).toBe('<i>italic</i> <tt>code</tt>')
		})

		test('handles a typical JIRA comment body', () => {
			const input =
				'<p>See <a href="https://example.com/docs" class="external-link" rel="nofollow">docs</a></p>\n<p>Thanks</p>'
			expect(HtmlMarkdownConverter.convert(input)).toBe('See [docs](https://example.com/docs)\n\n\nThanks')
		})

		test('returns empty string for empty or whitespace-only input', () => {
			expect(HtmlMarkdownConverter.convert('')).toBe('')
			expect(HtmlMarkdownConverter.convert('  \n ')).toBe('')
		})

		test('passes plain text through unchanged', () => {
			expect(HtmlMarkdownConverter.convert('just text')).toBe('just text')
		})
	})

	describe('decodeEntities', () => {
		test('decodes the fixed entity set', () => {
			expect(HtmlMarkdownConverter.decodeEntities('&lt;x&gt; &quot;q&quot; a &amp; b don&#8217;t')).toBe(
				'<x> "q" a & b don\'t'
			)
		})

		test('does not double-decode escaped entities', () => {
			expect(HtmlMarkdownConverter.decodeEntities('&amp;lt;')).toBe('&lt;')
			expect(HtmlMarkdownConverter.convert('Use &amp;lt;tag&amp;gt;')).toBe('Use &lt;tag&gt;')
		})

		test('leaves unrecognized entities as-is', () => {
			expect(HtmlMarkdownConverter.decodeEntities('a&nbsp;b &copy; &#169;')).toBe('a&nbsp;b &copy; &#169;')
		})

		test('is stable on already decoded text', () => {
			const once = HtmlMarkdownConverter.decodeEntities('&lt;b&gt; &quot;x&quot;')
			expect(HtmlMarkdownConverter.decodeEntities(once)).toBe(once)
		})
	})

	describe('replaceTags', () => {
		test('replaces tags without regard to nesting or balance', () => {
			expect(HtmlMarkdownConverter.replaceTags('<b>open only')).toBe('**open only')
			expect(HtmlMarkdownConverter.replaceTags('</li></li>')).toBe('\n\n')
		})
	})

	describe('convertLinks', () => {
		test('drops attributes after href', () => {
			expect(
				HtmlMarkdownConverter.convertLinks('<a href="http://x" class="external-link" rel="nofollow">site</a>')
			).toBe('[site](http://x)')
		})

		test('leaves an anchor without closing tag unchanged', () => {
			expect(HtmlMarkdownConverter.convertLinks('<a href="x">unclosed')).toBe('<a href="x">unclosed')
		})

		test('leaves an anchor without closing quote unchanged', () => {
			expect(HtmlMarkdownConverter.convertLinks('<a href="x>text</a>')).toBe('<a href="x>text</a>')
		})

		test('keeps earlier conversions when a later anchor is malformed', () => {
			expect(HtmlMarkdownConverter.convertLinks('<a href="a">A</a> <a href="b">B')).toBe('[A](a) <a href="b">B')
		})

		test('ignores anchors that do not start with href', () => {
			expect(HtmlMarkdownConverter.convertLinks('<a name="top">Top</a>')).toBe('<a name="top">Top</a>')
		})
	})

	describe('convertImages', () => {
		test('converts an image tag closed with > only', () => {
			expect(HtmlMarkdownConverter.convertImages('<img src="a.png">after')).toBe('![Image](a.png)after')
		})

		test('ignores attributes after src', () => {
			expect(HtmlMarkdownConverter.convertImages('<img src="a.png" height="20" border="0" />')).toBe('![Image](a.png)')
		})

		test('replaces the whole image-wrap span', () => {
			const input =
				'<span class="image-wrap" style=""><img src="http://x/a.png" style="border: 0px solid black" /></span>'
			expect(HtmlMarkdownConverter.convertImages(input)).toBe('![Image](http://x/a.png)')
		})

		test('consumes whitespace before the closing span of a wrapped image', () => {
			const input = 'See <span class="image-wrap" style=""><img src="u.png" /> </span> done'
			expect(HtmlMarkdownConverter.convertImages(input)).toBe('See ![Image](u.png) done')
		})

		test('does not treat a span with content before the image as a wrapper', () => {
			const input = '<span class="image-wrap">text <img src="a"/></span>'
			expect(HtmlMarkdownConverter.convertImages(input)).toBe('<span class="image-wrap">text ![Image](a)</span>')
		})

		test('converts several images in order', () => {
			expect(HtmlMarkdownConverter.convertImages('<img src="a"/> and <img src="b"/>')).toBe(
				'![Image](a) and ![Image](b)'
			)
		})

		test('ends the tag at /> even when an attribute contains >', () => {
			expect(HtmlMarkdownConverter.convert('<img src="a.png" alt="x>y"/> tail')).toBe('![Image](a.png) tail')
		})

		test('looks for /> before > when locating the end of the tag', () => {
			expect(HtmlMarkdownConverter.convert('<img src="a"> and <img src="b"/>')).toBe('![Image](a)')
		})

		test('leaves an image without closing quote unchanged', () => {
			expect(HtmlMarkdownConverter.convertImages('<img src="a.png')).toBe('<img src="a.png')
		})
	})
})
