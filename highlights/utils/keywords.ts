import type { KeywordHit, KeywordPolicy, Token } from '../types'

/**
 * Lowercase, trim and collapse whitespace so keywords and token text compare
 * on the same footing.
 */
export function normalizeKeywordText(text: string): string {
	return text.toLowerCase().replace(/\s+/g, ' ').trim()
}

/**
 * Normalize keywords from config or CLI input, keeping the first occurrence of
 * each keyword. An empty result is a valid (empty) keyword set.
 */
export function normalizeKeywords(rawKeywords: unknown): string[] {
	const rawList = Array.isArray(rawKeywords) ? rawKeywords : [rawKeywords]
	const keywords = rawList
		.filter((value): value is string => typeof value === 'string')
		.map(normalizeKeywordText)
		.filter(Boolean)
	return [...new Set(keywords)]
}

function keywordMatches(
	tokenText: string,
	keyword: string,
	policy: KeywordPolicy,
) {
	const keywordInToken = tokenText.includes(keyword)
	// An empty token would be "contained" in every keyword.
	const tokenInKeyword = tokenText.length > 0 && keyword.includes(tokenText)
	switch (policy) {
		case 'contains':
			return keywordInToken
		case 'contained':
			return tokenInKeyword
		case 'either':
			return keywordInToken || tokenInKeyword
	}
}

/**
 * Emit one hit per qualifying token, in token order. When several keywords
 * match a token the first configured keyword is reported.
 */
export function matchKeywords(
	tokens: readonly Token[],
	keywords: readonly string[],
	options: { policy?: KeywordPolicy } = {},
): KeywordHit[] {
	const normalizedKeywords = normalizeKeywords([...keywords])
	if (normalizedKeywords.length === 0) {
		return []
	}
	const policy = options.policy ?? 'contains'
	const hits: KeywordHit[] = []
	for (const token of tokens) {
		const tokenText = normalizeKeywordText(token.text)
		const keyword = normalizedKeywords.find((candidate) =>
			keywordMatches(tokenText, candidate, policy),
		)
		if (keyword === undefined) {
			continue
		}
		hits.push({
			timestamp: token.start,
			matchedText: token.text.trim(),
			keyword,
		})
	}
	return hits
}
