/**
 * Token storage using dense arrays with integer IDs.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	Atom: 2,
	// Special (255)
	Eof: 255,
	// Structural tokens (0-9)
	LeftParen: 0,
	RightParen: 1,
	String: 3,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token - fixed size, no pointers.
 * Payload meaning depends on kind:
 * - Atom/String: StringId of the token text (quotes stripped)
 * - Parentheses/Eof: 0
 */
export interface Token {
	readonly kind: TokenKind
	readonly line: number
	readonly column: number
	readonly payload: number
}

/**
 * Dense array storage for tokens.
 * Append-only during tokenization phase.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}
}
