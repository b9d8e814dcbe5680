import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Auth } from 'googleapis'
import { z } from 'zod'
import { ERROR_MESSAGES, OAUTH_CONFIG } from '../constants.js'
import { AuthenticationError } from '../errors.js'

export const storedTokenSchema = z.object({
	type: z.literal(OAUTH_CONFIG.TOKEN_TYPE),
	client_id: z.string(),
	client_secret: z.string(),
	refresh_token: z.string(),
	access_token: z.string().optional(),
	expiry_date: z.number().optional(),
	token_type: z.string().optional(),
	scope: z.string().optional(),
})

export type StoredToken = z.infer<typeof storedTokenSchema>

export interface TokenStore {
	load(): Promise<StoredToken | undefined>
	save(token: StoredToken): Promise<void>
}

/**
 * Keeps the user's credentials in a JSON file (token.json) between runs
 */
export class FileTokenStore implements TokenStore {
	constructor(private readonly path: string) {}

	async load(): Promise<StoredToken | undefined> {
		let raw: string
		try {
			raw = await readFile(this.path, 'utf8')
		} catch (error) {
			if (isMissingFile(error)) return undefined
			throw error
		}

		let json: unknown
		try {
			json = JSON.parse(raw)
		} catch {
			throw new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.INVALID_TOKEN_FILE, {
				path: this.path,
			})
		}

		const parsed = storedTokenSchema.safeParse(json)
		if (!parsed.success) {
			throw new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.INVALID_TOKEN_FILE, {
				path: this.path,
				issues: parsed.error.issues,
			})
		}
		return parsed.data
	}

	async save(token: StoredToken): Promise<void> {
		await mkdir(dirname(this.path), { recursive: true })
		await writeFile(this.path, `${JSON.stringify(token, null, 2)}\n`, { mode: 0o600 })
	}
}

/**
 * Fold freshly issued credentials into what is already stored. Google only
 * sends a refresh token on first consent, so the old one is kept otherwise.
 */
export function mergeStoredToken(previous: StoredToken, tokens: Auth.Credentials): StoredToken {
	return {
		...previous,
		refresh_token: tokens.refresh_token ?? previous.refresh_token,
		access_token: tokens.access_token ?? previous.access_token,
		expiry_date: tokens.expiry_date ?? previous.expiry_date,
		token_type: tokens.token_type ?? previous.token_type,
		scope: tokens.scope ?? previous.scope,
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
