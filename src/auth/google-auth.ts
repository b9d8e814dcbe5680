import { exec } from 'node:child_process'
import { randomBytes } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import { promisify } from 'node:util'
import type { Auth } from 'googleapis'
import { google } from 'googleapis'
import { z } from 'zod'
import { BROWSER_COMMANDS, ERROR_MESSAGES, OAUTH_CONFIG } from '../constants.js'
import { AuthenticationError } from '../errors.js'
import { extractErrorMessage, isTokenExpired } from '../utils.js'
import { listenForAuthorizationCode } from './callback-server.js'
import type { StoredToken, TokenStore } from './token-store.js'
import { mergeStoredToken } from './token-store.js'

const execAsync = promisify(exec)

const oauthClientSchema = z.object({
	client_id: z.string(),
	client_secret: z.string(),
	redirect_uris: z.array(z.string()).optional(),
})

// credentials.json as downloaded from the Google Cloud Console
const clientSecretsSchema = z
	.object({
		installed: oauthClientSchema.optional(),
		web: oauthClientSchema.optional(),
	})
	.transform((secrets) => secrets.installed ?? secrets.web)

export type ClientSecrets = z.infer<typeof oauthClientSchema>

export interface CredentialProvider {
	getAuthenticatedClient(): Promise<Auth.OAuth2Client>
}

export interface GoogleCredentialOptions {
	credentialsFile: string
	tokenStore: TokenStore
	scopes: readonly string[]
	callbackHost: string
	callbackPort: number
	/** Opens the consent page; the URL is always logged as well */
	openUrl?: (url: string) => Promise<void>
}

export async function loadClientSecrets(path: string): Promise<ClientSecrets> {
	let raw: string
	try {
		raw = await readFile(path, 'utf8')
	} catch (error) {
		throw new AuthenticationError(`${ERROR_MESSAGES.AUTHENTICATION.MISSING_CLIENT_SECRETS}: ${path}`, {
			originalError: extractErrorMessage(error),
		})
	}

	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch {
		throw new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.INVALID_CLIENT_SECRETS, { path })
	}

	const parsed = clientSecretsSchema.safeParse(json)
	if (!parsed.success || !parsed.data) {
		throw new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.INVALID_CLIENT_SECRETS, { path })
	}
	return parsed.data
}

export async function openInBrowser(url: string): Promise<void> {
	const command =
		process.platform === 'darwin'
			? BROWSER_COMMANDS.MACOS
			: process.platform === 'win32'
				? BROWSER_COMMANDS.WINDOWS
				: BROWSER_COMMANDS.LINUX
	try {
		await execAsync(`${command} "${url}"`)
	} catch (error) {
		console.error('Could not open a browser, visit the URL above:', extractErrorMessage(error))
	}
}

/**
 * Hands out an authenticated OAuth2 client for the Calendar API.
 *
 * Stored credentials are reused across runs; an expired access token is
 * refreshed up front, and without stored credentials the user is sent through
 * the consent screen with a loopback redirect. New tokens are written back.
 */
export class GoogleCredentialProvider implements CredentialProvider {
	private pending?: Promise<Auth.OAuth2Client>
	private stored?: StoredToken

	constructor(private readonly options: GoogleCredentialOptions) {}

	getAuthenticatedClient(): Promise<Auth.OAuth2Client> {
		if (!this.pending) {
			this.pending = this.authorize().catch((error: unknown) => {
				this.pending = undefined
				throw error
			})
		}
		return this.pending
	}

	private async authorize(): Promise<Auth.OAuth2Client> {
		const secrets = await loadClientSecrets(this.options.credentialsFile)
		const stored = await this.options.tokenStore.load()

		if (stored) {
			return this.restore(secrets, stored)
		}
		return this.authorizeInteractively(secrets)
	}

	private async restore(secrets: ClientSecrets, stored: StoredToken): Promise<Auth.OAuth2Client> {
		const oauth2Client = new google.auth.OAuth2(secrets.client_id, secrets.client_secret)
		oauth2Client.setCredentials({
			refresh_token: stored.refresh_token,
			access_token: stored.access_token,
			expiry_date: stored.expiry_date,
			token_type: stored.token_type,
			scope: stored.scope,
		})
		this.stored = stored
		this.persistRefreshedTokens(oauth2Client)

		if (!stored.access_token || isTokenExpired(stored.expiry_date)) {
			try {
				await oauth2Client.getAccessToken()
			} catch (error) {
				throw new AuthenticationError(
					`${ERROR_MESSAGES.AUTHENTICATION.REFRESH_FAILED}: ${extractErrorMessage(error)}`
				)
			}
		}

		console.log('Using stored Google credentials')
		return oauth2Client
	}

	private async authorizeInteractively(secrets: ClientSecrets): Promise<Auth.OAuth2Client> {
		const state = randomBytes(16).toString('hex')
		const callback = await listenForAuthorizationCode({
			host: this.options.callbackHost,
			port: this.options.callbackPort,
			state,
		})

		try {
			const oauth2Client = new google.auth.OAuth2(
				secrets.client_id,
				secrets.client_secret,
				callback.redirectUri
			)
			const authUrl = oauth2Client.generateAuthUrl({
				access_type: OAUTH_CONFIG.ACCESS_TYPE,
				prompt: OAUTH_CONFIG.PROMPT,
				scope: [...this.options.scopes],
				state,
			})

			console.log(`Authorize this app by visiting: ${authUrl}`)
			// The redirect can arrive while the opener is still running
			const [code] = await Promise.all([
				callback.code,
				(this.options.openUrl ?? openInBrowser)(authUrl),
			])
			const { tokens } = await oauth2Client.getToken(code)
			if (!tokens.refresh_token) {
				throw new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.NO_REFRESH_TOKEN)
			}
			oauth2Client.setCredentials(tokens)

			const stored = mergeStoredToken(
				{
					type: OAUTH_CONFIG.TOKEN_TYPE,
					client_id: secrets.client_id,
					client_secret: secrets.client_secret,
					refresh_token: tokens.refresh_token,
				},
				tokens
			)
			await this.options.tokenStore.save(stored)
			this.stored = stored
			this.persistRefreshedTokens(oauth2Client)

			console.log('Authentication complete, credentials stored')
			return oauth2Client
		} finally {
			callback.close()
		}
	}

	private persistRefreshedTokens(oauth2Client: Auth.OAuth2Client) {
		oauth2Client.on('tokens', (tokens) => {
			if (!this.stored) return
			const next = mergeStoredToken(this.stored, tokens)
			this.stored = next
			this.options.tokenStore.save(next).catch((error: unknown) => {
				console.error('Failed to store refreshed credentials:', extractErrorMessage(error))
			})
		})
	}
}
