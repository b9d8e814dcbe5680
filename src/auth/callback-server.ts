import type { Server } from 'node:http'
import express from 'express'
import { ERROR_MESSAGES, HTTP_STATUS, OAUTH_CONFIG } from '../constants.js'
import { AuthenticationError } from '../errors.js'

export interface AuthorizationCallback {
	/** Loopback redirect URI to register with the authorization request */
	redirectUri: string
	/** Settles once Google redirects back, or on timeout */
	code: Promise<string>
	close: () => void
}

export interface CallbackOptions {
	host: string
	port: number
	state: string
	timeoutMs?: number
}

function renderPage(title: string, message: string): string {
	return `<!DOCTYPE html>
<html lang="en">
<head><meta charset="UTF-8"><title>${title} - Google Meet MCP</title></head>
<body>
	<h1>${title}</h1>
	<p>${message}</p>
</body>
</html>`
}

function queryValue(value: unknown): string | undefined {
	return typeof value === 'string' ? value : undefined
}

/**
 * Start a one-shot local HTTP server that receives the OAuth redirect and
 * yields the authorization code once the state matches.
 */
export async function listenForAuthorizationCode(
	options: CallbackOptions
): Promise<AuthorizationCallback> {
	let resolveCode: (code: string) => void = () => {}
	let rejectCode: (error: Error) => void = () => {}
	const code = new Promise<string>((resolve, reject) => {
		resolveCode = resolve
		rejectCode = reject
	})

	const app = express()
	const server = await new Promise<Server>((resolve, reject) => {
		const listening = app.listen(options.port, options.host, () => resolve(listening))
		listening.on('error', reject)
	})

	let closed = false
	const close = () => {
		if (closed) return
		closed = true
		clearTimeout(timeout)
		server.close()
	}

	const timeout = setTimeout(() => {
		close()
		rejectCode(new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.CALLBACK_TIMEOUT))
	}, options.timeoutMs ?? OAUTH_CONFIG.CALLBACK_TIMEOUT_MS)

	app.get(OAUTH_CONFIG.CALLBACK_PATH, (req, res) => {
		const error = queryValue(req.query.error)
		const receivedCode = queryValue(req.query.code)
		const state = queryValue(req.query.state)

		res.set('Connection', 'close')

		if (error) {
			res
				.status(HTTP_STATUS.BAD_REQUEST)
				.type('html')
				.send(renderPage('Authorization Failed', `Error: ${error}`))
			close()
			rejectCode(
				new AuthenticationError(`${ERROR_MESSAGES.AUTHENTICATION.CONSENT_DENIED}: ${error}`)
			)
			return
		}

		if (!receivedCode || state !== options.state) {
			res
				.status(HTTP_STATUS.BAD_REQUEST)
				.type('html')
				.send(renderPage('Authorization Failed', ERROR_MESSAGES.AUTHENTICATION.STATE_MISMATCH))
			close()
			rejectCode(new AuthenticationError(ERROR_MESSAGES.AUTHENTICATION.STATE_MISMATCH))
			return
		}

		res
			.status(HTTP_STATUS.OK)
			.type('html')
			.send(
				renderPage(
					'Authentication Successful',
					'You can close this window and return to your application.'
				)
			)
		close()
		resolveCode(receivedCode)
	})

	const address = server.address()
	const port = typeof address === 'object' && address !== null ? address.port : options.port

	return {
		redirectUri: `http://${options.host}:${port}${OAUTH_CONFIG.CALLBACK_PATH}`,
		code,
		close,
	}
}
