#!/usr/bin/env node
import dotenv from 'dotenv'
import { loadConfig } from './config.js'
import { createCredentialProvider } from './index.js'
import { extractErrorMessage } from './utils.js'

// Load environment variables
dotenv.config()

async function main() {
	const config = loadConfig()
	console.log('Authorizing Google Calendar access...')
	await createCredentialProvider(config).getAuthenticatedClient()
	console.log(`Credentials ready in ${config.tokenFile}`)
}

main().catch((error: unknown) => {
	console.error('Authorization failed:', extractErrorMessage(error))
	process.exitCode = 1
})
