#!/usr/bin/env node
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js'
import cors from 'cors'
import dotenv from 'dotenv'
import express from 'express'
import helmet from 'helmet'
import { loadConfig } from './config.js'
import { ERROR_MESSAGES, HTTP_STATUS, MCP_ENDPOINT, SERVER_CONFIG } from './constants.js'
import { createMeetingDeps, createMeetServer } from './index.js'
import { extractErrorMessage } from './utils.js'

// Load environment variables
dotenv.config()

const config = loadConfig()
const deps = createMeetingDeps(config)

const app = express()

// Middleware
app.use(helmet())
app.use(cors({ exposedHeaders: ['Mcp-Session-Id'] }))
app.use(express.json())

// Stateless Streamable HTTP: a fresh server and transport per request
app.post(MCP_ENDPOINT, async (req, res) => {
	const server = createMeetServer(deps)
	const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined })

	res.on('close', () => {
		transport.close().catch((error: unknown) => {
			console.error('Error closing transport:', extractErrorMessage(error))
		})
		server.close().catch((error: unknown) => {
			console.error('Error closing MCP server:', extractErrorMessage(error))
		})
	})

	try {
		await server.connect(transport)
		await transport.handleRequest(req, res, req.body)
	} catch (error) {
		console.error('Error handling MCP request:', error)
		if (!res.headersSent) {
			res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({
				jsonrpc: '2.0',
				error: { code: -32603, message: ERROR_MESSAGES.GENERAL.SERVER_ERROR },
				id: null,
			})
		}
	}
})

const methodNotAllowed: express.RequestHandler = (_req, res) => {
	res.status(HTTP_STATUS.METHOD_NOT_ALLOWED).json({
		jsonrpc: '2.0',
		error: { code: -32000, message: ERROR_MESSAGES.GENERAL.METHOD_NOT_ALLOWED },
		id: null,
	})
}

app.get(MCP_ENDPOINT, methodNotAllowed)
app.delete(MCP_ENDPOINT, methodNotAllowed)

app.listen(config.port, config.host, () => {
	console.log(`${SERVER_CONFIG.NAME} listening on http://${config.host}:${config.port}${MCP_ENDPOINT}`)
	console.log(`   Calendar: ${config.calendarId}`)
	console.log(`   Credentials: ${config.credentialsFile}`)
})
