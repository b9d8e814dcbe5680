import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { GoogleCredentialProvider } from './auth/google-auth.js'
import { FileTokenStore } from './auth/token-store.js'
import { createCalendarClient, GoogleCalendarGateway } from './calendar-client.js'
import type { MeetConfig } from './config.js'
import { DEFAULT_HOST, GOOGLE_API_CONFIG, SERVER_CONFIG } from './constants.js'
import type { MeetingToolDeps } from './tools/meetings.js'
import { createMeetingHandlers, registerMeetingTools } from './tools/meetings.js'

export function createCredentialProvider(config: MeetConfig): GoogleCredentialProvider {
	return new GoogleCredentialProvider({
		credentialsFile: config.credentialsFile,
		tokenStore: new FileTokenStore(config.tokenFile),
		scopes: GOOGLE_API_CONFIG.DEFAULT_SCOPES,
		callbackHost: DEFAULT_HOST,
		callbackPort: config.oauthCallbackPort,
		openUrl: config.openBrowser ? undefined : async () => {},
	})
}

export function createMeetingDeps(config: MeetConfig): MeetingToolDeps {
	const credentials = createCredentialProvider(config)
	return {
		connect: async () =>
			new GoogleCalendarGateway(createCalendarClient(await credentials.getAuthenticatedClient())),
		defaults: { calendarId: config.calendarId },
	}
}

/**
 * Build an MCP server exposing the meeting tools
 */
export function createMeetServer(deps: MeetingToolDeps): McpServer {
	const server = new McpServer(
		{
			name: SERVER_CONFIG.NAME,
			version: SERVER_CONFIG.VERSION,
		},
		{ instructions: SERVER_CONFIG.INSTRUCTIONS }
	)

	registerMeetingTools(server, createMeetingHandlers(deps))
	return server
}
