/**
 * Constants and configuration values for the Google Meet MCP Server
 */

// Server Configuration
export const SERVER_CONFIG = {
	NAME: 'Google Meet MCP Server',
	VERSION: '1.0.0',
	INSTRUCTIONS: `This MCP server manages Google Meet meetings via the Google Calendar API.

Tools:
- create-meeting: Create a new Google Meet event
- list-meetings: List upcoming Google Meet events
- get-meeting-details: Get details of a specific meeting
- update-meeting: Update an existing meeting
- delete-meeting: Delete a meeting (calendar event)`,
} as const

// Default Ports
export const DEFAULT_PORTS = {
	MCP_SERVER: 8000,
	// 0 lets the OS pick a free port for the loopback redirect
	OAUTH_CALLBACK: 0,
} as const

export const DEFAULT_HOST = '127.0.0.1'

export const MCP_ENDPOINT = '/mcp'

// Google API Configuration
export const GOOGLE_API_CONFIG = {
	CALENDAR_VERSION: 'v3',
	DEFAULT_SCOPES: ['https://www.googleapis.com/auth/calendar'],
	// Keeps existing conferenceData intact on update and mints a link on insert
	CONFERENCE_DATA_VERSION: 1,
	CONFERENCE_SOLUTION_TYPE: 'hangoutsMeet',
	VIDEO_ENTRY_POINT: 'video',
} as const

// OAuth Configuration
export const OAUTH_CONFIG = {
	ACCESS_TYPE: 'offline',
	PROMPT: 'consent',
	CALLBACK_PATH: '/oauth2callback',
	CALLBACK_TIMEOUT_MS: 5 * 60 * 1000,
	TOKEN_TYPE: 'authorized_user',
} as const

// Local files produced by the Google Cloud Console and the bootstrap flow
export const CREDENTIAL_FILES = {
	CLIENT_SECRETS: 'credentials.json',
	TOKEN: 'token.json',
} as const

// Error Messages
export const ERROR_MESSAGES = {
	AUTHENTICATION: {
		MISSING_CLIENT_SECRETS: 'Client secrets file could not be read',
		INVALID_CLIENT_SECRETS:
			'Client secrets file must contain an "installed" or "web" OAuth client',
		INVALID_TOKEN_FILE: 'Stored token file is not a valid authorized_user credential',
		REFRESH_FAILED: 'Failed to refresh access token',
		NO_REFRESH_TOKEN:
			'Google did not return a refresh token. Revoke access at https://myaccount.google.com/connections and authorize again',
		CONSENT_DENIED: 'Authorization was not granted',
		STATE_MISMATCH: 'Invalid authorization code or state mismatch',
		CALLBACK_TIMEOUT: 'Authentication timeout - no callback received',
	},
	GENERAL: {
		UNKNOWN: 'An unknown error occurred',
		METHOD_NOT_ALLOWED: 'Method not allowed.',
		SERVER_ERROR: 'Internal server error',
	},
} as const

// Tool Names
export const TOOL_NAMES = {
	MEETINGS: {
		CREATE: 'create-meeting',
		LIST: 'list-meetings',
		GET: 'get-meeting-details',
		UPDATE: 'update-meeting',
		DELETE: 'delete-meeting',
	},
} as const

export type MeetingToolName = (typeof TOOL_NAMES.MEETINGS)[keyof typeof TOOL_NAMES.MEETINGS]

// Prefix of the message a failed tool reports, followed by the target id when there is one
export const TOOL_FAILURE_PREFIXES: Record<MeetingToolName, string> = {
	[TOOL_NAMES.MEETINGS.CREATE]: 'Failed to create meeting',
	[TOOL_NAMES.MEETINGS.LIST]: 'Failed to list meetings',
	[TOOL_NAMES.MEETINGS.GET]: 'Failed to get meeting details for',
	[TOOL_NAMES.MEETINGS.UPDATE]: 'Failed to update meeting',
	[TOOL_NAMES.MEETINGS.DELETE]: 'Failed to delete meeting',
}

// Calendar IDs
export const CALENDAR_IDS = {
	PRIMARY: 'primary',
} as const

// HTTP Status Codes
export const HTTP_STATUS = {
	OK: 200,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	METHOD_NOT_ALLOWED: 405,
	INTERNAL_SERVER_ERROR: 500,
} as const

// Browser Commands
export const BROWSER_COMMANDS = {
	MACOS: 'open',
	LINUX: 'xdg-open',
	WINDOWS: 'start ""',
} as const

// Default Values
export const DEFAULTS = {
	CALENDAR_ID: CALENDAR_IDS.PRIMARY,
	TIME_ZONE: 'UTC',
	LIST_WINDOW_DAYS: 7,
	MAX_RESULTS: 20,
	ORDER_BY: 'startTime',
} as const
