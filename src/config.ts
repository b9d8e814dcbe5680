import { z } from 'zod'
import { CALENDAR_IDS, CREDENTIAL_FILES, DEFAULT_HOST, DEFAULT_PORTS } from './constants.js'

export const configSchema = z.object({
	credentialsFile: z
		.string()
		.default(CREDENTIAL_FILES.CLIENT_SECRETS)
		.describe('OAuth client secrets downloaded from the Google Cloud Console'),
	tokenFile: z
		.string()
		.default(CREDENTIAL_FILES.TOKEN)
		.describe('Where the authorized user credentials are kept between runs'),
	calendarId: z.string().default(CALENDAR_IDS.PRIMARY).describe('Calendar the tools operate on'),
	host: z.string().default(DEFAULT_HOST).describe('Interface the MCP HTTP server binds to'),
	port: z.coerce.number().int().min(0).default(DEFAULT_PORTS.MCP_SERVER),
	oauthCallbackPort: z.coerce
		.number()
		.int()
		.min(0)
		.default(DEFAULT_PORTS.OAUTH_CALLBACK)
		.describe('Port of the loopback OAuth redirect (0 picks a free one)'),
	openBrowser: z
		.string()
		.trim()
		.toLowerCase()
		.default('true')
		.pipe(z.enum(['true', 'false']))
		.transform((value) => value === 'true')
		.describe('Open the consent page in a browser during authorization'),
})

export type MeetConfig = z.infer<typeof configSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MeetConfig {
	return configSchema.parse({
		credentialsFile: env.GOOGLE_CREDENTIALS_FILE,
		tokenFile: env.GOOGLE_TOKEN_FILE,
		calendarId: env.GOOGLE_CALENDAR_ID,
		host: env.MCP_HOST,
		port: env.MCP_PORT,
		oauthCallbackPort: env.OAUTH_CALLBACK_PORT,
		openBrowser: env.OAUTH_OPEN_BROWSER,
	})
}
