import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import { z } from 'zod'
import type { CalendarGateway } from '../calendar-client.js'
import { DEFAULTS, GOOGLE_API_CONFIG, TOOL_NAMES } from '../constants.js'
import { runTool } from '../errors.js'
import type {
	CreatedMeeting,
	DeletedMeeting,
	MeetingDefaults,
	MeetingEvent,
	MeetingSummary,
	MeetingUpdate,
	NewMeeting,
} from '../types.js'
import {
	buildMeetingEvent,
	getDefaultTimeRange,
	mergeMeetingUpdate,
	projectMeetings,
	summarizeCreatedMeeting,
} from '../utils.js'

export interface MeetingToolDeps {
	/** Resolve an authenticated gateway; called once per tool invocation */
	connect: () => Promise<CalendarGateway>
	now?: () => Date
	defaults?: Partial<MeetingDefaults>
	generateRequestId?: () => string
}

export interface ListMeetingsInput {
	timeMin?: string
	timeMax?: string
	maxResults?: number
	onlyWithMeetLink?: boolean
}

export interface MeetingHandlers {
	createMeeting(meeting: NewMeeting): Promise<CreatedMeeting>
	listMeetings(input: ListMeetingsInput): Promise<MeetingSummary[]>
	getMeetingDetails(eventId: string): Promise<MeetingEvent>
	updateMeeting(eventId: string, update: MeetingUpdate): Promise<MeetingEvent>
	deleteMeeting(eventId: string): Promise<DeletedMeeting>
}

export function createMeetingHandlers(deps: MeetingToolDeps): MeetingHandlers {
	const defaults: MeetingDefaults = {
		calendarId: DEFAULTS.CALENDAR_ID,
		timeZone: DEFAULTS.TIME_ZONE,
		listWindowDays: DEFAULTS.LIST_WINDOW_DAYS,
		maxResults: DEFAULTS.MAX_RESULTS,
		...deps.defaults,
	}
	const now = deps.now ?? (() => new Date())
	const { calendarId } = defaults

	return {
		async createMeeting(meeting) {
			const gateway = await deps.connect()
			const body = buildMeetingEvent(
				{ ...meeting, timeZone: meeting.timeZone ?? defaults.timeZone },
				deps.generateRequestId
			)
			const created = await gateway.insertEvent(
				calendarId,
				body,
				GOOGLE_API_CONFIG.CONFERENCE_DATA_VERSION
			)
			return summarizeCreatedMeeting(created)
		},

		async listMeetings(input) {
			const gateway = await deps.connect()
			const window = getDefaultTimeRange(now(), defaults.listWindowDays)
			const events = await gateway.listEvents({
				calendarId,
				timeMin: input.timeMin ?? window.timeMin,
				timeMax: input.timeMax ?? window.timeMax,
				singleEvents: true,
				orderBy: DEFAULTS.ORDER_BY,
				maxResults: input.maxResults ?? defaults.maxResults,
				showDeleted: false,
			})
			return projectMeetings(events, input.onlyWithMeetLink ?? true)
		},

		async getMeetingDetails(eventId) {
			const gateway = await deps.connect()
			return gateway.getEvent(calendarId, eventId)
		},

		async updateMeeting(eventId, update) {
			const gateway = await deps.connect()
			const current = await gateway.getEvent(calendarId, eventId)
			const merged = mergeMeetingUpdate(current, update, defaults.timeZone)
			return gateway.updateEvent(
				calendarId,
				eventId,
				merged,
				GOOGLE_API_CONFIG.CONFERENCE_DATA_VERSION
			)
		},

		async deleteMeeting(eventId) {
			const gateway = await deps.connect()
			await gateway.deleteEvent(calendarId, eventId)
			return { status: 'deleted', eventId }
		},
	}
}

export function registerMeetingTools(server: McpServer, handlers: MeetingHandlers) {
	// Tool: Create Meeting
	server.tool(
		TOOL_NAMES.MEETINGS.CREATE,
		'Create a new Google Calendar event with a Google Meet link',
		{
			summary: z.string().describe('Title of the meeting'),
			start_iso: z
				.string()
				.describe('Start time in RFC3339 format (e.g. 2025-11-21T10:00:00+05:30)'),
			end_iso: z.string().describe('End time in RFC3339 format'),
			description: z.string().optional().describe('Optional description or agenda'),
			attendees: z.array(z.string()).optional().describe('List of attendee email addresses'),
			timezone_str: z
				.string()
				.default(DEFAULTS.TIME_ZONE)
				.describe("IANA timezone, e.g. 'Asia/Kolkata' or 'UTC'"),
		},
		async ({ summary, start_iso, end_iso, description, attendees, timezone_str }) =>
			runTool(TOOL_NAMES.MEETINGS.CREATE, undefined, () =>
				handlers.createMeeting({
					summary,
					startTime: start_iso,
					endTime: end_iso,
					description,
					attendees,
					timeZone: timezone_str,
				})
			)
	)

	// Tool: List Meetings
	server.tool(
		TOOL_NAMES.MEETINGS.LIST,
		'List upcoming Google Calendar events, optionally only those with Google Meet links',
		{
			time_min_iso: z
				.string()
				.optional()
				.describe('Start of the time window (RFC3339). Defaults to now'),
			time_max_iso: z
				.string()
				.optional()
				.describe('End of the time window (RFC3339). Defaults to 7 days from now'),
			max_results: z
				.number()
				.int()
				.positive()
				.default(DEFAULTS.MAX_RESULTS)
				.describe('Maximum number of events to return'),
			only_with_meet_link: z
				.boolean()
				.default(true)
				.describe('Return only events that have a Meet link'),
		},
		async ({ time_min_iso, time_max_iso, max_results, only_with_meet_link }) =>
			runTool(TOOL_NAMES.MEETINGS.LIST, undefined, () =>
				handlers.listMeetings({
					timeMin: time_min_iso,
					timeMax: time_max_iso,
					maxResults: max_results,
					onlyWithMeetLink: only_with_meet_link,
				})
			)
	)

	// Tool: Get Meeting Details
	server.tool(
		TOOL_NAMES.MEETINGS.GET,
		'Get the full Google Calendar event of a meeting, including conferenceData',
		{
			event_id: z.string().describe('Google Calendar event ID'),
		},
		async ({ event_id }) =>
			runTool(TOOL_NAMES.MEETINGS.GET, event_id, () => handlers.getMeetingDetails(event_id))
	)

	// Tool: Update Meeting
	server.tool(
		TOOL_NAMES.MEETINGS.UPDATE,
		'Update the title, description or times of an existing meeting',
		{
			event_id: z.string().describe('ID of the event to update'),
			summary: z.string().optional().describe('New title'),
			description: z.string().optional().describe('New description'),
			start_iso: z.string().optional().describe('New start time (RFC3339)'),
			end_iso: z.string().optional().describe('New end time (RFC3339)'),
			timezone_str: z
				.string()
				.optional()
				.describe('IANA timezone; UTC is used when times change and none is given'),
		},
		async ({ event_id, summary, description, start_iso, end_iso, timezone_str }) =>
			runTool(TOOL_NAMES.MEETINGS.UPDATE, event_id, () =>
				handlers.updateMeeting(event_id, {
					summary,
					description,
					startTime: start_iso,
					endTime: end_iso,
					timeZone: timezone_str,
				})
			)
	)

	// Tool: Delete Meeting
	server.tool(
		TOOL_NAMES.MEETINGS.DELETE,
		'Delete a meeting (cancels the calendar event)',
		{
			event_id: z.string().describe('The event ID to delete'),
		},
		async ({ event_id }) =>
			runTool(TOOL_NAMES.MEETINGS.DELETE, event_id, () => handlers.deleteMeeting(event_id))
	)
}
