/**
 * Utility functions for the Google Meet MCP Server
 */

import { randomUUID } from 'node:crypto'
import { DEFAULTS, ERROR_MESSAGES, GOOGLE_API_CONFIG } from './constants.js'
import type {
	CreatedMeeting,
	EventDateTime,
	MeetingEvent,
	MeetingSummary,
	MeetingUpdate,
	NewMeeting,
} from './types.js'

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Build the resource for a new event. Every call asks Google for a fresh Meet
 * link under a new request id, so two identical creations never collapse into one.
 */
export function buildMeetingEvent(
	meeting: NewMeeting,
	generateRequestId: () => string = randomUUID
): MeetingEvent {
	const timeZone = meeting.timeZone ?? DEFAULTS.TIME_ZONE
	const event: MeetingEvent = {
		summary: meeting.summary,
		start: { dateTime: meeting.startTime, timeZone },
		end: { dateTime: meeting.endTime, timeZone },
	}

	if (meeting.description) {
		event.description = meeting.description
	}

	if (meeting.attendees && meeting.attendees.length > 0) {
		event.attendees = meeting.attendees.map((email) => ({ email }))
	}

	event.conferenceData = {
		createRequest: {
			requestId: generateRequestId(),
			conferenceSolutionKey: { type: GOOGLE_API_CONFIG.CONFERENCE_SOLUTION_TYPE },
		},
	}

	return event
}

function retime(
	side: EventDateTime | undefined,
	dateTime: string,
	timeZone: string | undefined
): EventDateTime {
	const updated: EventDateTime = { ...side, dateTime }
	if (timeZone) {
		updated.timeZone = timeZone
	}
	return updated
}

/**
 * Apply a sparse update to an event as last fetched from the API.
 *
 * Only the requested fields change. A timezone lands on a side whose time was
 * changed, and is backfilled onto any side that has none, but never replaces
 * the timezone of a side that was not retimed. `attendees` and
 * `conferenceData` are carried over as they are.
 */
export function mergeMeetingUpdate(
	event: MeetingEvent,
	update: MeetingUpdate,
	defaultTimeZone: string = DEFAULTS.TIME_ZONE
): MeetingEvent {
	const merged: MeetingEvent = { ...event }
	const retimed = update.startTime !== undefined || update.endTime !== undefined
	const timeZone = update.timeZone ?? (retimed ? defaultTimeZone : undefined)

	if (update.summary !== undefined) {
		merged.summary = update.summary
	}
	if (update.description !== undefined) {
		merged.description = update.description
	}

	if (update.startTime !== undefined) {
		merged.start = retime(merged.start, update.startTime, timeZone)
	}
	if (update.endTime !== undefined) {
		merged.end = retime(merged.end, update.endTime, timeZone)
	}

	if (timeZone) {
		if (merged.start && !merged.start.timeZone) {
			merged.start = { ...merged.start, timeZone }
		}
		if (merged.end && !merged.end.timeZone) {
			merged.end = { ...merged.end, timeZone }
		}
	}

	return merged
}

/**
 * Find the join URL of an event: the first video entry point, falling back to
 * the legacy `hangoutLink` field.
 */
export function extractMeetLink(event: MeetingEvent): string | undefined {
	const entryPoints = event.conferenceData?.entryPoints ?? []
	const video = entryPoints.find(
		(entryPoint) => entryPoint.entryPointType === GOOGLE_API_CONFIG.VIDEO_ENTRY_POINT
	)
	if (video) {
		return video.uri ?? undefined
	}
	return event.hangoutLink ?? undefined
}

/**
 * Project events to compact summaries, in order, optionally dropping the ones
 * without a Meet link
 */
export function projectMeetings(
	events: MeetingEvent[],
	onlyWithMeetLink: boolean
): MeetingSummary[] {
	const summaries: MeetingSummary[] = []
	for (const event of events) {
		const meetLink = extractMeetLink(event)
		if (onlyWithMeetLink && !meetLink) continue

		summaries.push({
			eventId: event.id ?? null,
			summary: event.summary ?? null,
			start: event.start ?? null,
			end: event.end ?? null,
			meetLink: meetLink ?? null,
			htmlLink: event.htmlLink ?? null,
		})
	}
	return summaries
}

export function summarizeCreatedMeeting(event: MeetingEvent): CreatedMeeting {
	return {
		eventId: event.id ?? null,
		htmlLink: event.htmlLink ?? null,
		hangoutLink: event.hangoutLink ?? null,
		meetLink: extractMeetLink(event) ?? null,
		summary: event.summary ?? null,
		start: event.start ?? null,
		end: event.end ?? null,
	}
}

/**
 * Get default time range for meeting listings, starting at `now`
 */
export function getDefaultTimeRange(
	now: Date,
	days: number = DEFAULTS.LIST_WINDOW_DAYS
): { timeMin: string; timeMax: string } {
	return {
		timeMin: now.toISOString(),
		timeMax: new Date(now.getTime() + days * DAY_MS).toISOString(),
	}
}

/**
 * Extract error message from various error types
 */
export function extractErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}
	if (typeof error === 'string') {
		return error
	}
	return ERROR_MESSAGES.GENERAL.UNKNOWN
}

/**
 * Check if access token is expired
 */
export function isTokenExpired(expiryDate?: number, now: number = Date.now()): boolean {
	if (!expiryDate) return false
	return now >= expiryDate
}
