import type { calendar_v3 } from 'googleapis'

/**
 * A calendar event resource as the Calendar API returns it. Fields the server
 * does not model (recurrence, status, organizer, ...) ride along untouched.
 */
export type MeetingEvent = calendar_v3.Schema$Event

export type EventDateTime = calendar_v3.Schema$EventDateTime

export interface NewMeeting {
	summary: string
	startTime: string
	endTime: string
	timeZone?: string
	description?: string
	attendees?: string[]
}

export interface MeetingUpdate {
	summary?: string
	description?: string
	startTime?: string
	endTime?: string
	timeZone?: string
}

export interface MeetingSummary {
	eventId: string | null
	summary: string | null
	start: EventDateTime | null
	end: EventDateTime | null
	meetLink: string | null
	htmlLink: string | null
}

export interface CreatedMeeting {
	eventId: string | null
	htmlLink: string | null
	hangoutLink: string | null
	meetLink: string | null
	summary: string | null
	start: EventDateTime | null
	end: EventDateTime | null
}

export interface DeletedMeeting {
	status: 'deleted'
	eventId: string
}

export interface MeetingDefaults {
	calendarId: string
	timeZone: string
	listWindowDays: number
	maxResults: number
}
