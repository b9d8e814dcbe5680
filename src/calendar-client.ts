import type { Auth, calendar_v3 } from 'googleapis'
import { google } from 'googleapis'
import { GOOGLE_API_CONFIG } from './constants.js'
import type { MeetingEvent } from './types.js'

export interface ListEventsQuery {
	calendarId: string
	timeMin: string
	timeMax: string
	singleEvents: boolean
	orderBy: 'startTime' | 'updated'
	maxResults: number
	showDeleted: boolean
}

/**
 * The slice of the Calendar API the meeting tools call
 */
export interface CalendarGateway {
	insertEvent(
		calendarId: string,
		body: MeetingEvent,
		conferenceDataVersion: number
	): Promise<MeetingEvent>
	listEvents(query: ListEventsQuery): Promise<MeetingEvent[]>
	getEvent(calendarId: string, eventId: string): Promise<MeetingEvent>
	updateEvent(
		calendarId: string,
		eventId: string,
		body: MeetingEvent,
		conferenceDataVersion: number
	): Promise<MeetingEvent>
	deleteEvent(calendarId: string, eventId: string): Promise<void>
}

/**
 * Create a Google Calendar API client bound to the given credentials
 */
export function createCalendarClient(oauth2Client: Auth.OAuth2Client): calendar_v3.Calendar {
	return google.calendar({ version: GOOGLE_API_CONFIG.CALENDAR_VERSION, auth: oauth2Client })
}

export class GoogleCalendarGateway implements CalendarGateway {
	constructor(private readonly calendar: calendar_v3.Calendar) {}

	async insertEvent(
		calendarId: string,
		body: MeetingEvent,
		conferenceDataVersion: number
	): Promise<MeetingEvent> {
		const response = await this.calendar.events.insert({
			calendarId,
			requestBody: body,
			conferenceDataVersion,
		})
		return response.data
	}

	async listEvents(query: ListEventsQuery): Promise<MeetingEvent[]> {
		const response = await this.calendar.events.list({
			calendarId: query.calendarId,
			timeMin: query.timeMin,
			timeMax: query.timeMax,
			singleEvents: query.singleEvents,
			orderBy: query.orderBy,
			maxResults: query.maxResults,
			showDeleted: query.showDeleted,
		})
		return response.data.items ?? []
	}

	async getEvent(calendarId: string, eventId: string): Promise<MeetingEvent> {
		const response = await this.calendar.events.get({ calendarId, eventId })
		return response.data
	}

	async updateEvent(
		calendarId: string,
		eventId: string,
		body: MeetingEvent,
		conferenceDataVersion: number
	): Promise<MeetingEvent> {
		const response = await this.calendar.events.update({
			calendarId,
			eventId,
			requestBody: body,
			conferenceDataVersion,
		})
		return response.data
	}

	async deleteEvent(calendarId: string, eventId: string): Promise<void> {
		await this.calendar.events.delete({ calendarId, eventId })
	}
}
