import { describe, expect, it } from 'vitest'
import type { MeetingEvent } from './types.js'
import {
	buildMeetingEvent,
	extractErrorMessage,
	extractMeetLink,
	getDefaultTimeRange,
	isTokenExpired,
	mergeMeetingUpdate,
	projectMeetings,
	summarizeCreatedMeeting,
} from './utils.js'

const MEET_URI = 'https://meet.google.com/abc-defg-hij'
const LEGACY_URI = 'https://meet.google.com/legacy-link'

function withVideo(id: string, uri: string): MeetingEvent {
	return {
		id,
		summary: `Meeting ${id}`,
		htmlLink: `https://calendar.google.com/event?eid=${id}`,
		conferenceData: { entryPoints: [{ entryPointType: 'video', uri }] },
	}
}

describe('buildMeetingEvent', () => {
	it('should build a full payload with a conference request', () => {
		const event = buildMeetingEvent(
			{
				summary: 'Planning',
				startTime: '2026-03-01T10:00:00+05:30',
				endTime: '2026-03-01T11:00:00+05:30',
				timeZone: 'Asia/Kolkata',
				description: 'Quarterly planning',
				attendees: ['alice@example.com', 'bob@example.com'],
			},
			() => 'request-1'
		)

		expect(event).toEqual({
			summary: 'Planning',
			start: { dateTime: '2026-03-01T10:00:00+05:30', timeZone: 'Asia/Kolkata' },
			end: { dateTime: '2026-03-01T11:00:00+05:30', timeZone: 'Asia/Kolkata' },
			description: 'Quarterly planning',
			attendees: [{ email: 'alice@example.com' }, { email: 'bob@example.com' }],
			conferenceData: {
				createRequest: {
					requestId: 'request-1',
					conferenceSolutionKey: { type: 'hangoutsMeet' },
				},
			},
		})
	})

	it('should default the timezone to UTC and omit empty optional fields', () => {
		const event = buildMeetingEvent(
			{
				summary: 'Standup',
				startTime: '2026-03-01T09:00:00Z',
				endTime: '2026-03-01T09:15:00Z',
				description: '',
				attendees: [],
			},
			() => 'request-2'
		)

		expect(event.start).toEqual({ dateTime: '2026-03-01T09:00:00Z', timeZone: 'UTC' })
		expect(event.end).toEqual({ dateTime: '2026-03-01T09:15:00Z', timeZone: 'UTC' })
		expect(event).not.toHaveProperty('description')
		expect(event).not.toHaveProperty('attendees')
	})

	it('should request a different conference id on every call', () => {
		const meeting = {
			summary: 'Sync',
			startTime: '2026-03-01T09:00:00Z',
			endTime: '2026-03-01T10:00:00Z',
		}

		const first = buildMeetingEvent(meeting)
		const second = buildMeetingEvent(meeting)

		const firstId = first.conferenceData?.createRequest?.requestId
		const secondId = second.conferenceData?.createRequest?.requestId
		expect(firstId).toEqual(expect.any(String))
		expect(secondId).toEqual(expect.any(String))
		expect(firstId).not.toBe(secondId)
	})
})

describe('mergeMeetingUpdate', () => {
	const existing: MeetingEvent = {
		id: 'evt-1',
		summary: 'A',
		description: 'D',
		start: { dateTime: 'T1', timeZone: 'UTC' },
		end: { dateTime: 'T2', timeZone: 'UTC' },
		status: 'confirmed',
		recurringEventId: 'series-9',
	}

	it('should only change the summary when only a summary is given', () => {
		const merged = mergeMeetingUpdate(existing, { summary: 'B' })

		expect(merged).toEqual({ ...existing, summary: 'B' })
		expect(merged.description).toBe('D')
		expect(merged.start).toEqual({ dateTime: 'T1', timeZone: 'UTC' })
		expect(merged.end).toEqual({ dateTime: 'T2', timeZone: 'UTC' })
	})

	it('should return an equal resource for an empty update', () => {
		const sparse: MeetingEvent = {
			id: 'evt-2',
			summary: 'No zone',
			start: { dateTime: 'T1' },
			end: { dateTime: 'T2' },
		}

		expect(mergeMeetingUpdate(existing, {})).toEqual(existing)
		expect(mergeMeetingUpdate(sparse, {})).toEqual(sparse)
	})

	it('should not mutate the event it was given', () => {
		const event: MeetingEvent = {
			summary: 'A',
			start: { dateTime: 'T1' },
			end: { dateTime: 'T2', timeZone: 'UTC' },
		}

		mergeMeetingUpdate(event, { summary: 'B', startTime: 'T3', timeZone: 'Europe/Paris' })

		expect(event).toEqual({
			summary: 'A',
			start: { dateTime: 'T1' },
			end: { dateTime: 'T2', timeZone: 'UTC' },
		})
	})

	it('should backfill a timezone onto a side that has none', () => {
		const event: MeetingEvent = {
			start: { dateTime: 'T1' },
			end: { dateTime: 'T2', timeZone: 'UTC' },
		}

		const merged = mergeMeetingUpdate(event, { timeZone: 'Asia/Kolkata' })

		expect(merged.start).toEqual({ dateTime: 'T1', timeZone: 'Asia/Kolkata' })
		expect(merged.end).toEqual({ dateTime: 'T2', timeZone: 'UTC' })
	})

	it('should never overwrite an existing timezone through backfill', () => {
		const merged = mergeMeetingUpdate(existing, { timeZone: 'Asia/Kolkata' })

		expect(merged.start).toEqual({ dateTime: 'T1', timeZone: 'UTC' })
		expect(merged.end).toEqual({ dateTime: 'T2', timeZone: 'UTC' })
	})

	it('should set the timezone on a retimed side', () => {
		const merged = mergeMeetingUpdate(existing, {
			startTime: '2026-04-01T10:00:00+09:00',
			timeZone: 'Asia/Tokyo',
		})

		expect(merged.start).toEqual({ dateTime: '2026-04-01T10:00:00+09:00', timeZone: 'Asia/Tokyo' })
		expect(merged.end).toEqual({ dateTime: 'T2', timeZone: 'UTC' })
	})

	it('should fall back to UTC for a retimed side when no timezone is given', () => {
		const event: MeetingEvent = {
			start: { dateTime: 'T1', timeZone: 'Asia/Tokyo' },
			end: { dateTime: 'T2' },
		}

		const merged = mergeMeetingUpdate(event, { endTime: 'T3' })

		expect(merged.start).toEqual({ dateTime: 'T1', timeZone: 'Asia/Tokyo' })
		expect(merged.end).toEqual({ dateTime: 'T3', timeZone: 'UTC' })
	})

	it('should create missing start and end structures', () => {
		const merged = mergeMeetingUpdate(
			{ summary: 'Bare' },
			{ startTime: 'T1', endTime: 'T2', timeZone: 'America/New_York' }
		)

		expect(merged).toEqual({
			summary: 'Bare',
			start: { dateTime: 'T1', timeZone: 'America/New_York' },
			end: { dateTime: 'T2', timeZone: 'America/New_York' },
		})
	})

	it('should leave attendees and conferenceData untouched', () => {
		const event: MeetingEvent = {
			...withVideo('evt-3', MEET_URI),
			attendees: [{ email: 'alice@example.com', responseStatus: 'accepted' }],
		}

		const merged = mergeMeetingUpdate(event, { description: 'New agenda' })

		expect(merged.attendees).toBe(event.attendees)
		expect(merged.conferenceData).toBe(event.conferenceData)
		expect(merged.description).toBe('New agenda')
	})
})

describe('extractMeetLink', () => {
	it('should prefer the video entry point over the legacy field', () => {
		const event: MeetingEvent = { ...withVideo('evt-1', MEET_URI), hangoutLink: LEGACY_URI }

		expect(extractMeetLink(event)).toBe(MEET_URI)
	})

	it('should fall back to hangoutLink without conferenceData', () => {
		expect(extractMeetLink({ hangoutLink: LEGACY_URI })).toBe(LEGACY_URI)
	})

	it('should fall back to hangoutLink when no entry point is a video one', () => {
		const event: MeetingEvent = {
			hangoutLink: LEGACY_URI,
			conferenceData: {
				entryPoints: [{ entryPointType: 'phone', uri: 'tel:+1-555-0100' }],
			},
		}

		expect(extractMeetLink(event)).toBe(LEGACY_URI)
	})

	it('should return the first video entry point when there are several', () => {
		const event: MeetingEvent = {
			conferenceData: {
				entryPoints: [
					{ entryPointType: 'more', uri: 'https://tel.meet/more' },
					{ entryPointType: 'video', uri: MEET_URI },
					{ entryPointType: 'video', uri: 'https://meet.google.com/second' },
				],
			},
		}

		expect(extractMeetLink(event)).toBe(MEET_URI)
	})

	it('should return undefined when there is no link at all', () => {
		expect(extractMeetLink({ summary: 'Lunch' })).toBeUndefined()
		expect(extractMeetLink({ conferenceData: {} })).toBeUndefined()
	})
})

describe('projectMeetings', () => {
	const events: MeetingEvent[] = [
		withVideo('1', 'https://meet.google.com/one'),
		{ id: '2', summary: 'Meeting 2' },
		withVideo('3', 'https://meet.google.com/three'),
		{ id: '4', summary: 'Meeting 4' },
		{ id: '5', summary: 'Meeting 5', hangoutLink: 'https://meet.google.com/five' },
	]

	it('should keep only linked events, in order', () => {
		const summaries = projectMeetings(events, true)

		expect(summaries.map((summary) => summary.eventId)).toEqual(['1', '3', '5'])
		expect(summaries[2].meetLink).toBe('https://meet.google.com/five')
	})

	it('should keep link-less events with a null meetLink when not filtering', () => {
		const summaries = projectMeetings(events, false)

		expect(summaries.map((summary) => summary.eventId)).toEqual(['1', '2', '3', '4', '5'])
		expect(summaries[1]).toEqual({
			eventId: '2',
			summary: 'Meeting 2',
			start: null,
			end: null,
			meetLink: null,
			htmlLink: null,
		})
	})

	it('should project the compact summary shape', () => {
		const event: MeetingEvent = {
			...withVideo('9', MEET_URI),
			start: { dateTime: '2026-03-01T10:00:00Z', timeZone: 'UTC' },
			end: { dateTime: '2026-03-01T11:00:00Z', timeZone: 'UTC' },
			description: 'not projected',
		}

		expect(projectMeetings([event], true)).toEqual([
			{
				eventId: '9',
				summary: 'Meeting 9',
				start: { dateTime: '2026-03-01T10:00:00Z', timeZone: 'UTC' },
				end: { dateTime: '2026-03-01T11:00:00Z', timeZone: 'UTC' },
				meetLink: MEET_URI,
				htmlLink: 'https://calendar.google.com/event?eid=9',
			},
		])
	})
})

describe('summarizeCreatedMeeting', () => {
	it('should report both the Meet link and the legacy hangoutLink', () => {
		const event: MeetingEvent = {
			...withVideo('evt-7', MEET_URI),
			hangoutLink: LEGACY_URI,
			start: { dateTime: 'T1', timeZone: 'UTC' },
			end: { dateTime: 'T2', timeZone: 'UTC' },
		}

		expect(summarizeCreatedMeeting(event)).toEqual({
			eventId: 'evt-7',
			htmlLink: 'https://calendar.google.com/event?eid=evt-7',
			hangoutLink: LEGACY_URI,
			meetLink: MEET_URI,
			summary: 'Meeting evt-7',
			start: { dateTime: 'T1', timeZone: 'UTC' },
			end: { dateTime: 'T2', timeZone: 'UTC' },
		})
	})
})

describe('getDefaultTimeRange', () => {
	it('should span the given number of days from now', () => {
		const now = new Date('2026-03-01T12:00:00.000Z')

		expect(getDefaultTimeRange(now, 7)).toEqual({
			timeMin: '2026-03-01T12:00:00.000Z',
			timeMax: '2026-03-08T12:00:00.000Z',
		})
	})
})

describe('extractErrorMessage', () => {
	it('should read messages from errors and strings', () => {
		expect(extractErrorMessage(new Error('Not Found'))).toBe('Not Found')
		expect(extractErrorMessage('quota exceeded')).toBe('quota exceeded')
		expect(extractErrorMessage({ status: 500 })).toBe('An unknown error occurred')
	})
})

describe('isTokenExpired', () => {
	it('should compare the expiry against the current time', () => {
		expect(isTokenExpired(undefined, 1_000)).toBe(false)
		expect(isTokenExpired(999, 1_000)).toBe(true)
		expect(isTokenExpired(1_001, 1_000)).toBe(false)
	})
})
