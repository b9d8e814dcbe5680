/**
 * Error handling utilities and custom error classes
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { MeetingToolName } from './constants.js'
import { HTTP_STATUS, TOOL_FAILURE_PREFIXES } from './constants.js'
import { extractErrorMessage } from './utils.js'

/**
 * Base error class for the MCP server
 */
export class MCPServerError extends Error {
	public readonly code: string
	public readonly statusCode: number
	public readonly details?: Record<string, unknown>

	constructor(
		message: string,
		code: string = 'MCP_SERVER_ERROR',
		statusCode: number = HTTP_STATUS.INTERNAL_SERVER_ERROR,
		details?: Record<string, unknown>
	) {
		super(message)
		this.name = 'MCPServerError'
		this.code = code
		this.statusCode = statusCode
		this.details = details
	}
}

/**
 * Authentication-related errors
 */
export class AuthenticationError extends MCPServerError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, 'AUTHENTICATION_ERROR', HTTP_STATUS.UNAUTHORIZED, details)
		this.name = 'AuthenticationError'
	}
}

/**
 * A meeting tool that could not complete
 */
export class ToolFailureError extends MCPServerError {
	public readonly operation: MeetingToolName
	public readonly target?: string

	constructor(operation: MeetingToolName, message: string, target?: string) {
		super(message, 'TOOL_FAILED', HTTP_STATUS.INTERNAL_SERVER_ERROR, { operation, target })
		this.name = 'ToolFailureError'
		this.operation = operation
		this.target = target
	}
}

/**
 * Map any failure raised while running a tool to the uniform tool error,
 * e.g. "Failed to delete meeting abc123: Not Found"
 */
export function toToolFailure(
	operation: MeetingToolName,
	cause: unknown,
	target?: string
): ToolFailureError {
	const subject =
		target !== undefined
			? `${TOOL_FAILURE_PREFIXES[operation]} ${target}`
			: TOOL_FAILURE_PREFIXES[operation]
	return new ToolFailureError(operation, `${subject}: ${extractErrorMessage(cause)}`, target)
}

/**
 * Create standardized error response
 */
export function createErrorResponse(error: Error): CallToolResult {
	return {
		content: [{ type: 'text', text: error.message }],
		isError: true,
	}
}

/**
 * Create success response carrying the tool result as JSON
 */
export function createSuccessResponse(data: unknown): CallToolResult {
	return {
		content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
	}
}

/**
 * Run a tool body behind the error boundary. Failures are reported once,
 * never retried.
 */
export async function runTool<T>(
	operation: MeetingToolName,
	target: string | undefined,
	action: () => Promise<T>
): Promise<CallToolResult> {
	try {
		return createSuccessResponse(await action())
	} catch (error) {
		const failure = toToolFailure(operation, error, target)
		console.error(`${operation} failed:`, failure.message)
		return createErrorResponse(failure)
	}
}
