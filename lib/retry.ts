import { GrammyError } from "grammy"

import { describeError, logEvent } from "./logger"

export type BackoffOptions = {
	label: string
	attempts: number
	baseDelayMs: number
	maxDelayMs: number
	sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

export async function withBackoff<T>(fn: () => Promise<T>, options: BackoffOptions): Promise<T> {
	const sleep = options.sleep ?? defaultSleep
	let lastError: unknown

	for (let attempt = 1; attempt <= options.attempts; attempt += 1) {
		try {
			return await fn()
		} catch (error) {
			lastError = error
			if (attempt === options.attempts) {
				break
			}

			const delayMs = retryAfterMs(error) ?? backoffDelayMs(attempt, options)
			logEvent("retry_scheduled", { label: options.label, attempt, delayMs, error: describeError(error) })
			await sleep(delayMs)
		}
	}

	throw lastError
}

export function backoffDelayMs(attempt: number, options: Pick<BackoffOptions, "baseDelayMs" | "maxDelayMs">): number {
	return Math.min(options.baseDelayMs * 2 ** (attempt - 1), options.maxDelayMs)
}

// Telegram answers 429 with parameters.retry_after in seconds.
export function retryAfterMs(error: unknown): number | null {
	if (!(error instanceof GrammyError) || error.error_code !== 429) {
		return null
	}
	const retryAfter = error.parameters.retry_after
	return retryAfter === undefined ? null : retryAfter * 1000
}
