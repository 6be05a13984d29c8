export function logEvent(event: string, payload: Record<string, unknown>): void {
	console.log(
		JSON.stringify({
			event,
			timestamp: new Date().toISOString(),
			...payload,
		}),
	)
}

export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}
	return String(error)
}
