export class StorageError extends Error {
	readonly operation: string

	constructor(operation: string, cause: string) {
		super(`storage failure in ${operation}: ${cause}`)
		this.name = "StorageError"
		this.operation = operation
	}
}

export const STORAGE_FAILURE_REPLY = "⚠️ Something went wrong, please try again later."
