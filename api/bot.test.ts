import { Api } from "grammy"
import { beforeEach, describe, expect, test, vi } from "vitest"

import { STORAGE_FAILURE_REPLY, StorageError } from "../lib/errors"
import { handleBotError, installFloodControl } from "./bot"

describe("installFloodControl", () => {
	test("waits out 429 responses before giving up on a call", async () => {
		const floodWait = {
			ok: false as const,
			error_code: 429,
			description: "Too Many Requests: retry after 0",
			parameters: { retry_after: 0 },
		}
		const chatNotFound = { ok: false as const, error_code: 400, description: "Bad Request: chat not found" }
		const responses = [floodWait, floodWait]
		const transport = vi.fn(async () => responses.shift() ?? chatNotFound)

		const api = new Api("test-token")
		api.config.use(transport)
		installFloodControl(api)

		await expect(api.sendMessage(-100500, "mirror")).rejects.toThrow("Bad Request: chat not found")
		expect(transport).toHaveBeenCalledTimes(3)
	})
})

describe("handleBotError", () => {
	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => undefined)
	})

	function failedUpdate(kind: "message" | "callback") {
		return {
			error: new StorageError("isBanned", "fetch failed"),
			ctx: {
				callbackQuery: kind === "callback" ? { id: "cb-1" } : undefined,
				chat: { id: 42 },
				answerCallbackQuery: vi.fn(async (_other: { text: string; show_alert: boolean }) => true),
				reply: vi.fn(async (_text: string) => undefined),
			},
		}
	}

	test("replies with the storage failure notice to a message", async () => {
		const failed = failedUpdate("message")

		await handleBotError(failed)

		expect(failed.ctx.reply).toHaveBeenCalledWith(STORAGE_FAILURE_REPLY)
		expect(failed.ctx.answerCallbackQuery).not.toHaveBeenCalled()
	})

	test("answers a button press with an alert instead", async () => {
		const failed = failedUpdate("callback")

		await handleBotError(failed)

		expect(failed.ctx.answerCallbackQuery).toHaveBeenCalledWith({ text: STORAGE_FAILURE_REPLY, show_alert: true })
		expect(failed.ctx.reply).not.toHaveBeenCalled()
	})

	test("a failing notice is logged, not thrown", async () => {
		const failed = failedUpdate("message")
		failed.ctx.reply.mockRejectedValueOnce(new Error("Forbidden: bot was blocked by the user"))

		await expect(handleBotError(failed)).resolves.toBeUndefined()
		expect(console.error).toHaveBeenCalledWith("bot_error_reply_error", expect.any(Error))
	})
})
