import express from "express"
import type { Express } from "express"
import type { Bot } from "grammy"

import { describeError, logEvent } from "../lib/logger"

export const WEBHOOK_PATH = "/webhook/telegram"
const SECRET_HEADER = "x-telegram-bot-api-secret-token"

type Update = Parameters<Bot["handleUpdate"]>[0]

type ServerDeps = {
	handleUpdate: (update: Update) => Promise<void>
	botTokenSet: boolean
	webhookSecret: string | undefined
}

// Telegram redelivers anything but a 200, so failures go in the body.
export function createServer(deps: ServerDeps): Express {
	const app = express()
	app.use(express.json({ limit: "1mb" }))

	app.post(WEBHOOK_PATH, async (req, res) => {
		if (deps.webhookSecret !== undefined && req.get(SECRET_HEADER) !== deps.webhookSecret) {
			res.status(200).json({ ok: false, error: "unauthorized" })
			return
		}

		const update: unknown = req.body
		if (!isUpdate(update)) {
			res.status(200).json({ ok: false, error: "invalid update payload" })
			return
		}

		try {
			await deps.handleUpdate(update)
			res.status(200).json({ ok: true })
		} catch (error) {
			console.error("webhook_update_error", error)
			logEvent("webhook_update_failed", { updateId: update.update_id, error: describeError(error) })
			res.status(200).json({ ok: false, error: describeError(error) })
		}
	})

	app.get("/health", (_req, res) => {
		res.json({ status: "ok", bot_token_set: deps.botTokenSet })
	})

	app.get("/", (_req, res) => {
		res.json({
			name: "Anonymous Relay Bot",
			mode: "webhook",
			webhook_path: WEBHOOK_PATH,
			health: "/health",
		})
	})

	return app
}

function isUpdate(value: unknown): value is Update {
	return typeof value === "object" && value !== null && "update_id" in value && typeof value.update_id === "number"
}
