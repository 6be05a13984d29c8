import { autoRetry } from "@grammyjs/auto-retry"
import { Bot } from "grammy"
import type { Api, Context } from "grammy"

import type { BotConfig } from "../lib/config"
import { STORAGE_FAILURE_REPLY } from "../lib/errors"
import { createPermissionOracle } from "../lib/permissions"
import { registerSubmissionHandler } from "../lib/submission-handler"
import { createBotGateway } from "../lib/telegram-gateway"
import { registerCallbackHandler } from "./modules/callback-handler"
import { registerCommands } from "./modules/commands"
import { createImageLoader } from "./modules/export"
import type { ModerationRepository } from "./modules/moderation-repository"
import type { SettingsRepository } from "./modules/settings-repository"

type BotDeps = {
	settings: SettingsRepository
	moderation: ModerationRepository
}

export function createBot(config: BotConfig, deps: BotDeps): Bot<Context> {
	const bot = new Bot<Context>(config.botToken)
	installFloodControl(bot.api)
	const gateway = createBotGateway(bot.api, config.botToken)
	const permissions = createPermissionOracle({ adminIds: config.adminIds, settings: deps.settings, gateway })

	// Errors from any handler stop here instead of failing the webhook request.
	const handlers = bot.errorBoundary(handleBotError)

	registerCommands(handlers, {
		settings: deps.settings,
		moderation: deps.moderation,
		permissions,
		gateway,
		loadImage: createImageLoader(gateway),
	})
	registerCallbackHandler(handlers, { moderation: deps.moderation, permissions, gateway })
	registerSubmissionHandler(handlers, {
		settings: deps.settings,
		moderation: deps.moderation,
		gateway,
		defaultChannel: config.defaultChannel,
	})

	return bot
}

// Every outgoing call waits out Telegram's flood-control `retry_after`.
export function installFloodControl(api: Api): void {
	api.config.use(autoRetry({ maxRetryAttempts: 3, maxDelaySeconds: 60 }))
}

type FailedUpdate = {
	error: unknown
	ctx: {
		callbackQuery?: unknown
		chat?: unknown
		answerCallbackQuery(other: { text: string; show_alert: boolean }): Promise<unknown>
		reply(text: string): Promise<unknown>
	}
}

export async function handleBotError(err: FailedUpdate): Promise<void> {
	const ctx = err.ctx
	console.error("bot_update_error", err.error)

	try {
		if (ctx.callbackQuery) {
			await ctx.answerCallbackQuery({ text: STORAGE_FAILURE_REPLY, show_alert: true })
		} else if (ctx.chat) {
			await ctx.reply(STORAGE_FAILURE_REPLY)
		}
	} catch (error) {
		console.error("bot_error_reply_error", error)
	}
}
