import { createClient } from "@supabase/supabase-js"

import { loadConfig } from "../lib/config"
import { logEvent } from "../lib/logger"
import { withBackoff } from "../lib/retry"
import { createBot } from "./bot"
import { createModerationRepository } from "./modules/moderation-repository"
import { createSettingsRepository } from "./modules/settings-repository"
import { WEBHOOK_PATH, createServer } from "./server"

async function main(): Promise<void> {
	const config = loadConfig()
	const supabase = createClient(config.supabaseUrl, config.supabaseKey)
	const settings = createSettingsRepository(supabase, config.tables.settings)
	const moderation = createModerationRepository(supabase, {
		moderationTable: config.tables.moderation,
		bansTable: config.tables.bans,
	})

	if (await settings.checkConnection()) {
		await settings.seedSetting("CHANNEL_USERNAME", config.defaultChannel)
		logEvent("store_ready", { tables: config.tables })
	} else {
		logEvent("store_unreachable", { hint: "run supabase/schema.sql in the Supabase SQL editor" })
	}

	const bot = createBot(config, { settings, moderation })
	await bot.init()

	const webhookUrl = `${config.baseUrl}${WEBHOOK_PATH}`
	await withBackoff(
		() =>
			bot.api.setWebhook(webhookUrl, {
				allowed_updates: ["message", "callback_query"],
				drop_pending_updates: true,
				secret_token: config.webhookSecret,
			}),
		{ label: "set_webhook", attempts: 5, baseDelayMs: 1_000, maxDelayMs: 30_000 },
	)
	logEvent("webhook_registered", { webhookUrl, bot: bot.botInfo.username })

	const app = createServer({
		handleUpdate: update => bot.handleUpdate(update),
		botTokenSet: Boolean(config.botToken),
		webhookSecret: config.webhookSecret,
	})
	app.listen(config.port, () => {
		logEvent("server_started", { port: config.port, webhookPath: WEBHOOK_PATH })
	})
}

main().catch(error => {
	console.error("startup_failed", error)
	process.exit(1)
})
