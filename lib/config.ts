import { config } from "dotenv"
import { existsSync } from "fs"
import { resolve } from "path"

const DEFAULT_CHANNEL = "@anonymous_channel"
const DEFAULT_BASE_URL = "http://localhost:8080"

export type StoreTables = {
	settings: string
	moderation: string
	bans: string
}

export type BotConfig = {
	botToken: string
	defaultChannel: string
	adminIds: Set<number>
	supabaseUrl: string
	supabaseKey: string
	tables: StoreTables
	baseUrl: string
	port: number
	webhookSecret: string | undefined
}

export function loadConfig(): BotConfig {
	const envPaths = [resolve(process.cwd(), ".env"), resolve(process.cwd(), "../.env")]
	for (const envPath of envPaths) {
		if (existsSync(envPath)) {
			config({ path: envPath })
			break
		}
	}

	const botToken = process.env.BOT_TOKEN
	const defaultChannel = (process.env.DEFAULT_CHANNEL ?? DEFAULT_CHANNEL).trim()
	const adminIds = new Set<number>(parseUserIds(process.env.ADMIN_IDS))
	const supabaseUrl = process.env.SUPABASE_URL
	const supabaseKey = process.env.SUPABASE_SERVICE_ROLE_KEY
	const baseUrl = (process.env.BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, "")
	const port = Number(process.env.PORT ?? "8080")
	const webhookSecret = process.env.WEBHOOK_SECRET || undefined

	const tables: StoreTables = {
		settings: process.env.SUPABASE_SETTINGS_TABLE ?? "settings",
		moderation: process.env.SUPABASE_MODERATION_TABLE ?? "moderation",
		bans: process.env.SUPABASE_BANS_TABLE ?? "bans",
	}

	if (!botToken) {
		throw new Error("BOT_TOKEN is missing. Put it in .env and restart the bot.")
	}

	if (!supabaseUrl || !supabaseKey) {
		throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required in .env.")
	}

	if (!defaultChannel.startsWith("@") || defaultChannel.length < 2) {
		throw new Error("DEFAULT_CHANNEL must be a public @channel username.")
	}

	if (!Number.isInteger(port) || port <= 0) {
		throw new Error("PORT must be an integer > 0")
	}

	return {
		botToken,
		defaultChannel,
		adminIds,
		supabaseUrl,
		supabaseKey,
		tables,
		baseUrl,
		port,
		webhookSecret,
	}
}

export function parseUserIds(raw: string | undefined): number[] {
	if (!raw) {
		return []
	}

	return raw
		.split(",")
		.map(value => Number(value.trim()))
		.filter(value => Number.isInteger(value) && value > 0)
}
