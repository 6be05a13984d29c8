import type { Composer, Context } from "grammy"

import { logEvent } from "../../lib/logger"
import type { PermissionOracle } from "../../lib/permissions"
import type { BotGateway } from "../../lib/telegram-gateway"
import { chunkLines } from "../../lib/utils"
import { deliverSubmissionExport, parseExportTarget } from "./export"
import type { ImageLoader } from "./export"
import type { ModerationRepository } from "./moderation-repository"
import type { SettingsRepository } from "./settings-repository"
import type { SenderSummary } from "./types"

export const REPLY_CHUNK_LIMIT = 3500

export type CommandDeps = {
	settings: Pick<SettingsRepository, "setSetting">
	moderation: Pick<ModerationRepository, "listSubmissions" | "listUniqueSenders" | "stats" | "unban">
	permissions: Pick<PermissionOracle, "isAdmin" | "isGroupAdmin">
	gateway: Pick<BotGateway, "sendDocument">
	loadImage: ImageLoader
}

export type CommandRequest = {
	chatId: number
	chatType: string
	fromId: number | undefined
	args: string
}

type CommandHandler = (request: CommandRequest, deps: CommandDeps) => Promise<string[]>

export const COMMAND_REPLIES = {
	welcome: "👋 Welcome to the anonymous submission bot!\n\nSend me a message and I will post it anonymously to the channel.",
	groupOnly: "Run this inside the admin group.",
	groupAdminsOnly: "Only group admins can do that.",
	adminsOnly: "Admins only.",
	groupRegistered: "✅ This chat is now registered as the admin group.",
	channelUsage: "Usage: /setchannel @ChannelUsername",
	channelInvalid: "Please provide a public @channel username.",
	noUsers: "No users found yet.",
	unbanUsage: "Usage: /unban 123456789",
} as const

const isGroupChat = (request: CommandRequest) => request.chatType === "group" || request.chatType === "supergroup"

async function isGroupAdminRequest(request: CommandRequest, deps: CommandDeps): Promise<boolean> {
	return request.fromId !== undefined && deps.permissions.isGroupAdmin(request.chatId, request.fromId)
}

async function isAdminRequest(request: CommandRequest, deps: CommandDeps): Promise<boolean> {
	return request.fromId !== undefined && deps.permissions.isAdmin(request.fromId)
}

export const commandHandlers: Record<string, CommandHandler> = {
	async start() {
		return [COMMAND_REPLIES.welcome]
	},

	async setgroup(request, deps) {
		if (!isGroupChat(request)) {
			return [COMMAND_REPLIES.groupOnly]
		}
		if (!(await isGroupAdminRequest(request, deps))) {
			return [COMMAND_REPLIES.groupAdminsOnly]
		}

		await deps.settings.setSetting("GROUP_CHAT_ID", String(request.chatId))
		logEvent("admin_group_registered", { chatId: request.chatId, adminId: request.fromId })
		return [COMMAND_REPLIES.groupRegistered]
	},

	async setchannel(request, deps) {
		if (!isGroupChat(request)) {
			return [COMMAND_REPLIES.groupOnly]
		}
		if (!(await isGroupAdminRequest(request, deps))) {
			return [COMMAND_REPLIES.groupAdminsOnly]
		}

		const channel = firstArgument(request.args)
		if (!channel) {
			return [COMMAND_REPLIES.channelUsage]
		}
		if (!channel.startsWith("@") || channel.length < 2) {
			return [COMMAND_REPLIES.channelInvalid]
		}

		await deps.settings.setSetting("CHANNEL_USERNAME", channel)
		logEvent("channel_registered", { channel, adminId: request.fromId })
		return [`✅ Channel set to ${channel}`]
	},

	async stats(_request, deps) {
		const stats = await deps.moderation.stats()
		return [`Total moderated posts: ${stats.totalSubmissions}\nBanned users: ${stats.totalBans}`]
	},

	async user(request, deps) {
		if (!(await isAdminRequest(request, deps))) {
			return [COMMAND_REPLIES.adminsOnly]
		}

		const senders = await deps.moderation.listUniqueSenders()
		if (senders.length === 0) {
			return [COMMAND_REPLIES.noUsers]
		}
		return chunkLines(formatSenderList(senders), REPLY_CHUNK_LIMIT)
	},

	async info(request, deps) {
		if (request.fromId === undefined || !(await deps.permissions.isAdmin(request.fromId))) {
			return [COMMAND_REPLIES.adminsOnly]
		}

		const notice = await exportSubmissions(firstArgument(request.args) ?? "", request.fromId, deps)
		return notice ? [notice] : []
	},

	async unban(request, deps) {
		if (!(await isAdminRequest(request, deps))) {
			return [COMMAND_REPLIES.adminsOnly]
		}

		const raw = firstArgument(request.args) ?? ""
		const userId = Number(raw)
		if (!/^\d+$/.test(raw) || !Number.isSafeInteger(userId)) {
			return [COMMAND_REPLIES.unbanUsage]
		}

		await deps.moderation.unban(userId)
		logEvent("user_unbanned_by_admin", { userId, adminId: request.fromId })
		return [`✅ User ${userId} can submit again.`]
	},
}

export function registerCommands(composer: Composer<Context>, deps: CommandDeps): void {
	for (const [name, handler] of Object.entries(commandHandlers)) {
		composer.command(name, async ctx => {
			const request = { chatId: ctx.chat.id, chatType: ctx.chat.type, fromId: ctx.from?.id, args: ctx.match }
			for (const text of await handler(request, deps)) {
				await ctx.reply(text)
			}
		})
	}
}

export const INFO_REPLIES = {
	usage: "Usage: /info @username or /info 123456789",
	empty: "No submissions found for that user.",
} as const

// Returns the notice to reply with when no file is sent.
export async function exportSubmissions(
	rawTarget: string,
	requesterId: number,
	deps: Pick<CommandDeps, "moderation" | "gateway" | "loadImage">,
): Promise<string | null> {
	const target = parseExportTarget(rawTarget)
	if (!target) {
		return INFO_REPLIES.usage
	}

	const records = await deps.moderation.listSubmissions(target.query)
	if (records.length === 0) {
		return INFO_REPLIES.empty
	}

	await deliverSubmissionExport(
		{ records, label: target.label, requesterId },
		{ gateway: deps.gateway, loadImage: deps.loadImage },
	)
	return null
}

export function formatSenderList(senders: SenderSummary[]): string[] {
	const lines = ["Users who sent messages:"]
	senders.forEach((sender, index) => {
		const username = sender.username ? `@${sender.username.replace(/^@/, "")}` : "-"
		const name = [sender.firstName, sender.lastName].filter(Boolean).join(" ").trim() || "-"
		lines.push(`${index + 1}. ${sender.userId}(ChatID) - ${username}(Username) - ${name}(Profile name)`)
	})
	return lines
}

function firstArgument(match: string): string | null {
	const [first] = match.trim().split(/\s+/)
	return first ? first : null
}
