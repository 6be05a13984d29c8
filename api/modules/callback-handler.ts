import type { Composer, Context } from "grammy"

import { afterDeleteKeyboard } from "../../lib/keyboards"
import { logEvent } from "../../lib/logger"
import type { PermissionOracle } from "../../lib/permissions"
import type { BotGateway } from "../../lib/telegram-gateway"
import { parseCallbackAction } from "../../lib/utils"
import { runStep } from "../../lib/workflow"
import type { WorkflowStep } from "../../lib/workflow"
import type { ModerationRepository } from "./moderation-repository"
import type { ModerationRecord } from "./types"

export const BAN_REASON = "Admin ban"
export const BANNED_NOTICE = "🚫 You have been banned from submitting messages to this bot."

const STEPS = {
	deleteChannelPost: { name: "delete_channel_post", policy: "best-effort" },
	saveBan: { name: "save_ban", policy: "required" },
	notifyBannedUser: { name: "notify_banned_user", policy: "best-effort" },
	refreshControls: { name: "refresh_group_controls", policy: "best-effort" },
} as const satisfies Record<string, WorkflowStep>

type CallbackHandlerDeps = {
	moderation: Pick<ModerationRepository, "getModerationRecord" | "ban">
	permissions: Pick<PermissionOracle, "canModerateIn">
	gateway: BotGateway
}

export type ModerationPress = {
	data: string
	requesterId: number
	/** The group message carrying the buttons, absent when Telegram no longer exposes it. */
	groupMessage: { chatId: number; messageId: number } | undefined
}

export type CallbackAnswer = {
	text?: string
	showAlert?: boolean
}

export function registerCallbackHandler(composer: Composer<Context>, deps: CallbackHandlerDeps): void {
	composer.on("callback_query:data", async ctx => {
		const message = ctx.callbackQuery.message
		const answer = await handleModerationPress(
			{
				data: ctx.callbackQuery.data,
				requesterId: ctx.callbackQuery.from.id,
				groupMessage: message ? { chatId: message.chat.id, messageId: message.message_id } : undefined,
			},
			deps,
		)
		await ctx.answerCallbackQuery({ text: answer.text, show_alert: answer.showAlert })
	})
}

export async function handleModerationPress(press: ModerationPress, deps: CallbackHandlerDeps): Promise<CallbackAnswer> {
	const action = parseCallbackAction(press.data)
	if (!action) {
		return {}
	}

	if (!(await deps.permissions.canModerateIn(press.groupMessage?.chatId, press.requesterId))) {
		return { text: "Admins only.", showAlert: true }
	}

	const setControls = (keyboard: Parameters<BotGateway["setReplyMarkup"]>[2]) =>
		runStep(STEPS.refreshControls, async () => {
			if (press.groupMessage) {
				await deps.gateway.setReplyMarkup(press.groupMessage.chatId, press.groupMessage.messageId, keyboard)
			}
		})

	const record = await deps.moderation.getModerationRecord(action.recordId)
	if (!record) {
		await setControls(null)
		return {}
	}

	if (action.kind === "delete") {
		const deleted = await deleteChannelPost(record, deps.gateway)
		await setControls(afterDeleteKeyboard({ recordId: record.id, userId: record.userId }))
		logEvent("channel_post_deleted_by_admin", { recordId: record.id, adminId: press.requesterId, deleted })
		return { text: deleted ? "Deleted in channel" : "Couldn't delete (maybe already deleted)" }
	}

	const saved = await runStep(STEPS.saveBan, () => deps.moderation.ban(record.userId, BAN_REASON))
	if (!saved.ok) {
		return { text: "⚠️ Couldn't save the ban, try again.", showAlert: true }
	}

	const deleted = await deleteChannelPost(record, deps.gateway)
	const notified = await runStep(STEPS.notifyBannedUser, () => deps.gateway.sendMessage(record.userId, BANNED_NOTICE))
	await setControls(null)
	logEvent("user_banned_by_admin", {
		recordId: record.id,
		userId: record.userId,
		adminId: press.requesterId,
		channelPostDeleted: deleted,
		userNotified: notified.ok,
	})
	return { text: "User banned & post removed" }
}

async function deleteChannelPost(record: ModerationRecord, gateway: BotGateway): Promise<boolean> {
	const result = await runStep(STEPS.deleteChannelPost, () =>
		gateway.deleteMessage(record.channelUsername, record.channelMessageId),
	)
	return result.ok
}
