import type { Composer, Context } from "grammy"

import type { ModerationRepository } from "../api/modules/moderation-repository"
import { parseChatId } from "../api/modules/settings-repository"
import type { SettingsRepository } from "../api/modules/settings-repository"
import type { MessageType } from "../api/modules/types"
import { STORAGE_FAILURE_REPLY } from "./errors"
import { moderationKeyboard } from "./keyboards"
import { describeError, logEvent } from "./logger"
import { classifyMessage, isCommandMessage } from "./message-kind"
import type { ClassifiableMessage } from "./message-kind"
import type { BotGateway } from "./telegram-gateway"
import { buildChannelLink, escapeHtml, truncate, userMentionHtml } from "./utils"
import type { Participant } from "./utils"
import { runStep } from "./workflow"
import type { WorkflowStep } from "./workflow"

// Visible body budget, leaving room for the header under Telegram's 4096/1024 limits.
const TEXT_BODY_LIMIT = 3500
const CAPTION_BODY_LIMIT = 700

export const RELAY_REPLIES = {
	banned: "🚫 You are banned from submitting messages.",
	noGroup: "⚠️ The admin group isn't set yet. Ask an admin to run /setgroup in the group.",
	groupFailed: "I couldn't post to the admin group. Is the bot in that group?",
	relayed: "✅ Your message was sent anonymously.",
} as const

const STEPS = {
	copyToChannel: { name: "copy_to_channel", policy: "required" },
	postToGroup: { name: "post_to_group", policy: "required" },
	insertRecord: { name: "insert_moderation_record", policy: "required" },
	attachControls: { name: "attach_group_controls", policy: "best-effort" },
} as const satisfies Record<string, WorkflowStep>

export type SubmissionInput = {
	chatId: number
	messageId: number
	sender: Participant
	message: ClassifiableMessage
}

export type RelayDeps = {
	settings: Pick<SettingsRepository, "getSetting">
	moderation: Pick<ModerationRepository, "isBanned" | "insertModerationRecord">
	gateway: BotGateway
	defaultChannel: string
}

export type RelayOutcome =
	| { status: "banned" }
	| { status: "no_group" }
	| { status: "channel_failed" }
	| { status: "group_failed"; channelMessageId: number }
	| { status: "store_failed"; channelMessageId: number; groupMessageId: number }
	| { status: "relayed"; recordId: number; channelMessageId: number; groupMessageId: number }

export function registerSubmissionHandler(composer: Composer<Context>, deps: RelayDeps): void {
	composer.chatType("private").on("message", async ctx => {
		const message = ctx.message
		const sender = ctx.from
		if (sender === undefined || isCommandMessage(message)) {
			return
		}

		await relaySubmission({ chatId: ctx.chat.id, messageId: message.message_id, sender, message }, deps)
	})
}

// A failed step does not undo the ones before it.
export async function relaySubmission(input: SubmissionInput, deps: RelayDeps): Promise<RelayOutcome> {
	const { chatId, sender } = input
	const reply = (text: string) => deps.gateway.sendMessage(chatId, text)

	if (await deps.moderation.isBanned(sender.id)) {
		await reply(RELAY_REPLIES.banned)
		logEvent("submission_rejected_banned", { userId: sender.id })
		return { status: "banned" }
	}

	const channelUsername = (await deps.settings.getSetting("CHANNEL_USERNAME")) ?? deps.defaultChannel
	const groupId = parseChatId(await deps.settings.getSetting("GROUP_CHAT_ID"))
	if (groupId === null) {
		await reply(RELAY_REPLIES.noGroup)
		return { status: "no_group" }
	}

	const { messageType, contentText, mediaFileId } = classifyMessage(input.message)

	const channelCopy = await runStep(STEPS.copyToChannel, () =>
		deps.gateway.copyMessage(channelUsername, chatId, input.messageId),
	)
	if (!channelCopy.ok) {
		await reply(`❌ Couldn't post to channel.\nChannel: ${channelUsername}\nError: ${describeError(channelCopy.error)}`)
		return { status: "channel_failed" }
	}
	const channelMessageId = channelCopy.value

	const groupPost = await runStep(STEPS.postToGroup, () => {
		if (messageType === "text") {
			const text = buildGroupMirrorText(sender, messageType, contentText, TEXT_BODY_LIMIT)
			return deps.gateway.sendMessage(groupId, text, { parseMode: "HTML" })
		}
		const caption = buildGroupMirrorText(sender, messageType, contentText, CAPTION_BODY_LIMIT)
		return deps.gateway.copyMessage(groupId, chatId, input.messageId, { caption, parseMode: "HTML" })
	})
	if (!groupPost.ok) {
		await reply(RELAY_REPLIES.groupFailed)
		logEvent("submission_channel_post_orphaned", { userId: sender.id, channelUsername, channelMessageId })
		return { status: "group_failed", channelMessageId }
	}
	const groupMessageId = groupPost.value

	const inserted = await runStep(STEPS.insertRecord, () =>
		deps.moderation.insertModerationRecord({
			userId: sender.id,
			username: sender.username ?? null,
			firstName: sender.first_name ?? null,
			lastName: sender.last_name ?? null,
			messageType,
			contentText,
			mediaFileId,
			channelUsername,
			channelMessageId,
			groupMessageId,
		}),
	)
	if (!inserted.ok) {
		await reply(STORAGE_FAILURE_REPLY)
		return { status: "store_failed", channelMessageId, groupMessageId }
	}
	const recordId = inserted.value

	await runStep(STEPS.attachControls, () =>
		deps.gateway.setReplyMarkup(
			groupId,
			groupMessageId,
			moderationKeyboard({
				recordId,
				userId: sender.id,
				channelLink: buildChannelLink(channelUsername, channelMessageId),
			}),
		),
	)

	await reply(RELAY_REPLIES.relayed)
	logEvent("submission_relayed", { recordId, messageType, channelMessageId, groupMessageId })
	return { status: "relayed", recordId, channelMessageId, groupMessageId }
}

export function buildGroupMirrorText(
	sender: Participant,
	messageType: MessageType,
	contentText: string | null,
	bodyLimit: number,
): string {
	const body = escapeHtml(truncate(contentText ?? "(no text)", bodyLimit))
	return [
		"<b>New submission</b>",
		`👤 ${userMentionHtml(sender)}  (<code>${sender.id}</code>)`,
		`🧾 Type: <code>${messageType}</code>`,
		"",
		"<b>Message:</b>",
		body,
	].join("\n")
}
