import { InlineKeyboard } from "grammy"

import { encodeCallbackAction, userProfileUrl } from "./utils"

// Telegram rejects URL buttons with an empty link.
export const CHANNEL_LINK_PLACEHOLDER = "https://t.me/\u200b"

export function moderationKeyboard(input: { recordId: number; userId: number; channelLink: string | null }): InlineKeyboard {
	return new InlineKeyboard()
		.text("🗑", encodeCallbackAction({ kind: "delete", recordId: input.recordId }))
		.text("🚫", encodeCallbackAction({ kind: "ban", recordId: input.recordId }))
		.row()
		.url("👤 Username", userProfileUrl(input.userId))
		.url("🔗 View in Channel", input.channelLink ?? CHANNEL_LINK_PLACEHOLDER)
}

export function afterDeleteKeyboard(input: { recordId: number; userId: number }): InlineKeyboard {
	return new InlineKeyboard()
		.text("🚫", encodeCallbackAction({ kind: "ban", recordId: input.recordId }))
		.row()
		.url("👤 Username", userProfileUrl(input.userId))
}
