import type { CallbackAction } from "../api/modules/types"

export type Participant = {
	id: number
	first_name?: string
	last_name?: string
	username?: string
}

const CALLBACK_TAGS = new Map<string, CallbackAction["kind"]>([
	["del", "delete"],
	["ban", "ban"],
])

const CALLBACK_PREFIXES: Record<CallbackAction["kind"], string> = {
	delete: "del",
	ban: "ban",
}

type NameParts = {
	first_name?: string | null
	last_name?: string | null
	username?: string | null
}

export function getParticipantName(user: NameParts | undefined): string {
	if (!user) {
		return "Unknown"
	}
	const fullName = [user.first_name, user.last_name].filter(Boolean).join(" ").trim()
	if (fullName) {
		return fullName
	}
	if (user.username) {
		return user.username
	}
	return "Unknown"
}

export function escapeHtml(value: string): string {
	return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;")
}

export function userProfileUrl(userId: number): string {
	return `tg://user?id=${userId}`
}

export function userMentionHtml(user: Participant): string {
	return `<a href="${userProfileUrl(user.id)}">${escapeHtml(getParticipantName(user))}</a>`
}

// Only public @channels have t.me message links.
export function buildChannelLink(channelUsername: string, messageId: number): string | null {
	if (!channelUsername.startsWith("@") || channelUsername.length < 2) {
		return null
	}
	return `https://t.me/${channelUsername.slice(1)}/${messageId}`
}

export function encodeCallbackAction(action: CallbackAction): string {
	return `${CALLBACK_PREFIXES[action.kind]}:${action.recordId}`
}

export function parseCallbackAction(data: string): CallbackAction | null {
	const parts = data.split(":")
	if (parts.length !== 2) {
		return null
	}

	const kind = CALLBACK_TAGS.get(parts[0])
	if (kind === undefined) {
		return null
	}

	const recordId = Number(parts[1])
	if (!/^\d+$/.test(parts[1]) || !Number.isSafeInteger(recordId)) {
		return null
	}

	return { kind, recordId }
}

// Lengths are UTF-16 units, as Telegram counts them. The cut never leaves a
// lone high surrogate.
export function truncate(value: string, maxLength: number): string {
	if (value.length <= maxLength) {
		return value
	}
	let end = maxLength - 1
	if (isHighSurrogate(value.charCodeAt(end - 1))) {
		end -= 1
	}
	return `${value.slice(0, end)}…`
}

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff
}

// A line longer than `limit` becomes its own message.
export function chunkLines(lines: string[], limit: number): string[] {
	const chunks: string[] = []
	let chunk = ""
	for (const line of lines) {
		if (chunk && chunk.length + line.length + 1 > limit) {
			chunks.push(chunk)
			chunk = line
		} else {
			chunk = chunk ? `${chunk}\n${line}` : line
		}
	}
	if (chunk) {
		chunks.push(chunk)
	}
	return chunks
}
