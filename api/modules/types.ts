export const MESSAGE_TYPES = ["text", "photo", "video", "voice", "animation", "sticker", "document", "other"] as const

export type MessageType = (typeof MESSAGE_TYPES)[number]

export type SettingKey = "CHANNEL_USERNAME" | "GROUP_CHAT_ID"

export type ModerationRecord = {
	id: number
	userId: number
	username: string | null
	firstName: string | null
	lastName: string | null
	messageType: MessageType
	contentText: string | null
	mediaFileId: string | null
	channelUsername: string
	channelMessageId: number
	groupMessageId: number
	createdAt: string
}

export type NewModerationRecord = Omit<ModerationRecord, "id" | "createdAt">

export type SenderSummary = {
	userId: number
	username: string | null
	firstName: string | null
	lastName: string | null
	lastSubmittedAt: string
}

export type SubmissionQuery = { userId: number } | { username: string }

export type StoreStats = {
	totalSubmissions: number
	totalBans: number
}

export type CallbackAction = { kind: "delete"; recordId: number } | { kind: "ban"; recordId: number }
