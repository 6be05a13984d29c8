import type { MessageType } from "../api/modules/types"

type FileRef = { file_id: string }

export type ClassifiableMessage = {
	text?: string
	caption?: string
	photo?: FileRef[]
	video?: FileRef
	voice?: FileRef
	animation?: FileRef
	sticker?: FileRef
	document?: FileRef
	entities?: { type: string; offset: number }[]
}

export type MessageClassification = {
	messageType: MessageType
	contentText: string | null
	mediaFileId: string | null
}

// Animations also carry a `document`, so they are matched first. Photo
// sizes arrive smallest first.
export function classifyMessage(message: ClassifiableMessage): MessageClassification {
	const contentText = message.text ?? message.caption ?? null

	if (message.text !== undefined) {
		return { messageType: "text", contentText, mediaFileId: null }
	}
	if (message.photo && message.photo.length > 0) {
		return { messageType: "photo", contentText, mediaFileId: message.photo[message.photo.length - 1].file_id }
	}
	if (message.video) {
		return { messageType: "video", contentText, mediaFileId: message.video.file_id }
	}
	if (message.voice) {
		return { messageType: "voice", contentText, mediaFileId: message.voice.file_id }
	}
	if (message.animation) {
		return { messageType: "animation", contentText, mediaFileId: message.animation.file_id }
	}
	if (message.sticker) {
		return { messageType: "sticker", contentText, mediaFileId: message.sticker.file_id }
	}
	if (message.document) {
		return { messageType: "document", contentText, mediaFileId: message.document.file_id }
	}
	return { messageType: "other", contentText, mediaFileId: null }
}

export function isCommandMessage(message: ClassifiableMessage): boolean {
	return (message.entities ?? []).some(entity => entity.type === "bot_command" && entity.offset === 0)
}
