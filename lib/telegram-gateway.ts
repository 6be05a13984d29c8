import { InputFile } from "grammy"
import type { Api, InlineKeyboard } from "grammy"

export type ChatRef = number | string

export type DownloadedFile = {
	data: Buffer
	filePath: string
}

export type BotGateway = {
	copyMessage(
		toChat: ChatRef,
		fromChat: number,
		messageId: number,
		options?: { caption?: string; parseMode?: "HTML" },
	): Promise<number>
	sendMessage(chat: ChatRef, text: string, options?: { parseMode?: "HTML" }): Promise<number>
	/** `null` removes the inline keyboard. */
	setReplyMarkup(chat: ChatRef, messageId: number, keyboard: InlineKeyboard | null): Promise<void>
	deleteMessage(chat: ChatRef, messageId: number): Promise<void>
	getChatMemberStatus(chat: ChatRef, userId: number): Promise<string>
	downloadFile(fileId: string): Promise<DownloadedFile>
	sendDocument(chat: ChatRef, path: string, options: { filename: string; caption: string }): Promise<void>
}

export function createBotGateway(api: Api, botToken: string): BotGateway {
	return {
		async copyMessage(toChat, fromChat, messageId, options) {
			const copied = await api.copyMessage(toChat, fromChat, messageId, {
				caption: options?.caption,
				parse_mode: options?.parseMode,
			})
			return copied.message_id
		},

		async sendMessage(chat, text, options) {
			const sent = await api.sendMessage(chat, text, { parse_mode: options?.parseMode })
			return sent.message_id
		},

		async setReplyMarkup(chat, messageId, keyboard) {
			await api.editMessageReplyMarkup(chat, messageId, keyboard ? { reply_markup: keyboard } : undefined)
		},

		async deleteMessage(chat, messageId) {
			await api.deleteMessage(chat, messageId)
		},

		async getChatMemberStatus(chat, userId) {
			const member = await api.getChatMember(chat, userId)
			return member.status
		},

		async downloadFile(fileId) {
			const file = await api.getFile(fileId)
			if (!file.file_path) {
				throw new Error(`file ${fileId} has no download path`)
			}

			const response = await fetch(`https://api.telegram.org/file/bot${botToken}/${file.file_path}`)
			if (!response.ok) {
				throw new Error(`file download failed with HTTP ${response.status}`)
			}

			return { data: Buffer.from(await response.arrayBuffer()), filePath: file.file_path }
		},

		async sendDocument(chat, path, options) {
			await api.sendDocument(chat, new InputFile(path, options.filename), { caption: options.caption })
		},
	}
}
