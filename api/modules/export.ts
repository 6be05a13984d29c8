import { Workbook } from "exceljs"
import { mkdtemp, rm } from "fs/promises"
import { tmpdir } from "os"
import { extname, join } from "path"
import sharp from "sharp"

import { describeError, logEvent } from "../../lib/logger"
import type { BotGateway } from "../../lib/telegram-gateway"
import { buildChannelLink } from "../../lib/utils"
import type { ModerationRecord, SubmissionQuery } from "./types"

const SHEET_NAME = "Submissions"
const IMAGE_ROW_HEIGHT = 120
const IMAGE_SIZE = 150
const IMAGE_TYPES = new Set(["photo", "sticker"])

export type ImageExtension = "jpeg" | "png" | "gif"

export type ExportImage = {
	buffer: Buffer
	extension: ImageExtension
}

// Resolves to `null` when the file has no embeddable image.
export type ImageLoader = (fileId: string) => Promise<ExportImage | null>

export type ExportTarget = {
	query: SubmissionQuery
	label: string
}

const TELEGRAM_HANDLE = /^[A-Za-z0-9_]{1,32}$/

// A numeric user id, or a username with or without the leading `@`.
export function parseExportTarget(raw: string): ExportTarget | null {
	const token = raw.trim().replace(/^@/, "")
	if (/^\d+$/.test(token)) {
		const userId = Number(token)
		return Number.isSafeInteger(userId) ? { query: { userId }, label: token } : null
	}
	if (TELEGRAM_HANDLE.test(token)) {
		return { query: { username: token }, label: `@${token}` }
	}
	return null
}

export function formatUtcTimestamp(value: string): string {
	const date = new Date(value)
	if (Number.isNaN(date.getTime())) {
		return value
	}
	return date.toISOString().slice(0, 19).replace("T", " ")
}

export async function buildSubmissionWorkbook(records: ModerationRecord[], loadImage: ImageLoader): Promise<Workbook> {
	const workbook = new Workbook()
	const sheet = workbook.addWorksheet(SHEET_NAME)
	sheet.columns = [
		{ header: "Message", key: "message", width: 70 },
		{ header: "Sent (UTC)", key: "sentAt", width: 22 },
		{ header: "Type", key: "type", width: 12 },
		{ header: "Channel Link", key: "link", width: 40 },
		{ header: "Photo", key: "photo", width: 25 },
	]

	for (const record of records) {
		const link = buildChannelLink(record.channelUsername, record.channelMessageId)
		const row = sheet.addRow({
			message: record.contentText ?? `(${record.messageType})`,
			sentAt: formatUtcTimestamp(record.createdAt),
			type: record.messageType,
			link: link ? { text: "Open", hyperlink: link } : "",
		})
		if (link) {
			row.getCell("link").font = { color: { argb: "FF0563C1" }, underline: true }
		}

		if (!IMAGE_TYPES.has(record.messageType) || !record.mediaFileId) {
			continue
		}

		const image = await loadExportImage(loadImage, record)
		if (!image) {
			continue
		}
		const imageId = workbook.addImage({ buffer: image.buffer, extension: image.extension })
		sheet.addImage(imageId, {
			tl: { col: 4, row: row.number - 1 },
			ext: { width: IMAGE_SIZE, height: IMAGE_SIZE },
		})
		row.height = IMAGE_ROW_HEIGHT
	}

	return workbook
}

async function loadExportImage(loadImage: ImageLoader, record: ModerationRecord): Promise<ExportImage | null> {
	if (!record.mediaFileId) {
		return null
	}
	try {
		return await loadImage(record.mediaFileId)
	} catch (error) {
		logEvent("export_image_skipped", { recordId: record.id, error: describeError(error) })
		return null
	}
}

export type SourceImageFormat = ImageExtension | "webp"

// Animated and video stickers (.tgs, .webm) have no still image to embed.
export function createImageLoader(gateway: Pick<BotGateway, "downloadFile">): ImageLoader {
	return async fileId => {
		const file = await gateway.downloadFile(fileId)
		const format = imageFormat(file.filePath)
		if (!format) {
			logEvent("export_image_unsupported", { filePath: file.filePath })
			return null
		}
		if (format === "webp") {
			return { buffer: await sharp(file.data).png().toBuffer(), extension: "png" }
		}
		return { buffer: file.data, extension: format }
	}
}

export function imageFormat(filePath: string): SourceImageFormat | null {
	const ext = extname(filePath).toLowerCase()
	if (ext === "" || ext === ".jpg" || ext === ".jpeg") {
		return "jpeg"
	}
	if (ext === ".png") {
		return "png"
	}
	if (ext === ".gif") {
		return "gif"
	}
	if (ext === ".webp") {
		return "webp"
	}
	return null
}

export type ExportDelivery = {
	records: ModerationRecord[]
	label: string
	requesterId: number
}

// The temp directory is removed even when the upload fails.
export async function deliverSubmissionExport(
	delivery: ExportDelivery,
	deps: { gateway: Pick<BotGateway, "sendDocument">; loadImage: ImageLoader },
): Promise<void> {
	const directory = await mkdtemp(join(tmpdir(), "anon-relay-"))
	try {
		const workbook = await buildSubmissionWorkbook(delivery.records, deps.loadImage)
		const filename = `info_${delivery.label.replace(/^@/, "")}.xlsx`
		const filePath = join(directory, filename)
		await workbook.xlsx.writeFile(filePath)

		await deps.gateway.sendDocument(delivery.requesterId, filePath, {
			filename,
			caption: `Submissions for ${delivery.label} (total: ${delivery.records.length})`,
		})
		logEvent("submission_export_sent", {
			label: delivery.label,
			requesterId: delivery.requesterId,
			rows: delivery.records.length,
		})
	} finally {
		await rm(directory, { recursive: true, force: true })
	}
}
