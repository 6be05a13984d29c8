import type { SupabaseClient } from "@supabase/supabase-js"

import { StorageError } from "../../lib/errors"
import type {
	MessageType,
	ModerationRecord,
	NewModerationRecord,
	SenderSummary,
	StoreStats,
	SubmissionQuery,
} from "./types"
import { MESSAGE_TYPES } from "./types"

export type ModerationRepository = ReturnType<typeof createModerationRepository>

type ModerationRepoConfig = {
	moderationTable: string
	bansTable: string
}

type Row = Record<string, unknown>

type PageResult = { data: Row[] | null; error: { message: string } | null }

// PostgREST caps every response at `max-rows`, 1000 by default on Supabase.
export const PAGE_SIZE = 1000

export function createModerationRepository(client: SupabaseClient, config: ModerationRepoConfig) {
	function fail(operation: string, message: string): never {
		console.error(`supabase_${operation}_error`, message)
		throw new StorageError(operation, message)
	}

	async function selectAllPages(
		operation: string,
		page: (from: number, to: number) => PromiseLike<PageResult>,
	): Promise<Row[]> {
		const rows: Row[] = []
		for (let from = 0; ; from += PAGE_SIZE) {
			const { data, error } = await page(from, from + PAGE_SIZE - 1)
			if (error) {
				return fail(operation, error.message)
			}
			const batch = data ?? []
			rows.push(...batch)
			if (batch.length < PAGE_SIZE) {
				return rows
			}
		}
	}

	async function insertModerationRecord(record: NewModerationRecord): Promise<number> {
		const payload = {
			user_id: record.userId,
			username: record.username,
			first_name: record.firstName,
			last_name: record.lastName,
			message_type: record.messageType,
			content_text: record.contentText,
			media_file_id: record.mediaFileId,
			channel_username: record.channelUsername,
			channel_message_id: record.channelMessageId,
			group_message_id: record.groupMessageId,
		}
		const { data, error } = await client.from(config.moderationTable).insert(payload).select("id").single()
		if (error) {
			return fail("insert_moderation", error.message)
		}

		return Number(data.id)
	}

	async function getModerationRecord(id: number): Promise<ModerationRecord | null> {
		const { data, error } = await client.from(config.moderationTable).select("*").eq("id", id).maybeSingle()
		if (error) {
			return fail("get_moderation", error.message)
		}

		return data ? toModerationRecord(data) : null
	}

	async function deleteModerationRecord(id: number): Promise<void> {
		const { error } = await client.from(config.moderationTable).delete().eq("id", id)
		if (error) {
			fail("delete_moderation", error.message)
		}
	}

	async function listSubmissions(query: SubmissionQuery): Promise<ModerationRecord[]> {
		const rows = await selectAllPages("list_submissions", (from, to) => {
			const base = client.from(config.moderationTable).select("*")
			const filtered =
				"userId" in query ? base.eq("user_id", query.userId) : base.ilike("username", escapeLikePattern(query.username))
			return filtered.order("created_at", { ascending: true }).order("id", { ascending: true }).range(from, to)
		})

		return rows.map(toModerationRecord)
	}

	async function listUniqueSenders(): Promise<SenderSummary[]> {
		const rows = await selectAllPages("list_senders", (from, to) =>
			client
				.from(config.moderationTable)
				.select("user_id, username, first_name, last_name, created_at")
				.order("created_at", { ascending: false })
				.order("id", { ascending: false })
				.range(from, to),
		)

		return collapseUniqueSenders(
			rows.map(row => ({
				userId: Number(row.user_id),
				username: nullableString(row.username),
				firstName: nullableString(row.first_name),
				lastName: nullableString(row.last_name),
				lastSubmittedAt: String(row.created_at),
			})),
		)
	}

	async function isBanned(userId: number): Promise<boolean> {
		const { data, error } = await client.from(config.bansTable).select("user_id").eq("user_id", userId).maybeSingle()
		if (error) {
			return fail("is_banned", error.message)
		}

		return data !== null
	}

	async function ban(userId: number, reason: string): Promise<void> {
		const { error } = await client
			.from(config.bansTable)
			.upsert({ user_id: userId, reason }, { onConflict: "user_id", ignoreDuplicates: true })
		if (error) {
			fail("ban", error.message)
		}
	}

	async function unban(userId: number): Promise<void> {
		const { error } = await client.from(config.bansTable).delete().eq("user_id", userId)
		if (error) {
			fail("unban", error.message)
		}
	}

	async function stats(): Promise<StoreStats> {
		const submissions = await client.from(config.moderationTable).select("id", { count: "exact", head: true })
		if (submissions.error) {
			return fail("count_submissions", submissions.error.message)
		}

		const bans = await client.from(config.bansTable).select("user_id", { count: "exact", head: true })
		if (bans.error) {
			return fail("count_bans", bans.error.message)
		}

		return { totalSubmissions: submissions.count ?? 0, totalBans: bans.count ?? 0 }
	}

	return {
		insertModerationRecord,
		getModerationRecord,
		deleteModerationRecord,
		listSubmissions,
		listUniqueSenders,
		isBanned,
		ban,
		unban,
		stats,
	}
}

// Expects rows newest first, so each user keeps their latest name.
export function collapseUniqueSenders(rows: SenderSummary[]): SenderSummary[] {
	const seen = new Map<number, SenderSummary>()
	for (const row of rows) {
		if (!seen.has(row.userId)) {
			seen.set(row.userId, row)
		}
	}
	return [...seen.values()]
}

// ILIKE without wildcards is a case-insensitive exact match.
export function escapeLikePattern(value: string): string {
	return value.replace(/[\\%_]/g, match => `\\${match}`)
}

export function toModerationRecord(row: Row): ModerationRecord {
	return {
		id: Number(row.id),
		userId: Number(row.user_id),
		username: nullableString(row.username),
		firstName: nullableString(row.first_name),
		lastName: nullableString(row.last_name),
		messageType: parseMessageType(row.message_type),
		contentText: nullableString(row.content_text),
		mediaFileId: nullableString(row.media_file_id),
		channelUsername: String(row.channel_username ?? ""),
		channelMessageId: Number(row.channel_message_id),
		groupMessageId: Number(row.group_message_id),
		createdAt: String(row.created_at),
	}
}

function parseMessageType(value: unknown): MessageType {
	return MESSAGE_TYPES.find(type => type === value) ?? "other"
}

function nullableString(value: unknown): string | null {
	return value === null || value === undefined ? null : String(value)
}
