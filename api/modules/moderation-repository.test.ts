import { beforeEach, describe, expect, test, vi } from "vitest"

import { StorageError } from "../../lib/errors"
import { createInMemoryStore } from "../../lib/testing/fakes"
import { createRecordingSupabase, emptyResponse, errorResponse, jsonResponse } from "../../lib/testing/supabase"
import {
	PAGE_SIZE,
	collapseUniqueSenders,
	createModerationRepository,
	escapeLikePattern,
	toModerationRecord,
} from "./moderation-repository"

describe("collapseUniqueSenders", () => {
	test("keeps one entry per user with their latest name, newest activity first", () => {
		const senders = collapseUniqueSenders([
			{ userId: 2, username: "dan_new", firstName: "Dan", lastName: null, lastSubmittedAt: "2026-01-03T00:00:00Z" },
			{ userId: 1, username: "ann", firstName: "Ann", lastName: "Lee", lastSubmittedAt: "2026-01-02T00:00:00Z" },
			{ userId: 2, username: "dan_old", firstName: "Dave", lastName: null, lastSubmittedAt: "2026-01-01T00:00:00Z" },
		])

		expect(senders.map(sender => [sender.userId, sender.username])).toEqual([
			[2, "dan_new"],
			[1, "ann"],
		])
	})
})

describe("listUniqueSenders over stored submissions", () => {
	test("orders users by their most recent submission", async () => {
		const store = createInMemoryStore()
		const submit = (userId: number, username: string) =>
			store.moderation.insertModerationRecord({
				userId,
				username,
				firstName: null,
				lastName: null,
				messageType: "text",
				contentText: "hi",
				mediaFileId: null,
				channelUsername: "@anon_board",
				channelMessageId: 1,
				groupMessageId: 1,
			})

		await submit(1, "ann")
		await submit(2, "dan_old")
		await submit(1, "ann")
		await submit(2, "dan_new")

		const senders = await store.moderation.listUniqueSenders()
		expect(senders.map(sender => [sender.userId, sender.username])).toEqual([
			[2, "dan_new"],
			[1, "ann"],
		])
	})
})

describe("escapeLikePattern", () => {
	test("escapes LIKE wildcards so usernames match exactly", () => {
		expect(escapeLikePattern("some_user")).toBe("some\\_user")
		expect(escapeLikePattern("50%\\off")).toBe("50\\%\\\\off")
	})
})

describe("toModerationRecord", () => {
	test("maps a Supabase row and falls back to other for unknown types", () => {
		expect(
			toModerationRecord({
				id: "7",
				user_id: 42,
				username: null,
				first_name: "Ann",
				last_name: null,
				message_type: "poll",
				content_text: null,
				media_file_id: null,
				channel_username: "@anon_board",
				channel_message_id: 11,
				group_message_id: 12,
				created_at: "2026-01-01T00:00:00+00:00",
			}),
		).toEqual({
			id: 7,
			userId: 42,
			username: null,
			firstName: "Ann",
			lastName: null,
			messageType: "other",
			contentText: null,
			mediaFileId: null,
			channelUsername: "@anon_board",
			channelMessageId: 11,
			groupMessageId: 12,
			createdAt: "2026-01-01T00:00:00+00:00",
		})
	})
})

describe("createModerationRepository over Supabase", () => {
	const tables = { moderationTable: "moderation", bansTable: "bans" }

	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => undefined)
	})

	function submissionRow(id: number, userId: number) {
		return {
			id,
			user_id: userId,
			username: `user_${userId}`,
			first_name: null,
			last_name: null,
			message_type: "text",
			content_text: `post ${id}`,
			media_file_id: null,
			channel_username: "@anon_board",
			channel_message_id: id,
			group_message_id: id,
			created_at: new Date(Date.UTC(2026, 0, 1) + id * 1000).toISOString(),
		}
	}

	test("insertModerationRecord returns the new id", async () => {
		const { client, requests } = createRecordingSupabase(() => jsonResponse({ id: 31 }, 201))
		const moderation = createModerationRepository(client, tables)

		const id = await moderation.insertModerationRecord({
			userId: 42,
			username: "alice",
			firstName: "Alice",
			lastName: null,
			messageType: "photo",
			contentText: "caption",
			mediaFileId: "file-1",
			channelUsername: "@anon_board",
			channelMessageId: 5,
			groupMessageId: 6,
		})

		expect(id).toBe(31)
		expect(requests[0].method).toBe("POST")
		expect(requests[0].table).toBe("moderation")
		expect(requests[0].body).toMatchObject({ user_id: 42, message_type: "photo", media_file_id: "file-1" })
	})

	test("listSubmissions by username matches case-insensitively with wildcards escaped", async () => {
		const { client, requests } = createRecordingSupabase(() => jsonResponse([submissionRow(1, 42)]))

		const records = await createModerationRepository(client, tables).listSubmissions({ username: "some_user" })

		expect(records.map(record => record.id)).toEqual([1])
		expect(requests[0].params.get("username")).toBe("ilike.some\\_user")
		expect(requests[0].params.get("order")).toBe("created_at.asc,id.asc")
	})

	test("listSubmissions reads past the PostgREST row cap", async () => {
		const { client, requests } = createRecordingSupabase(request => {
			const offset = Number(request.params.get("offset"))
			const size = offset === 0 ? PAGE_SIZE : 3
			return jsonResponse(Array.from({ length: size }, (_, index) => submissionRow(offset + index + 1, 42)))
		})

		const records = await createModerationRepository(client, tables).listSubmissions({ userId: 42 })

		expect(records).toHaveLength(PAGE_SIZE + 3)
		expect(records[PAGE_SIZE + 2].id).toBe(PAGE_SIZE + 3)
		expect(requests.map(request => [request.params.get("offset"), request.params.get("limit")])).toEqual([
			["0", String(PAGE_SIZE)],
			[String(PAGE_SIZE), String(PAGE_SIZE)],
		])
		expect(requests[0].params.get("user_id")).toBe("eq.42")
	})

	test("listUniqueSenders keeps senders that only appear after the first page", async () => {
		const { client, requests } = createRecordingSupabase(request => {
			if (request.params.get("offset") === "0") {
				return jsonResponse(Array.from({ length: PAGE_SIZE }, (_, index) => submissionRow(PAGE_SIZE + 1 - index, 1)))
			}
			return jsonResponse([submissionRow(0, 2)])
		})

		const senders = await createModerationRepository(client, tables).listUniqueSenders()

		expect(senders.map(sender => sender.userId)).toEqual([1, 2])
		expect(requests[0].params.get("order")).toBe("created_at.desc,id.desc")
	})

	test("ban ignores users that are already banned", async () => {
		const { client, requests } = createRecordingSupabase(() => emptyResponse(201))

		await createModerationRepository(client, tables).ban(42, "Admin ban")

		expect(requests[0].table).toBe("bans")
		expect(requests[0].params.get("on_conflict")).toBe("user_id")
		expect(requests[0].prefer).toContain("resolution=ignore-duplicates")
		expect(requests[0].body).toEqual({ user_id: 42, reason: "Admin ban" })
	})

	test("isBanned looks up one user", async () => {
		const { client, requests } = createRecordingSupabase(() => jsonResponse([{ user_id: 42 }]))

		expect(await createModerationRepository(client, tables).isBanned(42)).toBe(true)
		expect(requests[0].params.get("user_id")).toBe("eq.42")
	})

	test("stats counts both tables without fetching rows", async () => {
		const { client, requests } = createRecordingSupabase(request =>
			emptyResponse(200, { "content-range": request.table === "moderation" ? "*/12" : "*/3" }),
		)

		expect(await createModerationRepository(client, tables).stats()).toEqual({ totalSubmissions: 12, totalBans: 3 })
		expect(requests.map(request => [request.method, request.table])).toEqual([
			["HEAD", "moderation"],
			["HEAD", "bans"],
		])
		expect(requests[0].prefer).toContain("count=exact")
	})

	test("Supabase errors surface as StorageError", async () => {
		const { client } = createRecordingSupabase(() => errorResponse('relation "bans" does not exist', 404))

		await expect(createModerationRepository(client, tables).unban(42)).rejects.toThrow(
			new StorageError("unban", 'relation "bans" does not exist'),
		)
	})
})
