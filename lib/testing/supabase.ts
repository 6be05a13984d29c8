import { createClient } from "@supabase/supabase-js"
import type { SupabaseClient } from "@supabase/supabase-js"

export type RecordedRequest = {
	method: string
	table: string
	params: URLSearchParams
	prefer: string
	body: unknown
}

type Responder = (request: RecordedRequest) => Response

export function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } })
}

export function emptyResponse(status = 204, headers: Record<string, string> = {}): Response {
	return new Response(null, { status, headers })
}

export function errorResponse(message: string, status = 400): Response {
	return jsonResponse({ message, code: "XX000", details: null, hint: null }, status)
}

// A real client whose PostgREST traffic never leaves the process.
export function createRecordingSupabase(respond: Responder): { client: SupabaseClient; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = []

	const fetchStub: typeof fetch = async (input, init) => {
		const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url)
		const headers = new Headers(init?.headers)
		const rawBody = typeof init?.body === "string" ? init.body : null
		const request: RecordedRequest = {
			method: init?.method ?? "GET",
			table: url.pathname.replace(/^\/rest\/v1\//, ""),
			params: url.searchParams,
			prefer: headers.get("prefer") ?? "",
			body: rawBody === null ? null : JSON.parse(rawBody),
		}
		requests.push(request)
		return respond(request)
	}

	const client = createClient("https://project.supabase.test", "test-secret", {
		auth: { persistSession: false, autoRefreshToken: false },
		global: { fetch: fetchStub },
	})
	return { client, requests }
}
