import type { SupabaseClient } from "@supabase/supabase-js"

import { StorageError } from "../../lib/errors"
import type { SettingKey } from "./types"

export type SettingsRepository = ReturnType<typeof createSettingsRepository>

export function createSettingsRepository(client: SupabaseClient, table: string) {
	async function getSetting(key: SettingKey): Promise<string | null> {
		const { data, error } = await client.from(table).select("value").eq("key", key).maybeSingle()

		if (error) {
			console.error("supabase_get_setting_error", error.message)
			throw new StorageError("getSetting", error.message)
		}
		if (!data) {
			return null
		}

		return String(data.value)
	}

	async function setSetting(key: SettingKey, value: string): Promise<void> {
		const { error } = await client.from(table).upsert({ key, value }, { onConflict: "key", ignoreDuplicates: false })
		if (error) {
			console.error("supabase_set_setting_error", error.message)
			throw new StorageError("setSetting", error.message)
		}
	}

	// Writes the value only when the key has never been set.
	async function seedSetting(key: SettingKey, value: string): Promise<void> {
		const { error } = await client.from(table).upsert({ key, value }, { onConflict: "key", ignoreDuplicates: true })
		if (error) {
			console.error("supabase_seed_setting_error", error.message)
			throw new StorageError("seedSetting", error.message)
		}
	}

	async function checkConnection(): Promise<boolean> {
		const { error } = await client.from(table).select("key").limit(1)
		if (error) {
			console.error("supabase_connection_check_error", error.message)
			return false
		}
		return true
	}

	return {
		getSetting,
		setSetting,
		seedSetting,
		checkConnection,
	}
}

export function parseChatId(value: string | null): number | null {
	if (value === null) {
		return null
	}
	const chatId = Number(value)
	return Number.isInteger(chatId) && chatId !== 0 ? chatId : null
}
