import { parseChatId } from "../api/modules/settings-repository"
import type { SettingsRepository } from "../api/modules/settings-repository"
import type { BotGateway } from "./telegram-gateway"

const ADMIN_STATUSES = new Set(["administrator", "creator"])

type PermissionDeps = {
	adminIds: Set<number>
	settings: Pick<SettingsRepository, "getSetting">
	gateway: Pick<BotGateway, "getChatMemberStatus">
}

export type PermissionOracle = ReturnType<typeof createPermissionOracle>

// Lookup failures resolve to `false`.
export function createPermissionOracle(deps: PermissionDeps) {
	async function isGroupAdmin(chatId: number, userId: number): Promise<boolean> {
		try {
			const status = await deps.gateway.getChatMemberStatus(chatId, userId)
			return ADMIN_STATUSES.has(status)
		} catch (error) {
			console.error("get_chat_member_error", error)
			return false
		}
	}

	async function registeredGroupId(): Promise<number | null> {
		try {
			return parseChatId(await deps.settings.getSetting("GROUP_CHAT_ID"))
		} catch (error) {
			console.error("load_admin_group_error", error)
			return null
		}
	}

	async function isAdmin(userId: number): Promise<boolean> {
		if (deps.adminIds.has(userId)) {
			return true
		}
		const groupId = await registeredGroupId()
		if (groupId === null) {
			return false
		}
		return isGroupAdmin(groupId, userId)
	}

	// Group role only counts when the press happened inside the admin group.
	async function canModerateIn(chatId: number | undefined, userId: number): Promise<boolean> {
		if (deps.adminIds.has(userId)) {
			return true
		}
		const groupId = await registeredGroupId()
		if (groupId === null || chatId !== groupId) {
			return false
		}
		return isGroupAdmin(groupId, userId)
	}

	return {
		isAdmin,
		isGroupAdmin,
		canModerateIn,
	}
}
