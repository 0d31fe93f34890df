/**
 * Walletlist — src/features/roleGrant.ts
 * WHAT: RoleGranter over discord.js with permission and hierarchy pre-checks.
 * WHY: A clear reason ("bot role is below target role") beats a bare 50013 in the member's reply.
 * DOCS:
 *  - Role hierarchy: https://discord.com/developers/docs/topics/permissions#permission-hierarchy
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { PermissionFlagsBits, type Guild } from "discord.js";
import { logger } from "../lib/logger.js";
import type { RoleGranter, RoleGrantResult } from "./submission.js";

/**
 * Check if the bot can manage a specific role.
 * Discord's rules: the bot needs ManageRoles, and its highest role must sit strictly
 * above the target role. Bots never get the owner bypass.
 */
export function canManageRole(guild: Guild, roleId: string): { canManage: boolean; reason?: string } {
  const botMember = guild.members.me;
  if (!botMember) {
    return { canManage: false, reason: "Bot member not found in guild" };
  }

  if (!botMember.permissions.has(PermissionFlagsBits.ManageRoles)) {
    return { canManage: false, reason: "Bot missing Manage Roles permission" };
  }

  const targetRole = guild.roles.cache.get(roleId);
  if (!targetRole) {
    return { canManage: false, reason: "Target role not found" };
  }

  const botHighestRole = botMember.roles.highest;
  if (botHighestRole.position <= targetRole.position) {
    return {
      canManage: false,
      reason: `Bot role (${botHighestRole.name}) is not above ${targetRole.name}`,
    };
  }

  return { canManage: true };
}

export class DiscordRoleGranter implements RoleGranter {
  constructor(private readonly guild: Guild) {}

  /** Never throws; every failure comes back as `{ ok: false, reason }`. */
  async grantRole(userId: string, roleId: string): Promise<RoleGrantResult> {
    const member = await this.guild.members.fetch(userId).catch(() => null);
    if (!member) {
      return { ok: false, reason: "Member not found in guild" };
    }

    if (member.roles.cache.has(roleId)) {
      return { ok: true, action: "already_had" };
    }

    const permCheck = canManageRole(this.guild, roleId);
    if (!permCheck.canManage) {
      return { ok: false, reason: permCheck.reason ?? "Cannot manage role" };
    }

    try {
      // The reason string shows up in Discord's audit log.
      await member.roles.add(roleId, "Wallet submitted to whitelist");
      logger.info({ evt: "role_granted", userId, roleId, guildId: this.guild.id }, "[roles] granted");
      return { ok: true, action: "added" };
    } catch (err) {
      logger.warn({ evt: "role_grant_error", userId, roleId, err }, "[roles] add failed");
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }
}
