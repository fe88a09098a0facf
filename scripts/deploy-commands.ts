/**
 * WHAT: CLI helper to register the bot's slash commands.
 * WHY: Guild-scoped registration shows up instantly; global takes up to an hour.
 * FLOWS: build command JSON → REST PUT (guild when GUILD_ID is set, else global) → verify
 * DOCS:
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 *  - Bulk overwrite commands: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import "dotenv/config";
import { REST, Routes, type RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import * as spamguard from "../src/commands/spamguard.js";

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return [spamguard.data.toJSON()];
}

export function commandsRoute(appId: string, guildId?: string): `/${string}` {
  return guildId ? Routes.applicationGuildCommands(appId, guildId) : Routes.applicationCommands(appId);
}

function namesOf(result: unknown): string[] {
  if (!Array.isArray(result)) return [];
  return result.flatMap((cmd: unknown) => {
    const name: unknown = cmd && typeof cmd === "object" ? Reflect.get(cmd, "name") : undefined;
    return typeof name === "string" ? [name] : [];
  });
}

export async function deployCommands(appId: string, token: string, guildId?: string): Promise<string[]> {
  const rest = new REST({ version: "10" }).setToken(token);
  const commands = buildCommands();
  const route = commandsRoute(appId, guildId);

  await rest.put(route, { body: commands });

  const deployed = namesOf(await rest.get(route));
  const missing = commands.map((c) => c.name).filter((name) => !deployed.includes(name));
  if (missing.length > 0) {
    throw new Error(`Commands missing after deploy: ${missing.join(", ")}`);
  }
  return deployed;
}

// Only run when invoked directly, not when imported
if (import.meta.url === `file://${(process.argv[1] ?? "").replace(/\\/g, "/")}`) {
  const appId = process.env.CLIENT_ID;
  const token = process.env.DISCORD_TOKEN;
  const guildId = process.env.GUILD_ID || undefined;

  if (!appId || !token) {
    console.error("CLIENT_ID and DISCORD_TOKEN required");
    process.exit(1);
  }

  try {
    const deployed = await deployCommands(appId, token, guildId);
    console.log(JSON.stringify({ scope: guildId ? `guild:${guildId}` : "global", commands: deployed }));
  } catch (err) {
    console.error("[deploy] failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  }
}
