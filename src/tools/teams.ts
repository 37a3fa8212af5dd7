/**
 * Team tools
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createTeamHandlers(
  client: BackendClient
): Pick<ToolHandlers, "listTeams" | "createTeam" | "updateTeamName" | "updateTeamMembers"> {
  return {
    listTeams: async (_args, { signal }) => {
      const teams = await client.getTeams({ signal });
      return listContent(teams);
    },

    createTeam: async (args, { signal }) => {
      const id = await client.createTeam(new ArgumentReader(args).string("name"), { signal });
      return textContent(`Team created successfully with ID: ${id}`);
    },

    updateTeamName: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateTeamName(reader.id("id"), reader.string("name"), { signal });
      return textContent("Team name updated successfully");
    },

    // Replaces the membership list; users not listed are removed
    updateTeamMembers: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateTeamMembers(reader.id("id"), reader.idArray("userIds"), { signal });
      return textContent("Team members updated successfully");
    },
  };
}
