/**
 * Environment group tools (Portainer edge groups)
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createEnvironmentGroupHandlers(
  client: BackendClient
): Pick<
  ToolHandlers,
  | "listEnvironmentGroups"
  | "createEnvironmentGroup"
  | "updateEnvironmentGroupName"
  | "updateEnvironmentGroupEnvironments"
  | "updateEnvironmentGroupTags"
> {
  return {
    listEnvironmentGroups: async (_args, { signal }) => {
      const groups = await client.getEnvironmentGroups({ signal });
      return listContent(groups);
    },

    createEnvironmentGroup: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = await client.createEnvironmentGroup(
        reader.string("name"),
        reader.idArray("environmentIds"),
        { signal }
      );
      return textContent(`Environment group created successfully with ID: ${id}`);
    },

    updateEnvironmentGroupName: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateEnvironmentGroupName(reader.id("id"), reader.string("name"), { signal });
      return textContent("Environment group name updated successfully");
    },

    updateEnvironmentGroupEnvironments: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateEnvironmentGroupEnvironments(
        reader.id("id"),
        reader.idArray("environmentIds"),
        { signal }
      );
      return textContent("Environment group environments updated successfully");
    },

    updateEnvironmentGroupTags: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateEnvironmentGroupTags(reader.id("id"), reader.idArray("tagIds"), {
        signal,
      });
      return textContent("Environment group tags updated successfully");
    },
  };
}
