/**
 * Access group tools (Portainer endpoint groups)
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createAccessGroupHandlers(
  client: BackendClient
): Pick<
  ToolHandlers,
  | "listAccessGroups"
  | "createAccessGroup"
  | "updateAccessGroupName"
  | "updateAccessGroupUserAccesses"
  | "updateAccessGroupTeamAccesses"
  | "addEnvironmentToAccessGroup"
  | "removeEnvironmentFromAccessGroup"
> {
  return {
    listAccessGroups: async (_args, { signal }) => {
      const groups = await client.getAccessGroups({ signal });
      return listContent(groups);
    },

    createAccessGroup: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const environmentIds = reader.has("environmentIds") ? reader.idArray("environmentIds") : [];
      const id = await client.createAccessGroup(reader.string("name"), environmentIds, { signal });
      return textContent(`Access group created successfully with ID: ${id}`);
    },

    updateAccessGroupName: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateAccessGroupName(reader.id("id"), reader.string("name"), { signal });
      return textContent("Access group name updated successfully");
    },

    updateAccessGroupUserAccesses: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      await client.updateAccessGroupUserAccesses(id, reader.accessEntries("userAccesses"), {
        signal,
      });
      return textContent("Access group user accesses updated successfully");
    },

    updateAccessGroupTeamAccesses: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      await client.updateAccessGroupTeamAccesses(id, reader.accessEntries("teamAccesses"), {
        signal,
      });
      return textContent("Access group team accesses updated successfully");
    },

    addEnvironmentToAccessGroup: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.addEnvironmentToAccessGroup(reader.id("id"), reader.id("environmentId"), {
        signal,
      });
      return textContent("Environment added to access group successfully");
    },

    removeEnvironmentFromAccessGroup: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.removeEnvironmentFromAccessGroup(reader.id("id"), reader.id("environmentId"), {
        signal,
      });
      return textContent("Environment removed from access group successfully");
    },
  };
}
