/**
 * Stack tools (Portainer edge stacks)
 *
 * Stacks are compose files deployed to every environment of the listed
 * environment groups.
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createStackHandlers(
  client: BackendClient
): Pick<ToolHandlers, "listStacks" | "getStackFile" | "createStack" | "updateStack"> {
  return {
    listStacks: async (_args, { signal }) => {
      const stacks = await client.getStacks({ signal });
      return listContent(stacks);
    },

    getStackFile: async (args, { signal }) => {
      const file = await client.getStackFile(new ArgumentReader(args).id("id"), { signal });
      return textContent(file);
    },

    createStack: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = await client.createStack(
        reader.string("name"),
        reader.string("file"),
        reader.idArray("environmentGroupIds"),
        { signal }
      );
      return textContent(`Stack created successfully with ID: ${id}`);
    },

    updateStack: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      await client.updateStack(
        reader.id("id"),
        reader.string("file"),
        reader.idArray("environmentGroupIds"),
        { signal }
      );
      return textContent("Stack updated successfully");
    },
  };
}
