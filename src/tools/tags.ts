/**
 * Environment tag tools
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createTagHandlers(
  client: BackendClient
): Pick<ToolHandlers, "listEnvironmentTags" | "createEnvironmentTag"> {
  return {
    listEnvironmentTags: async (_args, { signal }) => {
      const tags = await client.getEnvironmentTags({ signal });
      return listContent(tags);
    },

    createEnvironmentTag: async (args, { signal }) => {
      const name = new ArgumentReader(args).string("name");
      const id = await client.createEnvironmentTag(name, { signal });
      return textContent(`Environment tag created successfully with ID: ${id}`);
    },
  };
}
