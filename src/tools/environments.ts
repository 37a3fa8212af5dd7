/**
 * Environment tools
 *
 * Environments are the Docker or Kubernetes endpoints Portainer manages.
 * Access updates replace the full list; an empty list clears it.
 */

import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createEnvironmentHandlers(
  client: BackendClient
): Pick<
  ToolHandlers,
  | "listEnvironments"
  | "updateEnvironmentTags"
  | "updateEnvironmentUserAccesses"
  | "updateEnvironmentTeamAccesses"
> {
  return {
    listEnvironments: async (_args, { signal }) => {
      const environments = await client.getEnvironments({ signal });
      return listContent(environments);
    },

    updateEnvironmentTags: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      await client.updateEnvironmentTags(id, reader.idArray("tagIds"), { signal });
      return textContent("Environment tags updated successfully");
    },

    updateEnvironmentUserAccesses: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      await client.updateEnvironmentUserAccesses(id, reader.accessEntries("userAccesses"), {
        signal,
      });
      return textContent("Environment user accesses updated successfully");
    },

    updateEnvironmentTeamAccesses: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      await client.updateEnvironmentTeamAccesses(id, reader.accessEntries("teamAccesses"), {
        signal,
      });
      return textContent("Environment team accesses updated successfully");
    },
  };
}
