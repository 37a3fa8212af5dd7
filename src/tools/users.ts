/**
 * User tools
 */

import { USER_ROLES } from "../clients/models.js";
import type { BackendClient } from "../clients/types.js";
import { ArgumentReader } from "./args.js";
import { listContent, textContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createUserHandlers(
  client: BackendClient
): Pick<ToolHandlers, "listUsers" | "updateUserRole"> {
  return {
    listUsers: async (_args, { signal }) => {
      const users = await client.getUsers({ signal });
      return listContent(users);
    },

    updateUserRole: async (args, { signal }) => {
      const reader = new ArgumentReader(args);
      const id = reader.id("id");
      const role = reader.oneOf("role", USER_ROLES);
      await client.updateUserRole(id, role, { signal });
      return textContent("User updated successfully");
    },
  };
}
