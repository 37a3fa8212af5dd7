/**
 * getSettings tool
 */

import type { BackendClient } from "../clients/types.js";
import { jsonContent } from "./results.js";
import type { ToolHandlers } from "./types.js";

export function createSettingsHandlers(client: BackendClient): Pick<ToolHandlers, "getSettings"> {
  return {
    getSettings: async (_args, { signal }) => jsonContent(await client.getSettings({ signal })),
  };
}
