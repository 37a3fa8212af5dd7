/**
 * Configuration Validation Utilities
 *
 * Validation and masking for connection settings.
 *
 * This module does NOT use the logger: the logger reads config,
 * and config reads this module. Callers log what they need.
 */

/**
 * Validate the Portainer base URL.
 *
 * Accepts http(s) URLs only and strips trailing slashes so paths
 * can be appended directly.
 *
 * @throws Error if the URL is missing or not http(s)
 */
export function validateServerUrl(value: string | undefined): string {
  if (!value || value.trim().length === 0) {
    throw new Error("server URL is empty (set STACKPILOT_SERVER_URL)");
  }

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    throw new Error(`server URL is not a valid URL (got: ${value})`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new Error(`server URL must use http or https (got: ${url.protocol})`);
  }

  return url.toString().replace(/\/+$/, "");
}

/**
 * Validate the Portainer API token.
 *
 * @throws Error if the token is missing or contains whitespace
 */
export function validateApiToken(value: string | undefined): string {
  if (!value || value.trim().length === 0) {
    throw new Error("API token is empty (set STACKPILOT_API_TOKEN)");
  }

  if (/\s/.test(value.trim())) {
    throw new Error(`API token must not contain whitespace (got: ${maskApiToken(value)})`);
  }

  return value.trim();
}

/**
 * Mask a token for safe logging.
 *
 * Shows first 3 and last 4 characters, masks the rest.
 * Example: ptr...9f2a
 */
export function maskApiToken(token: string): string {
  if (!token || token.length < 8) {
    return "***";
  }

  const prefix = token.slice(0, 3);
  const suffix = token.slice(-4);
  return `${prefix}...${suffix}`;
}
