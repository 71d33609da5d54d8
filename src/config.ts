import { ConfigurationError } from "./errors/error.js";

export const USER_NAME_ATTRIBUTES_ENV = "OAUTH2_USER_NAME_ATTRIBUTES";

/**
 * Reads the endpoint -> name-attribute mapping from
 * `OAUTH2_USER_NAME_ATTRIBUTES`, a JSON object such as
 * `{"https://api.github.com/user":"login"}`.
 */
export function loadUserNameAttributesFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const raw = env[USER_NAME_ATTRIBUTES_ENV];
  if (!raw || !raw.trim()) {
    throw new ConfigurationError(`${USER_NAME_ATTRIBUTES_ENV} is required`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(
      `${USER_NAME_ATTRIBUTES_ENV} must be valid JSON`,
      { cause: e },
    );
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(
      `${USER_NAME_ATTRIBUTES_ENV} must be a JSON object`,
    );
  }

  const mapping: Record<string, string> = {};
  for (const [uri, attributeName] of Object.entries(parsed)) {
    if (typeof attributeName !== "string") {
      throw new ConfigurationError(
        `${USER_NAME_ATTRIBUTES_ENV}: attribute name for ${uri} must be a string`,
      );
    }
    mapping[uri] = attributeName;
  }
  return mapping;
}
